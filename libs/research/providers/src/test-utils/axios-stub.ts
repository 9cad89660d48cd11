import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
  status: number;
  data: unknown;
}

export interface AxiosStub {
  adapter: AxiosAdapter;
  calls: InternalAxiosRequestConfig[];
}

/**
 * In-process axios transport: every request is answered by `handler`,
 * statuses >= 400 reject the way axios' own adapters do.
 */
export function createAxiosStub(handler: (config: InternalAxiosRequestConfig) => StubReply): AxiosStub {
  const calls: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const { status, data } = handler(config);
    const response: AxiosResponse = {
      data,
      status,
      statusText: String(status),
      headers: {},
      config,
    };

    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response
      );
    }
    return response;
  };

  return { adapter, calls };
}
