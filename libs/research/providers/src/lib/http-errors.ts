import axios from 'axios';
import {
  CancelledError,
  ProviderUnavailableError,
  RateLimitedError,
  ResearchError,
  TickerNotFoundError,
  errorMessage,
  isResearchError,
} from '@equity-research/shared/utils';

/**
 * Maps an axios failure onto the research error taxonomy
 */
export function toProviderError(error: unknown, providerName: string, ticker?: string): ResearchError {
  if (isResearchError(error)) {
    return error;
  }

  if (axios.isCancel(error)) {
    return new CancelledError(`${providerName} request cancelled`, { cause: error });
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status === 429) {
      return new RateLimitedError(`${providerName} rate limit exceeded`, { cause: error });
    }
    if (status === 404 && ticker) {
      return new TickerNotFoundError(ticker, { cause: error });
    }
    if (status === 401 || status === 403) {
      return new ProviderUnavailableError(`${providerName} rejected the API key (HTTP ${status})`, { cause: error });
    }
    if (status !== undefined) {
      return new ProviderUnavailableError(`${providerName} API error: HTTP ${status}`, { cause: error });
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ProviderUnavailableError(`${providerName} request timed out`, { cause: error });
    }
  }

  return new ProviderUnavailableError(`${providerName} request failed: ${errorMessage(error)}`, { cause: error });
}
