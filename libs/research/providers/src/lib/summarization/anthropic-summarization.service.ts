import { Logger } from '@nestjs/common';
import Anthropic from '@anthropic-ai/sdk';
import { METRIC_FIELDS, ResearchRecord } from '@equity-research/shared/types';
import { ServiceUnavailableError, errorMessage } from '@equity-research/shared/utils';
import { SummarizationService } from '../interfaces/providers.interface';

export interface AnthropicSummarizationOptions {
  apiKey: string | undefined;
  model: string;
  timeoutMs: number;
  maxTokens?: number;
}

const HEADLINES_IN_PROMPT = 3;

export function buildSummaryPrompt(record: ResearchRecord): string {
  const headlines = record.news
    .slice(0, HEADLINES_IN_PROMPT)
    .map((item) => `- ${item.title}`)
    .join('\n');

  const metrics = METRIC_FIELDS.flatMap((field) => {
    const value = record.rawMetrics[field];
    return value === null || value === undefined || value === 'N/A' ? [] : [`- ${field}: ${value}`];
  }).join('\n');

  return [
    'Summarize the following investment research data concisely:',
    '',
    `Company: ${record.ticker}`,
    '',
    `Recent News (${record.news.length} articles):`,
    headlines || '- none',
    '',
    'Financial Metrics:',
    metrics || '- none',
    '',
    'Provide a 3-4 sentence summary highlighting the most important points for an investor.',
  ].join('\n');
}

/**
 * Best-effort narrative summary through the Anthropic Messages API.
 * Retries are owned by the research stage, so the SDK's own retries are off.
 */
export class AnthropicSummarizationService implements SummarizationService {
  private readonly logger = new Logger(AnthropicSummarizationService.name);
  private readonly client: Anthropic | null;

  constructor(private readonly options: AnthropicSummarizationOptions) {
    this.client = options.apiKey
      ? new Anthropic({ apiKey: options.apiKey, maxRetries: 0, timeout: options.timeoutMs })
      : null;
  }

  async summarize(record: ResearchRecord, signal?: AbortSignal): Promise<string> {
    if (!this.client) {
      throw new ServiceUnavailableError('ANTHROPIC_API_KEY is not configured');
    }

    let text: string;
    try {
      const response = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens ?? 400,
          messages: [{ role: 'user', content: buildSummaryPrompt(record) }],
        },
        { signal }
      );

      text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('\n')
        .trim();
    } catch (error) {
      this.logger.warn(`[${record.ticker}] Summarization failed: ${errorMessage(error)}`);
      throw new ServiceUnavailableError(`Summarization failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!text) {
      throw new ServiceUnavailableError('Summarization returned no text');
    }
    return text;
  }
}
