import { Logger } from '@nestjs/common';
import { FailureKind, ResearchRecord } from '@equity-research/shared/types';
import {
  AnthropicSummarizationService,
  buildSummaryPrompt,
} from './anthropic-summarization.service';

const mockCreate = jest.fn();

jest.mock('@anthropic-ai/sdk', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    messages: { create: (...args: unknown[]) => mockCreate(...args) },
  })),
}));

const record: ResearchRecord = {
  ticker: 'ACME',
  researchedAt: '2025-03-01T10:00:00.000Z',
  rawMetrics: { peRatio: 22.5, marketCap: 'N/A', revenue: 5000000000, profitMargin: null },
  news: [
    { title: 'Acme beats earnings estimates', snippet: '', url: 'https://news.example.com/1', publishedAt: null },
    { title: 'Acme expands into Europe', snippet: '', url: 'https://news.example.com/2', publishedAt: null },
  ],
  summary: null,
  sourceErrors: [],
};

describe('AnthropicSummarizationService', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const createService = (apiKey: string | undefined) =>
    new AnthropicSummarizationService({ apiKey, model: 'test-model', timeoutMs: 1000 });

  it('should build a prompt from headlines and present metrics', () => {
    expect(buildSummaryPrompt(record)).toBe(
      [
        'Summarize the following investment research data concisely:',
        '',
        'Company: ACME',
        '',
        'Recent News (2 articles):',
        '- Acme beats earnings estimates',
        '- Acme expands into Europe',
        '',
        'Financial Metrics:',
        '- peRatio: 22.5',
        '- revenue: 5000000000',
        '',
        'Provide a 3-4 sentence summary highlighting the most important points for an investor.',
      ].join('\n')
    );
  });

  it('should return the joined text blocks of the response', async () => {
    mockCreate.mockResolvedValue({
      content: [
        { type: 'text', text: 'Acme grew revenue strongly. ' },
        { type: 'text', text: 'Valuation looks fair.' },
      ],
    });
    const controller = new AbortController();

    const summary = await createService('test-secret').summarize(record, controller.signal);

    expect(summary).toBe('Acme grew revenue strongly. \nValuation looks fair.');
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: 'test-model',
        max_tokens: 400,
        messages: [{ role: 'user', content: buildSummaryPrompt(record) }],
      },
      { signal: controller.signal }
    );
  });

  it('should fail with ServiceUnavailable when the API call fails', async () => {
    mockCreate.mockRejectedValue(new Error('overloaded'));

    await expect(createService('test-secret').summarize(record)).rejects.toMatchObject({
      kind: FailureKind.SERVICE_UNAVAILABLE,
      message: 'Summarization failed: overloaded',
    });
  });

  it('should fail with ServiceUnavailable when the response has no text', async () => {
    mockCreate.mockResolvedValue({ content: [] });

    await expect(createService('test-secret').summarize(record)).rejects.toThrow('Summarization returned no text');
  });

  it('should fail with ServiceUnavailable when no api key is configured', async () => {
    await expect(createService(undefined).summarize(record)).rejects.toMatchObject({
      kind: FailureKind.SERVICE_UNAVAILABLE,
    });
    expect(mockCreate).not.toHaveBeenCalled();
  });
});
