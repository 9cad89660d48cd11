/**
 * Research Stage Types
 * Provider-facing data gathered for one ticker before analysis
 */

import { DataSource, FailureKind } from './enums';

/**
 * A provider value as it arrives: numeric, a decorated string ("$2.5T",
 * "7.9%"), or missing. Percentages are in percent units.
 */
export type RawMetricValue = number | string | null | undefined;

export const METRIC_FIELDS = [
  'peRatio',
  'marketCap',
  'revenue',
  'earnings',
  'profitMargin',
  'revenueGrowth',
] as const;

export type MetricField = (typeof METRIC_FIELDS)[number];

export type RawMetrics = Readonly<Partial<Record<MetricField, RawMetricValue>>>;

export interface NewsItem {
  readonly title: string;
  readonly snippet: string;
  readonly url: string;
  readonly publishedAt: string | null; // ISO-8601, provider order is not chronological
  readonly source?: string;
}

export interface SourceError {
  readonly source: DataSource;
  readonly kind: FailureKind;
  readonly message: string;
}

export interface ResearchRecord {
  readonly ticker: string;
  readonly researchedAt: string;
  readonly rawMetrics: RawMetrics;
  readonly news: readonly NewsItem[];
  readonly summary: string | null; // null when summarization was skipped or failed
  readonly sourceErrors: readonly SourceError[];
}
