import { Injectable, Logger } from '@nestjs/common';
import {
  FinancialMetrics,
  METRIC_FIELDS,
  MetricField,
  MetricWarning,
  ParsedMetrics,
  RawMetricValue,
  RawMetrics,
} from '@equity-research/shared/types';

const ABSENT_MARKERS = new Set(['N/A', '-']);
const MONEY_FIELDS: ReadonlySet<MetricField> = new Set<MetricField>(['marketCap', 'revenue', 'earnings']);
const SUFFIX_MULTIPLIERS: Record<string, number> = {
  K: 1e3,
  M: 1e6,
  B: 1e9,
  T: 1e12,
};

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;
const MONEY_PATTERN = /^([-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?)([KMBT])?$/i;

type FieldParse =
  | { kind: 'value'; value: number }
  | { kind: 'absent' }
  | { kind: 'malformed'; rawValue: string; message: string };

/**
 * Normalizes provider metrics into numbers. Missing and malformed fields become
 * null; malformed ones also produce a warning instead of failing the run.
 */
@Injectable()
export class FinancialMetricsParser {
  private readonly logger = new Logger(FinancialMetricsParser.name);

  parse(raw: RawMetrics, ticker?: string): ParsedMetrics {
    const metrics: Record<MetricField, number | null> = {
      peRatio: null,
      marketCap: null,
      revenue: null,
      earnings: null,
      profitMargin: null,
      revenueGrowth: null,
    };
    const missingFields: MetricField[] = [];
    const warnings: MetricWarning[] = [];

    for (const field of METRIC_FIELDS) {
      const result = this.parseField(field, raw[field]);

      if (result.kind === 'value') {
        metrics[field] = result.value;
        continue;
      }

      missingFields.push(field);

      if (result.kind === 'malformed') {
        warnings.push({ field, rawValue: result.rawValue, message: result.message });
        this.logger.warn(`${ticker ? `[${ticker}] ` : ''}${field}: ${result.message}`);
      }
    }

    const parsed: FinancialMetrics = metrics;
    return { metrics: parsed, missingFields, warnings };
  }

  private parseField(field: MetricField, value: RawMetricValue): FieldParse {
    if (value === null || value === undefined) {
      return { kind: 'absent' };
    }

    if (typeof value === 'number') {
      return Number.isFinite(value)
        ? { kind: 'value', value }
        : { kind: 'malformed', rawValue: String(value), message: `non-finite value ${value}` };
    }

    const trimmed = value.trim();
    if (ABSENT_MARKERS.has(trimmed.toUpperCase())) {
      return { kind: 'absent' };
    }
    if (trimmed.length === 0) {
      return { kind: 'malformed', rawValue: value, message: 'empty value' };
    }

    const cleaned = trimmed.replace(/[$,%\s]/g, '');
    const parsed = MONEY_FIELDS.has(field) ? this.parseMoney(cleaned) : this.parsePlain(cleaned);

    if (parsed === null) {
      return { kind: 'malformed', rawValue: value, message: `could not parse "${value}" as a number` };
    }
    return { kind: 'value', value: parsed };
  }

  private parsePlain(cleaned: string): number | null {
    if (!NUMBER_PATTERN.test(cleaned)) {
      return null;
    }
    const value = Number(cleaned);
    return Number.isFinite(value) ? value : null;
  }

  private parseMoney(cleaned: string): number | null {
    const match = MONEY_PATTERN.exec(cleaned);
    if (!match) {
      return null;
    }

    const [, amount, suffix] = match;
    const value = Number(amount) * (suffix ? SUFFIX_MULTIPLIERS[suffix.toUpperCase()] : 1);
    return Number.isFinite(value) ? value : null;
  }
}
