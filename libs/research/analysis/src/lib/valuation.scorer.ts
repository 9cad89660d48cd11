import { Injectable } from '@nestjs/common';
import {
  FinancialMetrics,
  ScoreComponent,
  ValuationResult,
} from '@equity-research/shared/types';

type Bucket = (value: number) => number | undefined;

// Evaluated in order; the first bucket that matches wins.
const PE_BUCKETS: Bucket[] = [
  (pe) => (pe < 12 ? 25 : undefined),
  (pe) => (pe < 18 ? 15 : undefined),
  (pe) => (pe < 25 ? 5 : undefined),
  (pe) => (pe < 35 ? -10 : undefined),
  () => -25,
];

const GROWTH_BUCKETS: Bucket[] = [
  (g) => (g > 20 ? 20 : undefined),
  (g) => (g >= 10 ? 10 : undefined),
  (g) => (g >= 5 ? 5 : undefined),
  (g) => (g < 0 ? -20 : undefined),
  () => 0,
];

const MARGIN_BUCKETS: Bucket[] = [
  (m) => (m > 25 ? 15 : undefined),
  (m) => (m >= 15 ? 8 : undefined),
  (m) => (m >= 8 ? 3 : undefined),
  (m) => (m < 5 ? -15 : undefined),
  () => 0,
];

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * Bucket-based valuation heuristic over PE ratio, revenue growth % and
 * profit margin %. The total is the plain sum of the components.
 */
@Injectable()
export class ValuationScorer {
  score(metrics: FinancialMetrics): ValuationResult {
    const breakdown = {
      peRatio: this.component(metrics.peRatio, PE_BUCKETS),
      revenueGrowth: this.component(metrics.revenueGrowth, GROWTH_BUCKETS),
      profitMargin: this.component(metrics.profitMargin, MARGIN_BUCKETS),
    };

    const rawTotal = breakdown.peRatio.points + breakdown.revenueGrowth.points + breakdown.profitMargin.points;

    return {
      rawTotal,
      score: clamp(rawTotal, 0, 100),
      breakdown,
    };
  }

  private component(value: number | null, buckets: Bucket[]): ScoreComponent {
    if (value === null) {
      return { status: 'unavailable', value: null, points: 0 };
    }

    for (const bucket of buckets) {
      const points = bucket(value);
      if (points !== undefined) {
        return { status: 'scored', value, points };
      }
    }
    return { status: 'scored', value, points: 0 };
  }
}
