import {
  BatchSummary,
  BatchSummaryEntry,
  RecommendationAction,
  RecommendationPriority,
  TickerOutcome,
} from '@equity-research/shared/types';

/**
 * Highest action priority wins, then higher valuation score. Equal keys keep
 * input order.
 */
export function rankEntries(entries: readonly BatchSummaryEntry[]): BatchSummaryEntry[] {
  return [...entries].sort(
    (a, b) => RecommendationPriority[b.action] - RecommendationPriority[a.action] || b.score - a.score
  );
}

export function summarizeBatch(outcomes: readonly TickerOutcome[]): BatchSummary {
  const entries: BatchSummaryEntry[] = [];
  const failures: BatchSummary['failures'] = [];
  const recommendationCounts: Record<RecommendationAction, number> = {
    [RecommendationAction.BUY]: 0,
    [RecommendationAction.HOLD]: 0,
    [RecommendationAction.SELL]: 0,
  };

  for (const outcome of outcomes) {
    if (outcome.status === 'success') {
      const action = outcome.report.recommendation.action;
      entries.push({ ticker: outcome.ticker, action, score: outcome.report.financial_analysis.valuation_score });
      recommendationCounts[action]++;
    } else {
      failures.push({ ticker: outcome.ticker, kind: outcome.kind, reason: outcome.reason });
    }
  }

  const counts =
    `Recommendations: ${recommendationCounts[RecommendationAction.BUY]} Buy, ` +
    `${recommendationCounts[RecommendationAction.HOLD]} Hold, ` +
    `${recommendationCounts[RecommendationAction.SELL]} Sell.`;
  const header = `Analyzed ${outcomes.length} stocks: ${entries.length} succeeded, ${failures.length} failed.`;

  const base = {
    total: outcomes.length,
    successful: entries.length,
    failed: failures.length,
    entries,
    failures,
    recommendationCounts,
  };

  if (entries.length === 0) {
    const note = 'No stock completed analysis.';
    return { ...base, topPick: null, note, narrative: `${header} ${note}` };
  }

  const firstAction = entries[0].action;
  if (entries.every((entry) => entry.action === firstAction)) {
    const note = `All analyzed stocks are rated ${firstAction}; no clear favorite.`;
    return { ...base, topPick: null, note, narrative: `${header} ${counts} ${note}` };
  }

  const [top] = rankEntries(entries);
  return {
    ...base,
    topPick: top.ticker,
    narrative: `${header} ${counts} Top pick: ${top.ticker} (${top.action}, valuation score ${top.score.toFixed(1)}).`,
  };
}
