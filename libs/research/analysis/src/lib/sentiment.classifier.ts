import { Injectable } from '@nestjs/common';
import {
  NewsItem,
  SentimentLabel,
  SentimentResult,
} from '@equity-research/shared/types';
import lexicon from './sentiment-lexicon.json';

const RECENT_HEADLINE_COUNT = 3;

/**
 * Keyword-lexicon sentiment over news items. Matching is a case-insensitive
 * substring search of title + snippet; an item may count as both.
 */
@Injectable()
export class SentimentClassifier {
  private readonly positive: string[];
  private readonly negative: string[];

  constructor() {
    this.positive = lexicon.positive.map((word) => word.toLowerCase());
    this.negative = lexicon.negative.map((word) => word.toLowerCase());
  }

  classify(news: readonly NewsItem[]): SentimentResult {
    let positiveCount = 0;
    let negativeCount = 0;
    let neutralCount = 0;

    for (const item of news) {
      const text = `${item.title} ${item.snippet}`.toLowerCase();
      const isPositive = this.positive.some((word) => text.includes(word));
      const isNegative = this.negative.some((word) => text.includes(word));

      if (isPositive) positiveCount++;
      if (isNegative) negativeCount++;
      if (!isPositive && !isNegative) neutralCount++;
    }

    const totalCount = news.length;
    let label = SentimentLabel.NEUTRAL;
    if (positiveCount > negativeCount) {
      label = SentimentLabel.POSITIVE;
    } else if (negativeCount > positiveCount) {
      label = SentimentLabel.NEGATIVE;
    }

    // No articles: fully confident neutral
    const confidence =
      totalCount > 0 ? Math.round(((100 * Math.max(positiveCount, negativeCount)) / totalCount) * 100) / 100 : 100;

    return {
      label,
      confidence,
      positiveCount,
      negativeCount,
      neutralCount,
      totalCount,
      recentHeadlines: news.slice(0, RECENT_HEADLINE_COUNT).map((item) => item.title),
    };
  }
}
