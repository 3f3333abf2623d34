/**
 * Month-by-month evolution of topics and message quality. Months are UTC
 * calendar months; only months that hold messages are reported.
 */

import { ClassifiedMessage } from '../classification/types';
import { MonthlyQualityTrend, MonthlyTopicCounts } from './types';

const POSITIVE_NAME = /positive/i;

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function monthOf(ms: number): string {
  return new Date(ms).toISOString().slice(0, 7);
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Messages grouped by month, months in ascending order */
function byMonth(messages: readonly ClassifiedMessage[]): Array<[string, ClassifiedMessage[]]> {
  const groups = new Map<string, ClassifiedMessage[]>();
  for (const m of messages) {
    const month = monthOf(m.timestamp);
    const group = groups.get(month);
    if (group) group.push(m);
    else groups.set(month, [m]);
  }
  return Array.from(groups.entries()).sort(([a], [b]) => a.localeCompare(b));
}

/** Zero-filled record over sorted keys */
function zeroed(keys: Iterable<string>): Record<string, number> {
  const record: Record<string, number> = {};
  for (const key of Array.from(new Set(keys)).sort()) record[key] = 0;
  return record;
}

export function analyzeTopicEvolution(messages: readonly ClassifiedMessage[]): MonthlyTopicCounts[] {
  const allTopics = messages.flatMap((m) => m.labels.topics);

  return byMonth(messages).map(([month, group]) => {
    const counts = zeroed(allTopics);
    for (const m of group) {
      for (const topic of m.labels.topics) counts[topic]++;
    }
    return { month, counts };
  });
}

export function analyzeQualityTrends(messages: readonly ClassifiedMessage[]): MonthlyQualityTrend[] {
  const allSentiments = messages.map((m) => m.labels.sentiment);

  return byMonth(messages).map(([month, group]) => {
    const sentimentMix = zeroed(allSentiments);
    for (const m of group) sentimentMix[m.labels.sentiment]++;

    let positiveRatio = 0;
    for (const [name, count] of Object.entries(sentimentMix)) {
      sentimentMix[name] = round(count / group.length, 4);
      if (POSITIVE_NAME.test(name)) positiveRatio += count / group.length;
    }

    const words = group.map((m) => m.wordCount);
    const failing = group.filter((m) => m.labels.failureCount > 0).length;

    return {
      month,
      messageCount: group.length,
      sentimentMix,
      positiveRatio: round(positiveRatio, 4),
      failureRate: round((failing / group.length) * 100, 2),
      meanWords: round(words.reduce((a, b) => a + b, 0) / words.length, 2),
      medianWords: median(words),
    };
  });
}
