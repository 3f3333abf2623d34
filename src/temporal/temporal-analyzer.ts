/**
 * Temporal Analyzer
 *
 * Corpus-wide time patterns over every classified message. All calendar
 * arithmetic is done in UTC so results do not depend on the host zone.
 */

import { AnalysisThresholds } from '../config/types';
import { ClassifiedMessage } from '../classification/types';
import { analyzeQualityTrends, analyzeTopicEvolution } from './evolution-analyzer';
import { ActivityStreak, DailyEngagement, TemporalProfile, TrendMetric, TrendShift, WEEKDAYS, Weekday } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;
const TOP_N = 3;

const POSITIVE = new Set(['Positive', 'Very Positive']);
const NEGATIVE = new Set(['Negative', 'Very Negative']);

const TREND_METRICS: readonly TrendMetric[] = ['sentiment', 'failure_rate'];

const METRICS: Record<TrendMetric, (m: ClassifiedMessage) => number> = {
  sentiment: (m) => (POSITIVE.has(m.labels.sentiment) ? 1 : NEGATIVE.has(m.labels.sentiment) ? -1 : 0),
  failure_rate: (m) => (m.labels.failureCount > 0 ? 1 : 0),
};

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function isoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** Monday = 0 ... Sunday = 6 */
function weekdayIndex(ms: number): number {
  return (new Date(ms).getUTCDay() + 6) % 7;
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

function stdDev(values: number[]): number {
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
}

/** Non-zero entries, highest count first, lower index on ties */
function topIndices(counts: number[], n: number): Array<{ index: number; count: number }> {
  return counts
    .map((count, index) => ({ index, count }))
    .filter((e) => e.count > 0)
    .sort((a, b) => b.count - a.count || a.index - b.index)
    .slice(0, n);
}

function findStreaks(messages: readonly ClassifiedMessage[]): ActivityStreak[] {
  const perDay = new Map<number, number>();
  for (const m of messages) {
    const day = Math.floor(m.timestamp / DAY_MS);
    perDay.set(day, (perDay.get(day) ?? 0) + 1);
  }

  const days = Array.from(perDay.keys()).sort((a, b) => a - b);
  const streaks: ActivityStreak[] = [];
  let runStart = 0;

  for (let i = 1; i <= days.length; i++) {
    if (i < days.length && days[i] === days[i - 1] + 1) continue;
    const run = days.slice(runStart, i);
    if (run.length > 0) {
      streaks.push({
        start: isoDate(run[0] * DAY_MS),
        end: isoDate(run[run.length - 1] * DAY_MS),
        days: run.length,
        messageCount: run.reduce((sum, d) => sum + (perDay.get(d) ?? 0), 0),
      });
    }
    runStart = i;
  }

  return streaks.sort((a, b) => b.days - a.days || a.start.localeCompare(b.start));
}

export function dailyEngagement(messages: readonly ClassifiedMessage[]): DailyEngagement[] {
  const byDate = new Map<string, { messages: number; words: number; conversations: Set<string> }>();
  for (const m of messages) {
    const date = isoDate(m.timestamp);
    const entry = byDate.get(date) ?? { messages: 0, words: 0, conversations: new Set<string>() };
    entry.messages++;
    entry.words += m.wordCount;
    entry.conversations.add(m.conversationId);
    byDate.set(date, entry);
  }

  const rows = Array.from(byDate.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, e]) => ({
      date,
      messageCount: e.messages,
      conversationCount: e.conversations.size,
      avgWords: e.words / e.messages,
    }));

  const maxMessages = Math.max(0, ...rows.map((r) => r.messageCount));
  const maxWords = Math.max(0, ...rows.map((r) => r.avgWords));
  const maxConversations = Math.max(0, ...rows.map((r) => r.conversationCount));
  const share = (value: number, max: number) => (max > 0 ? value / max : 0);

  return rows.map((r) => ({
    ...r,
    avgWords: round(r.avgWords, 2),
    score: round(
      100 *
        (0.4 * share(r.messageCount, maxMessages) +
          0.3 * share(r.avgWords, maxWords) +
          0.3 * share(r.conversationCount, maxConversations)),
      2,
    ),
  }));
}

/**
 * Compare consecutive non-overlapping windows of a time-ordered series.
 * A window shifts when its mean moves by at least minMagnitude and by more
 * than stdDevThreshold standard deviations of the window before it.
 */
export function detectTrendShifts(
  ordered: readonly ClassifiedMessage[],
  thresholds: Pick<AnalysisThresholds, 'trendWindowSize' | 'trendStdDevThreshold' | 'trendMinMagnitude'>,
): TrendShift[] {
  const w = thresholds.trendWindowSize;
  const shifts: TrendShift[] = [];

  for (const metric of TREND_METRICS) {
    const series = ordered.map(METRICS[metric]);

    for (let start = w; start + w <= series.length; start += w) {
      const previous = series.slice(start - w, start);
      const current = series.slice(start, start + w);
      const previousMean = mean(previous);
      const currentMean = mean(current);
      const diff = currentMean - previousMean;
      const magnitude = Math.abs(diff);

      if (magnitude >= thresholds.trendMinMagnitude && magnitude > thresholds.trendStdDevThreshold * stdDev(previous)) {
        shifts.push({
          metric,
          timestamp: new Date(ordered[start].timestamp).toISOString(),
          index: start,
          previousMean: round(previousMean, 4),
          currentMean: round(currentMean, 4),
          magnitude: round(magnitude, 4),
          direction: diff > 0 ? 'increase' : 'decrease',
        });
      }
    }
  }

  return shifts;
}

export function analyzeTemporalProfile(
  messages: readonly ClassifiedMessage[],
  thresholds: AnalysisThresholds,
): TemporalProfile {
  // Array.prototype.sort is stable, so equal timestamps keep corpus order
  const ordered = [...messages].sort((a, b) => a.timestamp - b.timestamp);

  const heatmap = WEEKDAYS.map(() => new Array<number>(24).fill(0));
  const hourly = new Array<number>(24).fill(0);
  const weekdayCounts = new Array<number>(7).fill(0);

  for (const m of ordered) {
    const hour = new Date(m.timestamp).getUTCHours();
    const day = weekdayIndex(m.timestamp);
    heatmap[day][hour]++;
    hourly[hour]++;
    weekdayCounts[day]++;
  }

  const weekdayDistribution: Record<Weekday, number> = {
    Monday: weekdayCounts[0],
    Tuesday: weekdayCounts[1],
    Wednesday: weekdayCounts[2],
    Thursday: weekdayCounts[3],
    Friday: weekdayCounts[4],
    Saturday: weekdayCounts[5],
    Sunday: weekdayCounts[6],
  };

  const streaks = findStreaks(ordered);
  const first = ordered[0];
  const last = ordered[ordered.length - 1];

  return {
    messageCount: ordered.length,
    activityHeatmap: heatmap,
    hourlyDistribution: hourly,
    weekdayDistribution,
    peakHours: topIndices(hourly, TOP_N).map((e) => ({ hour: e.index, count: e.count })),
    busiestDays: topIndices(weekdayCounts, TOP_N).map((e) => ({ day: WEEKDAYS[e.index], count: e.count })),
    dateRange:
      ordered.length > 0
        ? {
            start: isoDate(first.timestamp),
            end: isoDate(last.timestamp),
            durationDays: Math.floor((last.timestamp - first.timestamp) / DAY_MS),
          }
        : null,
    streaks: streaks.filter((s) => s.days >= thresholds.minStreakDays),
    longestStreakDays: streaks.length > 0 ? streaks[0].days : 0,
    dailyEngagement: dailyEngagement(ordered),
    trendShifts: detectTrendShifts(ordered, thresholds),
    topicEvolution: analyzeTopicEvolution(ordered),
    qualityTrends: analyzeQualityTrends(ordered),
  };
}
