export const WEEKDAYS = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type TrendMetric = 'sentiment' | 'failure_rate';

export interface ActivityStreak {
  /** YYYY-MM-DD, UTC */
  start: string;
  end: string;
  days: number;
  messageCount: number;
}

export interface DailyEngagement {
  date: string;
  messageCount: number;
  conversationCount: number;
  avgWords: number;
  /** 0-100 */
  score: number;
}

export interface TrendShift {
  metric: TrendMetric;
  /** ISO-8601 time of the first message in the shifted window */
  timestamp: string;
  /** Position of that message in the time-ordered corpus */
  index: number;
  previousMean: number;
  currentMean: number;
  magnitude: number;
  direction: 'increase' | 'decrease';
}

export interface MonthlyTopicCounts {
  /** YYYY-MM, UTC */
  month: string;
  /** Every topic seen anywhere in the corpus, 0 where absent this month */
  counts: Record<string, number>;
}

export interface MonthlyQualityTrend {
  month: string;
  messageCount: number;
  /** Share of the month's messages per sentiment seen in the corpus */
  sentimentMix: Record<string, number>;
  /** Combined share of sentiments whose name contains "positive" */
  positiveRatio: number;
  /** Percentage of messages with at least one failure */
  failureRate: number;
  meanWords: number;
  medianWords: number;
}

export interface TemporalProfile {
  messageCount: number;
  /** [weekday][hour], Monday first, UTC */
  activityHeatmap: number[][];
  hourlyDistribution: number[];
  weekdayDistribution: Record<Weekday, number>;
  peakHours: Array<{ hour: number; count: number }>;
  busiestDays: Array<{ day: Weekday; count: number }>;
  dateRange: { start: string; end: string; durationDays: number } | null;
  streaks: ActivityStreak[];
  longestStreakDays: number;
  dailyEngagement: DailyEngagement[];
  trendShifts: TrendShift[];
  topicEvolution: MonthlyTopicCounts[];
  qualityTrends: MonthlyQualityTrend[];
}
