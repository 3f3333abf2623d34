/**
 * Corpus summary statistics, computed from assembled records only
 */

export type Distribution = Record<string, number>;

export interface MessageVolume {
  totalConversations: number;
  totalMessages: number;
  userMessages: number;
  assistantMessages: number;
  avgMessageLength: number;
  avgWordsPerMessage: number;
}

export interface FailureSummary {
  messagesWithFailures: number;
  /** Percentage of all messages, 2 decimals */
  failureRate: number;
  byType: Distribution;
}

export interface CorpusStatistics {
  volume: MessageVolume;
  topicDistribution: Distribution;
  sentimentDistribution: Distribution;
  failures: FailureSummary;
  /** Counted once per conversation; empty when quality analysis is off */
  collaborationQualityDistribution: Distribution;
  taskCompletionDistribution: Distribution;
  /** Rated assistant replies per effectiveness level, unknown included */
  responseEffectivenessDistribution: Distribution;
  /** Messages containing at least one redaction of each kind */
  piiRedactionCounts: Distribution;
}
