import { MessageRecord } from '../records/types';
import { CorpusStatistics, Distribution } from './types';

function increment(dist: Distribution, key: string): void {
  dist[key] = (dist[key] ?? 0) + 1;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function computeCorpusStatistics(records: readonly MessageRecord[]): CorpusStatistics {
  const total = records.length;
  const topics: Distribution = {};
  const sentiment: Distribution = {};
  const failureTypes: Distribution = {};
  const pii: Distribution = {};
  const collaboration: Distribution = {};
  const completion: Distribution = {};
  const effectiveness: Distribution = {};
  const seenConversations = new Set<string>();

  let userMessages = 0;
  let lengthSum = 0;
  let wordSum = 0;
  let withFailures = 0;

  for (const record of records) {
    if (record.role === 'user') userMessages++;
    lengthSum += record.contentLength;
    wordSum += record.wordCount;

    record.topics.forEach((t) => increment(topics, t));
    increment(sentiment, record.sentiment);
    record.failureTypes.forEach((f) => increment(failureTypes, f));
    if (record.hasFailure) withFailures++;
    record.piiRedactions.forEach((k) => increment(pii, k));
    if (record.responseEffectiveness !== null) increment(effectiveness, record.responseEffectiveness);

    // Conversation-level fields repeat on every row; count the first one
    if (!seenConversations.has(record.conversationId)) {
      seenConversations.add(record.conversationId);
      if (record.collaborationQuality !== null) increment(collaboration, record.collaborationQuality);
      if (record.taskCompletionStatus !== null) increment(completion, record.taskCompletionStatus);
    }
  }

  return {
    volume: {
      totalConversations: seenConversations.size,
      totalMessages: total,
      userMessages,
      assistantMessages: total - userMessages,
      avgMessageLength: total > 0 ? round2(lengthSum / total) : 0,
      avgWordsPerMessage: total > 0 ? round2(wordSum / total) : 0,
    },
    topicDistribution: topics,
    sentimentDistribution: sentiment,
    failures: {
      messagesWithFailures: withFailures,
      failureRate: total > 0 ? round2((withFailures / total) * 100) : 0,
      byType: failureTypes,
    },
    collaborationQualityDistribution: collaboration,
    taskCompletionDistribution: completion,
    responseEffectivenessDistribution: effectiveness,
    piiRedactionCounts: pii,
  };
}
