import { ClassifiedMessage, LabelSet } from '../classification/types';
import { RedactedConversation } from '../privacy/types';
import { ConversationQuality } from '../quality/types';
import { InvariantViolation } from '../pipeline/errors';
import { MessageRecord } from './types';

export const PREVIEW_LENGTH = 300;

export interface AssemblerInput {
  conversations: readonly RedactedConversation[];
  /** Keyed by messageKey() */
  labels: ReadonlyMap<string, LabelSet>;
  /** Keyed by conversation id; ignored when qualityEnabled is false */
  quality: ReadonlyMap<string, ConversationQuality>;
  qualityEnabled: boolean;
}

export function messageKey(message: Pick<ClassifiedMessage, 'conversationId' | 'index'>): string {
  return `${message.conversationId}:${message.index}`;
}

/** First 300 characters, counted by code point so surrogate pairs stay whole */
export function preview(text: string): string {
  return Array.from(text).slice(0, PREVIEW_LENGTH).join('');
}

/**
 * Merge per-message labels and per-conversation quality into flat records.
 * @throws InvariantViolation when a label set or a required quality entry is missing
 */
export function assembleRecords(input: AssemblerInput): MessageRecord[] {
  const records: MessageRecord[] = [];

  for (const conversation of input.conversations) {
    const quality = input.qualityEnabled ? input.quality.get(conversation.id) : undefined;
    if (input.qualityEnabled && !quality) {
      throw new InvariantViolation(`no quality metrics for conversation "${conversation.id}"`);
    }

    const ratings = new Map((quality?.responseRatings ?? []).map((r) => [r.messageIndex, r.effectiveness]));

    for (const message of conversation.messages) {
      const key = messageKey(message);
      const labels = input.labels.get(key);
      if (!labels) throw new InvariantViolation(`no label set for message ${key}`);

      records.push({
        conversationId: conversation.id,
        conversationName: conversation.name,
        messageIndex: message.index,
        timestamp: new Date(message.timestamp).toISOString(),
        role: message.role,
        model: conversation.model ?? null,
        contentPreview: preview(message.redactedText),
        contentLength: message.contentLength,
        wordCount: message.wordCount,

        topics: [...labels.topics],
        topicCount: labels.topicCount,
        sentiment: labels.sentiment,
        hasFailure: labels.failureCount > 0,
        failureTypes: labels.failures.map((f) => f.kind),
        failureCount: labels.failureCount,
        failureSeverities: labels.failures.map((f) => f.severity),
        maxFailureSeverity: labels.maxFailureSeverity,

        collaborationQuality: quality?.collaborationQuality ?? null,
        taskCompletionStatus: quality?.taskCompletionStatus ?? null,
        taskCompletionConfidence: quality?.taskCompletionConfidence ?? null,
        conversationTurnCount: quality?.turnCount ?? null,
        conversationQuestions: quality?.questionCount ?? null,
        conversationCodeBlocks: quality?.codeBlockCount ?? null,
        flowInterruptions: quality?.flowInterruptions ?? null,
        flowQuickResponses: quality?.quickResponseCount ?? null,
        conversationClarifications: quality?.clarificationRequests ?? null,
        responseEffectiveness: ratings.get(message.index) ?? null,

        piiRedactions: [...message.piiKinds],
      });
    }
  }

  return records;
}
