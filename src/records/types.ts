import { Severity } from '../config/types';
import { Role } from '../ingest/types';
import { CollaborationQuality, ResponseEffectiveness, TaskCompletionStatus } from '../quality/types';

/** One flat row per message; conversation metrics repeat on every row */
export interface MessageRecord {
  conversationId: string;
  conversationName: string;
  messageIndex: number;
  /** ISO-8601 */
  timestamp: string;
  role: Role;
  model: string | null;
  contentPreview: string;
  contentLength: number;
  wordCount: number;

  topics: string[];
  topicCount: number;
  sentiment: string;
  hasFailure: boolean;
  failureTypes: string[];
  failureCount: number;
  failureSeverities: Severity[];
  maxFailureSeverity: Severity | 'none';

  // null when the quality stage is disabled
  collaborationQuality: CollaborationQuality | null;
  taskCompletionStatus: TaskCompletionStatus | null;
  taskCompletionConfidence: number | null;
  conversationTurnCount: number | null;
  conversationQuestions: number | null;
  conversationCodeBlocks: number | null;
  flowInterruptions: number | null;
  flowQuickResponses: number | null;
  conversationClarifications: number | null;
  /** Rating of this reply; null for user messages */
  responseEffectiveness: ResponseEffectiveness | null;

  piiRedactions: string[];
}
