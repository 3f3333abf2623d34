import { EffectivenessLevel } from '../config/types';

export type CollaborationQuality = 'high' | 'medium' | 'low' | 'confrontational';

export type TaskCompletionStatus = 'completed' | 'in_progress' | 'abandoned' | 'blocked';

export type CompletionSignal =
  | 'closing_affirmation'
  | 'abandonment_cue'
  | 'blocker_cue'
  | 'unresolved_failure'
  | 'ends_on_failure'
  | 'trailing_gap'
  | 'unanswered';

export interface FlowMetrics {
  turnCount: number;
  /** User messages that ask something */
  questionCount: number;
  /** Assistant messages that carry a fenced code block */
  codeBlockCount: number;
  /** Adjacent pairs with the same role */
  flowInterruptions: number;
  /** The assistant-assistant subset of flowInterruptions */
  monologues: number;
  quickResponseCount: number;
  longGaps: number;
  /** User messages asking the assistant to explain or restate */
  clarificationRequests: number;
  /** Mean contentLength per role; 0 when the role never speaks */
  avgUserLength: number;
  avgAssistantLength: number;
}

export type ResponseEffectiveness = EffectivenessLevel | 'unknown';

export interface ResponseRating {
  /** Index of the rated assistant message */
  messageIndex: number;
  effectiveness: ResponseEffectiveness;
  /** Winning level's share of all matched points, 0 when unknown */
  confidence: number;
}

export interface TaskCompletion {
  status: TaskCompletionStatus;
  confidence: number;
  signals: CompletionSignal[];
}

export interface ConversationQuality extends FlowMetrics {
  conversationId: string;
  collaborationQuality: CollaborationQuality;
  collaborationScore: number;
  taskCompletionStatus: TaskCompletionStatus;
  taskCompletionConfidence: number;
  completionSignals: CompletionSignal[];
  /** One rating per assistant message, in conversation order */
  responseRatings: ResponseRating[];
}
