import { CompletionCue, EffectivenessLevel, Severity } from '../config/types';
import { Role } from '../ingest/types';

export const NEUTRAL_SENTIMENT = 'Neutral';

export interface FailureMatch {
  kind: string;
  severity: Severity;
}

export interface LabelSet {
  /** Distinct topic names, in taxonomy order. May be empty. */
  readonly topics: readonly string[];
  readonly topicCount: number;
  /** Always exactly one category; Neutral when nothing matched */
  readonly sentiment: string;
  readonly failures: readonly FailureMatch[];
  readonly failureCount: number;
  readonly maxFailureSeverity: Severity | 'none';
  readonly isQuestion: boolean;
  readonly hasCodeBlock: boolean;
  readonly completionCues: readonly CompletionCue[];
  readonly isClarificationRequest: boolean;
  /** Matching pattern count per level; read when this message follows an assistant reply */
  readonly effectivenessScores: Readonly<Record<EffectivenessLevel, number>>;
}

/** What the aggregators see of a message: metadata and labels, no text */
export interface ClassifiedMessage {
  readonly conversationId: string;
  readonly index: number;
  readonly role: Role;
  readonly timestamp: number;
  readonly contentLength: number;
  readonly wordCount: number;
  readonly labels: LabelSet;
}
