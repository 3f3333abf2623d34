import { ClassifiedMessage, LabelSet } from '../../src/classification/types';
import { EffectivenessLevel } from '../../src/config/types';
import { Role } from '../../src/ingest/types';

export const T0 = Date.UTC(2024, 2, 4, 9, 0, 0); // Monday 2024-03-04 09:00 UTC

export function labels(overrides: Partial<LabelSet> = {}): LabelSet {
  return {
    topics: [],
    topicCount: 0,
    sentiment: 'Neutral',
    failures: [],
    failureCount: 0,
    maxFailureSeverity: 'none',
    isQuestion: false,
    hasCodeBlock: false,
    completionCues: [],
    isClarificationRequest: false,
    effectivenessScores: { highly_effective: 0, effective: 0, partially_effective: 0, ineffective: 0 },
    ...overrides,
  };
}

export function classified(
  index: number,
  role: Role,
  offsetSeconds: number,
  labelOverrides: Partial<LabelSet> = {},
  extra: Partial<Pick<ClassifiedMessage, 'conversationId' | 'wordCount' | 'contentLength' | 'timestamp'>> = {},
): ClassifiedMessage {
  return {
    conversationId: 'c1',
    index,
    role,
    timestamp: T0 + offsetSeconds * 1000,
    contentLength: 10,
    wordCount: 2,
    labels: labels(labelOverrides),
    ...extra,
  };
}

/** Labels for a user reaction scoring one point on the given effectiveness level */
export function reacting(level: EffectivenessLevel, points = 1): Partial<LabelSet> {
  return { effectivenessScores: { ...labels().effectivenessScores, [level]: points } };
}

/** Labels for a message carrying one failure of the given severity */
export function failing(severity: 'high' | 'medium' | 'low', kind = 'Hallucination'): Partial<LabelSet> {
  return { failures: [{ kind, severity }], failureCount: 1, maxFailureSeverity: severity };
}
