/**
 * Conversation Quality Analyzer
 *
 * Rolls one conversation's label sets into a collaboration rating, a
 * task-completion verdict and per-reply effectiveness ratings. Reads labels, roles and timestamps only.
 */

import { AnalysisThresholds } from '../config/types';
import { ClassifiedMessage } from '../classification/types';
import { analyzeFlow } from './flow-analyzer';
import { rateResponses } from './response-effectiveness';
import { CollaborationQuality, CompletionSignal, ConversationQuality, TaskCompletion } from './types';

const NEGATIVE_SENTIMENTS = new Set(['Negative', 'Very Negative']);

type Vote = 'completed' | 'abandoned' | 'blocked';

const SIGNAL_VOTES: Record<CompletionSignal, Vote> = {
  closing_affirmation: 'completed',
  abandonment_cue: 'abandoned',
  blocker_cue: 'blocked',
  unresolved_failure: 'abandoned',
  ends_on_failure: 'abandoned',
  trailing_gap: 'abandoned',
  unanswered: 'abandoned',
};

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

export function collaborationScore(
  messages: readonly ClassifiedMessage[],
  flowInterruptions: number,
  thresholds: AnalysisThresholds,
): { score: number; quality: CollaborationQuality } {
  const turns = messages.length;
  if (turns === 0) return { score: 0, quality: 'high' };

  const failureTotal = messages.reduce((sum, m) => sum + m.labels.failureCount, 0);
  const negativeRate = messages.filter((m) => NEGATIVE_SENTIMENTS.has(m.labels.sentiment)).length / turns;
  const highSeverityRate = messages.filter((m) => m.labels.maxFailureSeverity === 'high').length / turns;
  const interruptionRate = flowInterruptions / Math.max(1, turns - 1);

  const score =
    thresholds.failureDensityWeight * Math.min(1, failureTotal / turns) +
    thresholds.negativeSentimentWeight * negativeRate +
    thresholds.interruptionWeight * interruptionRate;

  let quality: CollaborationQuality;
  if (
    negativeRate > thresholds.confrontationalNegativeRate &&
    highSeverityRate > thresholds.confrontationalHighSeverityRate
  ) {
    quality = 'confrontational';
  } else if (score < thresholds.collaborationHighMax) {
    quality = 'high';
  } else if (score < thresholds.collaborationMediumMax) {
    quality = 'medium';
  } else {
    quality = 'low';
  }

  return { score: round(score, 4), quality };
}

export function collectCompletionSignals(
  messages: readonly ClassifiedMessage[],
  thresholds: AnalysisThresholds,
): CompletionSignal[] {
  if (messages.length === 0) return [];

  const tail = messages.slice(-thresholds.completionTailSize);
  const last = messages[messages.length - 1];
  const signals: CompletionSignal[] = [];

  const userAffirms = (m: ClassifiedMessage) => m.role === 'user' && m.labels.completionCues.includes('affirmation');

  if (tail.some(userAffirms)) signals.push('closing_affirmation');
  if (tail.some((m) => m.role === 'user' && m.labels.completionCues.includes('abandonment'))) {
    signals.push('abandonment_cue');
  }
  if (tail.some((m) => m.labels.completionCues.includes('blocker'))) signals.push('blocker_cue');

  const unresolved = tail.some(
    (m, i) => m.labels.failureCount > 0 && !tail.slice(i + 1).some(userAffirms),
  );
  if (unresolved) signals.push('unresolved_failure');
  if (last.labels.failureCount > 0) signals.push('ends_on_failure');

  if (messages.length > 1) {
    const gap = last.timestamp - messages[messages.length - 2].timestamp;
    if (gap > thresholds.longGapSeconds * 1000) signals.push('trailing_gap');
  }
  // A closing remark ("thanks", "forget it") is not a question left hanging
  if (last.role === 'user' && last.labels.completionCues.length === 0) signals.push('unanswered');

  return signals;
}

/** Vote the signals into a status; completed needs a strict majority. */
export function resolveTaskCompletion(signals: CompletionSignal[]): TaskCompletion {
  if (signals.length === 0) return { status: 'in_progress', confidence: 0, signals };

  const votes: Record<Vote, number> = { completed: 0, abandoned: 0, blocked: 0 };
  for (const signal of signals) votes[SIGNAL_VOTES[signal]]++;

  let status: Vote;
  if (votes.completed > votes.abandoned + votes.blocked) status = 'completed';
  else if (votes.abandoned >= votes.blocked) status = 'abandoned';
  else status = 'blocked';

  return { status, confidence: round(votes[status] / (signals.length + 1), 2), signals };
}

export function analyzeConversationQuality(
  conversationId: string,
  messages: readonly ClassifiedMessage[],
  thresholds: AnalysisThresholds,
): ConversationQuality {
  const flow = analyzeFlow(messages, thresholds);
  const collaboration = collaborationScore(messages, flow.flowInterruptions, thresholds);
  const completion = resolveTaskCompletion(collectCompletionSignals(messages, thresholds));

  return {
    conversationId,
    ...flow,
    collaborationQuality: collaboration.quality,
    collaborationScore: collaboration.score,
    taskCompletionStatus: completion.status,
    taskCompletionConfidence: completion.confidence,
    completionSignals: completion.signals,
    responseRatings: rateResponses(messages),
  };
}
