import { EFFECTIVENESS_LEVELS, EffectivenessLevel } from '../config/types';
import { ClassifiedMessage } from '../classification/types';
import { ResponseRating } from './types';

/**
 * Rate an assistant reply by the user message that answers it. The level with
 * the most matched points wins, the better level on ties; no reaction or no
 * points means unknown.
 */
export function rateResponse(reply: ClassifiedMessage, reaction: ClassifiedMessage | undefined): ResponseRating {
  const unknown: ResponseRating = { messageIndex: reply.index, effectiveness: 'unknown', confidence: 0 };
  if (!reaction || reaction.role !== 'user') return unknown;

  const scores = reaction.labels.effectivenessScores;
  let best: EffectivenessLevel | null = null;
  let total = 0;
  for (const level of EFFECTIVENESS_LEVELS) {
    total += scores[level];
    if (scores[level] > 0 && (best === null || scores[level] > scores[best])) best = level;
  }
  if (best === null) return unknown;

  return {
    messageIndex: reply.index,
    effectiveness: best,
    confidence: Math.round((scores[best] / total) * 100) / 100,
  };
}

/** One rating per assistant message, judged by the message right after it. */
export function rateResponses(messages: readonly ClassifiedMessage[]): ResponseRating[] {
  return messages.flatMap((msg, i) => (msg.role === 'assistant' ? [rateResponse(msg, messages[i + 1])] : []));
}
