/**
 * Taxonomy Classifier
 *
 * Pure pattern evaluation over redacted text. Topics and failures are
 * multi-label; sentiment is a first-match cascade with a Neutral fallback.
 */

import {
  COMPLETION_CUES,
  CompiledCategory,
  CompiledTaxonomy,
  CompletionCue,
  EffectivenessLevel,
  Severity,
} from '../config/types';
import { RedactedMessage } from '../privacy/types';
import { ClassifiedMessage, FailureMatch, LabelSet, NEUTRAL_SENTIMENT } from './types';

const SEVERITY_RANK: Record<Severity, number> = { high: 3, medium: 2, low: 1 };

const CODE_FENCE = '```';

function matchesAny(patterns: readonly RegExp[], text: string): boolean {
  return patterns.some((p) => p.test(text));
}

export function maxSeverity(failures: readonly FailureMatch[]): Severity | 'none' {
  let best: Severity | 'none' = 'none';
  for (const f of failures) {
    if (best === 'none' || SEVERITY_RANK[f.severity] > SEVERITY_RANK[best]) best = f.severity;
  }
  return best;
}

export class TaxonomyClassifier {
  constructor(private readonly taxonomy: CompiledTaxonomy) {}

  detectTopics(text: string): string[] {
    return this.taxonomy.topics.filter((t) => matchesAny(t.patterns, text)).map((t) => t.name);
  }

  detectSentiment(text: string): string {
    const winner: CompiledCategory | undefined = this.taxonomy.sentiment.find((c) => matchesAny(c.patterns, text));
    return winner ? winner.name : NEUTRAL_SENTIMENT;
  }

  detectFailures(text: string): FailureMatch[] {
    return this.taxonomy.failures
      .filter((f) => matchesAny(f.patterns, text))
      .map((f) => ({ kind: f.name, severity: f.severity }));
  }

  detectCompletionCues(text: string): CompletionCue[] {
    return COMPLETION_CUES.filter((cue) => matchesAny(this.taxonomy.completionCues[cue], text));
  }

  isClarificationRequest(text: string): boolean {
    return matchesAny(this.taxonomy.clarificationPatterns, text);
  }

  scoreEffectiveness(text: string): Record<EffectivenessLevel, number> {
    const score = (level: EffectivenessLevel) => this.taxonomy.effectiveness[level].filter((p) => p.test(text)).length;
    return {
      highly_effective: score('highly_effective'),
      effective: score('effective'),
      partially_effective: score('partially_effective'),
      ineffective: score('ineffective'),
    };
  }

  isQuestion(text: string): boolean {
    return text.includes('?') || matchesAny(this.taxonomy.questionPatterns, text);
  }

  classify(text: string): LabelSet {
    const topics = this.detectTopics(text);
    const failures = this.detectFailures(text);

    return Object.freeze({
      topics: Object.freeze(topics),
      topicCount: topics.length,
      sentiment: this.detectSentiment(text),
      failures: Object.freeze(failures),
      failureCount: failures.length,
      maxFailureSeverity: maxSeverity(failures),
      isQuestion: this.isQuestion(text),
      hasCodeBlock: text.includes(CODE_FENCE),
      completionCues: Object.freeze(this.detectCompletionCues(text)),
      isClarificationRequest: this.isClarificationRequest(text),
      effectivenessScores: Object.freeze(this.scoreEffectiveness(text)),
    });
  }

  classifyMessage(message: RedactedMessage): ClassifiedMessage {
    return Object.freeze({
      conversationId: message.conversationId,
      index: message.index,
      role: message.role,
      timestamp: message.timestamp,
      contentLength: message.contentLength,
      wordCount: message.wordCount,
      labels: this.classify(message.redactedText),
    });
  }
}
