import { AnalyzerConfig } from '../config/types';
import { Conversation, LoadedMessage } from '../ingest/types';
import { FIXED_PII_RULES, PIIClassifier, PIIDetection, entityRules, placeholderFor } from './pii-classifier';
import { PseudonymTable } from './pseudonym-table';
import { RedactedConversation, RedactedMessage, RedactionResult } from './types';

// A replacement can join two fragments into a new match, so the fixed pass re-scans
const MAX_FIXED_PASSES = 3;

/**
 * Two-pass redaction: fixed categories become `[KIND_REDACTED]`, then person
 * and organization names become pseudonyms from the run's PseudonymTable.
 */
export class PIIRedactor {
  private readonly fixed: PIIClassifier;
  private readonly entities: PIIClassifier;

  constructor(
    private readonly config: AnalyzerConfig,
    private readonly pseudonyms: PseudonymTable,
  ) {
    this.fixed = new PIIClassifier([
      ...FIXED_PII_RULES,
      ...config.customPiiRules.map((rule) => ({ kind: rule.kind, regex: rule.regex })),
    ]);
    this.entities = new PIIClassifier(entityRules(config.nonNameWords));
  }

  get enabled(): boolean {
    return this.config.features.privacy;
  }

  redact(text: string): RedactionResult {
    if (!this.enabled) return { text, kinds: [] };

    const kinds = new Set<string>();
    let current = text;

    for (let pass = 0; pass < MAX_FIXED_PASSES; pass++) {
      const detections = this.fixed.detect(current);
      if (detections.length === 0) break;
      for (const d of detections) kinds.add(d.kind);
      current = this.fixed.replace(current, detections, (d) => placeholderFor(d.kind));
    }

    const entities = this.entities.detect(current);
    current = this.entities.replace(current, entities, (d) => this.pseudonymize(d, kinds));

    return { text: current, kinds: Array.from(kinds).sort() };
  }

  redactMessage(message: LoadedMessage): RedactedMessage {
    const { rawText, ...rest } = message;
    const { text, kinds } = this.redact(rawText);
    return Object.freeze({ ...rest, redactedText: text, piiKinds: Object.freeze(kinds) });
  }

  redactConversation(conversation: Conversation): RedactedConversation {
    return Object.freeze({
      ...conversation,
      messages: Object.freeze(conversation.messages.map((m) => this.redactMessage(m))),
    });
  }

  private pseudonymize(detection: PIIDetection, kinds: Set<string>): string {
    if (detection.kind === 'organization') {
      // Claimed so it is not read as a person name, but kept as written
      if (!this.config.privacy.pseudonymizeOrganizations) return detection.value;
      kinds.add('organization');
      return this.pseudonyms.resolve('organization', detection.value);
    }
    kinds.add('person_name');
    return this.pseudonyms.resolve('person_name', detection.value);
  }
}
