import { Conversation, LoadedMessage } from '../ingest/types';

/** Entity kinds replaced with a pseudonym instead of a fixed placeholder */
export type EntityKind = 'person_name' | 'organization';

/**
 * A message after the privacy stage. The raw text is gone; later stages
 * only ever see redactedText.
 */
export interface RedactedMessage extends Omit<LoadedMessage, 'rawText'> {
  readonly redactedText: string;
  /** Sorted distinct kinds replaced in this message */
  readonly piiKinds: readonly string[];
}

export interface RedactedConversation extends Omit<Conversation, 'messages'> {
  readonly messages: readonly RedactedMessage[];
}

export interface RedactionResult {
  text: string;
  kinds: string[];
}
