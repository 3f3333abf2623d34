/** Normalized message author */
export type Role = 'user' | 'assistant';

export interface Conversation {
  readonly id: string;
  readonly name: string;
  readonly model?: string;
  /** Epoch milliseconds */
  readonly createdAt: number;
  /** Insertion order is chronological order */
  readonly messages: readonly LoadedMessage[];
}

/**
 * A message as produced by the loader. rawText is read only by the privacy
 * redactor; every later stage works on RedactedMessage.
 */
export interface LoadedMessage {
  readonly conversationId: string;
  readonly index: number;
  readonly role: Role;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly rawText: string;
  readonly contentLength: number;
  readonly wordCount: number;
}

// ───── Export document shape (as found in the wild) ─────

export interface RawMessage {
  role?: unknown;
  sender?: unknown;
  text?: unknown;
  content?: unknown;
  created_at?: unknown;
  timestamp?: unknown;
}

export interface RawConversation {
  id?: unknown;
  uuid?: unknown;
  name?: unknown;
  model?: unknown;
  created_at?: unknown;
  chat_messages?: unknown;
  messages?: unknown;
}

export interface RawExport {
  conversations: RawConversation[];
}
