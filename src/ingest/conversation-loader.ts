/**
 * Conversation Loader
 *
 * Turns a raw export document into frozen Conversation entities.
 * The whole load fails on the first malformed conversation or message;
 * a partial corpus is never returned.
 */

import Ajv from 'ajv';
import { Conversation, LoadedMessage, RawConversation, RawExport, RawMessage, Role } from './types';
import { parseTimestamp } from './timestamps';
import { MalformedExportError, MalformedMessageError } from '../pipeline/errors';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'conversation-loader' });

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

const validateExport = ajv.compile<RawExport>({
  type: 'object',
  required: ['conversations'],
  properties: {
    conversations: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: ['string', 'number'] },
          uuid: { type: 'string' },
          name: { type: ['string', 'null'] },
          chat_messages: { type: ['array', 'null'], items: { type: 'object' } },
          messages: { type: ['array', 'null'], items: { type: 'object' } },
        },
        anyOf: [{ required: ['id'] }, { required: ['uuid'] }],
      },
    },
  },
});

const ROLE_ALIASES: Record<string, Role> = {
  user: 'user',
  human: 'user',
  assistant: 'assistant',
  bot: 'assistant',
  ai: 'assistant',
  model: 'assistant',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeRole(raw: RawMessage): Role | null {
  const value = raw.role ?? raw.sender;
  if (typeof value !== 'string') return null;
  return ROLE_ALIASES[value.trim().toLowerCase()] ?? null;
}

function extractText(raw: RawMessage): string | null {
  if (typeof raw.text === 'string') return raw.text;
  if (typeof raw.content === 'string') return raw.content;
  if (Array.isArray(raw.content)) {
    const parts = raw.content
      .filter(isRecord)
      .map((block) => block.text)
      .filter((text): text is string => typeof text === 'string');
    return parts.length > 0 ? parts.join('\n') : null;
  }
  return null;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

function loadMessage(
  conversationId: string,
  index: number,
  raw: RawMessage,
  fallbackTimestamp: number | null,
): LoadedMessage {
  const role = normalizeRole(raw);
  if (!role) {
    throw new MalformedMessageError(conversationId, index, 'missing or unrecognised role');
  }

  const text = extractText(raw);
  if (text === null) {
    throw new MalformedMessageError(conversationId, index, 'missing text');
  }

  const rawTimestamp = raw.created_at ?? raw.timestamp;
  const hasOwnTimestamp = rawTimestamp !== undefined && rawTimestamp !== null;
  const timestamp = hasOwnTimestamp ? parseTimestamp(rawTimestamp) : fallbackTimestamp;
  if (timestamp === null) {
    const reason = hasOwnTimestamp ? `unparsable timestamp ${JSON.stringify(rawTimestamp)}` : 'missing timestamp';
    throw new MalformedMessageError(conversationId, index, reason);
  }

  return Object.freeze({
    conversationId,
    index,
    role,
    timestamp,
    rawText: text,
    contentLength: text.length,
    wordCount: countWords(text),
  });
}

function loadConversation(raw: RawConversation, position: number): Conversation {
  const rawId = raw.id ?? raw.uuid;
  const id = typeof rawId === 'number' ? String(rawId) : typeof rawId === 'string' ? rawId.trim() : '';
  if (id === '') {
    throw new MalformedExportError('Conversation has no id', [`/conversations/${position}`]);
  }

  const createdAt = raw.created_at === undefined || raw.created_at === null ? null : parseTimestamp(raw.created_at);
  if (raw.created_at !== undefined && raw.created_at !== null && createdAt === null) {
    throw new MalformedExportError(`Conversation "${id}" has an unparsable created_at`, [String(raw.created_at)]);
  }

  const rawMessages = Array.isArray(raw.chat_messages) ? raw.chat_messages : Array.isArray(raw.messages) ? raw.messages : [];
  const messages = rawMessages.map((m: RawMessage, index: number) => loadMessage(id, index, m, createdAt));

  return Object.freeze({
    id,
    name: typeof raw.name === 'string' && raw.name.trim() !== '' ? raw.name : 'Untitled',
    ...(typeof raw.model === 'string' && raw.model !== '' ? { model: raw.model } : {}),
    createdAt: createdAt ?? messages[0]?.timestamp ?? 0,
    messages: Object.freeze(messages),
  });
}

/**
 * Load every conversation in an export document.
 * @throws MalformedExportError when the document shape is wrong or ids collide
 * @throws MalformedMessageError when a message lacks a role, text or valid timestamp
 */
export function loadConversations(raw: unknown): Conversation[] {
  if (!validateExport(raw)) {
    const details = (validateExport.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
    throw new MalformedExportError('Export is missing a valid conversations collection', details);
  }

  const seen = new Set<string>();
  const conversations = raw.conversations.map((conv, position) => {
    const loaded = loadConversation(conv, position);
    if (seen.has(loaded.id)) {
      throw new MalformedExportError(`Duplicate conversation id "${loaded.id}"`);
    }
    seen.add(loaded.id);
    return loaded;
  });

  log.info(
    {
      conversationCount: conversations.length,
      messageCount: conversations.reduce((sum, c) => sum + c.messages.length, 0),
    },
    'Export loaded',
  );

  return conversations;
}
