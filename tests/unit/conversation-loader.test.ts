import { countWords, loadConversations } from '../../src/ingest/conversation-loader';
import { MalformedExportError, MalformedMessageError } from '../../src/pipeline/errors';

function exportOf(...conversations: unknown[]): unknown {
  return { conversations };
}

describe('Conversation Loader', () => {
  describe('loadConversations', () => {
    it('should load conversations with normalized roles and text', () => {
      const [conv] = loadConversations(
        exportOf({
          uuid: 'c1',
          name: 'Setup',
          created_at: '2024-03-15T10:00:00Z',
          chat_messages: [
            { sender: 'human', text: 'Hello there friend', created_at: '2024-03-15T10:00:00Z' },
            {
              sender: 'Assistant',
              content: [
                { type: 'text', text: 'Hi' },
                { type: 'text', text: 'again' },
              ],
              created_at: '2024-03-15T10:00:30Z',
            },
          ],
        }),
      );

      expect(conv.id).toBe('c1');
      expect(conv.name).toBe('Setup');
      expect(conv.model).toBeUndefined();
      expect(conv.createdAt).toBe(Date.UTC(2024, 2, 15, 10, 0, 0));
      expect(conv.messages).toHaveLength(2);

      expect(conv.messages[0]).toEqual({
        conversationId: 'c1',
        index: 0,
        role: 'user',
        timestamp: Date.UTC(2024, 2, 15, 10, 0, 0),
        rawText: 'Hello there friend',
        contentLength: 18,
        wordCount: 3,
      });
      expect(conv.messages[1].role).toBe('assistant');
      expect(conv.messages[1].rawText).toBe('Hi\nagain');
      expect(conv.messages[1].wordCount).toBe(2);
    });

    it('should accept the alternate field names', () => {
      const [conv] = loadConversations(
        exportOf({
          id: 42,
          model: 'assistant-v1',
          messages: [{ role: 'user', content: 'Ping', timestamp: 1700000000 }],
        }),
      );

      expect(conv.id).toBe('42');
      expect(conv.model).toBe('assistant-v1');
      expect(conv.name).toBe('Untitled');
      expect(conv.messages[0].timestamp).toBe(1700000000000);
    });

    it('should fall back to the conversation timestamp for messages without one', () => {
      const [conv] = loadConversations(
        exportOf({
          id: 'c1',
          created_at: '2024-03-15T10:00:00Z',
          chat_messages: [{ sender: 'human', text: 'Hi' }],
        }),
      );
      expect(conv.messages[0].timestamp).toBe(Date.UTC(2024, 2, 15, 10, 0, 0));
    });

    it('should derive createdAt from the first message, or 0 when empty', () => {
      const [withMessages, empty] = loadConversations(
        exportOf(
          { id: 'a', chat_messages: [{ sender: 'human', text: 'Hi', created_at: '2024-03-15T12:00:00Z' }] },
          { id: 'b' },
        ),
      );
      expect(withMessages.createdAt).toBe(Date.UTC(2024, 2, 15, 12, 0, 0));
      expect(empty.createdAt).toBe(0);
      expect(empty.messages).toEqual([]);
    });

    it('should return frozen entities', () => {
      const [conv] = loadConversations(
        exportOf({ id: 'c1', chat_messages: [{ sender: 'human', text: 'Hi', created_at: 1700000000 }] }),
      );
      expect(Object.isFrozen(conv)).toBe(true);
      expect(Object.isFrozen(conv.messages)).toBe(true);
      expect(Object.isFrozen(conv.messages[0])).toBe(true);
    });

    it('should reject an export without a conversations collection', () => {
      expect(() => loadConversations({ chats: [] })).toThrow(MalformedExportError);
      expect(() => loadConversations(null)).toThrow(MalformedExportError);
    });

    it('should reject a conversation without an id', () => {
      expect(() => loadConversations(exportOf({ name: 'No id' }))).toThrow(MalformedExportError);
    });

    it('should reject duplicate conversation ids', () => {
      expect(() => loadConversations(exportOf({ id: 'dup' }, { id: 'dup' }))).toThrow(
        'Duplicate conversation id "dup"',
      );
    });

    it('should reject an unknown role with the conversation id and index', () => {
      let caught: unknown;
      try {
        loadConversations(
          exportOf({
            id: 'c9',
            chat_messages: [
              { sender: 'human', text: 'Hi', created_at: 1700000000 },
              { sender: 'system', text: 'Boot', created_at: 1700000001 },
            ],
          }),
        );
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(MalformedMessageError);
      if (caught instanceof MalformedMessageError) {
        expect(caught.conversationId).toBe('c9');
        expect(caught.messageIndex).toBe(1);
        expect(caught.message).toBe('Conversation "c9" message 1: missing or unrecognised role');
      }
    });

    it('should reject a message without text', () => {
      expect(() =>
        loadConversations(exportOf({ id: 'c1', chat_messages: [{ sender: 'human', created_at: 1700000000 }] })),
      ).toThrow('Conversation "c1" message 0: missing text');
    });

    it('should reject missing and unparsable timestamps', () => {
      expect(() => loadConversations(exportOf({ id: 'c1', chat_messages: [{ sender: 'human', text: 'Hi' }] }))).toThrow(
        'Conversation "c1" message 0: missing timestamp',
      );
      expect(() =>
        loadConversations(exportOf({ id: 'c1', chat_messages: [{ sender: 'human', text: 'Hi', created_at: 'soon' }] })),
      ).toThrow('Conversation "c1" message 0: unparsable timestamp "soon"');
    });

    it('should reject an epoch timestamp outside the representable date range', () => {
      expect(() =>
        loadConversations(exportOf({ id: 'c1', chat_messages: [{ sender: 'human', text: 'Hi', created_at: 9e12 }] })),
      ).toThrow(MalformedMessageError);
      expect(() =>
        loadConversations(exportOf({ id: 'c1', chat_messages: [{ sender: 'human', text: 'Hi', created_at: 9e12 }] })),
      ).toThrow('Conversation "c1" message 0: unparsable timestamp 9000000000000');
    });
  });

  describe('countWords', () => {
    it('should count whitespace-separated tokens', () => {
      expect(countWords('  one two\nthree\tfour ')).toBe(4);
      expect(countWords('   ')).toBe(0);
    });
  });
});
