import * as fs from 'fs';
import * as path from 'path';
import { AnalyzerConfigBuilder } from '../../src/config/config-builder';
import { FeatureFlags } from '../../src/config/types';
import { ConversationAnalysisPipeline } from '../../src/pipeline/pipeline';
import { MalformedExportError, MalformedMessageError } from '../../src/pipeline/errors';

const fixture: unknown = JSON.parse(
  fs.readFileSync(path.join(__dirname, '..', 'fixtures', 'sample-export.json'), 'utf-8'),
);

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
const PERSON_TOKEN = /\[PERSON_[0-9a-f]{12}\]/;

function createPipeline(features: Partial<FeatureFlags> = {}): ConversationAnalysisPipeline {
  return new ConversationAnalysisPipeline(AnalyzerConfigBuilder.fromTaxonomyFile().withFeatures(features).build());
}

function personToken(text: string): string | undefined {
  return PERSON_TOKEN.exec(text)?.[0];
}

describe('ConversationAnalysisPipeline', () => {
  describe('full run', () => {
    const result = createPipeline().run(fixture);

    it('should assign a run id and produce one record per message', () => {
      expect(result.runId).toMatch(UUID_V4);
      expect(result.records).toHaveLength(9);
      expect(result.records.map((r) => `${r.conversationId}:${r.messageIndex}`)).toEqual([
        'conv-1:0',
        'conv-1:1',
        'conv-1:2',
        'conv-2:0',
        'conv-2:1',
        'conv-2:2',
        'conv-3:0',
        'conv-3:1',
        'conv-3:2',
      ]);
    });

    it('should redact contact details before classification', () => {
      const [first] = result.records;

      expect(first.contentPreview).toBe(
        'Hi, my email is [EMAIL_REDACTED] and my phone is [PHONE_REDACTED]. How do I deploy a Docker container?',
      );
      expect(first.piiRedactions).toEqual(['email', 'phone']);
      expect(first.topics).toEqual(['Technical/Coding', 'Infrastructure']);
      expect(first.sentiment).toBe('Questioning');
      expect(first.model).toBe('assistant-v1');
    });

    it('should pseudonymize the same person consistently across messages', () => {
      const johnFirst = personToken(result.records[3].contentPreview);
      const johnSecond = personToken(result.records[4].contentPreview);
      const jane = personToken(result.records[5].contentPreview);

      expect(johnFirst).toBeDefined();
      expect(johnSecond).toBe(johnFirst);
      expect(jane).toBeDefined();
      expect(jane).not.toBe(johnFirst);
      expect(result.records[3].contentPreview).toBe(`${johnFirst} asked about the report`);
      expect(result.records[3].model).toBeNull();
    });

    it('should rate each conversation', () => {
      const byId = new Map(result.conversations.map((c) => [c.conversationId, c]));

      expect(byId.get('conv-1')).toMatchObject({
        taskCompletionStatus: 'completed',
        taskCompletionConfidence: 0.5,
        collaborationQuality: 'high',
        questionCount: 1,
        codeBlockCount: 1,
        quickResponseCount: 2,
      });
      expect(byId.get('conv-2')).toMatchObject({ taskCompletionStatus: 'abandoned', completionSignals: ['unanswered'] });
      expect(byId.get('conv-3')).toMatchObject({
        taskCompletionStatus: 'abandoned',
        taskCompletionConfidence: 0.75,
        collaborationQuality: 'confrontational',
        flowInterruptions: 2,
      });
    });

    it('should rate assistant replies by the reaction that follows', () => {
      const byId = new Map(result.conversations.map((c) => [c.conversationId, c]));

      expect(byId.get('conv-1')).toMatchObject({
        responseRatings: [{ messageIndex: 1, effectiveness: 'effective', confidence: 1 }],
        avgUserLength: 64.5,
        avgAssistantLength: 42,
        clarificationRequests: 0,
      });
      expect(byId.get('conv-2')?.responseRatings).toEqual([{ messageIndex: 1, effectiveness: 'unknown', confidence: 0 }]);
      expect(result.records[1].responseEffectiveness).toBe('effective');
      expect(result.records[0].responseEffectiveness).toBeNull();
      expect(result.statistics.responseEffectivenessDistribution).toEqual({ effective: 1, unknown: 1 });
    });

    it('should repeat conversation metrics on every row', () => {
      const conv3 = result.records.filter((r) => r.conversationId === 'conv-3');

      expect(conv3.map((r) => r.taskCompletionStatus)).toEqual(['abandoned', 'abandoned', 'abandoned']);
      expect(conv3[2].failureTypes).toEqual(['Hallucination']);
      expect(conv3[2].maxFailureSeverity).toBe('high');
    });

    it('should summarise the corpus', () => {
      expect(result.statistics.volume).toMatchObject({
        totalConversations: 3,
        totalMessages: 9,
        userMessages: 7,
        assistantMessages: 2,
      });
      expect(result.statistics.failures.messagesWithFailures).toBe(1);
      expect(result.statistics.failures.failureRate).toBe(11.11);
      expect(result.statistics.taskCompletionDistribution).toEqual({ completed: 1, abandoned: 2 });
      expect(result.statistics.piiRedactionCounts).toEqual({ email: 1, phone: 1, person_name: 3 });
    });

    it('should profile activity over time', () => {
      expect(result.temporal?.dateRange).toEqual({ start: '2024-03-04', end: '2024-03-06', durationDays: 2 });
      expect(result.temporal?.longestStreakDays).toBe(3);
      expect(result.temporal?.qualityTrends).toHaveLength(1);
      expect(result.temporal?.qualityTrends[0]).toMatchObject({ month: '2024-03', messageCount: 9, failureRate: 11.11 });
    });
  });

  it('should produce identical pseudonyms in separate runs with the same salt', () => {
    const first = createPipeline().run(fixture);
    const second = createPipeline().run(fixture);

    expect(second.runId).not.toBe(first.runId);
    expect(second.records.map((r) => r.contentPreview)).toEqual(first.records.map((r) => r.contentPreview));
  });

  it('should leave text untouched when privacy is disabled', () => {
    const [first] = createPipeline({ privacy: false }).run(fixture).records;

    expect(first.contentPreview).toContain('jordan@example.com');
    expect(first.piiRedactions).toEqual([]);
  });

  it('should skip conversation metrics when quality is disabled', () => {
    const result = createPipeline({ quality: false }).run(fixture);

    expect(result.conversations).toEqual([]);
    expect(result.records[0].collaborationQuality).toBeNull();
    expect(result.statistics.taskCompletionDistribution).toEqual({});
  });

  it('should skip the temporal profile when temporal analysis is disabled', () => {
    expect(createPipeline({ temporal: false }).run(fixture).temporal).toBeNull();
  });

  it('should propagate loader errors without partial output', () => {
    expect(() => createPipeline().run({ conversations: 'none' })).toThrow(MalformedExportError);
  });

  it('should reject a far-future epoch timestamp as a malformed message', () => {
    const raw = { conversations: [{ id: 'c', messages: [{ role: 'user', text: 'hi', created_at: 9e12 }] }] };
    expect(() => createPipeline().run(raw)).toThrow(MalformedMessageError);
  });
});
