import { v4 as uuid } from 'uuid';
import { AnalyzerConfig, FeatureFlags } from '../config/types';
import { loadConversations } from '../ingest/conversation-loader';
import { PseudonymTable } from '../privacy/pseudonym-table';
import { PIIRedactor } from '../privacy/pii-redactor';
import { TaxonomyClassifier } from '../classification/taxonomy-classifier';
import { ClassifiedMessage, LabelSet } from '../classification/types';
import { analyzeConversationQuality } from '../quality/quality-analyzer';
import { ConversationQuality } from '../quality/types';
import { analyzeTemporalProfile } from '../temporal/temporal-analyzer';
import { TemporalProfile } from '../temporal/types';
import { assembleRecords, messageKey } from '../records/record-assembler';
import { MessageRecord } from '../records/types';
import { computeCorpusStatistics } from '../analytics/corpus-statistics';
import { CorpusStatistics } from '../analytics/types';
import { runLogger } from '../observability/logger';

export interface AnalysisResult {
  runId: string;
  records: MessageRecord[];
  conversations: ConversationQuality[];
  temporal: TemporalProfile | null;
  statistics: CorpusStatistics;
  features: FeatureFlags;
  durationMs: number;
}

/**
 * ConversationAnalysisPipeline runs one export through every stage:
 * load, redact, classify, aggregate, assemble.
 *
 * Each run gets its own id and PseudonymTable, so pseudonyms never leak
 * between runs. Loader and configuration errors propagate unchanged and
 * the run produces nothing.
 */
export class ConversationAnalysisPipeline {
  constructor(private readonly config: AnalyzerConfig) {}

  run(rawExport: unknown): AnalysisResult {
    const start = Date.now();
    const runId = uuid();
    const log = runLogger(runId, { component: 'analysis-pipeline' });
    const { features, thresholds, privacy } = this.config;

    log.info({ features }, 'Analysis run starting');

    // 1. Load
    const conversations = loadConversations(rawExport);

    // 2. Redact
    const pseudonyms = new PseudonymTable({ salt: privacy.pseudonymSalt, length: privacy.pseudonymLength });
    const redactor = new PIIRedactor(this.config, pseudonyms);
    const redacted = conversations.map((c) => redactor.redactConversation(c));
    if (features.privacy) {
      log.info({ pseudonymCount: pseudonyms.size }, 'Privacy stage completed');
    } else {
      log.info('Privacy stage skipped');
    }

    // 3. Classify
    const classifier = new TaxonomyClassifier(this.config.taxonomy);
    const labels = new Map<string, LabelSet>();
    const byConversation = new Map<string, ClassifiedMessage[]>();
    for (const conversation of redacted) {
      const classified = conversation.messages.map((m) => classifier.classifyMessage(m));
      for (const message of classified) labels.set(messageKey(message), message.labels);
      byConversation.set(conversation.id, classified);
    }
    log.info({ messageCount: labels.size }, 'Classification completed');

    // 4. Aggregate
    const quality = new Map<string, ConversationQuality>();
    if (features.quality) {
      for (const [id, messages] of byConversation) {
        quality.set(id, analyzeConversationQuality(id, messages, thresholds));
      }
      log.info({ conversationCount: quality.size }, 'Quality analysis completed');
    }

    let temporal: TemporalProfile | null = null;
    if (features.temporal) {
      temporal = analyzeTemporalProfile(Array.from(byConversation.values()).flat(), thresholds);
      log.info({ trendShiftCount: temporal.trendShifts.length }, 'Temporal analysis completed');
    }

    // 5. Assemble
    const records = assembleRecords({
      conversations: redacted,
      labels,
      quality,
      qualityEnabled: features.quality,
    });
    const statistics = computeCorpusStatistics(records);

    const durationMs = Date.now() - start;
    log.info(
      { conversationCount: conversations.length, recordCount: records.length, durationMs },
      'Analysis run completed',
    );

    return {
      runId,
      records,
      conversations: Array.from(quality.values()),
      temporal,
      statistics,
      features: { ...features },
      durationMs,
    };
  }
}
