import * as fs from 'fs';
import { env } from './config/env';
import { createConfigFromEnv } from './config/config-builder';
import { ConversationAnalysisPipeline } from './pipeline/pipeline';
import { logger } from './observability/logger';

export * from './pipeline/errors';
export { AnalyzerConfigBuilder, createConfigFromEnv } from './config/config-builder';
export { ConversationAnalysisPipeline } from './pipeline/pipeline';
export type { AnalysisResult } from './pipeline/pipeline';
export { loadConversations } from './ingest/conversation-loader';
export { PIIRedactor } from './privacy/pii-redactor';
export { PseudonymTable } from './privacy/pseudonym-table';
export { TaxonomyClassifier } from './classification/taxonomy-classifier';
export { analyzeConversationQuality } from './quality/quality-analyzer';
export { rateResponses } from './quality/response-effectiveness';
export type { ConversationQuality, ResponseRating } from './quality/types';
export { analyzeTemporalProfile } from './temporal/temporal-analyzer';
export { analyzeQualityTrends, analyzeTopicEvolution } from './temporal/evolution-analyzer';
export type { TemporalProfile } from './temporal/types';
export { assembleRecords } from './records/record-assembler';
export type { MessageRecord } from './records/types';
export { computeCorpusStatistics } from './analytics/corpus-statistics';

function main(): void {
  if (!env.io.exportPath) {
    throw new Error('EXPORT_PATH is not set');
  }

  const raw: unknown = JSON.parse(fs.readFileSync(env.io.exportPath, 'utf-8'));
  const result = new ConversationAnalysisPipeline(createConfigFromEnv()).run(raw);
  const output = JSON.stringify(result, null, 2);

  if (env.io.outputPath) {
    fs.writeFileSync(env.io.outputPath, output);
    logger.info({ outputPath: env.io.outputPath, recordCount: result.records.length }, 'Analysis written');
  } else {
    process.stdout.write(output + '\n');
  }
}

if (require.main === module) {
  try {
    main();
  } catch (err) {
    logger.fatal({ err }, 'Analysis failed');
    process.exit(1);
  }
}
