import { AnalysisThresholds } from '../config/types';
import { ClassifiedMessage } from '../classification/types';
import { FlowMetrics } from './types';

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.round((values.reduce((a, b) => a + b, 0) / values.length) * 100) / 100;
}

/**
 * Turn-taking metrics over one conversation's ordered messages.
 * Pairs are always adjacent messages; deltas are in milliseconds.
 */
export function analyzeFlow(
  messages: readonly ClassifiedMessage[],
  thresholds: Pick<AnalysisThresholds, 'quickResponseSeconds' | 'longGapSeconds'>,
): FlowMetrics {
  const quickMs = thresholds.quickResponseSeconds * 1000;
  const longGapMs = thresholds.longGapSeconds * 1000;

  const metrics: FlowMetrics = {
    turnCount: messages.length,
    questionCount: 0,
    codeBlockCount: 0,
    flowInterruptions: 0,
    monologues: 0,
    quickResponseCount: 0,
    longGaps: 0,
    clarificationRequests: 0,
    avgUserLength: 0,
    avgAssistantLength: 0,
  };
  const lengths: Record<ClassifiedMessage['role'], number[]> = { user: [], assistant: [] };

  messages.forEach((msg, i) => {
    lengths[msg.role].push(msg.contentLength);
    if (msg.role === 'user' && msg.labels.isQuestion) metrics.questionCount++;
    if (msg.role === 'user' && msg.labels.isClarificationRequest) metrics.clarificationRequests++;
    if (msg.role === 'assistant' && msg.labels.hasCodeBlock) metrics.codeBlockCount++;

    if (i === 0) return;
    const prev = messages[i - 1];
    const delta = msg.timestamp - prev.timestamp;

    if (prev.role === msg.role) {
      metrics.flowInterruptions++;
      if (msg.role === 'assistant') metrics.monologues++;
    } else if (delta >= 0 && delta < quickMs) {
      metrics.quickResponseCount++;
    }

    if (delta > longGapMs) metrics.longGaps++;
  });

  metrics.avgUserLength = average(lengths.user);
  metrics.avgAssistantLength = average(lengths.assistant);
  return metrics;
}
