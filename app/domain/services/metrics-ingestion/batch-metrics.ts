import type { BatchJob, BatchMetrics } from '../../entities';
import { parseUsage } from './usage-parser';

/**
 * Sums usage over the successful lines of a completed batch. Response time
 * runs from the first observed progress (or creation) to completion.
 */
export function computeBatchMetrics(batch: BatchJob): BatchMetrics {
  const snapshot = batch.toSnapshot();
  const completedAt = snapshot.completedAt ?? snapshot.createdAt;
  const startedAt = snapshot.inProgressAt ?? snapshot.createdAt;

  let promptTokens = 0;
  let completionTokens = 0;
  let totalTokens = 0;
  let numResponses = 0;

  for (const line of snapshot.lines) {
    if (line.status !== 'success' || !line.result) continue;

    numResponses += 1;
    const usage = parseUsage(line.result);
    const prompt = usage.promptTokens ?? 0;
    const completion = usage.completionTokens ?? 0;
    promptTokens += prompt;
    completionTokens += completion;
    totalTokens += usage.totalTokens ?? prompt + completion;
  }

  const responseTimeSec = Math.max(0, (completedAt.getTime() - startedAt.getTime()) / 1000);

  return {
    batchId: snapshot.id,
    username: snapshot.username,
    cluster: snapshot.cluster,
    framework: snapshot.framework,
    model: snapshot.model,
    numResponses,
    numFailedLines: batch.failedLineCount(),
    promptTokens,
    completionTokens,
    totalTokens,
    responseTimeSec,
    throughputTokensPerSecond: responseTimeSec > 0 ? totalTokens / responseTimeSec : null,
    completedAt
  };
}
