export interface ParsedUsage {
  readonly promptTokens: number | null;
  readonly completionTokens: number | null;
  readonly totalTokens: number | null;
  readonly throughputTokensPerSecond: number | null;
}

export interface RequestMetrics extends ParsedUsage {
  readonly requestId: string;
  readonly username: string;
  readonly cluster: string;
  readonly framework: string;
  readonly model: string;
  readonly statusCode: number;
  readonly responseTimeSec: number | null;
  readonly timestampCompute: Date;
}

export interface BatchMetrics {
  readonly batchId: string;
  readonly username: string;
  readonly cluster: string;
  readonly framework: string;
  readonly model: string;
  readonly numResponses: number;
  readonly numFailedLines: number;
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
  readonly responseTimeSec: number;
  readonly throughputTokensPerSecond: number | null;
  readonly completedAt: Date;
}

export interface MetricsLag {
  readonly unprocessedCount: number;
  readonly oldestUnprocessed: Date | null;
  readonly newestUnprocessed: Date | null;
}
