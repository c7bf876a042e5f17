export interface RequestMetricsDocument {
  _id: string;
  username: string;
  cluster: string;
  framework: string;
  model: string;
  statusCode: number;
  promptTokens: number | null;
  completionTokens: number | null;
  totalTokens: number | null;
  responseTimeSec: number | null;
  throughputTokensPerSecond: number | null;
  timestampCompute: Date;
  createdAt: Date;
  updatedAt: Date;
}

export const RequestMetricsCollectionName = 'request_metrics';

export const RequestMetricsIndexes = [
  { key: { timestampCompute: -1 }, name: 'compute_time' },
  { key: { model: 1, timestampCompute: -1 }, name: 'model_time' }
] as const;

export interface BatchMetricsDocument {
  _id: string;
  username: string;
  cluster: string;
  framework: string;
  model: string;
  numResponses: number;
  numFailedLines: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  responseTimeSec: number;
  throughputTokensPerSecond: number | null;
  completedAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export const BatchMetricsCollectionName = 'batch_metrics';

export const BatchMetricsIndexes = [
  { key: { completedAt: -1 }, name: 'completed_at' }
] as const;
