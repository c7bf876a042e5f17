import type { BatchErrorKind, BatchLineResult, BatchStatus } from '../../../domain/entities';

export interface BatchJobDocument {
  _id: string;
  username: string;
  cluster: string;
  framework: string;
  model: string;
  endpointSlug: string;
  inputFile: string;
  outputFolder: string;
  status: BatchStatus;
  taskIds: string[];
  lines: BatchLineResult[];
  createdAt: Date;
  inProgressAt?: Date;
  completedAt?: Date;
  failedAt?: Date;
  cancellingAt?: Date;
  cancelledAt?: Date;
  error?: string;
  errorKind?: BatchErrorKind;
  resultLocation?: string;
  metricsProcessed: boolean;
  updatedAt: Date;
}

export const BatchJobCollectionName = 'batch_jobs';

export const BatchJobIndexes = [
  { key: { status: 1, createdAt: 1 }, name: 'status_created' },
  { key: { username: 1, status: 1 }, name: 'user_status' },
  { key: { username: 1, inputFile: 1 }, name: 'user_input' }
] as const;

export interface BatchQuotaDocument {
  _id: string;
  active: number;
  updatedAt: Date;
}

export const BatchQuotaCollectionName = 'batch_quotas';
