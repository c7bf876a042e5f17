import type { OpenAIEndpoint } from '../../../domain/entities';

export interface RequestLogDocument {
  _id: string;
  username: string;
  name: string;
  cluster: string;
  framework: string;
  model: string;
  openaiEndpoint: OpenAIEndpoint;
  endpointSlug?: string;
  federated: boolean;
  streaming: boolean;
  statusCode?: number;
  prompt?: string;
  result?: string;
  taskId?: string;
  attempts: number;
  timestampReceive: Date;
  timestampBackendRequest?: Date;
  timestampBackendResponse?: Date;
  metricsProcessed: boolean | null;
  claimedBy?: string | null;
  claimedAt?: Date | null;
}

export const RequestLogCollectionName = 'request_logs';

export const RequestLogIndexes = [
  { key: { metricsProcessed: 1, timestampBackendResponse: 1 }, name: 'metrics_queue' },
  { key: { username: 1, timestampReceive: -1 }, name: 'user_requests' },
  { key: { endpointSlug: 1 }, name: 'endpoint_slug' }
] as const;
