import type { InferencePayload } from '../../domain/adaptors';
import type { OpenAIEndpoint, UserIdentity } from '../../domain/entities';
import type { StreamSession } from '../../domain/services/streaming';

export interface InferenceCommand {
  readonly identity: UserIdentity;
  readonly openaiEndpoint: OpenAIEndpoint;
  readonly payload: InferencePayload;
  readonly cluster?: string;
  readonly framework?: string;
  readonly signal?: AbortSignal;
}

export interface CompletedInference {
  readonly kind: 'response';
  readonly requestLogId: string;
  readonly endpointSlug: string;
  readonly body: unknown;
}

export interface StreamingInference {
  readonly kind: 'stream';
  readonly requestLogId: string;
  readonly session: StreamSession;
}

export type InferenceOutcome = CompletedInference | StreamingInference;
