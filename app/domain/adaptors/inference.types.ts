import type { OpenAIEndpoint } from '../entities';

export interface ChatMessage {
  readonly role: string;
  readonly content: unknown;
  readonly [key: string]: unknown;
}

/**
 * OpenAI-compatible request body. Known fields are typed; anything else the
 * client sends is forwarded to the backend untouched.
 */
export interface InferencePayload {
  readonly model: string;
  readonly messages?: readonly ChatMessage[];
  readonly prompt?: unknown;
  readonly input?: unknown;
  readonly max_tokens?: number;
  readonly temperature?: number;
  readonly top_p?: number;
  readonly stream?: boolean;
  readonly stop?: string | readonly string[];
  readonly [key: string]: unknown;
}

export interface InferenceRequest {
  readonly openaiEndpoint: OpenAIEndpoint;
  readonly payload: InferencePayload;
}

export interface BatchLineRequest {
  readonly line: number;
  readonly customId?: string;
  readonly openaiEndpoint: OpenAIEndpoint;
  readonly payload: InferencePayload;
}
