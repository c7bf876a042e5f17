import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import { toError } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { ICryptoService } from '../../../core/security';
import type { InferencePayload } from '../../adaptors';
import { RequestLog, type OpenAIEndpoint, type UserIdentity } from '../../entities';
import type { RequestLogRepository } from '../../repositories';

export interface StartRequestLog {
  readonly identity: UserIdentity;
  readonly model: string;
  readonly openaiEndpoint: OpenAIEndpoint;
  readonly payload: InferencePayload;
  readonly federated: boolean;
  readonly streaming: boolean;
  readonly cluster?: string;
  readonly framework?: string;
}

/** The part of the request worth keeping: messages, prompt or input, whichever is present. */
export function extractPrompt(payload: InferencePayload): string {
  const prompt = payload.messages ?? payload.prompt ?? payload.input;
  if (prompt === undefined) {
    return '';
  }
  return typeof prompt === 'string' ? prompt : JSON.stringify(prompt);
}

@injectable()
export class RequestLogService {
  private readonly logger: ILogger;
  private readonly repository: RequestLogRepository;
  private readonly cryptoService: ICryptoService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.RequestLogRepository) repository: RequestLogRepository,
    @inject(TYPES.CryptoService) cryptoService: ICryptoService
  ) {
    this.logger = logger.createChild('RequestLogService');
    this.repository = repository;
    this.cryptoService = cryptoService;
  }

  start(request: StartRequestLog, now: Date = new Date()): RequestLog {
    return new RequestLog(
      {
        id: this.cryptoService.generateId(),
        username: request.identity.username,
        name: request.identity.name,
        timestampReceive: now
      },
      {
        cluster: request.cluster ?? '',
        framework: request.framework ?? '',
        model: request.model,
        openaiEndpoint: request.openaiEndpoint,
        federated: request.federated,
        streaming: request.streaming
      },
      {
        prompt: extractPrompt(request.payload),
        attempts: 0,
        metricsProcessed: null
      }
    );
  }

  /** Persistence failures are logged and never reach the caller. */
  async save(log: RequestLog): Promise<void> {
    try {
      await this.repository.save(log);
    } catch (error) {
      this.logger.error('Failed to persist request log', toError(error), {
        requestId: log.getId(),
        userId: log.getUsername()
      });
    }
  }
}
