import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';
import {
  AdaptorError,
  AuthError,
  BatchExpiryError,
  CapacityExceededError,
  NotFoundError,
  ValidationError,
  errorMessage,
  toError
} from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ICryptoService } from '../../../core/security';
import { fail, type Result } from '../../../core/types';
import { TimeoutError, createLinkedController, isTimeoutReason, raceAbort } from '../../../core/utils';
import type { AdaptorFailure, BatchTaskStatus, EndpointAdaptor } from '../../adaptors';
import {
  BatchJob,
  POLLABLE_BATCH_STATUSES,
  buildEndpointSlug,
  type BatchStatus,
  type Endpoint,
  type UserIdentity
} from '../../entities';
import type { BatchFileStore, BatchJobRepository, BatchPageCursor, BatchQuotaRepository } from '../../repositories';
import type { AuthorizationService } from '../auth';
import type { EndpointCatalogService } from '../catalog';
import { aggregateBatchStatus, mergeLineStatuses } from './batch-status';

export interface SubmitBatchRequest {
  readonly identity: UserIdentity;
  readonly model: string;
  readonly inputFile: string;
  readonly outputFolder: string;
  readonly cluster?: string;
  readonly framework?: string;
}

export type BatchPollOutcome = 'unchanged' | 'skipped' | 'updated' | 'completed' | 'expired' | 'conflict' | 'error';

export interface PollSummary {
  readonly polled: number;
  readonly outcomes: Readonly<Record<BatchPollOutcome, number>>;
}

export interface CancellationSummary {
  readonly processed: number;
  readonly cancelled: number;
  readonly retrying: number;
}

interface BatchTarget {
  readonly endpoint: Endpoint;
  readonly adaptor: EndpointAdaptor;
}

function emptyOutcomes(): Record<BatchPollOutcome, number> {
  return { unchanged: 0, skipped: 0, updated: 0, completed: 0, expired: 0, conflict: 0, error: 0 };
}

/**
 * Admits, tracks and finalizes batch jobs. Every status write is
 * conditional on the status the writer last read, so concurrent pollers
 * can only move a batch forward, and only the writer that lands the
 * terminal transition gives back the user's quota slot.
 */
@injectable()
export class BatchJobManager {
  private readonly logger: ILogger;
  private readonly settings: GatewayConfig['batches'];
  private readonly catalog: EndpointCatalogService;
  private readonly authorization: AuthorizationService;
  private readonly batches: BatchJobRepository;
  private readonly quota: BatchQuotaRepository;
  private readonly files: BatchFileStore;
  private readonly cryptoService: ICryptoService;
  private readonly metrics: IMetricsService;

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.EndpointCatalogService) catalog: EndpointCatalogService,
    @inject(TYPES.AuthorizationService) authorization: AuthorizationService,
    @inject(TYPES.BatchJobRepository) batches: BatchJobRepository,
    @inject(TYPES.BatchQuotaRepository) quota: BatchQuotaRepository,
    @inject(TYPES.BatchFileStore) files: BatchFileStore,
    @inject(TYPES.CryptoService) cryptoService: ICryptoService,
    @inject(TYPES.MetricsService) metrics: IMetricsService
  ) {
    this.logger = logger.createChild('BatchJobManager');
    this.settings = config.batches;
    this.catalog = catalog;
    this.authorization = authorization;
    this.batches = batches;
    this.quota = quota;
    this.files = files;
    this.cryptoService = cryptoService;
    this.metrics = metrics;
  }

  async submit(request: SubmitBatchRequest, now: Date = new Date()): Promise<BatchJob> {
    const { identity } = request;
    const { endpoint, adaptor } = this.resolveTarget(request);

    if (await this.batches.hasActiveBatchForInput(identity.username, request.inputFile)) {
      throw new ValidationError(`Input file ${request.inputFile} is already used by an ongoing batch`);
    }

    const admitted = await this.quota.tryAcquire(identity.username, this.settings.maxBatchesPerUser);
    if (!admitted) {
      throw new CapacityExceededError(
        `User ${identity.username} already has ${this.settings.maxBatchesPerUser} batches in progress`
      );
    }

    try {
      const lines = await this.files.readInput(request.inputFile, endpoint.model);
      const batchId = this.cryptoService.generateId();

      const submission = await adaptor.submitBatch(
        { batchId, inputFile: request.inputFile, outputFolder: request.outputFolder, lines },
        identity
      );
      if (!submission.ok) {
        throw new AdaptorError(`Batch submission to ${endpoint.slug} failed: ${submission.error.message}`, submission.error.code);
      }

      const batch = BatchJob.submitted(
        { id: batchId, username: identity.username, createdAt: now },
        {
          cluster: endpoint.cluster,
          framework: endpoint.framework,
          model: endpoint.model,
          endpointSlug: endpoint.slug,
          inputFile: request.inputFile,
          outputFolder: request.outputFolder
        },
        submission.value.taskIds
      );

      await this.batches.create(batch);
      this.metrics.recordBatchTransition('pending');

      this.logger.info('Batch submitted', {
        userId: identity.username,
        metadata: { batchId, endpoint: endpoint.slug, lines: lines.length }
      });

      return batch;
    } catch (error) {
      await this.releaseSlot(identity.username);
      throw error;
    }
  }

  async getBatch(id: string, identity: UserIdentity, refresh: boolean = true): Promise<BatchJob> {
    const batch = await this.findVisible(id, identity);

    if (!refresh || batch.isTerminal()) {
      return batch;
    }

    const outcome = await this.poll(batch, new Date(), { ignoreFirstPollDelay: true });
    if (outcome === 'conflict') {
      return (await this.batches.findById(id)) ?? batch;
    }
    return batch;
  }

  listBatches(identity: UserIdentity, status?: BatchStatus): Promise<BatchJob[]> {
    return this.batches.findByUser(identity.username, status);
  }

  /**
   * Moves a pending or running batch to `cancelling`. The backend work is
   * stopped later by {@link processCancellations}, which also gives back
   * the quota slot.
   */
  async cancel(id: string, identity: UserIdentity, now: Date = new Date()): Promise<BatchJob> {
    let batch = await this.findVisible(id, identity);

    while (batch.getStatus() !== 'cancelling') {
      const expectedStatus = batch.getStatus();
      if (!batch.requestCancel(now)) {
        throw new ValidationError(`Batch ${id} is already ${expectedStatus}`);
      }
      if (await this.persist(batch, expectedStatus)) {
        this.logger.info('Batch cancellation requested', {
          userId: identity.username,
          metadata: { batchId: id, previousStatus: expectedStatus }
        });
        return batch;
      }
      batch = await this.findVisible(id, identity);
    }

    return batch;
  }

  async pollAll(now: Date = new Date()): Promise<PollSummary> {
    const outcomes = emptyOutcomes();
    let polled = 0;

    await this.forEachPage(POLLABLE_BATCH_STATUSES, async page => {
      polled += page.length;
      for (let start = 0; start < page.length; start += this.settings.pollConcurrency) {
        const slice = page.slice(start, start + this.settings.pollConcurrency);
        const settled = await Promise.allSettled(slice.map(batch => this.poll(batch, now)));

        settled.forEach((result, index) => {
          if (result.status === 'fulfilled') {
            outcomes[result.value] += 1;
            return;
          }
          outcomes.error += 1;
          this.logger.error('Batch poll failed', toError(result.reason), {
            metadata: { batchId: slice[index]?.getId() }
          });
        });
      }
    });

    if (polled > 0) {
      this.logger.info('Batch poll finished', { metadata: { polled, ...outcomes } });
    }

    return { polled, outcomes };
  }

  /**
   * Stops the backend work of every `cancelling` batch and marks it
   * cancelled. A batch whose backend refuses stays `cancelling` for the
   * next pass; one past retention or without a configured endpoint is
   * cancelled without asking.
   */
  async processCancellations(now: Date = new Date()): Promise<CancellationSummary> {
    let processed = 0;
    let cancelled = 0;
    let retrying = 0;

    await this.forEachPage(['cancelling'], async page => {
      for (const batch of page) {
        processed += 1;
        try {
          if (await this.finishCancellation(batch, now)) {
            cancelled += 1;
          } else {
            retrying += 1;
          }
        } catch (error) {
          retrying += 1;
          this.logger.error('Batch cancellation failed', toError(error), {
            metadata: { batchId: batch.getId() }
          });
        }
      }
    });

    if (processed > 0) {
      this.logger.info('Batch cancellations processed', { metadata: { processed, cancelled, retrying } });
    }

    return { processed, cancelled, retrying };
  }

  /**
   * Brings one batch up to date. A batch past its retention deadline is
   * failed without asking the backend.
   */
  async poll(batch: BatchJob, now: Date, options: { ignoreFirstPollDelay?: boolean } = {}): Promise<BatchPollOutcome> {
    if (batch.isTerminal()) {
      return 'unchanged';
    }
    if (batch.getStatus() === 'cancelling') {
      return 'skipped';
    }

    const expectedStatus = batch.getStatus();

    if (batch.isExpired(now, this.settings.retentionMs)) {
      const expiry = new BatchExpiryError(batch.getId(), batch.retentionDeadline(this.settings.retentionMs));
      batch.fail(now, expiry.message, 'expired');
      const won = await this.persist(batch, expectedStatus);
      if (won) {
        this.logger.warn('Batch expired', { userId: batch.getUsername(), metadata: { batchId: batch.getId() } });
      }
      return won ? 'expired' : 'conflict';
    }

    const age = now.getTime() - batch.getCreatedAt().getTime();
    if (!options.ignoreFirstPollDelay && age < this.settings.firstPollDelayMs) {
      return 'skipped';
    }

    const target = batch.getTarget();
    const adaptor = this.catalog.getEndpointAdaptor(target.endpointSlug);
    if (!adaptor) {
      this.logger.warn('Batch endpoint is no longer configured', {
        metadata: { batchId: batch.getId(), endpoint: target.endpointSlug }
      });
      return 'skipped';
    }

    const statuses = await this.fetchStatuses(batch, adaptor);
    if (!statuses.ok) {
      this.logger.warn('Could not fetch batch status', {
        metadata: { batchId: batch.getId(), endpoint: target.endpointSlug, ...statuses.error }
      });
      return 'error';
    }

    batch.recordLines(mergeLineStatuses(batch, statuses.value));
    const aggregate = aggregateBatchStatus(batch.getLines());

    if (aggregate === 'completed') {
      const location = await this.writeResults(batch);
      if (location !== undefined) {
        batch.complete(now, location);
      } else {
        batch.markRunning(now);
      }
    } else if (aggregate === 'running') {
      batch.markRunning(now);
    }

    const won = await this.persist(batch, expectedStatus);
    if (!won) {
      return 'conflict';
    }
    if (batch.getStatus() === 'completed') {
      return 'completed';
    }
    return batch.getStatus() === expectedStatus ? 'unchanged' : 'updated';
  }

  private async finishCancellation(batch: BatchJob, now: Date): Promise<boolean> {
    const target = batch.getTarget();
    const adaptor = this.catalog.getEndpointAdaptor(target.endpointSlug);

    if (adaptor && !batch.isExpired(now, this.settings.retentionMs)) {
      const stopped = await this.withPollTimeout(`Cancelling batch ${batch.getId()}`, signal =>
        adaptor.cancelBatch(batch, signal)
      );
      if (!stopped.ok && stopped.error.kind !== 'unsupported') {
        this.logger.warn('Could not stop batch on its backend', {
          metadata: { batchId: batch.getId(), endpoint: target.endpointSlug, ...stopped.error }
        });
        return false;
      }
    }

    batch.markCancelled(now);
    return this.persist(batch, 'cancelling');
  }

  private async forEachPage(
    statuses: readonly BatchStatus[],
    visit: (page: readonly BatchJob[]) => Promise<void>
  ): Promise<void> {
    const pageSize = this.settings.pollPageSize;
    let after: BatchPageCursor | undefined;

    while (true) {
      const page = await this.batches.findByStatus(statuses, pageSize, after);
      await visit(page);

      const last = page.at(-1);
      if (!last || page.length < pageSize) {
        return;
      }
      after = { createdAt: last.getCreatedAt(), id: last.getId() };
    }
  }

  private async findVisible(id: string, identity: UserIdentity): Promise<BatchJob> {
    const batch = await this.batches.findById(id);
    if (!batch || (batch.getUsername() !== identity.username && !this.authorization.isAdmin(identity))) {
      throw new NotFoundError(`Batch ${id} not found`);
    }
    return batch;
  }

  private fetchStatuses(batch: BatchJob, adaptor: EndpointAdaptor): Promise<Result<readonly BatchTaskStatus[], AdaptorFailure>> {
    return this.withPollTimeout(`Status poll for batch ${batch.getId()}`, signal => adaptor.getBatchStatus(batch, signal));
  }

  private async withPollTimeout<T>(
    label: string,
    call: (signal: AbortSignal) => Promise<Result<T, AdaptorFailure>>
  ): Promise<Result<T, AdaptorFailure>> {
    const timeoutMs = this.settings.pollTimeoutMs;
    const { controller, dispose } = createLinkedController();
    const timer = setTimeout(() => controller.abort(new TimeoutError(`${label} exceeded ${timeoutMs}ms`)), timeoutMs);

    try {
      return await raceAbort(call(controller.signal), controller.signal);
    } catch (error) {
      const failure: AdaptorFailure = isTimeoutReason(error)
        ? { message: errorMessage(error), code: 504, kind: 'timeout' }
        : { message: errorMessage(error), code: 502, kind: 'internal' };
      return fail(failure);
    } finally {
      clearTimeout(timer);
      dispose();
    }
  }

  private async writeResults(batch: BatchJob): Promise<string | undefined> {
    const target = batch.getTarget();
    try {
      return await this.files.writeResults(target.outputFolder, batch.getId(), batch.getLines());
    } catch (error) {
      this.logger.error('Failed to write batch results', toError(error), {
        metadata: { batchId: batch.getId(), outputFolder: target.outputFolder }
      });
      return undefined;
    }
  }

  private async persist(batch: BatchJob, expectedStatus: BatchStatus): Promise<boolean> {
    const won = await this.batches.saveIfStatus(batch, expectedStatus);
    if (!won) {
      this.logger.debug('Batch was updated by another writer', {
        metadata: { batchId: batch.getId(), expectedStatus }
      });
      return false;
    }

    const status = batch.getStatus();
    if (status !== expectedStatus) {
      this.metrics.recordBatchTransition(status);
    }
    if (batch.isTerminal()) {
      await this.releaseSlot(batch.getUsername());
      this.logger.info('Batch finished', {
        userId: batch.getUsername(),
        metadata: {
          batchId: batch.getId(),
          status,
          lines: batch.getLines().length,
          failedLines: batch.failedLineCount()
        }
      });
    }
    return true;
  }

  private async releaseSlot(username: string): Promise<void> {
    try {
      await this.quota.release(username);
    } catch (error) {
      this.logger.error('Failed to release batch quota slot', toError(error), { userId: username });
    }
  }

  private resolveTarget(request: SubmitBatchRequest): BatchTarget {
    const { identity, model } = request;

    if (request.cluster !== undefined && request.framework !== undefined) {
      const slug = buildEndpointSlug(request.cluster, request.framework, model);
      const endpoint = this.catalog.getEndpoint(slug);
      const adaptor = this.catalog.getEndpointAdaptor(slug);
      if (!endpoint || !adaptor) {
        throw new NotFoundError(`Endpoint '${slug}' does not exist`);
      }
      this.authorization.assertAccess(identity, endpoint, `endpoint ${slug}`);
      if (!adaptor.hasBatchEnabled()) {
        throw new AdaptorError(`Endpoint ${slug} does not have batch enabled`, 501);
      }
      return { endpoint, adaptor };
    }

    const federated = this.catalog.findFederatedEndpoint(model);
    const endpoints = federated
      ? federated.targets.flatMap(target => this.catalog.getEndpoint(target.endpointSlug) ?? [])
      : this.catalog.findEndpointsByModel(model);

    if (endpoints.length === 0) {
      throw new NotFoundError(`Model '${model}' is not available`);
    }

    const permitted = endpoints.filter(endpoint => this.authorization.canAccess(identity, endpoint));
    if (permitted.length === 0) {
      throw new AuthError(`User ${identity.username} is not allowed to access model '${model}'`, 403);
    }

    for (const endpoint of permitted) {
      const adaptor = this.catalog.getEndpointAdaptor(endpoint.slug);
      if (adaptor?.hasBatchEnabled()) {
        return { endpoint, adaptor };
      }
    }

    throw new AdaptorError(`No endpoint serving '${model}' has batch enabled`, 501);
  }
}
