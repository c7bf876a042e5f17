import { injectable, inject } from 'inversify';
import type { AnyBulkWriteOperation, Collection } from 'mongodb';
import type { BatchMetrics, RequestMetrics } from '../../domain/entities';
import type { BatchMetricsRepository, RequestMetricsRepository } from '../../domain/repositories';
import type { IDatabaseService } from '../database';
import {
  BatchMetricsCollectionName,
  RequestMetricsCollectionName,
  type BatchMetricsDocument,
  type RequestMetricsDocument
} from '../database/schemas';
import type { ILogger } from '../../core/logging';
import { TYPES } from '../../core/container/types';
import { toError } from '../../core/errors';

@injectable()
export class MongoRequestMetricsRepository implements RequestMetricsRepository {
  private readonly logger: ILogger;
  private readonly databaseService: IDatabaseService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DatabaseService) databaseService: IDatabaseService
  ) {
    this.logger = logger.createChild('MongoRequestMetricsRepository');
    this.databaseService = databaseService;
  }

  private getCollection(): Collection<RequestMetricsDocument> {
    return this.databaseService.getDatabase().collection<RequestMetricsDocument>(RequestMetricsCollectionName);
  }

  /** Keyed by request id; `createdAt` is only written on first insert. */
  async upsertMany(metrics: readonly RequestMetrics[]): Promise<void> {
    if (metrics.length === 0) {
      return;
    }

    const now = new Date();
    const operations: AnyBulkWriteOperation<RequestMetricsDocument>[] = metrics.map(({ requestId, ...fields }) => ({
      updateOne: {
        filter: { _id: requestId },
        update: {
          $set: { ...fields, updatedAt: now },
          $setOnInsert: { createdAt: now }
        },
        upsert: true
      }
    }));

    try {
      await this.getCollection().bulkWrite(operations, { ordered: false });
    } catch (error) {
      this.logger.error('Failed to upsert request metrics', toError(error), {
        metadata: { count: metrics.length }
      });
      throw error;
    }
  }

  async findByRequestId(requestId: string): Promise<RequestMetrics | null> {
    const doc = await this.getCollection().findOne({ _id: requestId });
    if (!doc) {
      return null;
    }

    const { _id, createdAt: _createdAt, updatedAt: _updatedAt, ...fields } = doc;
    return { requestId: _id, ...fields };
  }
}

@injectable()
export class MongoBatchMetricsRepository implements BatchMetricsRepository {
  private readonly logger: ILogger;
  private readonly databaseService: IDatabaseService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DatabaseService) databaseService: IDatabaseService
  ) {
    this.logger = logger.createChild('MongoBatchMetricsRepository');
    this.databaseService = databaseService;
  }

  private getCollection(): Collection<BatchMetricsDocument> {
    return this.databaseService.getDatabase().collection<BatchMetricsDocument>(BatchMetricsCollectionName);
  }

  async upsert(metrics: BatchMetrics): Promise<void> {
    const { batchId, ...fields } = metrics;
    const now = new Date();

    try {
      await this.getCollection().updateOne(
        { _id: batchId },
        { $set: { ...fields, updatedAt: now }, $setOnInsert: { createdAt: now } },
        { upsert: true }
      );
    } catch (error) {
      this.logger.error('Failed to upsert batch metrics', toError(error), {
        metadata: { batchId }
      });
      throw error;
    }
  }

  async findByBatchId(batchId: string): Promise<BatchMetrics | null> {
    const doc = await this.getCollection().findOne({ _id: batchId });
    if (!doc) {
      return null;
    }

    const { _id, createdAt: _createdAt, updatedAt: _updatedAt, ...fields } = doc;
    return { batchId: _id, ...fields };
  }
}
