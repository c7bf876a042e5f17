import { injectable, inject } from 'inversify';
import { MongoServerError, type Collection, type Filter } from 'mongodb';
import { BatchJob, NON_TERMINAL_BATCH_STATUSES } from '../../domain/entities';
import type { BatchStatus } from '../../domain/entities';
import type { BatchJobRepository, BatchPageCursor, BatchQuotaRepository } from '../../domain/repositories';
import type { IDatabaseService } from '../database';
import {
  BatchJobCollectionName,
  BatchQuotaCollectionName,
  type BatchJobDocument,
  type BatchQuotaDocument
} from '../database/schemas';
import type { ILogger } from '../../core/logging';
import { TYPES } from '../../core/container/types';
import { toError } from '../../core/errors';

const DUPLICATE_KEY = 11000;

@injectable()
export class MongoBatchJobRepository implements BatchJobRepository {
  private readonly logger: ILogger;
  private readonly databaseService: IDatabaseService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DatabaseService) databaseService: IDatabaseService
  ) {
    this.logger = logger.createChild('MongoBatchJobRepository');
    this.databaseService = databaseService;
  }

  private getCollection(): Collection<BatchJobDocument> {
    return this.databaseService.getDatabase().collection<BatchJobDocument>(BatchJobCollectionName);
  }

  private documentToEntity(doc: BatchJobDocument): BatchJob {
    const { _id, updatedAt: _updatedAt, ...fields } = doc;
    return BatchJob.fromSnapshot({ id: _id, ...fields });
  }

  private entityToDocument(batch: BatchJob): BatchJobDocument {
    const { id, ...fields } = batch.toSnapshot();
    return { _id: id, ...fields, updatedAt: new Date() };
  }

  async create(batch: BatchJob): Promise<void> {
    try {
      await this.getCollection().insertOne(this.entityToDocument(batch));
    } catch (error) {
      this.logger.error('Failed to create batch job', toError(error), {
        metadata: { batchId: batch.getId() }
      });
      throw error;
    }
  }

  async findById(id: string): Promise<BatchJob | null> {
    const doc = await this.getCollection().findOne({ _id: id });
    return doc ? this.documentToEntity(doc) : null;
  }

  async findByUser(username: string, status?: BatchStatus): Promise<BatchJob[]> {
    const filter: Filter<BatchJobDocument> = status ? { username, status } : { username };
    const docs = await this.getCollection().find(filter).sort({ createdAt: -1 }).toArray();
    return docs.map(doc => this.documentToEntity(doc));
  }

  async findByStatus(
    statuses: readonly BatchStatus[],
    limit: number,
    after?: BatchPageCursor
  ): Promise<BatchJob[]> {
    const filter: Filter<BatchJobDocument> = { status: { $in: [...statuses] } };
    if (after) {
      filter.$or = [
        { createdAt: { $gt: after.createdAt } },
        { createdAt: after.createdAt, _id: { $gt: after.id } }
      ];
    }
    const docs = await this.getCollection()
      .find(filter)
      .sort({ createdAt: 1, _id: 1 })
      .limit(limit)
      .toArray();
    return docs.map(doc => this.documentToEntity(doc));
  }

  async hasActiveBatchForInput(username: string, inputFile: string): Promise<boolean> {
    const count = await this.getCollection().countDocuments(
      { username, inputFile, status: { $in: [...NON_TERMINAL_BATCH_STATUSES] } },
      { limit: 1 }
    );
    return count > 0;
  }

  async saveIfStatus(batch: BatchJob, expectedStatus: BatchStatus): Promise<boolean> {
    const doc = this.entityToDocument(batch);

    try {
      const result = await this.getCollection().replaceOne({ _id: doc._id, status: expectedStatus }, doc);
      return result.matchedCount === 1;
    } catch (error) {
      this.logger.error('Failed to save batch job', toError(error), {
        metadata: { batchId: doc._id, expectedStatus }
      });
      throw error;
    }
  }

  async findCompletedWithoutMetrics(limit: number): Promise<BatchJob[]> {
    const docs = await this.getCollection()
      .find({ status: 'completed', metricsProcessed: false })
      .sort({ completedAt: 1 })
      .limit(limit)
      .toArray();
    return docs.map(doc => this.documentToEntity(doc));
  }

  async markMetricsProcessed(id: string): Promise<void> {
    await this.getCollection().updateOne({ _id: id }, { $set: { metricsProcessed: true, updatedAt: new Date() } });
  }
}

@injectable()
export class MongoBatchQuotaRepository implements BatchQuotaRepository {
  private readonly logger: ILogger;
  private readonly databaseService: IDatabaseService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DatabaseService) databaseService: IDatabaseService
  ) {
    this.logger = logger.createChild('MongoBatchQuotaRepository');
    this.databaseService = databaseService;
  }

  private getCollection(): Collection<BatchQuotaDocument> {
    return this.databaseService.getDatabase().collection<BatchQuotaDocument>(BatchQuotaCollectionName);
  }

  /**
   * The filter only matches while `active < max`. At the cap the upsert
   * collides with the existing user document and fails on the unique `_id`.
   */
  async tryAcquire(username: string, max: number): Promise<boolean> {
    try {
      const updated = await this.getCollection().findOneAndUpdate(
        { _id: username, active: { $lt: max } },
        { $inc: { active: 1 }, $set: { updatedAt: new Date() } },
        { upsert: true, returnDocument: 'after' }
      );
      return updated !== null;
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        return false;
      }
      this.logger.error('Failed to acquire batch quota', toError(error), {
        userId: username
      });
      throw error;
    }
  }

  async release(username: string): Promise<void> {
    await this.getCollection().updateOne(
      { _id: username, active: { $gt: 0 } },
      { $inc: { active: -1 }, $set: { updatedAt: new Date() } }
    );
  }

  async activeCount(username: string): Promise<number> {
    const doc = await this.getCollection().findOne({ _id: username });
    return doc?.active ?? 0;
  }
}
