import { injectable, inject } from 'inversify';
import type { Collection, Filter } from 'mongodb';
import { RequestLog } from '../../domain/entities';
import type { MetricsLag } from '../../domain/entities';
import type { ClaimOptions, RequestLogRepository } from '../../domain/repositories';
import type { IDatabaseService } from '../database';
import { RequestLogCollectionName, type RequestLogDocument } from '../database/schemas';
import type { ILogger } from '../../core/logging';
import { TYPES } from '../../core/container/types';
import { toError } from '../../core/errors';

const ELIGIBLE_FOR_METRICS: Filter<RequestLogDocument> = {
  statusCode: { $gte: 200, $lt: 300 },
  result: { $regex: /"total_tokens"/ }
};

@injectable()
export class MongoRequestLogRepository implements RequestLogRepository {
  private readonly logger: ILogger;
  private readonly databaseService: IDatabaseService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DatabaseService) databaseService: IDatabaseService
  ) {
    this.logger = logger.createChild('MongoRequestLogRepository');
    this.databaseService = databaseService;
  }

  private getCollection(): Collection<RequestLogDocument> {
    return this.databaseService.getDatabase().collection<RequestLogDocument>(RequestLogCollectionName);
  }

  private documentToEntity(doc: RequestLogDocument): RequestLog {
    return RequestLog.fromSnapshot({
      id: doc._id,
      username: doc.username,
      name: doc.name,
      cluster: doc.cluster,
      framework: doc.framework,
      model: doc.model,
      openaiEndpoint: doc.openaiEndpoint,
      endpointSlug: doc.endpointSlug,
      federated: doc.federated,
      streaming: doc.streaming,
      statusCode: doc.statusCode,
      prompt: doc.prompt,
      result: doc.result,
      taskId: doc.taskId,
      attempts: doc.attempts,
      timestampReceive: doc.timestampReceive,
      timestampBackendRequest: doc.timestampBackendRequest,
      timestampBackendResponse: doc.timestampBackendResponse,
      metricsProcessed: doc.metricsProcessed
    });
  }

  private entityToDocument(log: RequestLog): Omit<RequestLogDocument, 'claimedBy' | 'claimedAt'> {
    const { id, ...snapshot } = log.toSnapshot();
    return { _id: id, ...snapshot };
  }

  async save(log: RequestLog): Promise<void> {
    try {
      const { _id, ...fields } = this.entityToDocument(log);
      await this.getCollection().updateOne({ _id }, { $set: fields }, { upsert: true });
    } catch (error) {
      this.logger.error('Failed to save request log', toError(error), {
        requestId: log.getId()
      });
      throw error;
    }
  }

  async findById(id: string): Promise<RequestLog | null> {
    const doc = await this.getCollection().findOne({ _id: id });
    return doc ? this.documentToEntity(doc) : null;
  }

  /**
   * Claims rows one conditional update at a time: a row already claimed by a
   * live lease fails the filter and is skipped, so workers never block each
   * other and never share a row.
   */
  async claimUnprocessed(options: ClaimOptions): Promise<RequestLog[]> {
    const collection = this.getCollection();
    const leaseCutoff = new Date(options.now.getTime() - options.leaseMs);

    const claimable: Filter<RequestLogDocument> = {
      ...ELIGIBLE_FOR_METRICS,
      metricsProcessed: false,
      $or: [{ claimedBy: null }, { claimedAt: { $lt: leaseCutoff } }]
    };

    try {
      const candidates = await collection
        .find(claimable, { projection: { _id: 1 } })
        .sort({ timestampBackendResponse: 1 })
        .limit(options.limit)
        .toArray();

      if (candidates.length === 0) {
        return [];
      }

      const ids = candidates.map(candidate => candidate._id);

      await collection.updateMany(
        { ...claimable, _id: { $in: ids } },
        { $set: { claimedBy: options.workerId, claimedAt: options.now } }
      );

      const claimed = await collection
        .find({ _id: { $in: ids }, claimedBy: options.workerId, claimedAt: options.now })
        .sort({ timestampBackendResponse: 1 })
        .toArray();

      return claimed.map(doc => this.documentToEntity(doc));
    } catch (error) {
      this.logger.error('Failed to claim request logs', toError(error), {
        metadata: { workerId: options.workerId, limit: options.limit }
      });
      throw error;
    }
  }

  async markProcessed(ids: readonly string[], workerId: string): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }

    const result = await this.getCollection().updateMany(
      { _id: { $in: [...ids] }, claimedBy: workerId },
      { $set: { metricsProcessed: true, claimedBy: null, claimedAt: null } }
    );
    return result.modifiedCount;
  }

  async releaseClaims(ids: readonly string[], workerId: string): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    await this.getCollection().updateMany(
      { _id: { $in: [...ids] }, claimedBy: workerId },
      { $set: { claimedBy: null, claimedAt: null } }
    );
  }

  async markHistoricalUnprocessed(): Promise<number> {
    const result = await this.getCollection().updateMany(
      { ...ELIGIBLE_FOR_METRICS, metricsProcessed: null },
      { $set: { metricsProcessed: false } }
    );
    return result.modifiedCount;
  }

  async getLag(): Promise<MetricsLag> {
    const [summary] = await this.getCollection()
      .aggregate<{ count: number; oldest: Date | null; newest: Date | null }>([
        { $match: { ...ELIGIBLE_FOR_METRICS, metricsProcessed: false } },
        {
          $group: {
            _id: null,
            count: { $sum: 1 },
            oldest: { $min: '$timestampBackendResponse' },
            newest: { $max: '$timestampBackendResponse' }
          }
        }
      ])
      .toArray();

    return {
      unprocessedCount: summary?.count ?? 0,
      oldestUnprocessed: summary?.oldest ?? null,
      newestUnprocessed: summary?.newest ?? null
    };
  }
}
