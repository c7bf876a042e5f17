import { injectable, inject } from 'inversify';
import { MongoClient, Db, MongoClientOptions, type IndexDescription } from 'mongodb';
import type { ILogger } from '../../core/logging';
import type { GatewayConfig } from '../../core/config';
import { TYPES } from '../../core/container/types';
import { toError } from '../../core/errors';
import { COLLECTION_INDEXES } from './schemas';

export interface IDatabaseService {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  getDatabase(): Db;
}

@injectable()
export class DatabaseService implements IDatabaseService {
  private client: MongoClient | null = null;
  private database: Db | null = null;
  private readonly logger: ILogger;
  private readonly connectionString: string;
  private readonly databaseName: string;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.GatewayConfig) config: GatewayConfig
  ) {
    this.logger = logger.createChild('DatabaseService');
    this.connectionString = config.database.uri;
    this.databaseName = config.database.name;
  }

  async connect(): Promise<void> {
    try {
      this.logger.info('Connecting to MongoDB...', {
        metadata: {
          connectionString: this.connectionString.replace(/\/\/.*@/, '//***:***@'),
          databaseName: this.databaseName
        }
      });

      const options: MongoClientOptions = {
        maxPoolSize: 20,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
        family: 4,
        ignoreUndefined: true
      };

      this.client = new MongoClient(this.connectionString, options);
      await this.client.connect();

      this.database = this.client.db(this.databaseName);
      await this.ensureIndexes(this.database);

      this.logger.info('MongoDB connected successfully', {
        metadata: { databaseName: this.databaseName }
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Failed to connect to MongoDB', cause);
      throw new Error(`Database connection failed: ${cause.message}`, { cause });
    }
  }

  async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      this.logger.info('Disconnecting from MongoDB...');
      await this.client.close();
      this.client = null;
      this.database = null;
      this.logger.info('MongoDB disconnected successfully');
    } catch (error) {
      this.logger.error('Failed to disconnect from MongoDB', toError(error));
      throw error;
    }
  }

  isConnected(): boolean {
    return this.client !== null && this.database !== null;
  }

  getDatabase(): Db {
    if (!this.database) {
      throw new Error('Database not connected. Call connect() first.');
    }
    return this.database;
  }

  private async ensureIndexes(database: Db): Promise<void> {
    for (const [collectionName, indexes] of Object.entries(COLLECTION_INDEXES)) {
      const descriptions: IndexDescription[] = indexes.map(index => ({ ...index }));
      if (descriptions.length > 0) {
        await database.collection(collectionName).createIndexes(descriptions);
      }
    }
  }
}
