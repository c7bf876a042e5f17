import { readFile } from 'fs/promises';
import { injectable, inject } from 'inversify';
import type { FederationConfigSource, RawFederationConfig } from '../../domain/repositories';
import type { IDatabaseService } from '../database';
import {
  ClusterCollectionName,
  EndpointCollectionName,
  FederatedEndpointCollectionName
} from '../database/schemas';
import { ConfigError, errorMessage } from '../../core/errors';
import { TYPES } from '../../core/container/types';

function readArray(document: Record<string, unknown>, ...keys: string[]): unknown[] {
  for (const key of keys) {
    const value = document[key];
    if (Array.isArray(value)) {
      return value;
    }
  }
  return [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class FileFederationConfigSource implements FederationConfigSource {
  readonly description: string;
  private readonly path: string;

  constructor(path: string) {
    this.path = path;
    this.description = `file:${path}`;
  }

  async load(): Promise<RawFederationConfig> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(this.path, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Could not read federation config ${this.path}: ${errorMessage(error)}`, { cause: error });
    }

    if (!isRecord(parsed)) {
      throw new ConfigError(`Federation config ${this.path} must be a JSON object`);
    }

    return {
      clusters: readArray(parsed, 'clusters'),
      endpoints: readArray(parsed, 'endpoints'),
      federatedEndpoints: readArray(parsed, 'federatedEndpoints', 'federated_endpoints')
    };
  }
}

@injectable()
export class MongoFederationConfigSource implements FederationConfigSource {
  readonly description = 'mongodb';
  private readonly databaseService: IDatabaseService;

  constructor(@inject(TYPES.DatabaseService) databaseService: IDatabaseService) {
    this.databaseService = databaseService;
  }

  async load(): Promise<RawFederationConfig> {
    const database = this.databaseService.getDatabase();
    const projection = { projection: { _id: 0 } };

    const [clusters, endpoints, federatedEndpoints] = await Promise.all([
      database.collection(ClusterCollectionName).find({}, projection).toArray(),
      database.collection(EndpointCollectionName).find({}, projection).toArray(),
      database.collection(FederatedEndpointCollectionName).find({}, projection).toArray()
    ]);

    return { clusters, endpoints, federatedEndpoints };
  }
}
