import { Value } from '@sinclair/typebox/value';
import * as cron from 'node-cron';
import { ConfigError } from '../errors';
import { GatewayConfigSchema, type GatewayConfig } from './gateway-config.schema';

type Environment = Record<string, string | undefined>;

const THREE_DAYS_MS = 3 * 24 * 60 * 60 * 1000;

function readString(env: Environment, name: string, fallback: string): string {
  const value = env[name];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
}

function readNumber(env: Environment, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`Environment variable ${name} must be a number, got '${raw}'`);
  }
  return value;
}

function readBoolean(env: Environment, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function readList(env: Environment, name: string): string[] {
  return (env[name] ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function readEnvironment(env: Environment): GatewayConfig['environment'] {
  const value = readString(env, 'NODE_ENV', 'development');
  if (value === 'production' || value === 'test' || value === 'development') {
    return value;
  }
  throw new ConfigError(`NODE_ENV must be development, production or test, got '${value}'`);
}

export function loadGatewayConfig(env: Environment = process.env): GatewayConfig {
  const port = readNumber(env, 'PORT', 8080);
  const batchPollSchedule = readString(env, 'BATCH_POLL_SCHEDULE', '0 * * * * *');

  const config: GatewayConfig = {
    environment: readEnvironment(env),
    server: {
      host: readString(env, 'HOST', '0.0.0.0'),
      port,
      corsOrigin: readString(env, 'CORS_ORIGIN', '*'),
      publicBaseUrl: readString(env, 'PUBLIC_BASE_URL', `http://localhost:${port}`)
    },
    database: {
      uri: readString(env, 'MONGODB_URI', 'mongodb://localhost:27017'),
      name: readString(env, 'DATABASE_NAME', 'inference_gateway')
    },
    auth: {
      introspectionUrl: readString(env, 'AUTH_INTROSPECTION_URL', ''),
      clientId: readString(env, 'AUTH_CLIENT_ID', ''),
      clientSecret: readString(env, 'AUTH_CLIENT_SECRET', ''),
      cacheTtlMs: readNumber(env, 'AUTH_CACHE_TTL_MS', 60_000),
      adminGroups: readList(env, 'ADMIN_GROUPS')
    },
    federation: {
      configPath: env.FEDERATION_CONFIG_PATH?.trim() || undefined
    },
    fabric: {
      apiUrl: readString(env, 'FABRIC_API_URL', ''),
      accessToken: readString(env, 'FABRIC_ACCESS_TOKEN', ''),
      pollIntervalMs: readNumber(env, 'FABRIC_POLL_INTERVAL_MS', 1_000),
      statusCacheTtlMs: readNumber(env, 'FABRIC_STATUS_CACHE_TTL_MS', 60_000),
      statusTimeoutMs: readNumber(env, 'FABRIC_STATUS_TIMEOUT_MS', 30_000)
    },
    router: {
      maxAttempts: readNumber(env, 'ROUTER_MAX_ATTEMPTS', 5),
      cooldownMs: readNumber(env, 'ROUTER_COOLDOWN_MS', 60_000),
      defaultTimeoutMs: readNumber(env, 'ROUTER_TIMEOUT_MS', 120_000),
      allowUnknownStatusFallback: readBoolean(env, 'ROUTER_ALLOW_UNKNOWN_STATUS', true)
    },
    clusterStatus: {
      refreshSchedule: readString(env, 'CLUSTER_STATUS_SCHEDULE', '*/30 * * * * *'),
      staleAfterMs: readNumber(env, 'CLUSTER_STATUS_STALE_AFTER_MS', 180_000),
      fetchTimeoutMs: readNumber(env, 'CLUSTER_STATUS_TIMEOUT_MS', 30_000)
    },
    streaming: {
      internalSecret: readString(env, 'INTERNAL_STREAMING_SECRET', ''),
      firstDataTimeoutMs: readNumber(env, 'STREAM_FIRST_DATA_TIMEOUT_MS', 30_000),
      idleTimeoutMs: readNumber(env, 'STREAM_IDLE_TIMEOUT_MS', 60_000),
      totalTimeoutMs: readNumber(env, 'STREAM_TOTAL_TIMEOUT_MS', 300_000)
    },
    batches: {
      maxBatchesPerUser: readNumber(env, 'MAX_BATCHES_PER_USER', 2),
      retentionMs: readNumber(env, 'BATCH_RETENTION_MS', THREE_DAYS_MS),
      pollSchedule: batchPollSchedule,
      firstPollDelayMs: readNumber(env, 'BATCH_FIRST_POLL_DELAY_MS', 60_000),
      pollTimeoutMs: readNumber(env, 'BATCH_POLL_TIMEOUT_MS', 60_000),
      pollConcurrency: readNumber(env, 'BATCH_POLL_CONCURRENCY', 10),
      pollPageSize: readNumber(env, 'BATCH_POLL_PAGE_SIZE', 500)
    },
    metricsIngestion: {
      schedule: readString(env, 'METRICS_INGESTION_SCHEDULE', '*/30 * * * * *'),
      batchSize: readNumber(env, 'METRICS_BATCH_SIZE', 1_000),
      claimLeaseMs: readNumber(env, 'METRICS_CLAIM_LEASE_MS', 300_000),
      backfillDelayMs: readNumber(env, 'METRICS_BACKFILL_DELAY_MS', 100)
    },
    workers: {
      enabled: readBoolean(env, 'RUN_BACKGROUND_WORKERS', true)
    }
  };

  return validateGatewayConfig(config);
}

export function validateGatewayConfig(config: GatewayConfig): GatewayConfig {
  if (!Value.Check(GatewayConfigSchema, config)) {
    const problems = [...Value.Errors(GatewayConfigSchema, config)]
      .map(error => `${error.path || '/'}: ${error.message}`)
      .join('; ');
    throw new ConfigError(`Invalid gateway configuration: ${problems}`);
  }

  const schedules: Array<[string, string]> = [
    ['clusterStatus.refreshSchedule', config.clusterStatus.refreshSchedule],
    ['batches.pollSchedule', config.batches.pollSchedule],
    ['metricsIngestion.schedule', config.metricsIngestion.schedule]
  ];

  for (const [path, expression] of schedules) {
    if (!cron.validate(expression)) {
      throw new ConfigError(`Invalid cron expression for ${path}: '${expression}'`);
    }
  }

  if (config.environment === 'production' && config.streaming.internalSecret.length === 0) {
    throw new ConfigError('INTERNAL_STREAMING_SECRET must be set in production');
  }

  return config;
}
