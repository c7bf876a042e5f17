import { Type, type Static } from '@sinclair/typebox';

const PositiveInteger = Type.Integer({ minimum: 1 });
const Milliseconds = Type.Integer({ minimum: 0 });

export const GatewayConfigSchema = Type.Object({
  environment: Type.Union([
    Type.Literal('development'),
    Type.Literal('production'),
    Type.Literal('test')
  ]),
  server: Type.Object({
    host: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 1, maximum: 65535 }),
    corsOrigin: Type.String(),
    publicBaseUrl: Type.String({ minLength: 1 })
  }),
  database: Type.Object({
    uri: Type.String({ minLength: 1 }),
    name: Type.String({ minLength: 1 })
  }),
  auth: Type.Object({
    introspectionUrl: Type.String(),
    clientId: Type.String(),
    clientSecret: Type.String(),
    cacheTtlMs: Milliseconds,
    adminGroups: Type.Array(Type.String())
  }),
  federation: Type.Object({
    configPath: Type.Optional(Type.String({ minLength: 1 }))
  }),
  fabric: Type.Object({
    apiUrl: Type.String(),
    accessToken: Type.String(),
    pollIntervalMs: PositiveInteger,
    statusCacheTtlMs: Milliseconds,
    statusTimeoutMs: PositiveInteger
  }),
  router: Type.Object({
    maxAttempts: PositiveInteger,
    cooldownMs: Milliseconds,
    defaultTimeoutMs: PositiveInteger,
    allowUnknownStatusFallback: Type.Boolean()
  }),
  clusterStatus: Type.Object({
    refreshSchedule: Type.String({ minLength: 1 }),
    staleAfterMs: PositiveInteger,
    fetchTimeoutMs: PositiveInteger
  }),
  streaming: Type.Object({
    internalSecret: Type.String(),
    firstDataTimeoutMs: PositiveInteger,
    idleTimeoutMs: PositiveInteger,
    totalTimeoutMs: PositiveInteger
  }),
  batches: Type.Object({
    maxBatchesPerUser: PositiveInteger,
    retentionMs: PositiveInteger,
    pollSchedule: Type.String({ minLength: 1 }),
    firstPollDelayMs: Milliseconds,
    pollTimeoutMs: PositiveInteger,
    pollConcurrency: PositiveInteger,
    pollPageSize: PositiveInteger
  }),
  metricsIngestion: Type.Object({
    schedule: Type.String({ minLength: 1 }),
    batchSize: PositiveInteger,
    claimLeaseMs: PositiveInteger,
    backfillDelayMs: Milliseconds
  }),
  workers: Type.Object({
    enabled: Type.Boolean()
  })
});

export type GatewayConfig = Static<typeof GatewayConfigSchema>;
