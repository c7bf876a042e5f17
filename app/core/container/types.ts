export const TYPES = {
  GatewayConfig: Symbol.for('GatewayConfig'),
  DatabaseService: Symbol.for('DatabaseService'),
  Logger: Symbol.for('Logger'),
  MetricsService: Symbol.for('MetricsService'),
  MetricsCollector: Symbol.for('MetricsCollector'),
  CryptoService: Symbol.for('CryptoService'),
  ErrorClassificationService: Symbol.for('ErrorClassificationService'),

  RequestLogRepository: Symbol.for('RequestLogRepository'),
  RequestMetricsRepository: Symbol.for('RequestMetricsRepository'),
  BatchMetricsRepository: Symbol.for('BatchMetricsRepository'),
  BatchJobRepository: Symbol.for('BatchJobRepository'),
  BatchQuotaRepository: Symbol.for('BatchQuotaRepository'),
  FederationConfigSource: Symbol.for('FederationConfigSource'),

  FabricClient: Symbol.for('FabricClient'),
  DirectApiStatusClient: Symbol.for('DirectApiStatusClient'),
  IdentityProvider: Symbol.for('IdentityProvider'),
  BatchFileStore: Symbol.for('BatchFileStore'),
  AdaptorRegistry: Symbol.for('AdaptorRegistry'),

  EndpointCatalogService: Symbol.for('EndpointCatalogService'),
  ClusterStatusCache: Symbol.for('ClusterStatusCache'),
  TargetHealthService: Symbol.for('TargetHealthService'),
  FederatedRouter: Symbol.for('FederatedRouter'),
  StreamRelayService: Symbol.for('StreamRelayService'),
  StreamProxyService: Symbol.for('StreamProxyService'),
  RequestLogService: Symbol.for('RequestLogService'),
  BatchJobManager: Symbol.for('BatchJobManager'),
  MetricsIngestionService: Symbol.for('MetricsIngestionService'),
  AuthenticationService: Symbol.for('AuthenticationService'),
  AuthorizationService: Symbol.for('AuthorizationService'),
  BackgroundWorkerService: Symbol.for('BackgroundWorkerService'),

  InferenceService: Symbol.for('InferenceService'),
  BatchService: Symbol.for('BatchService'),
  ModelsService: Symbol.for('ModelsService'),

  RequestTracker: Symbol.for('RequestTracker'),
  ControllerSupport: Symbol.for('ControllerSupport'),

  InferenceController: Symbol.for('InferenceController'),
  BatchesController: Symbol.for('BatchesController'),
  ModelsController: Symbol.for('ModelsController'),
  ClustersController: Symbol.for('ClustersController'),
  StreamingRelayController: Symbol.for('StreamingRelayController'),
  AdminMetricsController: Symbol.for('AdminMetricsController')
};
