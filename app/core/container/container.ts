import 'reflect-metadata';
import { Container, type interfaces } from 'inversify';
import { TYPES } from './types';
import { loadGatewayConfig, type GatewayConfig } from '../config';
import { Logger, type ILogger } from '../logging';
import { CryptoService } from '../security';
import { PrometheusCollector, MetricsService } from '../metrics';
import { ErrorClassificationService } from '../error-classification';
import { DatabaseService } from '../../infrastructure/database';
import {
  FileFederationConfigSource,
  MongoBatchJobRepository,
  MongoBatchMetricsRepository,
  MongoBatchQuotaRepository,
  MongoFederationConfigSource,
  MongoRequestLogRepository,
  MongoRequestMetricsRepository
} from '../../infrastructure/repositories';
import { AdaptorRegistry, DirectApiStatusClient } from '../../infrastructure/adaptors';
import { FabricClient } from '../../infrastructure/fabric';
import { HttpIdentityProvider } from '../../infrastructure/identity';
import { JsonlBatchFileStore } from '../../infrastructure/storage';
import type { FederationConfigSource } from '../../domain/repositories';
import {
  AuthenticationService,
  AuthorizationService,
  BackgroundWorkerService,
  BatchJobManager,
  ClusterStatusCache,
  EndpointCatalogService,
  FederatedRouter,
  MetricsIngestionService,
  RequestLogService,
  StreamProxyService,
  StreamRelayService,
  TargetHealthService
} from '../../domain/services';
import { BatchService, InferenceService, ModelsService } from '../../application/services';
import {
  AdminMetricsController,
  BatchesController,
  ClustersController,
  ControllerSupport,
  InferenceController,
  ModelsController,
  StreamingRelayController
} from '../../api/controllers';
import { RequestTracker } from '../../api/plugins';

export interface IApplicationContainer {
  get<T>(serviceIdentifier: symbol): T;
  isBound(serviceIdentifier: symbol): boolean;
  rebind<T>(serviceIdentifier: symbol): interfaces.BindingToSyntax<T>;
  dispose(): void;
}

export class ApplicationContainer implements IApplicationContainer {
  private static instance: ApplicationContainer | null = null;
  private readonly container: Container;
  private isInitialized = false;

  private constructor() {
    this.container = new Container({ defaultScope: 'Singleton' });
  }

  public static getInstance(): ApplicationContainer {
    if (!ApplicationContainer.instance) {
      ApplicationContainer.instance = new ApplicationContainer();
    }
    return ApplicationContainer.instance;
  }

  public initialize(config: GatewayConfig = loadGatewayConfig()): void {
    if (this.isInitialized) {
      throw new Error('Container is already initialized');
    }

    this.container.bind<GatewayConfig>(TYPES.GatewayConfig).toConstantValue(config);
    this.configureCore();
    this.configureRepositories(config);
    this.configureInfrastructure();
    this.configureDomainServices();
    this.configureApplicationServices();
    this.configureControllers();

    this.isInitialized = true;
    this.get<ILogger>(TYPES.Logger).info('Container initialized', {
      metadata: { environment: config.environment }
    });
  }

  public get<T>(serviceIdentifier: symbol): T {
    this.ensureInitialized();

    try {
      return this.container.get<T>(serviceIdentifier);
    } catch (error) {
      throw new Error(`Failed to resolve service ${String(serviceIdentifier)}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }
  }

  public isBound(serviceIdentifier: symbol): boolean {
    return this.container.isBound(serviceIdentifier);
  }

  public rebind<T>(serviceIdentifier: symbol): interfaces.BindingToSyntax<T> {
    return this.container.rebind<T>(serviceIdentifier);
  }

  public dispose(): void {
    this.container.unbindAll();
    this.isInitialized = false;
  }

  private configureCore(): void {
    this.container.bind<ILogger>(TYPES.Logger).toConstantValue(new Logger());
    this.container.bind(TYPES.CryptoService).to(CryptoService);
    this.container.bind(TYPES.MetricsCollector).to(PrometheusCollector);
    this.container.bind(TYPES.MetricsService).to(MetricsService);
    this.container.bind(TYPES.ErrorClassificationService).to(ErrorClassificationService);
    this.container.bind(TYPES.DatabaseService).to(DatabaseService);
  }

  private configureRepositories(config: GatewayConfig): void {
    this.container.bind(TYPES.RequestLogRepository).to(MongoRequestLogRepository);
    this.container.bind(TYPES.RequestMetricsRepository).to(MongoRequestMetricsRepository);
    this.container.bind(TYPES.BatchMetricsRepository).to(MongoBatchMetricsRepository);
    this.container.bind(TYPES.BatchJobRepository).to(MongoBatchJobRepository);
    this.container.bind(TYPES.BatchQuotaRepository).to(MongoBatchQuotaRepository);

    const { configPath } = config.federation;
    if (configPath) {
      this.container
        .bind<FederationConfigSource>(TYPES.FederationConfigSource)
        .toDynamicValue(() => new FileFederationConfigSource(configPath));
    } else {
      this.container.bind<FederationConfigSource>(TYPES.FederationConfigSource).to(MongoFederationConfigSource);
    }
  }

  private configureInfrastructure(): void {
    this.container.bind(TYPES.FabricClient).to(FabricClient);
    this.container.bind(TYPES.DirectApiStatusClient).to(DirectApiStatusClient);
    this.container.bind(TYPES.IdentityProvider).to(HttpIdentityProvider);
    this.container.bind(TYPES.BatchFileStore).to(JsonlBatchFileStore);
    this.container.bind(TYPES.AdaptorRegistry).to(AdaptorRegistry);
  }

  private configureDomainServices(): void {
    this.container.bind(TYPES.AuthenticationService).to(AuthenticationService);
    this.container.bind(TYPES.AuthorizationService).to(AuthorizationService);
    this.container.bind(TYPES.EndpointCatalogService).to(EndpointCatalogService);
    this.container.bind(TYPES.ClusterStatusCache).to(ClusterStatusCache);
    this.container.bind(TYPES.TargetHealthService).to(TargetHealthService);
    this.container.bind(TYPES.FederatedRouter).to(FederatedRouter);
    this.container.bind(TYPES.StreamRelayService).to(StreamRelayService);
    this.container.bind(TYPES.StreamProxyService).to(StreamProxyService);
    this.container.bind(TYPES.RequestLogService).to(RequestLogService);
    this.container.bind(TYPES.BatchJobManager).to(BatchJobManager);
    this.container.bind(TYPES.MetricsIngestionService).to(MetricsIngestionService);
    this.container.bind(TYPES.BackgroundWorkerService).to(BackgroundWorkerService);
  }

  private configureApplicationServices(): void {
    this.container.bind(TYPES.InferenceService).to(InferenceService);
    this.container.bind(TYPES.BatchService).to(BatchService);
    this.container.bind(TYPES.ModelsService).to(ModelsService);
  }

  private configureControllers(): void {
    this.container.bind(TYPES.RequestTracker).to(RequestTracker);
    this.container.bind(TYPES.ControllerSupport).to(ControllerSupport);

    this.container.bind(TYPES.InferenceController).to(InferenceController);
    this.container.bind(TYPES.ModelsController).to(ModelsController);
    this.container.bind(TYPES.ClustersController).to(ClustersController);
    this.container.bind(TYPES.BatchesController).to(BatchesController);
    this.container.bind(TYPES.StreamingRelayController).to(StreamingRelayController);
    this.container.bind(TYPES.AdminMetricsController).to(AdminMetricsController);
  }

  private ensureInitialized(): void {
    if (!this.isInitialized) {
      throw new Error('Container must be initialized before use. Call initialize() first.');
    }
  }
}

export const container = ApplicationContainer.getInstance();
