export * from './target-health.service';
export * from './federated-router.service';
