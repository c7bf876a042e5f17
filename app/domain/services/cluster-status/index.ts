export * from './cluster-status-cache.service';
