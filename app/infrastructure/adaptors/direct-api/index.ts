export * from './direct-api-status.client';
export * from './direct-api-endpoint.adaptor';
export * from './direct-api-cluster.adaptor';
