export * from './adaptor-settings';
export * from './sse-reader';
export * from './base-endpoint.adaptor';
export * from './base-cluster.adaptor';
export * from './http';
