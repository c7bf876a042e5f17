export * from './fabric-endpoint.adaptor';
export * from './fabric-cluster.adaptor';
