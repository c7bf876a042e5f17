export const ClusterCollectionName = 'clusters';
export const EndpointCollectionName = 'endpoints';
export const FederatedEndpointCollectionName = 'federated_endpoints';

export const FederationIndexes = {
  [ClusterCollectionName]: [{ key: { name: 1 }, name: 'cluster_name', unique: true }],
  [EndpointCollectionName]: [{ key: { slug: 1 }, name: 'endpoint_slug', unique: true }],
  [FederatedEndpointCollectionName]: [{ key: { slug: 1 }, name: 'federated_slug', unique: true }]
} as const;
