export interface FederatedTarget {
  readonly cluster: string;
  readonly framework: string;
  readonly model: string;
  readonly endpointSlug: string;
}

export interface FederatedEndpoint {
  readonly slug: string;
  readonly name: string;
  readonly targetModelName: string;
  readonly description?: string;
  readonly targets: readonly FederatedTarget[];
}
