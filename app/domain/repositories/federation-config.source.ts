/**
 * Raw, unvalidated federation configuration as stored by the operator.
 */
export interface RawFederationConfig {
  readonly clusters: readonly unknown[];
  readonly endpoints: readonly unknown[];
  readonly federatedEndpoints: readonly unknown[];
}

export interface FederationConfigSource {
  readonly description: string;
  load(): Promise<RawFederationConfig>;
}
