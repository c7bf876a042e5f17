import { ConfigError } from '../../app/core/errors';
import { EndpointCatalogService } from '../../app/domain/services/catalog';
import { captureSyncError } from '../support/config';
import { ALPHA, ALPHA_EMBEDDINGS, BETA, FEDERATED_SLUG, MODEL, RESTRICTED, federationFixture } from '../support/federation';
import { createHarness } from '../support/harness';
import { StaticFederationConfigSource } from '../support/repositories';

describe('EndpointCatalogService', () => {
  it('builds endpoints, federated entries and their adaptors', () => {
    const { catalog } = createHarness();

    expect(catalog.listEndpoints().map(endpoint => endpoint.slug)).toEqual([ALPHA, BETA, RESTRICTED, ALPHA_EMBEDDINGS]);
    expect(catalog.getEndpoint(RESTRICTED)).toMatchObject({ allowedGroups: ['staff'], allowedDomains: [], settings: {} });
    expect(catalog.getEndpointAdaptor(ALPHA)?.endpoint.slug).toBe(ALPHA);
    expect(catalog.listClusterAdaptors().map(adaptor => adaptor.cluster.name)).toEqual(['alpha', 'beta', 'restricted']);
    expect(catalog.listFederatedEndpoints()).toEqual([
      {
        slug: FEDERATED_SLUG,
        name: 'OPT 125m',
        targetModelName: MODEL,
        description: 'Small OPT model',
        targets: [
          { cluster: 'alpha', framework: 'vllm', model: MODEL, endpointSlug: ALPHA },
          { cluster: 'beta', framework: 'vllm', model: MODEL, endpointSlug: BETA }
        ]
      }
    ]);
  });

  it('finds a federated endpoint by slug or by model name', () => {
    const { catalog } = createHarness();

    expect(catalog.findFederatedEndpoint(FEDERATED_SLUG)?.slug).toBe(FEDERATED_SLUG);
    expect(catalog.findFederatedEndpoint(MODEL)?.slug).toBe(FEDERATED_SLUG);
    expect(catalog.findFederatedEndpoint('intfloat/e5-small')).toBeUndefined();
  });

  it('refuses to serve before a configuration is loaded', () => {
    const { logger, registry } = createHarness();
    const catalog = new EndpointCatalogService(logger, registry, new StaticFederationConfigSource(federationFixture()));

    const error = captureSyncError(() => catalog.listEndpoints());

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ message: 'Federation configuration has not been loaded' });
  });

  it('loads from its source and logs what it found', async () => {
    const { logger, registry } = createHarness();
    const catalog = new EndpointCatalogService(logger, registry, new StaticFederationConfigSource(federationFixture()));

    const snapshot = await catalog.load();

    expect(snapshot.endpoints.size).toBe(4);
    expect(logger.entries.find(entry => entry.message === 'Federation configuration loaded')?.context).toEqual({
      metadata: { source: 'in-memory fixture', clusters: 3, endpoints: 4, federatedEndpoints: 1 }
    });
  });

  describe('invalid configuration', () => {
    function rejects(mutate: (config: ReturnType<typeof federationFixture>) => void): unknown {
      const { catalog } = createHarness();
      const config = federationFixture();
      mutate(config);
      const error = captureSyncError(() => catalog.loadFrom(config));
      expect(catalog.listEndpoints()).toHaveLength(4);
      return error;
    }

    it('rejects entries that do not match the schema', () => {
      const error = rejects(config => {
        config.clusters[0] = { ...config.clusters[0], frameworks: [''] };
      });

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ message: expect.stringMatching(/^Invalid cluster at index 0: /) });
    });

    it('rejects duplicate cluster names', () => {
      const error = rejects(config => {
        config.clusters.push({ ...config.clusters[0] });
      });

      expect(error).toMatchObject({ message: 'Duplicate cluster name: alpha' });
    });

    it('rejects an unknown adaptor type', () => {
      const error = rejects(config => {
        config.clusters[1] = { ...config.clusters[1], adaptorType: 'carrier-pigeon' };
      });

      expect(error).toMatchObject({ message: "Unknown adaptor type 'carrier-pigeon' for cluster beta" });
    });

    it('rejects an endpoint on an unknown cluster', () => {
      const error = rejects(config => {
        config.endpoints.push({ cluster: 'gamma', framework: 'vllm', model: MODEL, adaptorType: 'scripted' });
      });

      expect(error).toMatchObject({ message: "Endpoint gamma-vllm-facebookopt-125m references unknown cluster 'gamma'" });
    });

    it('rejects an endpoint whose framework the cluster does not run', () => {
      const error = rejects(config => {
        config.endpoints.push({ cluster: 'alpha', framework: 'sglang', model: MODEL, adaptorType: 'scripted' });
      });

      expect(error).toMatchObject({
        message: "Endpoint alpha-sglang-facebookopt-125m uses framework 'sglang' which cluster alpha does not support"
      });
    });

    it('rejects an explicit slug that does not match the endpoint', () => {
      const error = rejects(config => {
        config.endpoints[1] = { ...config.endpoints[1], slug: 'beta-opt' };
      });

      expect(error).toMatchObject({
        message: `Endpoint slug 'beta-opt' does not match its cluster, framework and model (expected '${BETA}')`
      });
    });

    it('rejects duplicate endpoints', () => {
      const error = rejects(config => {
        config.endpoints.push({ ...config.endpoints[0] });
      });

      expect(error).toMatchObject({ message: `Duplicate endpoint slug: ${ALPHA}` });
    });

    it('rejects a federated target serving a different model', () => {
      const error = rejects(config => {
        config.federatedEndpoints[0] = {
          ...config.federatedEndpoints[0],
          targets: [{ cluster: 'alpha', framework: 'vllm', model: 'intfloat/e5-small' }]
        };
      });

      expect(error).toMatchObject({
        message: `Federated endpoint ${FEDERATED_SLUG} has a target for model 'intfloat/e5-small' but serves '${MODEL}'`
      });
    });

    it('rejects a federated target without a matching endpoint', () => {
      const error = rejects(config => {
        config.federatedEndpoints[0] = {
          ...config.federatedEndpoints[0],
          targets: [{ cluster: 'beta', framework: 'sglang', model: MODEL }]
        };
      });

      expect(error).toMatchObject({
        message: `Federated endpoint ${FEDERATED_SLUG} references unknown endpoint 'beta-sglang-facebookopt-125m'`
      });
    });
  });
});
