/**
 * Cluster-scoped config.openshift.io resources derived from the install config.
 * Their files are merged into the manifests unmodified. They are always
 * rebuilt from the current pass, never read back from `manifests/`.
 */

import yaml from 'js-yaml';
import { assetFile, assetKey, type AssetKey, type Parents, type Producer, type ProducerResult } from '@asset-graph/core';
import { clusterIdKey } from './clusterId.js';
import { clusterDomain, installConfigKey, platformName } from './installConfig.js';

export const MANIFEST_DIR = 'manifests';

export interface ClusterResource {
  apiVersion: string;
  kind: string;
  metadata: { name: string };
  [field: string]: unknown;
}

export const factKeys = {
  ingress: assetKey<ClusterResource>('ingress-config'),
  dns: assetKey<ClusterResource>('dns-config'),
  infrastructure: assetKey<ClusterResource>('infrastructure-config'),
  networking: assetKey<ClusterResource>('network-config'),
} as const;

const PLATFORM_TYPES: Readonly<Record<string, string>> = {
  aws: 'AWS',
  azure: 'Azure',
  gcp: 'GCP',
  libvirt: 'Libvirt',
  openstack: 'OpenStack',
  vsphere: 'VSphere',
  none: 'None',
};

interface ClusterFactDefinition {
  key: AssetKey<ClusterResource>;
  filename: string;
  dependencies: readonly AssetKey<unknown>[];
  build(parents: Parents): ClusterResource;
}

function configResource(kind: string, body: Record<string, unknown>): ClusterResource {
  return {
    ...body,
    apiVersion: 'config.openshift.io/v1',
    kind,
    metadata: { name: 'cluster' },
  };
}

export class ClusterFactProducer implements Producer<ClusterResource> {
  readonly key: AssetKey<ClusterResource>;
  private readonly path: string;

  constructor(private readonly definition: ClusterFactDefinition) {
    this.key = definition.key;
    this.path = `${MANIFEST_DIR}/${definition.filename}`;
  }

  dependencies(): readonly AssetKey<unknown>[] {
    return this.definition.dependencies;
  }

  async synthesize(parents: Parents): Promise<ProducerResult<ClusterResource>> {
    const resource = this.definition.build(parents);
    const content = yaml.dump(resource, { sortKeys: true, noRefs: true, lineWidth: -1 });
    return { value: resource, files: [assetFile(this.path, content)] };
  }
}

export function createClusterFactProducers(): ClusterFactProducer[] {
  return [
    new ClusterFactProducer({
      key: factKeys.ingress,
      filename: 'cluster-ingress-02-config.yml',
      dependencies: [installConfigKey],
      build: (parents) =>
        configResource('Ingress', {
          spec: { domain: `apps.${clusterDomain(parents.get(installConfigKey))}` },
        }),
    }),
    new ClusterFactProducer({
      key: factKeys.dns,
      filename: 'cluster-dns-02-config.yml',
      dependencies: [installConfigKey],
      build: (parents) =>
        configResource('DNS', {
          spec: { baseDomain: clusterDomain(parents.get(installConfigKey)) },
        }),
    }),
    new ClusterFactProducer({
      key: factKeys.infrastructure,
      filename: 'cluster-infrastructure-02-config.yml',
      dependencies: [installConfigKey, clusterIdKey],
      build: (parents) => {
        const config = parents.get(installConfigKey);
        const domain = clusterDomain(config);
        const platform = platformName(config);
        return configResource('Infrastructure', {
          spec: { cloudConfig: { name: '' } },
          status: {
            apiServerURL: `https://api.${domain}:6443`,
            etcdDiscoveryDomain: domain,
            infrastructureName: parents.get(clusterIdKey).infraId,
            platform: PLATFORM_TYPES[platform] ?? platform,
          },
        });
      },
    }),
    new ClusterFactProducer({
      key: factKeys.networking,
      filename: 'cluster-network-02-config.yml',
      dependencies: [installConfigKey],
      build: (parents) => {
        const { networking } = parents.get(installConfigKey);
        return configResource('Network', {
          spec: {
            clusterNetwork: networking.clusterNetwork,
            networkType: networking.networkType,
            serviceNetwork: networking.serviceNetwork,
          },
        });
      },
    }),
  ];
}
