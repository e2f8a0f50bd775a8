import { randomBytes, randomUUID } from 'crypto';
import { assetKey, type AssetKey, type Parents, type Producer, type ProducerResult } from '@asset-graph/core';
import { installConfigKey, type InstallConfig } from './installConfig.js';

export interface ClusterId {
  /** Cluster-wide unique identifier */
  uuid: string;
  /** Short name prefix for infrastructure resources */
  infraId: string;
}

export interface ClusterIdOptions {
  /** UUID source, `crypto.randomUUID` by default */
  generateUuid?: () => string;
  /** Suffix source for infraId, 5 random alphanumerics by default */
  generateSuffix?: () => string;
}

const INFRA_NAME_MAX = 27;
const SUFFIX_ALPHABET = 'bcdfghjklmnpqrstvwxz2456789';

function randomSuffix(): string {
  return [...randomBytes(5)].map((byte) => SUFFIX_ALPHABET.charAt(byte % SUFFIX_ALPHABET.length)).join('');
}

/**
 * `<cluster name, lower-cased, non-alphanumerics as dashes, truncated>-<suffix>`
 */
export function generateInfraId(clusterName: string, suffix: string): string {
  const base = clusterName
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, '-')
    .slice(0, INFRA_NAME_MAX)
    .replace(/-+$/, '');
  return `${base}-${suffix}`;
}

export const clusterIdKey: AssetKey<ClusterId> = assetKey<ClusterId>('cluster-id');

export class ClusterIdProducer implements Producer<ClusterId> {
  readonly key = clusterIdKey;
  private readonly generateUuid: () => string;
  private readonly generateSuffix: () => string;

  constructor(options: ClusterIdOptions = {}) {
    this.generateUuid = options.generateUuid ?? randomUUID;
    this.generateSuffix = options.generateSuffix ?? randomSuffix;
  }

  dependencies(): readonly AssetKey<unknown>[] {
    return [installConfigKey];
  }

  async synthesize(parents: Parents): Promise<ProducerResult<ClusterId>> {
    const config: InstallConfig = parents.get(installConfigKey);
    return {
      value: {
        uuid: this.generateUuid(),
        infraId: generateInfraId(config.metadata.name, this.generateSuffix()),
      },
    };
  }
}
