/**
 * Builds the explicit producer set for one manifests pass and materializes it
 */

import {
  AssetEngine,
  DirectoryFileFetcher,
  createLogger,
  writeAssetFiles,
  type AssetOrigin,
  type Logger,
  type Producer,
} from '@asset-graph/core';
import { createBootkubeTemplateProducers } from './bootkube.js';
import { ClusterIdProducer, type ClusterIdOptions } from './clusterId.js';
import { createClusterFactProducers } from './clusterFacts.js';
import { InstallConfigProducer, type InstallConfig, type InstallConfigInput } from './installConfig.js';
import { ManifestsProducer, manifestsKey, type Manifests } from './manifests.js';
import { createTlsProducers, type CertificateIssuer } from './tls.js';

export interface ManifestProducersOptions {
  installConfig: InstallConfigInput | InstallConfig;
  issuer: CertificateIssuer;
  clusterId?: ClusterIdOptions;
  /** Override the bundled bootkube templates */
  templatesDir?: string;
  logger?: Logger;
}

/**
 * Every producer the manifests depend on, plus the manifests producer itself.
 * A new set is built for every pass.
 */
export function createManifestProducers(options: ManifestProducersOptions): {
  producers: Producer<unknown>[];
  manifests: ManifestsProducer;
} {
  const manifests = new ManifestsProducer(options.logger ? { logger: options.logger } : {});
  const producers: Producer<unknown>[] = [
    new InstallConfigProducer(options.installConfig),
    new ClusterIdProducer(options.clusterId),
    ...createClusterFactProducers(),
    ...createTlsProducers(options.issuer),
    ...createBootkubeTemplateProducers(options.templatesDir),
    manifests,
  ];
  return { producers, manifests };
}

export interface MaterializeOptions {
  /** Output directory; also where persisted state is read from */
  directory: string;
  producers: readonly Producer<unknown>[];
  logger?: Logger;
}

export interface MaterializeResult {
  origin: AssetOrigin;
  manifests: Manifests;
}

/**
 * Load the manifests from directory, or generate and write them there.
 * Nothing is written when resolution fails or when the manifests were restored.
 */
export async function materializeManifests(options: MaterializeOptions): Promise<MaterializeResult> {
  const logger = options.logger ?? createLogger('materialize');
  const engine = new AssetEngine({
    producers: options.producers,
    fetcher: new DirectoryFileFetcher(options.directory),
    logger,
  });

  const resolved = await engine.resolve(manifestsKey);
  if (resolved.origin === 'synthesized') {
    await writeAssetFiles(options.directory, resolved.files);
    logger.info({ directory: options.directory, files: resolved.files.length }, 'manifests written');
  } else {
    logger.info({ directory: options.directory, files: resolved.files.length }, 'manifests loaded from disk');
  }

  return { origin: resolved.origin, manifests: resolved.value };
}
