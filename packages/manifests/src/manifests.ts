/**
 * Manifests: the top-level producer that assembles every manifest the
 * cluster is installed with.
 */

import {
  assetFile,
  assetKey,
  createLogger,
  mergeFileSets,
  sortFiles,
  type AssetFile,
  type AssetKey,
  type FileFetcher,
  type Logger,
  type Parents,
  type Producer,
  type ProducerResult,
} from '@asset-graph/core';
import { bootkubeTemplateKeys, TEMPLATE_SUFFIX } from './bootkube.js';
import { clusterIdKey } from './clusterId.js';
import { factKeys, MANIFEST_DIR } from './clusterFacts.js';
import { installConfigKey } from './installConfig.js';
import { serializeRedactedInstallConfig } from './redactor.js';
import {
  configMap,
  parseStatusRecord,
  serializeStatusRecord,
  type ConfigurationObject,
} from './statusRecord.js';
import { bindTemplate } from './templateBinder.js';
import { buildBootkubeTemplateData } from './templateData.js';
import { tlsKeys } from './tls.js';

/** Status record path; fixed */
export const STATUS_RECORD_PATH = `${MANIFEST_DIR}/cluster-config.yaml`;
export const MANIFEST_PATTERN = `${MANIFEST_DIR}/*`;
export const STATUS_RECORD_NAMESPACE = 'kube-system';
export const STATUS_RECORD_NAME = 'cluster-config-v1';

export type ManifestsState = 'uninitialized' | 'resolving' | 'synthesized' | 'restored' | 'failed';

export interface Manifests {
  readonly statusRecord: Readonly<ConfigurationObject>;
  /** Every manifest file, sorted by path */
  readonly files: readonly AssetFile[];
}

export const manifestsKey: AssetKey<Manifests> = assetKey<Manifests>('manifests');

const FACT_KEYS = [factKeys.ingress, factKeys.dns, factKeys.infrastructure, factKeys.networking] as const;

/**
 * `bootkube/kube-system-configmap-root-ca.yaml.template` → `manifests/kube-system-configmap-root-ca.yaml`
 */
export function manifestPathFor(templatePath: string): string {
  const base = templatePath.slice(templatePath.lastIndexOf('/') + 1);
  const name = base.endsWith(TEMPLATE_SUFFIX) ? base.slice(0, -TEMPLATE_SUFFIX.length) : base;
  return `${MANIFEST_DIR}/${name}`;
}

export interface ManifestsProducerOptions {
  logger?: Logger;
}

export class ManifestsProducer implements Producer<Manifests> {
  readonly key = manifestsKey;
  private readonly logger: Logger;
  private currentState: ManifestsState = 'uninitialized';

  constructor(options: ManifestsProducerOptions = {}) {
    this.logger = options.logger ?? createLogger('manifests');
  }

  get state(): ManifestsState {
    return this.currentState;
  }

  onResolving(): void {
    this.currentState = 'resolving';
  }

  onFailed(): void {
    this.currentState = 'failed';
  }

  dependencies(): readonly AssetKey<unknown>[] {
    return [
      clusterIdKey,
      installConfigKey,
      ...FACT_KEYS,
      tlsKeys.rootCA,
      tlsKeys.etcdCA,
      tlsKeys.etcdSigner,
      tlsKeys.etcdCABundle,
      tlsKeys.etcdSignerClient,
      tlsKeys.etcdClient,
      tlsKeys.etcdMetricCABundle,
      tlsKeys.etcdMetricSignerClient,
      tlsKeys.mcs,
      ...bootkubeTemplateKeys,
    ];
  }

  /**
   * Generate
   */
  async synthesize(parents: Parents): Promise<ProducerResult<Manifests>> {
    const manifests = await this.track(
      async (): Promise<Manifests> => {
        const redacted = serializeRedactedInstallConfig(parents.get(installConfigKey));
        const statusRecord = configMap(STATUS_RECORD_NAMESPACE, STATUS_RECORD_NAME, {
          'install-config': redacted,
        });
        const own = [assetFile(STATUS_RECORD_PATH, serializeStatusRecord(statusRecord, this.key.name))];

        const files = mergeFileSets(
          this.key.name,
          own,
          this.bindTemplates(parents),
          ...FACT_KEYS.map((key) => parents.files(key))
        );

        this.logger.debug({ files: files.length }, 'manifests generated');
        return freezeManifests(statusRecord, files);
      },
      () => 'synthesized'
    );
    return { value: manifests, files: [...manifests.files] };
  }

  /**
   * Load. Returns null when no manifests were persisted, or when the status
   * record is missing from an otherwise non-empty set.
   */
  async restore(fetcher: FileFetcher): Promise<ProducerResult<Manifests> | null> {
    const manifests = await this.track(
      async (): Promise<Manifests | null> => {
        const fileList = await fetcher.fetchByPattern(MANIFEST_PATTERN);
        const record = fileList.find((file) => file.path === STATUS_RECORD_PATH);
        if (!record) {
          if (fileList.length) {
            this.logger.warn({ files: fileList.length }, `${STATUS_RECORD_PATH} missing, regenerating manifests`);
          }
          return null;
        }
        const statusRecord = parseStatusRecord(record.content.toString('utf-8'), this.key.name);
        return freezeManifests(statusRecord, sortFiles(fileList));
      },
      (value, previous) => (value ? 'restored' : previous === 'resolving' ? 'resolving' : 'uninitialized')
    );
    return manifests ? { value: manifests, files: [...manifests.files] } : null;
  }

  private bindTemplates(parents: Parents): AssetFile[] {
    const data = buildBootkubeTemplateData(this.key.name, parents);
    return bootkubeTemplateKeys.map((key) => {
      const template = parents.get(key);
      const target = manifestPathFor(template.path);
      return assetFile(target, bindTemplate(target, template.body, data));
    });
  }

  /**
   * resolving → settle(value, state before the step), or failed when step throws.
   * A restore miss inside an engine pass stays resolving while dependencies are pulled.
   */
  private async track<T>(
    step: () => Promise<T>,
    settle: (value: T, previous: ManifestsState) => ManifestsState
  ): Promise<T> {
    const previous = this.currentState;
    this.currentState = 'resolving';
    try {
      const value = await step();
      this.currentState = settle(value, previous);
      return value;
    } catch (err) {
      this.currentState = 'failed';
      throw err;
    }
  }
}

function freezeManifests(statusRecord: ConfigurationObject, files: readonly AssetFile[]): Manifests {
  return Object.freeze({
    statusRecord: Object.freeze(statusRecord),
    files: Object.freeze([...files]),
  });
}
