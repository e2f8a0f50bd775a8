/**
 * Bootkube template producers. Each supplies one unbound template body; a
 * copy placed under `bootkube/` in the output directory takes precedence over
 * the bundled one.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  assetFile,
  assetKey,
  SynthesisError,
  errorMessage,
  type AssetKey,
  type FileFetcher,
  type Producer,
  type ProducerResult,
} from '@asset-graph/core';

export const BOOTKUBE_DIR = 'bootkube';
export const TEMPLATE_SUFFIX = '.template';

/** Bundled template bodies */
export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../templates/bootkube/', import.meta.url));

/** Template file names, in the order the manifests bind them */
export const BOOTKUBE_TEMPLATES = [
  'cvo-overrides.yaml.template',
  'etcd-service-kube-system.yaml.template',
  'host-etcd-service-endpoints-kube-system.yaml.template',
  'host-etcd-service-kube-system.yaml.template',
  'kube-cloud-config.yaml.template',
  'kube-system-configmap-etcd-ca.yaml.template',
  'kube-system-configmap-etcd-serving-ca.yaml.template',
  'kube-system-configmap-root-ca.yaml.template',
  'kube-system-secret-etcd-client.yaml.template',
  'kube-system-secret-etcd-client-ca-deprecated.yaml.template',
  'kube-system-secret-etcd-signer.yaml.template',
  'kube-system-secret-etcd-signer-client.yaml.template',
  'machine-config-server-tls-secret.yaml.template',
  'openshift-config-configmap-etcd-metric-serving-ca.yaml.template',
  'openshift-config-secret-etcd-metric-client.yaml.template',
  'openshift-config-secret-pull-secret.yaml.template',
  'openshift-machine-config-operator.yaml.template',
  'pull.json.template',
] as const;

export type BootkubeTemplateName = (typeof BOOTKUBE_TEMPLATES)[number];

export interface TemplateBody {
  /** Path relative to the output directory, e.g. `bootkube/pull.json.template` */
  path: string;
  body: string;
}

export function bootkubeTemplateKey(filename: BootkubeTemplateName): AssetKey<TemplateBody> {
  return assetKey<TemplateBody>(`${BOOTKUBE_DIR}/${filename}`);
}

export const bootkubeTemplateKeys: readonly AssetKey<TemplateBody>[] = BOOTKUBE_TEMPLATES.map(bootkubeTemplateKey);

export class BootkubeTemplateProducer implements Producer<TemplateBody> {
  readonly key: AssetKey<TemplateBody>;
  private readonly path: string;

  constructor(
    private readonly filename: BootkubeTemplateName,
    private readonly templatesDir: string = DEFAULT_TEMPLATES_DIR
  ) {
    this.key = bootkubeTemplateKey(filename);
    this.path = `${BOOTKUBE_DIR}/${filename}`;
  }

  dependencies(): readonly AssetKey<unknown>[] {
    return [];
  }

  async synthesize(): Promise<ProducerResult<TemplateBody>> {
    let body: string;
    try {
      body = await fs.readFile(path.join(this.templatesDir, this.filename), 'utf-8');
    } catch (err) {
      throw new SynthesisError(this.key.name, `failed to read template: ${errorMessage(err)}`, { cause: err });
    }
    return { value: { path: this.path, body }, files: [assetFile(this.path, body)] };
  }

  async restore(fetcher: FileFetcher): Promise<ProducerResult<TemplateBody> | null> {
    const file = await fetcher.fetchByName(this.path);
    if (!file) return null;
    return { value: { path: this.path, body: file.content.toString('utf-8') }, files: [file] };
  }
}

export function createBootkubeTemplateProducers(templatesDir?: string): BootkubeTemplateProducer[] {
  return BOOTKUBE_TEMPLATES.map((filename) => new BootkubeTemplateProducer(filename, templatesDir));
}
