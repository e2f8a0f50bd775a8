/**
 * Cluster manifests built on the asset graph
 */

export {
  ManifestsProducer,
  manifestsKey,
  manifestPathFor,
  STATUS_RECORD_PATH,
  STATUS_RECORD_NAME,
  STATUS_RECORD_NAMESPACE,
  MANIFEST_PATTERN,
} from './manifests.js';
export type { Manifests, ManifestsState, ManifestsProducerOptions } from './manifests.js';

export { createManifestProducers, materializeManifests } from './producers.js';
export type { ManifestProducersOptions, MaterializeOptions, MaterializeResult } from './producers.js';

export {
  installConfigSchema,
  installConfigKey,
  InstallConfigProducer,
  parseInstallConfig,
  clusterDomain,
  platformName,
  formatZodError,
  KNOWN_PLATFORMS,
} from './installConfig.js';
export type { InstallConfig, InstallConfigInput } from './installConfig.js';

export { redactInstallConfig, serializeRedactedInstallConfig, DEFAULT_REDACTION_POLICY } from './redactor.js';
export type { RedactionPolicy } from './redactor.js';

export { bindTemplate, indent } from './templateBinder.js';
export type { TemplateData } from './templateBinder.js';

export { buildBootkubeTemplateData, etcdEndpointHostnames } from './templateData.js';
export type { BootkubeTemplateData } from './templateData.js';

export { configMap, configurationObjectSchema, parseStatusRecord, serializeStatusRecord } from './statusRecord.js';
export type { ConfigurationObject } from './statusRecord.js';

export { ClusterIdProducer, clusterIdKey, generateInfraId } from './clusterId.js';
export type { ClusterId, ClusterIdOptions } from './clusterId.js';

export { CertKeyProducer, CertBundleProducer, createTlsProducers, tlsKeys, TLS_DIR } from './tls.js';
export type { CertKey, CertBundle, CertificateIssuer, CertificateRequest } from './tls.js';

export { ClusterFactProducer, createClusterFactProducers, factKeys, MANIFEST_DIR } from './clusterFacts.js';
export type { ClusterResource } from './clusterFacts.js';

export {
  BootkubeTemplateProducer,
  createBootkubeTemplateProducers,
  bootkubeTemplateKey,
  bootkubeTemplateKeys,
  BOOTKUBE_TEMPLATES,
  BOOTKUBE_DIR,
  DEFAULT_TEMPLATES_DIR,
} from './bootkube.js';
export type { BootkubeTemplateName, TemplateBody } from './bootkube.js';
