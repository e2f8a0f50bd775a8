/**
 * Bound-value schema for the bootkube templates
 */

import { SynthesisError, type AssetKey, type Parents } from '@asset-graph/core';
import { clusterIdKey } from './clusterId.js';
import { clusterDomain, installConfigKey } from './installConfig.js';
import { tlsKeys, type CertBundle, type CertKey } from './tls.js';

export type BootkubeTemplateData = {
  readonly CVOClusterID: string;
  readonly EtcdCaBundle: string;
  readonly EtcdCaCert: string;
  readonly EtcdClientCaCert: string;
  readonly EtcdClientCaKey: string;
  readonly EtcdClientCert: string;
  readonly EtcdClientKey: string;
  readonly EtcdEndpointDNSSuffix: string;
  readonly EtcdEndpointHostnames: readonly string[];
  readonly EtcdMetricCaCert: string;
  readonly EtcdMetricClientCert: string;
  readonly EtcdMetricClientKey: string;
  readonly EtcdSignerCert: string;
  readonly EtcdSignerClientCert: string;
  readonly EtcdSignerClientKey: string;
  readonly EtcdSignerKey: string;
  readonly McsTLSCert: string;
  readonly McsTLSKey: string;
  readonly PullSecretBase64: string;
  readonly RootCaCert: string;
};

const base64 = (data: Buffer | string): string => Buffer.from(data).toString('base64');

/**
 * `etcd-0` … `etcd-(replicas-1)`
 */
export function etcdEndpointHostnames(replicas: number): string[] {
  return Array.from({ length: replicas }, (_, i) => `etcd-${i}`);
}

function requireMaterial(asset: string, name: string, data: Buffer): Buffer {
  if (!data.length) {
    throw new SynthesisError(asset, `${name} is empty`);
  }
  return data;
}

/**
 * Collect every templated value from the resolved dependencies.
 * The result is frozen; binders only read it.
 */
export function buildBootkubeTemplateData(asset: string, parents: Parents): BootkubeTemplateData {
  const config = parents.get(installConfigKey);
  const replicas = config.controlPlane.replicas;
  if (replicas === undefined) {
    throw new SynthesisError(asset, 'controlPlane.replicas is not set');
  }

  const bundle = (key: AssetKey<CertBundle>): Buffer =>
    requireMaterial(asset, `${key.name} certificate`, parents.get(key).cert);
  const pair = (key: AssetKey<CertKey>): CertKey => ({
    cert: bundle(key),
    key: requireMaterial(asset, `${key.name} key`, parents.get(key).key),
  });

  const etcdCA = pair(tlsKeys.etcdCA);
  const etcdClient = pair(tlsKeys.etcdClient);
  const etcdMetricSignerClient = pair(tlsKeys.etcdMetricSignerClient);
  const etcdSigner = pair(tlsKeys.etcdSigner);
  const etcdSignerClient = pair(tlsKeys.etcdSignerClient);
  const mcs = pair(tlsKeys.mcs);
  const rootCA = pair(tlsKeys.rootCA);

  return Object.freeze({
    CVOClusterID: parents.get(clusterIdKey).uuid,
    EtcdCaBundle: base64(bundle(tlsKeys.etcdCABundle)),
    EtcdCaCert: etcdCA.cert.toString('utf-8'),
    EtcdClientCaCert: base64(etcdCA.cert),
    EtcdClientCaKey: base64(etcdCA.key),
    EtcdClientCert: base64(etcdClient.cert),
    EtcdClientKey: base64(etcdClient.key),
    EtcdEndpointDNSSuffix: clusterDomain(config),
    EtcdEndpointHostnames: Object.freeze(etcdEndpointHostnames(replicas)),
    EtcdMetricCaCert: bundle(tlsKeys.etcdMetricCABundle).toString('utf-8'),
    EtcdMetricClientCert: base64(etcdMetricSignerClient.cert),
    EtcdMetricClientKey: base64(etcdMetricSignerClient.key),
    EtcdSignerCert: base64(etcdSigner.cert),
    EtcdSignerClientCert: base64(etcdSignerClient.cert),
    EtcdSignerClientKey: base64(etcdSignerClient.key),
    EtcdSignerKey: base64(etcdSigner.key),
    McsTLSCert: base64(mcs.cert),
    McsTLSKey: base64(mcs.key),
    PullSecretBase64: base64(config.pullSecret),
    RootCaCert: rootCA.cert.toString('utf-8'),
  });
}
