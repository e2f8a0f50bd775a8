/**
 * Certificate/key producers. Generating the material is delegated to a
 * CertificateIssuer; these producers only wire it into the graph and emit it.
 * Material is issued against the signers resolved in the same pass and is
 * never read back from disk.
 */

import {
  assetFile,
  assetKey,
  SynthesisError,
  type AssetKey,
  type Parents,
  type Producer,
  type ProducerResult,
} from '@asset-graph/core';

export interface CertBundle {
  /** PEM bytes */
  cert: Buffer;
}

export interface CertKey extends CertBundle {
  /** PEM bytes */
  key: Buffer;
}

export interface CertificateRequest {
  /** Producer identity, e.g. `etcd-client` */
  name: string;
  /** Signing pair, absent for self-signed CAs */
  signer?: CertKey;
}

export type CertificateIssuer = (request: CertificateRequest) => Promise<CertKey>;

export const TLS_DIR = 'tls';

export const tlsKeys = {
  rootCA: assetKey<CertKey>('root-ca'),
  etcdCA: assetKey<CertKey>('etcd-ca'),
  etcdSigner: assetKey<CertKey>('etcd-signer'),
  etcdCABundle: assetKey<CertBundle>('etcd-ca-bundle'),
  etcdSignerClient: assetKey<CertKey>('etcd-signer-client'),
  etcdClient: assetKey<CertKey>('etcd-client'),
  etcdMetricCA: assetKey<CertKey>('etcd-metric-ca'),
  etcdMetricCABundle: assetKey<CertBundle>('etcd-metric-ca-bundle'),
  etcdMetricSignerClient: assetKey<CertKey>('etcd-metric-signer-client'),
  mcs: assetKey<CertKey>('mcs'),
} as const;

export interface CertKeyProducerOptions {
  key: AssetKey<CertKey>;
  /** Base name of the persisted files under tls/ */
  filename: string;
  signer?: AssetKey<CertKey>;
  issuer: CertificateIssuer;
}

export class CertKeyProducer implements Producer<CertKey> {
  readonly key: AssetKey<CertKey>;
  private readonly certPath: string;
  private readonly keyPath: string;

  constructor(private readonly options: CertKeyProducerOptions) {
    this.key = options.key;
    this.certPath = `${TLS_DIR}/${options.filename}.crt`;
    this.keyPath = `${TLS_DIR}/${options.filename}.key`;
  }

  dependencies(): readonly AssetKey<unknown>[] {
    return this.options.signer ? [this.options.signer] : [];
  }

  async synthesize(parents: Parents): Promise<ProducerResult<CertKey>> {
    const { signer, issuer } = this.options;
    const request: CertificateRequest = { name: this.key.name };
    if (signer) request.signer = parents.get(signer);

    const pair = await issuer(request);
    if (!pair.cert.length || !pair.key.length) {
      throw new SynthesisError(this.key.name, 'issuer returned an empty certificate or key');
    }
    return { value: pair, files: this.toFiles(pair) };
  }

  private toFiles(pair: CertKey) {
    return [assetFile(this.certPath, pair.cert), assetFile(this.keyPath, pair.key)];
  }
}

export interface CertBundleProducerOptions {
  key: AssetKey<CertBundle>;
  filename: string;
  certs: readonly AssetKey<CertBundle>[];
}

/**
 * Concatenation of the certificates of its dependencies, in declaration order
 */
export class CertBundleProducer implements Producer<CertBundle> {
  readonly key: AssetKey<CertBundle>;
  private readonly certPath: string;

  constructor(private readonly options: CertBundleProducerOptions) {
    this.key = options.key;
    this.certPath = `${TLS_DIR}/${options.filename}.crt`;
  }

  dependencies(): readonly AssetKey<unknown>[] {
    return this.options.certs;
  }

  async synthesize(parents: Parents): Promise<ProducerResult<CertBundle>> {
    if (!this.options.certs.length) {
      throw new SynthesisError(this.key.name, 'bundle has no certificates');
    }
    const parts = this.options.certs.map((certKey) => {
      const pem = parents.get(certKey).cert;
      return pem.length && pem[pem.length - 1] !== 0x0a ? Buffer.concat([pem, Buffer.from('\n')]) : pem;
    });
    const cert = Buffer.concat(parts);
    return { value: { cert }, files: [assetFile(this.certPath, cert)] };
  }
}

/**
 * The certificate producers the manifests need, wired to one issuer
 */
export function createTlsProducers(issuer: CertificateIssuer): Producer<unknown>[] {
  const k = tlsKeys;
  return [
    new CertKeyProducer({ key: k.rootCA, filename: 'root-ca', issuer }),
    new CertKeyProducer({ key: k.etcdCA, filename: 'etcd-client-ca', issuer }),
    new CertKeyProducer({ key: k.etcdSigner, filename: 'etcd-signer', issuer }),
    new CertBundleProducer({ key: k.etcdCABundle, filename: 'etcd-ca-bundle', certs: [k.etcdCA, k.etcdSigner] }),
    new CertKeyProducer({ key: k.etcdSignerClient, filename: 'etcd-signer-client', signer: k.etcdSigner, issuer }),
    new CertKeyProducer({ key: k.etcdClient, filename: 'etcd-client', signer: k.etcdCA, issuer }),
    new CertKeyProducer({ key: k.etcdMetricCA, filename: 'etcd-metric-ca', issuer }),
    new CertBundleProducer({ key: k.etcdMetricCABundle, filename: 'etcd-metric-ca-bundle', certs: [k.etcdMetricCA] }),
    new CertKeyProducer({
      key: k.etcdMetricSignerClient,
      filename: 'etcd-metric-signer-client',
      signer: k.etcdMetricCA,
      issuer,
    }),
    new CertKeyProducer({ key: k.mcs, filename: 'machine-config-server', signer: k.rootCA, issuer }),
  ];
}
