/**
 * Install configuration: schema and producer
 */

import { z } from 'zod';
import type { ZodError } from 'zod';
import { assetKey, SynthesisError, type AssetKey, type Producer, type ProducerResult } from '@asset-graph/core';

const machinePoolSchema = z.object({
  name: z.string().default('master'),
  replicas: z.number().int().nonnegative().optional(),
});

const vsphereSchema = z.looseObject({
  vCenter: z.string(),
  username: z.string(),
  password: z.string(),
  datacenter: z.string(),
  defaultDatastore: z.string(),
});

const awsSchema = z.looseObject({
  region: z.string(),
});

const libvirtSchema = z.looseObject({
  URI: z.string().optional(),
});

const openstackSchema = z.looseObject({
  region: z.string().optional(),
  cloud: z.string().optional(),
  externalNetwork: z.string().optional(),
});

/**
 * Exactly one variant is expected; unknown variants are kept as they are.
 */
const platformSchema = z.looseObject({
  aws: awsSchema.optional(),
  azure: z.looseObject({ region: z.string() }).optional(),
  gcp: z.looseObject({ projectID: z.string(), region: z.string() }).optional(),
  libvirt: libvirtSchema.optional(),
  openstack: openstackSchema.optional(),
  vsphere: vsphereSchema.optional(),
  none: z.looseObject({}).optional(),
});

const networkingSchema = z.object({
  networkType: z.string().default('OpenShiftSDN'),
  machineCIDR: z.string().default('10.0.0.0/16'),
  clusterNetwork: z
    .array(z.object({ cidr: z.string(), hostPrefix: z.number().int() }))
    .default([{ cidr: '10.128.0.0/14', hostPrefix: 23 }]),
  serviceNetwork: z.array(z.string()).default(['172.30.0.0/16']),
});

export const installConfigSchema = z.object({
  apiVersion: z.string().default('v1'),
  metadata: z.object({ name: z.string().min(1) }),
  baseDomain: z.string().min(1),
  pullSecret: z.string(),
  sshKey: z.string().optional(),
  controlPlane: machinePoolSchema,
  compute: z.array(machinePoolSchema).default([]),
  networking: networkingSchema.default({
    networkType: 'OpenShiftSDN',
    machineCIDR: '10.0.0.0/16',
    clusterNetwork: [{ cidr: '10.128.0.0/14', hostPrefix: 23 }],
    serviceNetwork: ['172.30.0.0/16'],
  }),
  platform: platformSchema,
});

export type InstallConfig = z.infer<typeof installConfigSchema>;
export type InstallConfigInput = z.input<typeof installConfigSchema>;

export const KNOWN_PLATFORMS = ['aws', 'azure', 'gcp', 'libvirt', 'openstack', 'vsphere', 'none'] as const;

export function formatZodError(error: ZodError): string {
  const issues = error.issues ?? [];
  if (!issues.length) return error.message;
  return issues
    .map((issue) => {
      const path = issue.path?.length ? issue.path.join('.') : '';
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate an install config, filling defaults
 */
export function parseInstallConfig(value: unknown, asset = 'install-config'): InstallConfig {
  const parsed = installConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new SynthesisError(asset, `invalid install config: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * `<cluster name>.<base domain>`
 */
export function clusterDomain(config: InstallConfig): string {
  return `${config.metadata.name}.${config.baseDomain}`;
}

/**
 * Name of the platform variant that is set (first known one wins)
 */
export function platformName(config: InstallConfig): string {
  for (const name of KNOWN_PLATFORMS) {
    if (config.platform[name] !== undefined) return name;
  }
  const [other] = Object.keys(config.platform);
  return other ?? 'none';
}

export const installConfigKey: AssetKey<InstallConfig> = assetKey<InstallConfig>('install-config');

/**
 * Supplies the validated install config. Loading it from disk is the caller's job.
 */
export class InstallConfigProducer implements Producer<InstallConfig> {
  readonly key = installConfigKey;

  constructor(private readonly input: InstallConfigInput | InstallConfig) {}

  dependencies(): readonly AssetKey<unknown>[] {
    return [];
  }

  async synthesize(): Promise<ProducerResult<InstallConfig>> {
    return { value: parseInstallConfig(this.input, this.key.name) };
  }
}
