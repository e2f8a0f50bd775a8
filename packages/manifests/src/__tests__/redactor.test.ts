import { describe, it, expect } from 'vitest';
import yaml from 'js-yaml';
import { parseInstallConfig } from '../installConfig.js';
import { redactInstallConfig, serializeRedactedInstallConfig } from '../redactor.js';

function vsphereConfig() {
  return parseInstallConfig({
    metadata: { name: 'demo' },
    baseDomain: 'example.test',
    pullSecret: 'test-secret',
    controlPlane: { replicas: 3 },
    platform: {
      vsphere: {
        vCenter: 'vcenter.example.test',
        username: 'test-user',
        password: 'test-password',
        datacenter: 'dc1',
        defaultDatastore: 'ds1',
      },
    },
  });
}

describe('redactInstallConfig', () => {
  it('should clear the pull secret and vSphere credentials', () => {
    const redacted = redactInstallConfig(vsphereConfig());

    expect(redacted.pullSecret).toBe('');
    expect(redacted.platform.vsphere).toEqual({
      vCenter: 'vcenter.example.test',
      username: '',
      password: '',
      datacenter: 'dc1',
      defaultDatastore: 'ds1',
    });
    expect(redacted.metadata.name).toBe('demo');
  });

  it('should leave the input untouched', () => {
    const config = vsphereConfig();
    redactInstallConfig(config);

    expect(config.pullSecret).toBe('test-secret');
    expect(config.platform.vsphere?.password).toBe('test-password');
  });

  it('should only clear the pull secret on platforms without a policy', () => {
    const config = parseInstallConfig({
      metadata: { name: 'demo' },
      baseDomain: 'example.test',
      pullSecret: 'test-secret',
      controlPlane: { replicas: 1 },
      platform: { aws: { region: 'us-east-1', accessKey: 'visible' } },
    });

    const redacted = redactInstallConfig(config);

    expect(redacted.pullSecret).toBe('');
    expect(redacted.platform).toEqual({ aws: { region: 'us-east-1', accessKey: 'visible' } });
  });

  it('should follow a custom policy', () => {
    const redacted = redactInstallConfig(vsphereConfig(), { vsphere: ['vCenter'] });

    expect(redacted.platform.vsphere?.vCenter).toBe('');
    expect(redacted.platform.vsphere?.password).toBe('test-password');
  });
});

describe('serializeRedactedInstallConfig', () => {
  it('should emit YAML with sorted keys and no secrets', () => {
    const text = serializeRedactedInstallConfig(vsphereConfig());

    expect(text.split('\n')[0]).toBe('apiVersion: v1');
    expect(text).not.toContain('test-secret');
    expect(text).not.toContain('test-password');
    expect(yaml.load(text)).toEqual(redactInstallConfig(vsphereConfig()));
  });

  it('should produce the same text for the same config', () => {
    expect(serializeRedactedInstallConfig(vsphereConfig())).toBe(serializeRedactedInstallConfig(vsphereConfig()));
  });
});
