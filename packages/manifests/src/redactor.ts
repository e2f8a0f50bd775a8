/**
 * Strips secrets from the install config before it is persisted or logged.
 *
 * Redaction is driven by an explicit field list per platform variant; a new
 * sensitive field stays visible until it is added to the policy.
 */

import yaml from 'js-yaml';
import { RedactionError, errorMessage } from '@asset-graph/core';
import { installConfigSchema, formatZodError, type InstallConfig } from './installConfig.js';

export type RedactionPolicy = Readonly<Record<string, readonly string[]>>;

export const DEFAULT_REDACTION_POLICY: RedactionPolicy = {
  vsphere: ['username', 'password'],
};

const ASSET = 'install-config-redactor';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy of config with the pull secret and the policy's platform fields cleared
 */
export function redactInstallConfig(
  config: InstallConfig,
  policy: RedactionPolicy = DEFAULT_REDACTION_POLICY
): InstallConfig {
  const platform: Record<string, unknown> = { ...config.platform };

  for (const [variant, fields] of Object.entries(policy)) {
    const settings = platform[variant];
    if (!isRecord(settings)) continue;
    const redacted = { ...settings };
    for (const field of fields) {
      if (field in redacted) redacted[field] = '';
    }
    platform[variant] = redacted;
  }

  const parsed = installConfigSchema.safeParse({ ...config, pullSecret: '', platform });
  if (!parsed.success) {
    throw new RedactionError(ASSET, `redacted config is invalid: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Redact and serialize to YAML (keys sorted)
 */
export function serializeRedactedInstallConfig(
  config: InstallConfig,
  policy: RedactionPolicy = DEFAULT_REDACTION_POLICY
): string {
  const redacted = redactInstallConfig(config, policy);
  try {
    return yaml.dump(redacted, { sortKeys: true, noRefs: true, lineWidth: -1 });
  } catch (err) {
    throw new RedactionError(ASSET, `failed to serialize install config: ${errorMessage(err)}`, { cause: err });
  }
}
