/**
 * Status record: the `cluster-config-v1` ConfigMap persisted with the manifests
 */

import yaml from 'js-yaml';
import { z } from 'zod';
import { PersistedStateError, RedactionError, errorMessage } from '@asset-graph/core';
import { formatZodError } from './installConfig.js';

export const configurationObjectSchema = z.object({
  apiVersion: z.string(),
  kind: z.string(),
  metadata: z.object({
    name: z.string(),
    namespace: z.string().optional(),
  }),
  data: z.record(z.string(), z.string()).default({}),
});

export type ConfigurationObject = z.infer<typeof configurationObjectSchema>;

/**
 * Build a v1 ConfigMap. Values must already be redacted.
 */
export function configMap(namespace: string, name: string, data: Record<string, string>): ConfigurationObject {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: { name, namespace },
    data: { ...data },
  };
}

export function serializeStatusRecord(record: ConfigurationObject, asset: string): string {
  try {
    return yaml.dump(record, { sortKeys: true, noRefs: true, lineWidth: -1 });
  } catch (err) {
    throw new RedactionError(asset, `failed to serialize ${record.metadata.name}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export function parseStatusRecord(text: string, asset: string): ConfigurationObject {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new PersistedStateError(asset, `failed to parse status record: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = configurationObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistedStateError(asset, `invalid status record: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}
