/**
 * Error taxonomy. Every error names the producer or step that raised it.
 */

export type AssetErrorCode =
  | 'MISSING_PRODUCER'
  | 'DUPLICATE_PRODUCER'
  | 'CYCLE'
  | 'SYNTHESIS'
  | 'REDACTION'
  | 'BINDING'
  | 'PERSISTED_STATE'
  | 'DUPLICATE_FILE';

export class AssetError extends Error {
  readonly code: AssetErrorCode;
  /** Producer or step identity */
  readonly asset: string;

  constructor(code: AssetErrorCode, asset: string, message: string, options?: { cause?: unknown }) {
    super(`${asset}: ${message}`, options);
    this.name = new.target.name;
    this.code = code;
    this.asset = asset;
  }
}

export class MissingProducerError extends AssetError {
  /** The identity nothing is registered for */
  readonly missing: string;

  constructor(asset: string, missing: string) {
    super('MISSING_PRODUCER', asset, `no producer registered for dependency "${missing}"`);
    this.missing = missing;
  }
}

export class DuplicateProducerError extends AssetError {
  constructor(asset: string) {
    super('DUPLICATE_PRODUCER', asset, 'producer registered more than once');
  }
}

export class CycleError extends AssetError {
  /** Identities along the cycle, first and last are equal */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super('CYCLE', cycle[0] ?? 'graph', `dependency cycle: ${cycle.join(' -> ')}`);
    this.cycle = cycle;
  }
}

export class SynthesisError extends AssetError {
  constructor(asset: string, message: string, options?: { cause?: unknown }) {
    super('SYNTHESIS', asset, message, options);
  }
}

export class RedactionError extends AssetError {
  constructor(asset: string, message: string, options?: { cause?: unknown }) {
    super('REDACTION', asset, message, options);
  }
}

export class BindingError extends AssetError {
  constructor(asset: string, message: string, options?: { cause?: unknown }) {
    super('BINDING', asset, message, options);
  }
}

export class PersistedStateError extends AssetError {
  constructor(asset: string, message: string, options?: { cause?: unknown }) {
    super('PERSISTED_STATE', asset, message, options);
  }
}

export class DuplicateFileError extends AssetError {
  readonly path: string;

  constructor(asset: string, path: string) {
    super('DUPLICATE_FILE', asset, `more than one file with path "${path}"`);
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
