/**
 * Asset graph type definitions
 */

import type { Logger } from 'pino';

/**
 * Typed identity of a producer. Dependencies are declared by key, and the
 * engine looks the producer up by `name` in the set it was constructed with.
 */
export interface AssetKey<T> {
  readonly name: string;
  /** Type carrier only, never set at runtime */
  readonly __value?: T;
}

/**
 * A file artifact. `path` is relative to the output directory and always uses
 * `/` as separator.
 */
export interface AssetFile {
  readonly path: string;
  readonly content: Buffer;
}

/**
 * Result of synthesize/restore
 */
export interface ProducerResult<T> {
  /** Value handed to dependents */
  value: T;
  /** Files this producer emits (default: none) */
  files?: AssetFile[];
}

/**
 * Read access to the resolved values of a producer's declared dependencies
 */
export interface Parents {
  get<T>(key: AssetKey<T>): T;
  files(key: AssetKey<unknown>): readonly AssetFile[];
}

/**
 * Source of previously persisted files
 */
export interface FileFetcher {
  /** Read one file, or null when it does not exist */
  fetchByName(path: string): Promise<AssetFile | null>;
  /** Read every file matching a `dir/glob` pattern (non-recursive, sorted) */
  fetchByPattern(pattern: string): Promise<AssetFile[]>;
}

/**
 * Producer contract
 */
export interface Producer<T> {
  readonly key: AssetKey<T>;
  /** Static, side-effect free */
  dependencies(): readonly AssetKey<unknown>[];
  /** Compute the value from the resolved dependencies */
  synthesize(parents: Parents): Promise<ProducerResult<T>>;
  /**
   * Rebuild the value from persisted files.
   * Returns null when nothing was persisted (not an error).
   */
  restore?(fetcher: FileFetcher): Promise<ProducerResult<T> | null>;
  /** Called by the engine when it starts resolving this producer */
  onResolving?(): void;
  /** Called by the engine when resolution fails, dependencies included */
  onFailed?(err: unknown): void;
}

export type AssetOrigin = 'synthesized' | 'restored';

/**
 * Immutable handle of a resolved producer
 */
export interface ResolvedAsset<T> {
  readonly key: AssetKey<T>;
  readonly value: T;
  /** Emitted files, frozen */
  readonly files: readonly AssetFile[];
  readonly origin: AssetOrigin;
}

/**
 * AssetEngine configuration
 */
export interface AssetEngineOptions {
  /** Every producer this pass may resolve */
  producers: readonly Producer<unknown>[];
  /** Enables restoration from persisted files */
  fetcher?: FileFetcher;
  logger?: Logger;
}

export interface AssetGraphNode {
  /** Producer identity */
  id: string;
  dependencies: string[];
}

export interface AssetGraphEdge {
  /** `${source}->${target}` */
  id: string;
  /** Dependent */
  source: string;
  /** Dependency */
  target: string;
}

export interface AssetGraph {
  nodes: AssetGraphNode[];
  edges: AssetGraphEdge[];
}
