/**
 * Asset graph core
 *
 * Core concepts:
 * - Producers declare their dependencies by key
 * - One AssetEngine per pass, each producer resolved at most once
 * - Persisted files restore a producer instead of synthesizing it
 */

export { AssetEngine } from './engine.js';

export type {
  AssetKey,
  AssetFile,
  AssetOrigin,
  ProducerResult,
  Parents,
  FileFetcher,
  Producer,
  ResolvedAsset,
  AssetEngineOptions,
  AssetGraph,
  AssetGraphNode,
  AssetGraphEdge,
} from './types.js';

export { assetKey, buildRegistry, planAssetGraph, describeAssetGraph } from './assetGraph.js';

export { assetFile, assertSafeRelativePath, compareFilePaths, sortFiles, mergeFileSets } from './assetFile.js';

export {
  DirectoryFileFetcher,
  writeAssetFiles,
  removeDir,
  globToRegExp,
  TEMP_FILE_PREFIX,
} from './fileStore.js';

export {
  AssetError,
  MissingProducerError,
  DuplicateProducerError,
  CycleError,
  SynthesisError,
  RedactionError,
  BindingError,
  PersistedStateError,
  DuplicateFileError,
  errorMessage,
} from './errors.js';

export type { AssetErrorCode } from './errors.js';

export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
