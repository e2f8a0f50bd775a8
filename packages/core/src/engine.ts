/**
 * AssetEngine: resolves producers against one pass
 */

import type { Logger } from 'pino';
import { buildRegistry, planAssetGraph } from './assetGraph.js';
import { AssetError, PersistedStateError, SynthesisError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import type {
  AssetEngineOptions,
  AssetFile,
  AssetKey,
  AssetOrigin,
  FileFetcher,
  Parents,
  Producer,
  ProducerResult,
  ResolvedAsset,
} from './types.js';

function freezeResolved<T>(key: AssetKey<T>, result: ProducerResult<T>, origin: AssetOrigin): ResolvedAsset<T> {
  const files: readonly AssetFile[] = Object.freeze([...(result.files ?? [])]);
  return Object.freeze({ key, value: result.value, files, origin });
}

/**
 * Parents view over the handles of one producer's declared dependencies
 */
class ResolvedParents implements Parents {
  constructor(
    private readonly owner: string,
    private readonly handles: ReadonlyMap<string, ResolvedAsset<unknown>>
  ) {}

  get<T>(key: AssetKey<T>): T {
    // handles are stored under the key that produced them
    return this.handle(key).value as T;
  }

  files(key: AssetKey<unknown>): readonly AssetFile[] {
    return this.handle(key).files;
  }

  private handle(key: AssetKey<unknown>): ResolvedAsset<unknown> {
    const handle = this.handles.get(key.name);
    if (!handle) {
      throw new SynthesisError(this.owner, `dependency "${key.name}" was not declared`);
    }
    return handle;
  }
}

export class AssetEngine {
  private readonly registry: Map<string, Producer<unknown>>;
  private readonly fetcher: FileFetcher | undefined;
  private readonly logger: Logger;
  /** Memoization table: one in-flight or settled resolution per identity */
  private readonly memo: Map<string, Promise<ResolvedAsset<unknown>>> = new Map();
  private readonly settled: Map<string, ResolvedAsset<unknown>> = new Map();

  constructor(options: AssetEngineOptions) {
    this.registry = buildRegistry(options.producers);
    this.fetcher = options.fetcher;
    this.logger = options.logger ?? createLogger('asset-engine');
  }

  /**
   * Resolve a producer and its transitive dependencies
   */
  async resolve<T>(key: AssetKey<T>): Promise<ResolvedAsset<T>> {
    try {
      planAssetGraph(this.registry, [key.name]);
      const handle = await this.resolveName(key.name);
      return this.narrow(key, handle);
    } catch (err) {
      this.logger.error({ asset: key.name, err }, 'asset resolution failed');
      throw err;
    }
  }

  /**
   * Handle already resolved in this pass
   */
  resolved<T>(key: AssetKey<T>): ResolvedAsset<T> | undefined {
    const handle = this.settled.get(key.name);
    return handle ? this.narrow(key, handle) : undefined;
  }

  private narrow<T>(key: AssetKey<T>, handle: ResolvedAsset<unknown>): ResolvedAsset<T> {
    // the registry maps each name to the producer whose key carries T
    return Object.freeze({ ...handle, key, value: handle.value as T });
  }

  private resolveName(name: string): Promise<ResolvedAsset<unknown>> {
    const existing = this.memo.get(name);
    if (existing) {
      return existing;
    }
    const pending = this.run(name);
    this.memo.set(name, pending);
    return pending;
  }

  private async run(name: string): Promise<ResolvedAsset<unknown>> {
    const producer = this.registry.get(name);
    if (!producer) {
      // planAssetGraph runs first, so this only guards direct misuse
      throw new SynthesisError(name, 'producer is not registered');
    }

    const startedAt = Date.now();
    this.logger.debug({ asset: name }, 'resolving asset');
    producer.onResolving?.();

    let handle: ResolvedAsset<unknown>;
    try {
      const restored = await this.tryRestore(producer);
      handle = restored
        ? freezeResolved(producer.key, restored, 'restored')
        : freezeResolved(producer.key, await this.synthesize(producer), 'synthesized');
    } catch (err) {
      producer.onFailed?.(err);
      throw err;
    }

    this.settled.set(name, handle);
    this.logger.info(
      { asset: name, origin: handle.origin, files: handle.files.length, durationMs: Date.now() - startedAt },
      `asset ${handle.origin}`
    );
    return handle;
  }

  private async tryRestore(producer: Producer<unknown>): Promise<ProducerResult<unknown> | null> {
    if (!this.fetcher || !producer.restore) {
      return null;
    }
    try {
      return await producer.restore(this.fetcher);
    } catch (err) {
      if (err instanceof AssetError) throw err;
      throw new PersistedStateError(producer.key.name, `failed to restore: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private async synthesize(producer: Producer<unknown>): Promise<ProducerResult<unknown>> {
    const name = producer.key.name;
    const deps = producer.dependencies();

    // Dependencies are independent of each other, resolve them concurrently.
    const handles = await Promise.all(deps.map((dep) => this.resolveName(dep.name)));
    const byName = new Map<string, ResolvedAsset<unknown>>();
    handles.forEach((handle, i) => {
      const dep = deps[i];
      if (dep) byName.set(dep.name, handle);
    });

    try {
      return await producer.synthesize(new ResolvedParents(name, byName));
    } catch (err) {
      if (err instanceof AssetError) throw err;
      throw new SynthesisError(name, `failed to synthesize: ${errorMessage(err)}`, { cause: err });
    }
  }
}
