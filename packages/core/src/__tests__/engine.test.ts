/**
 * AssetEngine tests
 */

import { describe, it, expect } from 'vitest';
import { AssetEngine } from '../engine.js';
import { assetKey } from '../assetGraph.js';
import { assetFile } from '../assetFile.js';
import {
  CycleError,
  DuplicateProducerError,
  MissingProducerError,
  PersistedStateError,
  SynthesisError,
} from '../errors.js';
import type { AssetFile, AssetKey, FileFetcher, Parents, Producer, ProducerResult } from '../types.js';

interface FakeProducer<T> extends Producer<T> {
  synthesizeCalls: number;
  restoreCalls: number;
}

function fakeProducer<T>(
  key: AssetKey<T>,
  deps: AssetKey<unknown>[],
  build: (parents: Parents) => ProducerResult<T> | Promise<ProducerResult<T>>,
  restore?: (fetcher: FileFetcher) => Promise<ProducerResult<T> | null>
): FakeProducer<T> {
  const producer: FakeProducer<T> = {
    key,
    synthesizeCalls: 0,
    restoreCalls: 0,
    dependencies: () => deps,
    synthesize: async (parents) => {
      producer.synthesizeCalls++;
      return build(parents);
    },
  };
  if (restore) {
    producer.restore = async (fetcher) => {
      producer.restoreCalls++;
      return restore(fetcher);
    };
  }
  return producer;
}

function memoryFetcher(files: AssetFile[]): FileFetcher {
  return {
    fetchByName: async (name) => files.find((f) => f.path === name) ?? null,
    fetchByPattern: async () => files,
  };
}

describe('AssetEngine', () => {
  describe('resolve', () => {
    it('should pass resolved dependency values to synthesize', async () => {
      const base = assetKey<number>('base');
      const doubled = assetKey<number>('doubled');

      const engine = new AssetEngine({
        producers: [
          fakeProducer(base, [], () => ({ value: 21 })),
          fakeProducer(doubled, [base], (parents) => ({ value: parents.get(base) * 2 })),
        ],
      });

      const handle = await engine.resolve(doubled);
      expect(handle.value).toBe(42);
      expect(handle.origin).toBe('synthesized');
      expect(handle.key.name).toBe('doubled');
    });

    it('should expose emitted files as a frozen list', async () => {
      const key = assetKey<string>('with-files');
      const engine = new AssetEngine({
        producers: [fakeProducer(key, [], () => ({ value: 'x', files: [assetFile('out/a.txt', 'a')] }))],
      });

      const handle = await engine.resolve(key);
      expect(handle.files.map((f) => f.path)).toEqual(['out/a.txt']);
      expect(Object.isFrozen(handle.files)).toBe(true);
      expect(Object.isFrozen(handle)).toBe(true);
    });

    it('should synthesize dependencies before dependents', async () => {
      const order: string[] = [];
      const a = assetKey<string>('a');
      const b = assetKey<string>('b');
      const c = assetKey<string>('c');

      const engine = new AssetEngine({
        producers: [
          fakeProducer(c, [a, b], () => {
            order.push('c');
            return { value: 'c' };
          }),
          fakeProducer(b, [a], () => {
            order.push('b');
            return { value: 'b' };
          }),
          fakeProducer(a, [], () => {
            order.push('a');
            return { value: 'a' };
          }),
        ],
      });

      await engine.resolve(c);
      expect(order).toEqual(['a', 'b', 'c']);
    });

    it('should synthesize a shared dependency exactly once', async () => {
      const shared = assetKey<string>('shared');
      const left = assetKey<string>('left');
      const right = assetKey<string>('right');
      const top = assetKey<string>('top');

      const sharedProducer = fakeProducer(shared, [], async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return { value: 'shared' };
      });

      const engine = new AssetEngine({
        producers: [
          sharedProducer,
          fakeProducer(left, [shared], (p) => ({ value: `left:${p.get(shared)}` })),
          fakeProducer(right, [shared], (p) => ({ value: `right:${p.get(shared)}` })),
          fakeProducer(top, [left, right], (p) => ({ value: `${p.get(left)}|${p.get(right)}` })),
        ],
      });

      const handle = await engine.resolve(top);
      expect(handle.value).toBe('left:shared|right:shared');
      expect(sharedProducer.synthesizeCalls).toBe(1);
    });

    it('should memoize across resolve calls in the same pass', async () => {
      const shared = assetKey<string>('shared');
      const first = assetKey<string>('first');
      const second = assetKey<string>('second');
      const sharedProducer = fakeProducer(shared, [], () => ({ value: 's' }));

      const engine = new AssetEngine({
        producers: [
          sharedProducer,
          fakeProducer(first, [shared], () => ({ value: '1' })),
          fakeProducer(second, [shared], () => ({ value: '2' })),
        ],
      });

      await Promise.all([engine.resolve(first), engine.resolve(second)]);
      expect(sharedProducer.synthesizeCalls).toBe(1);
      expect(engine.resolved(shared)?.value).toBe('s');
    });

    it('should return undefined from resolved() before resolution', () => {
      const key = assetKey<string>('lazy');
      const engine = new AssetEngine({ producers: [fakeProducer(key, [], () => ({ value: 'v' }))] });
      expect(engine.resolved(key)).toBeUndefined();
    });
  });

  describe('graph validation', () => {
    it('should reject a cycle before synthesizing anything', async () => {
      const a = assetKey<string>('a');
      const b = assetKey<string>('b');
      const producerA = fakeProducer(a, [b], () => ({ value: 'a' }));
      const producerB = fakeProducer(b, [a], () => ({ value: 'b' }));

      const engine = new AssetEngine({ producers: [producerA, producerB] });

      const error = await engine.resolve(a).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CycleError);
      expect(error instanceof CycleError && error.cycle).toEqual(['a', 'b', 'a']);
      expect(producerA.synthesizeCalls).toBe(0);
      expect(producerB.synthesizeCalls).toBe(0);
    });

    it('should reject a producer depending on itself', async () => {
      const self = assetKey<string>('self');
      const engine = new AssetEngine({ producers: [fakeProducer(self, [self], () => ({ value: 's' }))] });

      await expect(engine.resolve(self)).rejects.toThrow('self: dependency cycle: self -> self');
    });

    it('should report a missing dependency with its dependent', async () => {
      const top = assetKey<string>('top');
      const ghost = assetKey<string>('ghost');
      const engine = new AssetEngine({ producers: [fakeProducer(top, [ghost], () => ({ value: 't' }))] });

      const error = await engine.resolve(top).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(MissingProducerError);
      expect(error instanceof MissingProducerError && error.asset).toBe('top');
      expect(error instanceof MissingProducerError && error.missing).toBe('ghost');
    });

    it('should reject duplicate identities', () => {
      const key = assetKey<string>('twice');
      expect(
        () =>
          new AssetEngine({
            producers: [fakeProducer(key, [], () => ({ value: '1' })), fakeProducer(key, [], () => ({ value: '2' }))],
          })
      ).toThrow(DuplicateProducerError);
    });
  });

  describe('errors', () => {
    it('should wrap plain errors thrown by synthesize', async () => {
      const key = assetKey<string>('broken');
      const cause = new Error('certificate was never generated');
      const engine = new AssetEngine({
        producers: [
          fakeProducer(key, [], () => {
            throw cause;
          }),
        ],
      });

      const error = await engine.resolve(key).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(SynthesisError);
      expect(error instanceof SynthesisError && error.message).toBe(
        'broken: failed to synthesize: certificate was never generated'
      );
      expect(error instanceof SynthesisError && error.cause).toBe(cause);
    });

    it('should surface asset errors from dependencies unchanged', async () => {
      const leaf = assetKey<string>('leaf');
      const top = assetKey<string>('top');
      const original = new SynthesisError('leaf', 'upstream data is absent');

      const engine = new AssetEngine({
        producers: [
          fakeProducer(leaf, [], () => {
            throw original;
          }),
          fakeProducer(top, [leaf], () => ({ value: 't' })),
        ],
      });

      await expect(engine.resolve(top)).rejects.toBe(original);
    });

    it('should fail when reading an undeclared parent', async () => {
      const declared = assetKey<string>('declared');
      const hidden = assetKey<string>('hidden');
      const top = assetKey<string>('top');

      const engine = new AssetEngine({
        producers: [
          fakeProducer(declared, [], () => ({ value: 'd' })),
          fakeProducer(hidden, [], () => ({ value: 'h' })),
          fakeProducer(top, [declared], (p) => ({ value: p.get(hidden) })),
        ],
      });

      await expect(engine.resolve(top)).rejects.toThrow('top: dependency "hidden" was not declared');
    });
  });

  describe('restore', () => {
    it('should prefer persisted state and skip dependencies', async () => {
      const dep = assetKey<string>('dep');
      const top = assetKey<string>('top');
      const depProducer = fakeProducer(dep, [], () => ({ value: 'dep' }));
      const topProducer = fakeProducer(
        top,
        [dep],
        () => ({ value: 'fresh' }),
        async (fetcher) => {
          const file = await fetcher.fetchByName('top.txt');
          return file ? { value: file.content.toString('utf-8'), files: [file] } : null;
        }
      );

      const engine = new AssetEngine({
        producers: [depProducer, topProducer],
        fetcher: memoryFetcher([assetFile('top.txt', 'persisted')]),
      });

      const handle = await engine.resolve(top);
      expect(handle.origin).toBe('restored');
      expect(handle.value).toBe('persisted');
      expect(topProducer.synthesizeCalls).toBe(0);
      expect(depProducer.synthesizeCalls).toBe(0);
    });

    it('should fall back to synthesize when nothing was persisted', async () => {
      const key = assetKey<string>('first-run');
      const producer = fakeProducer(
        key,
        [],
        () => ({ value: 'fresh' }),
        async () => null
      );

      const engine = new AssetEngine({ producers: [producer], fetcher: memoryFetcher([]) });

      const handle = await engine.resolve(key);
      expect(handle.origin).toBe('synthesized');
      expect(producer.restoreCalls).toBe(1);
      expect(producer.synthesizeCalls).toBe(1);
    });

    it('should not call restore without a fetcher', async () => {
      const key = assetKey<string>('no-fetcher');
      const producer = fakeProducer(
        key,
        [],
        () => ({ value: 'fresh' }),
        async () => ({ value: 'stale' })
      );

      const engine = new AssetEngine({ producers: [producer] });

      expect((await engine.resolve(key)).value).toBe('fresh');
      expect(producer.restoreCalls).toBe(0);
    });

    it('should wrap plain restore errors as persisted state errors', async () => {
      const key = assetKey<string>('corrupt');
      const producer = fakeProducer(
        key,
        [],
        () => ({ value: 'fresh' }),
        async () => {
          throw new Error('unexpected end of input');
        }
      );

      const engine = new AssetEngine({ producers: [producer], fetcher: memoryFetcher([]) });

      const error = await engine.resolve(key).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(PersistedStateError);
      expect(error instanceof PersistedStateError && error.message).toBe(
        'corrupt: failed to restore: unexpected end of input'
      );
      expect(producer.synthesizeCalls).toBe(0);
    });
  });

  describe('lifecycle hooks', () => {
    it('should report resolving before dependencies and failure from a dependency', async () => {
      const leaf = assetKey<string>('leaf');
      const top = assetKey<string>('top');
      const events: string[] = [];

      const topProducer = fakeProducer(top, [leaf], () => ({ value: 't' }));
      topProducer.onResolving = () => events.push('top:resolving');
      topProducer.onFailed = (err) => events.push(`top:failed:${err instanceof SynthesisError ? err.asset : '?'}`);

      const engine = new AssetEngine({
        producers: [
          fakeProducer(leaf, [], () => {
            events.push('leaf:synthesize');
            throw new Error('boom');
          }),
          topProducer,
        ],
      });

      await expect(engine.resolve(top)).rejects.toThrow('leaf: failed to synthesize: boom');
      expect(events).toEqual(['top:resolving', 'leaf:synthesize', 'top:failed:leaf']);
      expect(topProducer.synthesizeCalls).toBe(0);
    });

    it('should not report failure after a successful resolution', async () => {
      const key = assetKey<number>('ok');
      const events: string[] = [];
      const producer = fakeProducer(key, [], () => ({ value: 1 }));
      producer.onResolving = () => events.push('resolving');
      producer.onFailed = () => events.push('failed');

      await new AssetEngine({ producers: [producer] }).resolve(key);

      expect(events).toEqual(['resolving']);
    });
  });
});
