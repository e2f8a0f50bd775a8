/**
 * Asset graph helpers
 */

import { CycleError, DuplicateProducerError, MissingProducerError } from './errors.js';
import type { AssetGraph, AssetGraphEdge, AssetKey, Producer } from './types.js';

/**
 * Create a typed producer identity
 */
export function assetKey<T>(name: string): AssetKey<T> {
  return Object.freeze({ name });
}

/**
 * Index producers by identity
 */
export function buildRegistry(producers: readonly Producer<unknown>[]): Map<string, Producer<unknown>> {
  const registry = new Map<string, Producer<unknown>>();
  for (const producer of producers) {
    const name = producer.key.name;
    if (registry.has(name)) {
      throw new DuplicateProducerError(name);
    }
    registry.set(name, producer);
  }
  return registry;
}

/**
 * Walk the graph reachable from roots and return it dependency-first.
 * Fails on a missing producer or a cycle before anything is resolved.
 */
export function planAssetGraph(
  registry: ReadonlyMap<string, Producer<unknown>>,
  roots: readonly string[]
): string[] {
  const order: string[] = [];
  const done = new Set<string>();
  // in-progress path, for cycle reporting
  const stack: string[] = [];

  const visit = (name: string, dependent: string): void => {
    if (done.has(name)) return;

    const inProgress = stack.indexOf(name);
    if (inProgress !== -1) {
      throw new CycleError([...stack.slice(inProgress), name]);
    }

    const producer = registry.get(name);
    if (!producer) {
      throw new MissingProducerError(dependent, name);
    }

    stack.push(name);
    for (const dep of producer.dependencies()) {
      visit(dep.name, name);
    }
    stack.pop();

    done.add(name);
    order.push(name);
  };

  for (const root of roots) {
    visit(root, 'engine');
  }
  return order;
}

/**
 * Nodes and edges of the declared graph, sorted by identity
 */
export function describeAssetGraph(producers: readonly Producer<unknown>[]): AssetGraph {
  const registry = buildRegistry(producers);
  const names = [...registry.keys()].sort();

  const nodes = names.map((id) => ({
    id,
    dependencies: (registry.get(id)?.dependencies() ?? []).map((dep) => dep.name),
  }));

  const edges: AssetGraphEdge[] = nodes.flatMap((node) =>
    node.dependencies.map((target) => ({
      id: `${node.id}->${target}`,
      source: node.id,
      target,
    }))
  );

  return { nodes, edges };
}
