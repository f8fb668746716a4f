/**
 * Transitive dependency walk.
 *
 * Sits on the catalog side of the decode boundary: each asset is decoded
 * once for its direct references, and every reference the catalog can
 * resolve is queued in turn. Cycles are cut by the visited set. An unknown
 * reference stops only the asset that declared it.
 */

import type { InMemoryCatalog } from './catalog';
import type { AssetId, Dependency } from './dependency';
import { formatAssetId } from './dependency';
import { plan } from './dependency-resolver';
import type { DecodePath, ResolveOptions } from './dependency-resolver';
import { UnknownAssetId } from './errors';
import { log, warn } from './logger';

export interface GraphNode {
  dependency: Dependency;
  /** Decode path used for this asset's own references, null if not in the catalog. */
  path: DecodePath | null;
  references: AssetId[];
  /** Set when this asset's references could not be resolved; the walk goes on. */
  error?: string;
}

export interface DependencyGraph {
  root: AssetId;
  nodes: Map<AssetId, GraphNode>;
}

/**
 * Breadth-first walk from `root`. Options apply to the root only; nested
 * assets are always walked in full.
 */
export function walkDependencies(
  catalog: InMemoryCatalog,
  root: AssetId,
  options: ResolveOptions = {},
): DependencyGraph {
  const nodes = new Map<AssetId, GraphNode>();
  const rootAsset = catalog.resolve(root);
  const queue: { dependency: Dependency; options: ResolveOptions }[] = [
    { dependency: { type: rootAsset.type, id: root }, options },
  ];

  while (queue.length > 0) {
    const next = queue.shift();
    if (!next || nodes.has(next.dependency.id)) continue;

    const { dependency: dep } = next;
    if (!catalog.isValid(dep.id)) {
      nodes.set(dep.id, { dependency: dep, path: null, references: [] });
      continue;
    }

    const result = plan(catalog.resolve(dep.id), catalog.game, catalog, next.options);
    const node: GraphNode = { dependency: dep, path: result.path, references: [] };
    try {
      for (const ref of result.dependencies) {
        if (ref.id === dep.id || node.references.includes(ref.id)) continue;
        node.references.push(ref.id);
        if (!nodes.has(ref.id)) {
          queue.push({ dependency: ref, options: { registry: options.registry } });
        }
      }
    } catch (err) {
      if (!(err instanceof UnknownAssetId)) throw err;
      node.error = err.message;
      warn(`${formatAssetId(dep.id, catalog.game)}: ${err.message}`);
    }
    nodes.set(dep.id, node);
  }

  log(`Walked ${nodes.size} assets from ${formatAssetId(root, catalog.game)}`);
  return { root, nodes };
}
