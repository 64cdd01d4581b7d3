import { WorkerError } from "../errors.js";
import {
  bindModule,
  canonicalName,
  outgoingReferences,
  resolveReference,
} from "../ir/graph.js";
import type { ModuleGraph, ModuleId } from "../ir/types.js";

export interface FilterResult {
  kept: ModuleId[];
  dropped: ModuleId[];
}

/**
 * Restrict a graph's top-level modules to the requested sources.
 *
 * Two build actions may both compile a shared dependency; only the action
 * that lists it as a source may own it. Modules loaded implicitly are
 * removed from the top level, but their canonical names are bound in the
 * root first, so references to them from kept modules still serialize and
 * resolve by identity in whichever artifact does own them.
 *
 * Mutates `graph`. Running it again with the same sources changes nothing.
 *
 * @throws WorkerError FILTER_INVARIANT_VIOLATION if a dropped module has no
 *   node to bind, or a kept module's reference is unbound afterwards
 */
export function filterToSources(
  graph: ModuleGraph,
  sources: Iterable<ModuleId>,
): FilterResult {
  const include = new Set(sources);
  const kept: ModuleId[] = [];
  const dropped: ModuleId[] = [];
  for (const id of graph.modules) {
    if (include.has(id)) {
      kept.push(id);
    } else {
      dropped.push(id);
    }
  }

  // Bind before removal: once off the top level the serializer never
  // computes these names.
  for (const id of dropped) {
    const node = graph.nodes.get(id);
    if (!node) {
      throw new WorkerError(
        "FILTER_INVARIANT_VIOLATION",
        `Cannot bind canonical names for ${id}: module is not in the graph`,
        { module: id },
      );
    }
    bindModule(graph.root, node);
  }
  graph.modules = kept;

  for (const id of kept) {
    const node = graph.nodes.get(id);
    if (!node) {
      throw new WorkerError(
        "FILTER_INVARIANT_VIOLATION",
        `Kept module ${id} is not in the graph`,
        { module: id },
      );
    }
    bindModule(graph.root, node);
  }

  for (const id of kept) {
    const node = graph.nodes.get(id);
    for (const ref of node ? outgoingReferences(node) : []) {
      if (resolveReference(graph.root, ref) === undefined) {
        const name = canonicalName(ref.module, ref.name);
        throw new WorkerError(
          "FILTER_INVARIANT_VIOLATION",
          `Reference from ${id} to ${name} has no canonical name after filtering`,
          { module: id, reference: name },
        );
      }
    }
  }

  return { kept, dropped };
}
