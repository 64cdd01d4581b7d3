import type {
  CanonicalNameRecord,
  CanonicalRoot,
  LiteralValue,
  ModuleGraph,
  ModuleId,
  ModuleNode,
  Reference,
  ValueType,
} from "./types.js";

export function createGraph(): ModuleGraph {
  return { nodes: new Map(), modules: [], root: new Map() };
}

export function addModule(
  graph: ModuleGraph,
  node: ModuleNode,
  opts: { topLevel: boolean },
): void {
  graph.nodes.set(node.id, node);
  if (opts.topLevel && !graph.modules.includes(node.id)) {
    graph.modules.push(node.id);
  }
}

export function topLevelModules(graph: ModuleGraph): ModuleNode[] {
  const result: ModuleNode[] = [];
  for (const id of graph.modules) {
    const node = graph.nodes.get(id);
    if (node) result.push(node);
  }
  return result;
}

export function canonicalName(module: ModuleId, name: string): string {
  return `${module}::${name}`;
}

function recordFor(root: CanonicalRoot, module: ModuleId): CanonicalNameRecord {
  let record = root.get(module);
  if (!record) {
    record = { module, names: new Map() };
    root.set(module, record);
  }
  return record;
}

/**
 * Compute canonical names for every declaration of a module and attach them
 * to the root under the module's identity. Idempotent.
 */
export function bindModule(
  root: CanonicalRoot,
  node: ModuleNode,
): CanonicalNameRecord {
  const record = recordFor(root, node.id);
  for (const decl of node.declarations) {
    record.names.set(decl.name, canonicalName(node.id, decl.name));
  }
  return record;
}

/** Bind a single name without having the module itself (e.g. when decoding). */
export function bindReference(root: CanonicalRoot, ref: Reference): void {
  recordFor(root, ref.module).names.set(
    ref.name,
    canonicalName(ref.module, ref.name),
  );
}

/** Canonical name a reference resolves to, or undefined if unbound. */
export function resolveReference(
  root: CanonicalRoot,
  ref: Reference,
): string | undefined {
  return root.get(ref.module)?.names.get(ref.name);
}

export function outgoingReferences(node: ModuleNode): Reference[] {
  const refs: Reference[] = [];
  for (const decl of node.declarations) {
    if (decl.initializer?.kind === "reference") {
      refs.push(decl.initializer.target);
    }
  }
  return refs;
}

export function literalType(value: LiteralValue): ValueType {
  switch (typeof value) {
    case "number":
      return "int";
    case "string":
      return "string";
    default:
      return "bool";
  }
}
