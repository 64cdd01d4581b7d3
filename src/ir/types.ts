/** Canonical locator of a module: its import URI. */
export type ModuleId = string;

export type ValueType = "int" | "string" | "bool";

export type LiteralValue = number | string | boolean;

/** Points at a declaration by module identity and name, never by object. */
export interface Reference {
  module: ModuleId;
  name: string;
}

export type Expression =
  | { kind: "literal"; value: LiteralValue }
  | { kind: "reference"; target: Reference };

export interface Declaration {
  name: string;
  kind: "const" | "let";
  type: ValueType;
  exported: boolean;
  initializer?: Expression; // absent for `let` in summaries
}

export interface ModuleNode {
  id: ModuleId;
  fileUri: string;
  imports: ModuleId[];
  declarations: Declaration[];
  /**
   * True when this graph is the one that serializes the module. Modules
   * loaded from summaries or linked inputs are owned by another artifact and
   * are only referenced.
   */
  isCanonicalOwner: boolean;
}

/** Canonical names bound for one module: declaration name -> canonical name. */
export interface CanonicalNameRecord {
  module: ModuleId;
  names: Map<string, string>;
}

/**
 * Shared naming structure. Keyed by module identity, so removing a module
 * from a graph's top-level list leaves its bindings reachable.
 */
export type CanonicalRoot = Map<ModuleId, CanonicalNameRecord>;

export interface ModuleGraph {
  /** Arena of every module known to the graph, owned or external. */
  nodes: Map<ModuleId, ModuleNode>;
  /** Top-level modules, in order; these are what gets serialized. */
  modules: ModuleId[];
  root: CanonicalRoot;
}
