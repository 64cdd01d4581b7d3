import {
  type CanonicalNameEntry,
  IrPayloadSchema,
  type SerializedDeclaration,
  type SerializedModule,
} from "../schemas/ir-payload.js";
import { IrCodecError } from "./errors.js";
import {
  addModule,
  bindModule,
  bindReference,
  createGraph,
  resolveReference,
} from "./graph.js";
import type { Declaration, ModuleGraph, ModuleNode, Reference } from "./types.js";

export const IR_MAGIC = "OWIR";
export const IR_FORMAT_VERSION = 1;
export const IR_HEADER_BYTES = 12; // magic, u32 version, u32 payload length

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Serialize the top-level modules of a graph.
 *
 * Each top-level module is bound in the root before it is written, as the
 * serializer owns it. Every reference must then resolve in the root; modules
 * outside the top-level list must have been bound beforehand.
 *
 * @throws IrCodecError MISSING_MODULE, DANGLING_REFERENCE, MALFORMED_PAYLOAD
 */
export function encodeGraph(graph: ModuleGraph): Uint8Array {
  const table: CanonicalNameEntry[] = [];
  const tableIndex = new Map<string, number>();

  const intern = (ref: Reference): number => {
    const name = resolveReference(graph.root, ref);
    if (name === undefined) {
      throw new IrCodecError(
        "DANGLING_REFERENCE",
        `No canonical name bound for ${ref.module}::${ref.name}`,
      );
    }
    let index = tableIndex.get(name);
    if (index === undefined) {
      index = table.length;
      table.push({ module: ref.module, name: ref.name });
      tableIndex.set(name, index);
    }
    return index;
  };

  const nodes: ModuleNode[] = [];
  for (const id of graph.modules) {
    const node = graph.nodes.get(id);
    if (!node) {
      throw new IrCodecError("MISSING_MODULE", `Top-level module ${id} has no node`);
    }
    bindModule(graph.root, node);
    nodes.push(node);
  }

  const modules: SerializedModule[] = nodes.map((node) => ({
    id: node.id,
    fileUri: node.fileUri,
    imports: [...node.imports],
    declarations: node.declarations.map((decl) => serializeDeclaration(decl, intern)),
  }));

  const body = encoder.encode(JSON.stringify({ canonicalNames: table, modules }));
  const bytes = new Uint8Array(IR_HEADER_BYTES + body.length);
  bytes.set(encoder.encode(IR_MAGIC), 0);
  const view = new DataView(bytes.buffer);
  view.setUint32(4, IR_FORMAT_VERSION);
  view.setUint32(8, body.length);
  bytes.set(body, IR_HEADER_BYTES);
  return bytes;
}

function serializeDeclaration(
  decl: Declaration,
  intern: (ref: Reference) => number,
): SerializedDeclaration {
  const out: SerializedDeclaration = {
    name: decl.name,
    kind: decl.kind,
    type: decl.type,
    exported: decl.exported,
  };
  if (decl.initializer?.kind === "literal") {
    const value = decl.initializer.value;
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new IrCodecError(
        "MALFORMED_PAYLOAD",
        `Literal ${value} in ${decl.name} is not a safe integer`,
      );
    }
    out.initializer = { literal: value };
  } else if (decl.initializer?.kind === "reference") {
    out.initializer = { ref: intern(decl.initializer.target) };
  }
  return out;
}

/**
 * Read an artifact back into a fresh graph. Every table entry is bound in the
 * new root, whether or not its module is part of the artifact.
 *
 * @throws IrCodecError
 */
export function decodeGraph(bytes: Uint8Array): ModuleGraph {
  if (bytes.length < IR_HEADER_BYTES) {
    throw new IrCodecError("TRUNCATED", `Artifact is ${bytes.length} bytes, shorter than its header`);
  }
  const magic = new TextDecoder().decode(bytes.subarray(0, 4));
  if (magic !== IR_MAGIC) {
    throw new IrCodecError("BAD_MAGIC", "Not an outline artifact");
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const version = view.getUint32(4);
  if (version !== IR_FORMAT_VERSION) {
    throw new IrCodecError(
      "UNSUPPORTED_VERSION",
      `Artifact format version ${version} is not supported (expected ${IR_FORMAT_VERSION})`,
    );
  }
  const length = view.getUint32(8);
  if (IR_HEADER_BYTES + length > bytes.length) {
    throw new IrCodecError(
      "TRUNCATED",
      `Artifact payload announces ${length} bytes, ${bytes.length - IR_HEADER_BYTES} present`,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(bytes.subarray(IR_HEADER_BYTES, IR_HEADER_BYTES + length)));
  } catch (error) {
    throw new IrCodecError(
      "MALFORMED_PAYLOAD",
      `Artifact payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const parsed = IrPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new IrCodecError("MALFORMED_PAYLOAD", `Invalid artifact payload: ${parsed.error.message}`);
  }

  const { canonicalNames, modules } = parsed.data;
  const graph = createGraph();
  for (const entry of canonicalNames) {
    bindReference(graph.root, entry);
  }

  for (const module of modules) {
    const node: ModuleNode = {
      id: module.id,
      fileUri: module.fileUri,
      imports: module.imports,
      declarations: module.declarations.map((decl) =>
        deserializeDeclaration(decl, canonicalNames),
      ),
      isCanonicalOwner: true,
    };
    addModule(graph, node, { topLevel: true });
    bindModule(graph.root, node);
  }
  return graph;
}

function deserializeDeclaration(
  decl: SerializedDeclaration,
  table: CanonicalNameEntry[],
): Declaration {
  const out: Declaration = {
    name: decl.name,
    kind: decl.kind,
    type: decl.type,
    exported: decl.exported,
  };
  const init = decl.initializer;
  if (!init) return out;

  if ("literal" in init) {
    out.initializer = { kind: "literal", value: init.literal };
  } else {
    const entry = table[init.ref];
    if (!entry) {
      throw new IrCodecError(
        "MALFORMED_PAYLOAD",
        `Reference index ${init.ref} in ${decl.name} is out of range`,
      );
    }
    out.initializer = {
      kind: "reference",
      target: { module: entry.module, name: entry.name },
    };
  }
  return out;
}
