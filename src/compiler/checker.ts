import { literalType } from "../ir/graph.js";
import type {
  Declaration,
  Expression,
  ModuleGraph,
  ModuleId,
  ValueType,
} from "../ir/types.js";
import {
  diagnostic,
  formatMessage,
  type OnDiagnostic,
  type SourceLocation,
} from "./diagnostics.js";
import type { ParsedDeclaration, ParsedModule, Span } from "./parser.js";

interface CheckContext {
  id: ModuleId;
  parsed: ParsedModule;
  /** Resolved identity of each import, parallel to parsed.imports. */
  importTargets: Array<ModuleId | undefined>;
  graph: ModuleGraph;
  report: OnDiagnostic;
}

/**
 * Resolve names and check types of one parsed module against the graph.
 * Every problem is reported; declarations with a problem are still returned,
 * without an initializer, so that later declarations can refer to them.
 */
export function checkModule(ctx: CheckContext): Declaration[] {
  const { id, parsed, report } = ctx;
  const at = (span: Span): SourceLocation => ({ uri: id, ...span });

  // target is undefined for an import whose URI did not resolve
  const prefixes = new Map<string, { target: ModuleId | undefined; span: Span; uri: string }>();
  parsed.imports.forEach((imp, index) => {
    const previous = prefixes.get(imp.alias);
    if (previous) {
      report(
        diagnostic(
          "error",
          `'${imp.alias}' is already used as an import prefix.`,
          at(imp.span),
          [formatMessage("context", `Previous use of '${imp.alias}'.`, at(previous.span))],
        ),
      );
      return;
    }
    prefixes.set(imp.alias, { target: ctx.importTargets[index], span: imp.span, uri: imp.uri });
  });

  const locals = new Map<string, ParsedDeclaration>();
  const unique: ParsedDeclaration[] = [];
  for (const decl of parsed.declarations) {
    const previous = locals.get(decl.name);
    if (previous) {
      report(
        diagnostic(
          "error",
          `'${decl.name}' is already declared in this module.`,
          at(decl.span),
          [formatMessage("context", `Previous declaration of '${decl.name}'.`, at(previous.span))],
        ),
      );
      continue;
    }
    locals.set(decl.name, decl);
    unique.push(decl);
  }

  const usedPrefixes = new Set<string>();

  const resolve = (
    decl: ParsedDeclaration,
  ): { expression: Expression; type: ValueType } | undefined => {
    const init = decl.initializer;
    if (init.kind === "literal") {
      return { expression: { kind: "literal", value: init.value }, type: literalType(init.value) };
    }

    if (init.prefix === undefined) {
      if (init.name === decl.name) {
        report(diagnostic("error", `'${decl.name}' can't refer to itself.`, at(init.span)));
        return undefined;
      }
      const target = locals.get(init.name);
      if (!target) {
        report(diagnostic("error", `Undefined name '${init.name}'.`, at(init.span)));
        return undefined;
      }
      return {
        expression: { kind: "reference", target: { module: id, name: target.name } },
        type: target.type,
      };
    }

    const prefix = prefixes.get(init.prefix);
    if (!prefix) {
      report(diagnostic("error", `Undefined prefix '${init.prefix}'.`, at(init.span)));
      return undefined;
    }
    usedPrefixes.add(init.prefix);
    const source = prefix.target;
    const module = source === undefined ? undefined : ctx.graph.nodes.get(source);
    if (source === undefined || !module) {
      // The import failed to resolve or load, which has been reported already.
      return undefined;
    }
    const target = module.declarations.find((d) => d.name === init.name);
    if (!target || !target.exported) {
      report(
        diagnostic("error", `'${init.name}' isn't exported by '${source}'.`, at(init.span)),
      );
      return undefined;
    }
    return {
      expression: { kind: "reference", target: { module: source, name: target.name } },
      type: target.type,
    };
  };

  const declarations = unique.map((decl): Declaration => {
    const out: Declaration = {
      name: decl.name,
      kind: decl.kind,
      type: decl.type,
      exported: decl.exported,
    };
    const resolved = resolve(decl);
    if (!resolved) return out;

    if (resolved.type !== decl.type) {
      const what = decl.kind === "const" ? "constant" : "variable";
      report(
        diagnostic(
          "error",
          `A value of type '${resolved.type}' can't be assigned to a ${what} of type '${decl.type}'.`,
          at(decl.initializer.span),
        ),
      );
      return out;
    }
    out.initializer = resolved.expression;
    return out;
  });

  for (const [alias, prefix] of prefixes) {
    if (prefix.target !== undefined && !usedPrefixes.has(alias)) {
      report(diagnostic("info", `Unused import of '${prefix.uri}'.`, at(prefix.span)));
    }
  }

  return declarations;
}
