import { z } from "zod";
import { WorkerError } from "../errors.js";

export const DEFAULT_MULTI_ROOT_SCHEME = "multi-root";

export type OptionKind = "flag" | "option" | "multi-option";

export interface OptionSpec {
  name: string; // as written on the command line, without "--"
  key: keyof ParsedOptions;
  kind: OptionKind;
  negatable?: boolean; // flags only: accepts --no-<name>
  valueName?: string;
  help: string;
}

export const OPTION_TABLE: readonly OptionSpec[] = [
  {
    name: "help",
    key: "help",
    kind: "flag",
    help: "Print this usage information.",
  },
  {
    name: "exclude-non-sources",
    key: "excludeNonSources",
    kind: "flag",
    help: "Leave modules loaded implicitly (not listed with --source) out of the summary.",
  },
  {
    name: "summary-only",
    key: "summaryOnly",
    kind: "flag",
    negatable: true,
    help: "Only build summary files. (defaults to on)",
  },
  {
    name: "platform-summary",
    key: "platformSummary",
    kind: "option",
    valueName: "path",
    help: "Summary of the platform modules. Required.",
  },
  {
    name: "input-summary",
    key: "inputSummaries",
    kind: "multi-option",
    valueName: "path",
    help: "Summary of a dependency. May be repeated.",
  },
  {
    name: "input-linked",
    key: "inputLinked",
    kind: "multi-option",
    valueName: "path",
    help: "Already linked artifact used as context. May be repeated.",
  },
  {
    name: "multi-root",
    key: "multiRoots",
    kind: "multi-option",
    valueName: "path",
    help: "Physical root searched for multi-root URIs, in order. Defaults to the working directory.",
  },
  {
    name: "multi-root-scheme",
    key: "multiRootScheme",
    kind: "option",
    valueName: "scheme",
    help: `URI scheme mapped onto the multi-root search path. (defaults to "${DEFAULT_MULTI_ROOT_SCHEME}")`,
  },
  {
    name: "package-metadata",
    key: "packageMetadata",
    kind: "option",
    valueName: "path",
    help: "Package map used to resolve package: URIs.",
  },
  {
    name: "source",
    key: "sources",
    kind: "multi-option",
    valueName: "uri",
    help: "Module to compile into the output. May be repeated.",
  },
  {
    name: "output",
    key: "output",
    kind: "option",
    valueName: "path",
    help: "Where to write the artifact. Required.",
  },
];

export const ParsedOptionsSchema = z
  .object({
    help: z.boolean().default(false),
    excludeNonSources: z.boolean().default(false),
    summaryOnly: z.boolean().default(true),
    platformSummary: z.string().min(1).optional(),
    inputSummaries: z.array(z.string().min(1)).default([]),
    inputLinked: z.array(z.string().min(1)).default([]),
    multiRoots: z.array(z.string().min(1)).default([]),
    multiRootScheme: z
      .string()
      .regex(/^[a-zA-Z][a-zA-Z0-9+.-]*$/, "must be a valid URI scheme")
      .default(DEFAULT_MULTI_ROOT_SCHEME),
    packageMetadata: z.string().min(1).optional(),
    sources: z.array(z.string().min(1)).default([]),
    output: z.string().min(1).optional(),
  })
  .strict();

export type ParsedOptions = z.infer<typeof ParsedOptionsSchema>;

const OPTIONS_BY_NAME = new Map(OPTION_TABLE.map((spec) => [spec.name, spec]));

function parseError(message: string, option?: string): WorkerError {
  return new WorkerError("OPTION_PARSE_ERROR", message, { option });
}

function lookup(name: string): { spec: OptionSpec; negated: boolean } {
  const spec = OPTIONS_BY_NAME.get(name);
  if (spec) return { spec, negated: false };

  if (name.startsWith("no-")) {
    const positive = OPTIONS_BY_NAME.get(name.slice(3));
    if (positive?.kind === "flag" && positive.negatable) {
      return { spec: positive, negated: true };
    }
  }
  throw parseError(`Could not find an option named "${name}".`, name);
}

/**
 * Parse request arguments against OPTION_TABLE.
 *
 * Accepts `--name value` and `--name=value`. Does not check required options;
 * see validateOptions.
 *
 * @throws WorkerError OPTION_PARSE_ERROR
 */
export function parseOptions(args: readonly string[]): ParsedOptions {
  const raw: Record<string, boolean | string | string[]> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--") || arg === "--") {
      throw parseError(`Unexpected argument "${arg}".`);
    }

    const body = arg.slice(2);
    const eq = body.indexOf("=");
    const name = eq >= 0 ? body.slice(0, eq) : body;
    const inline = eq >= 0 ? body.slice(eq + 1) : undefined;
    const { spec, negated } = lookup(name);

    if (spec.kind === "flag") {
      if (inline !== undefined) {
        throw parseError(`Flag option "--${name}" does not take a value.`, name);
      }
      raw[spec.key] = !negated;
      continue;
    }

    let value = inline;
    if (value === undefined) {
      i++;
      value = args[i];
    }
    if (value === undefined) {
      throw parseError(`Missing argument for "--${name}".`, name);
    }

    if (spec.kind === "option") {
      if (spec.key in raw) {
        throw parseError(`Option "--${name}" was given more than once.`, name);
      }
      raw[spec.key] = value;
    } else {
      const existing = raw[spec.key];
      raw[spec.key] = Array.isArray(existing) ? [...existing, value] : [value];
    }
  }

  const parsed = ParsedOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path[0];
    const spec = OPTION_TABLE.find((s) => s.key === key);
    const target = spec ? `--${spec.name}` : "arguments";
    throw parseError(
      `Invalid value for ${target}: ${issue?.message ?? parsed.error.message}`,
      spec?.name,
    );
  }
  return parsed.data;
}

/** Options of a compile request once the required ones are known present. */
export type CompileRequestOptions = ParsedOptions & {
  platformSummary: string;
  output: string;
};

/**
 * Enforce the options a compile request cannot run without: a platform
 * summary, an output and at least one source. Callers handle help first.
 *
 * @throws WorkerError OPTION_PARSE_ERROR
 */
export function validateOptions(options: ParsedOptions): CompileRequestOptions {
  const { platformSummary, output } = options;
  if (platformSummary === undefined) {
    throw parseError(
      "Missing required option --platform-summary.",
      "platform-summary",
    );
  }
  if (output === undefined) {
    throw parseError("Missing required option --output.", "output");
  }
  if (options.sources.length === 0) {
    throw parseError("At least one --source is required.", "source");
  }
  return { ...options, platformSummary, output };
}

function label(spec: OptionSpec): string {
  const name = spec.negatable ? `[no-]${spec.name}` : spec.name;
  return spec.valueName ? `--${name}=<${spec.valueName}>` : `--${name}`;
}

/** Usage text generated from OPTION_TABLE. */
export function usage(): string {
  const labels = OPTION_TABLE.map(label);
  const width = Math.max(...labels.map((l) => l.length)) + 2;
  const lines = OPTION_TABLE.map(
    (spec, i) => `${(labels[i] ?? "").padEnd(width)}${spec.help}`,
  );
  return [
    "Usage: outline-worker [options] [@argfile]",
    "       outline-worker --persistent_worker",
    "",
    ...lines,
  ].join("\n");
}
