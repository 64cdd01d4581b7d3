import { describe, expect, test } from "vitest";
import { WorkerError } from "../../errors.js";
import {
  DEFAULT_MULTI_ROOT_SCHEME,
  OPTION_TABLE,
  parseOptions,
  usage,
  validateOptions,
} from "../options.js";

function parseFailure(args: string[]): WorkerError {
  try {
    parseOptions(args);
  } catch (error) {
    if (error instanceof WorkerError) return error;
    throw error;
  }
  throw new Error("expected parseOptions to fail");
}

describe("parseOptions", () => {
  test("defaults", () => {
    expect(parseOptions([])).toEqual({
      help: false,
      excludeNonSources: false,
      summaryOnly: true,
      inputSummaries: [],
      inputLinked: [],
      multiRoots: [],
      multiRootScheme: DEFAULT_MULTI_ROOT_SCHEME,
      sources: [],
    });
  });

  test("reads every option kind, in both value spellings", () => {
    const options = parseOptions([
      "--exclude-non-sources",
      "--no-summary-only",
      "--platform-summary",
      "platform.sum",
      "--input-summary=dep1.sum",
      "--input-summary",
      "dep2.sum",
      "--input-linked=linked.dill",
      "--multi-root=/src",
      "--multi-root=/gen",
      "--multi-root-scheme=workspace",
      "--package-metadata=.packages",
      "--source=package:app/main.mod",
      "--source=package:app/util.mod",
      "--output=out/app.sum",
    ]);

    expect(options).toEqual({
      help: false,
      excludeNonSources: true,
      summaryOnly: false,
      platformSummary: "platform.sum",
      inputSummaries: ["dep1.sum", "dep2.sum"],
      inputLinked: ["linked.dill"],
      multiRoots: ["/src", "/gen"],
      multiRootScheme: "workspace",
      packageMetadata: ".packages",
      sources: ["package:app/main.mod", "package:app/util.mod"],
      output: "out/app.sum",
    });
  });

  test("unknown option", () => {
    const error = parseFailure(["--frobnicate"]);
    expect(error.code).toBe("OPTION_PARSE_ERROR");
    expect(error.message).toBe('Could not find an option named "frobnicate".');
  });

  test("--no- is only accepted on negatable flags", () => {
    expect(parseFailure(["--no-help"]).message).toBe(
      'Could not find an option named "no-help".',
    );
  });

  test("positional argument", () => {
    expect(parseFailure(["main.mod"]).message).toBe('Unexpected argument "main.mod".');
  });

  test("missing value", () => {
    expect(parseFailure(["--output"]).message).toBe('Missing argument for "--output".');
  });

  test("value given to a flag", () => {
    expect(parseFailure(["--help=yes"]).message).toBe(
      'Flag option "--help" does not take a value.',
    );
  });

  test("single-valued option given twice", () => {
    expect(parseFailure(["--output=a", "--output=b"]).message).toBe(
      'Option "--output" was given more than once.',
    );
  });

  test("invalid scheme name", () => {
    const error = parseFailure(["--multi-root-scheme=1bad"]);
    expect(error.message).toBe(
      "Invalid value for --multi-root-scheme: must be a valid URI scheme",
    );
    expect(error.details?.option).toBe("multi-root-scheme");
  });
});

describe("validateOptions", () => {
  const complete = [
    "--platform-summary=p.sum",
    "--source=a.mod",
    "--output=a.sum",
  ];

  test("accepts a complete request and narrows the required fields", () => {
    const options = validateOptions(parseOptions(complete));
    expect(options.platformSummary).toBe("p.sum");
    expect(options.output).toBe("a.sum");
  });

  test.each([
    ["platform-summary", "Missing required option --platform-summary."],
    ["output", "Missing required option --output."],
    ["source", "At least one --source is required."],
  ])("missing --%s", (option, message) => {
    const args = complete.filter((arg) => !arg.startsWith(`--${option}=`));
    expect(() => validateOptions(parseOptions(args))).toThrow(message);
  });
});

describe("usage", () => {
  test("lists every option once", () => {
    const text = usage();
    for (const spec of OPTION_TABLE) {
      expect(text).toContain(`--${spec.negatable ? "[no-]" : ""}${spec.name}`);
    }
    expect(text.split("\n")[0]).toBe("Usage: outline-worker [options] [@argfile]");
  });

  test("shows value placeholders", () => {
    expect(usage()).toContain("--platform-summary=<path>");
    expect(usage()).toContain("--[no-]summary-only");
  });
});
