export { ARG_FILE_MARKER, expandArguments } from "./expand.js";
export type { ReadText } from "./expand.js";
export {
  DEFAULT_MULTI_ROOT_SCHEME,
  OPTION_TABLE,
  ParsedOptionsSchema,
  parseOptions,
  usage,
  validateOptions,
} from "./options.js";
export type {
  CompileRequestOptions,
  OptionKind,
  OptionSpec,
  ParsedOptions,
} from "./options.js";
