export { checkModule } from "./checker.js";
export { diagnostic, formatMessage } from "./diagnostics.js";
export type {
  Diagnostic,
  OnDiagnostic,
  Severity,
  SourceLocation,
} from "./diagnostics.js";
export {
  locateModule,
  parsePackageMetadata,
  resolveImportUri,
} from "./packages.js";
export type { PackageMap } from "./packages.js";
export { parseModule } from "./parser.js";
export type { ParsedModule } from "./parser.js";
export { OutlineCompiler } from "./service.js";
export type {
  CompileOpts,
  CompilerInputs,
  CompilerService,
  SessionHandle,
} from "./service.js";
