export { createCompilation, DEFAULT_OPTIONS } from "./codegen/compilation.js";
export type { CompilationContext, CompilationOptions } from "./codegen/context.js";
export {
  LIST_HEADER,
  TYPES_HEADER,
  UTILITY_HEADER,
  emitListHeader,
  emitProgramHeaders,
  emitTypesHeader,
  emitUtilityHeader,
} from "./codegen/headers.js";
export {
  lowerListUse,
  lowerListUseToC,
  type ListReceiver,
  type ListUse,
  type LoweredListUse,
} from "./codegen/lists/lowering.js";
export type {
  ListInstantiation,
  ListInstantiationRegistry,
} from "./codegen/lists/registry.js";
export { printDecls, printExpr, printStmt } from "./codegen/c/printer.js";
export * from "./types/element-type.js";
export {
  DiagnosticEmitter,
  DiagnosticError,
  InternalCompilerError,
  formatDiagnostic,
  type Diagnostic,
  type SourceSpan,
} from "./diagnostics/index.js";
export {
  createCompilerPerf,
  reportCompilerPerf,
  type CompilerPerf,
} from "./perf.js";
