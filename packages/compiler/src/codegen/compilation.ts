import { DiagnosticEmitter } from "../diagnostics/index.js";
import { createCompilerPerf, type CompilerPerf } from "../perf.js";
import { primitive } from "../types/element-type.js";
import type { CompilationContext, CompilationOptions } from "./context.js";
import { createListInstantiationRegistry } from "./lists/registry.js";

export const DEFAULT_OPTIONS: Required<CompilationOptions> = {
  accessCache: true,
  headerDir: "keel_headers",
  // The file IO standard library reads and writes list[char].
  preludeElementTypes: [primitive("char")],
};

export const createCompilation = (
  options: CompilationOptions = {},
  perf: CompilerPerf = createCompilerPerf(),
): CompilationContext => {
  const mergedOptions: Required<CompilationOptions> = {
    ...DEFAULT_OPTIONS,
    ...options,
  };
  const diagnostics = new DiagnosticEmitter();
  const lists = createListInstantiationRegistry({
    diagnostics,
    perf,
    accessCache: mergedOptions.accessCache,
  });
  const ctx: CompilationContext = {
    options: mergedOptions,
    diagnostics,
    perf,
    lists,
  };

  mergedOptions.preludeElementTypes.forEach((elementType) =>
    lists.resolve(elementType)
  );
  return ctx;
};
