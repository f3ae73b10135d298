import type { DiagnosticEmitter } from "../diagnostics/index.js";
import type { CompilerPerf } from "../perf.js";
import type { ElementType } from "../types/element-type.js";
import type { ListInstantiationRegistry } from "./lists/registry.js";

export interface CompilationOptions {
  /** Emit the forward access cache in list get/set. */
  accessCache?: boolean;
  /** Include directory the emitted headers refer to each other through. */
  headerDir?: string;
  /** Element types whose lists exist in every program, e.g. for the standard library. */
  preludeElementTypes?: readonly ElementType[];
}

/**
 * State of a single compilation. Everything a compilation accumulates hangs
 * off this object, so separate compilations in one process never share
 * instantiations or diagnostics.
 */
export interface CompilationContext {
  options: Required<CompilationOptions>;
  diagnostics: DiagnosticEmitter;
  perf: CompilerPerf;
  lists: ListInstantiationRegistry;
}
