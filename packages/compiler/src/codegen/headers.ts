import { reportCompilerPerf } from "../perf.js";
import { PRIMITIVE_TYPES } from "../types/primitives.js";
import { printDecls } from "./c/printer.js";
import { named, type CDecl } from "./c/syntax.js";
import type { CompilationContext } from "./context.js";

export const LIST_HEADER = "list.h";
export const TYPES_HEADER = "types.h";
export const UTILITY_HEADER = "utility_functions.h";

const systemInclude = (path: string): CDecl => ({
  kind: "include",
  path,
  system: true,
});

export const emitTypesHeader = (): string =>
  printDecls([
    { kind: "pragma", text: "once" },
    systemInclude("stdbool.h"),
    systemInclude("stdint.h"),
    { kind: "comment", text: "typedefs for the builtin primitive types" },
    ...PRIMITIVE_TYPES.filter(
      (info) => info.resolved && info.storable && info.cType !== info.name
    ).map(
      (info): CDecl => ({ kind: "typedef", type: named(info.cType), name: info.name })
    ),
  ]);

export const emitUtilityHeader = (): string =>
  printDecls([
    { kind: "pragma", text: "once" },
    systemInclude("stdio.h"),
    systemInclude("stdlib.h"),
    { kind: "define", name: "RED", value: '"\\x1b[31m"' },
    { kind: "define", name: "RESET", value: '"\\x1b[0m"' },
    { kind: "comment", text: "stops the program; runtime faults are not recoverable" },
    {
      kind: "function",
      returnType: named("void"),
      name: "panic",
      params: [{ type: named("const char*"), name: "message" }],
      body: [
        {
          kind: "expression",
          expr: { kind: "verbatim", code: 'fprintf(stderr, RED "panic: %s!\\n" RESET, message)' },
        },
        { kind: "expression", expr: { kind: "verbatim", code: "exit(1)" } },
      ],
    },
  ]);

export const emitListHeader = (ctx: CompilationContext): string => {
  const { headerDir } = ctx.options;
  return printDecls([
    { kind: "pragma", text: "once" },
    systemInclude("stdio.h"),
    systemInclude("stdlib.h"),
    systemInclude(`${headerDir}/${TYPES_HEADER}`),
    systemInclude(`${headerDir}/${UTILITY_HEADER}`),
    ...ctx.lists.entries().flatMap((entry) => entry.declarations),
  ]);
};

/** Every header the list runtime needs, keyed by file name. */
export const emitProgramHeaders = (
  ctx: CompilationContext
): Record<string, string> => {
  const headers = ctx.perf.time("headers", () => ({
    [TYPES_HEADER]: emitTypesHeader(),
    [UTILITY_HEADER]: emitUtilityHeader(),
    [LIST_HEADER]: emitListHeader(ctx),
  }));
  ctx.perf.count("lists.emitted", ctx.lists.entries().length);
  reportCompilerPerf({
    perf: ctx.perf,
    label: "program-headers",
    success: true,
    diagnostics: ctx.diagnostics.diagnostics.length,
  });
  return headers;
};
