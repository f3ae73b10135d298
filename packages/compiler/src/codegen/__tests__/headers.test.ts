import { describe, expect, it } from "vitest";
import { listOf, primitive } from "../../types/element-type.js";
import { createCompilation } from "../compilation.js";
import {
  LIST_HEADER,
  TYPES_HEADER,
  UTILITY_HEADER,
  emitListHeader,
  emitProgramHeaders,
  emitTypesHeader,
  emitUtilityHeader,
} from "../headers.js";

const lines = (...text: string[]): string => `${text.join("\n")}\n`;

const occurrences = (source: string, needle: string): number =>
  source.split(needle).length - 1;

describe("support headers", () => {
  it("typedefs every storable primitive whose C spelling differs", () => {
    expect(emitTypesHeader()).toBe(
      lines(
        "#pragma once",
        "#include <stdbool.h>",
        "#include <stdint.h>",
        "",
        "// typedefs for the builtin primitive types",
        "typedef bool u1;",
        "typedef uint8_t u8;",
        "typedef uint16_t u16;",
        "typedef uint32_t u32;",
        "typedef uint64_t u64;",
        "typedef int8_t s8;",
        "typedef int16_t s16;",
        "typedef int32_t s32;",
        "typedef int64_t s64;",
        "typedef float f32;",
        "typedef double f64;",
        "typedef char* string;"
      )
    );
  });

  it("defines the panic routine", () => {
    expect(emitUtilityHeader()).toBe(
      lines(
        "#pragma once",
        "#include <stdio.h>",
        "#include <stdlib.h>",
        '#define RED "\\x1b[31m"',
        '#define RESET "\\x1b[0m"',
        "",
        "// stops the program; runtime faults are not recoverable",
        "void panic(const char* message) {",
        '    fprintf(stderr, RED "panic: %s!\\n" RESET, message);',
        "    exit(1);",
        "}"
      )
    );
  });
});

describe("list header", () => {
  it("includes the support headers from the configured directory", () => {
    const ctx = createCompilation({ headerDir: "gen" });
    expect(
      emitListHeader(ctx).startsWith(
        lines(
          "#pragma once",
          "#include <stdio.h>",
          "#include <stdlib.h>",
          "#include <gen/types.h>",
          "#include <gen/utility_functions.h>",
          "",
          "// list[char]"
        )
      )
    ).toBe(true);
  });

  it("emits each instantiation once, inner lists first", () => {
    const ctx = createCompilation({ preludeElementTypes: [] });
    ctx.lists.resolve(listOf(primitive("u8")));
    ctx.lists.resolve(primitive("u8"));
    ctx.lists.resolve(listOf(primitive("u8")));
    const source = emitListHeader(ctx);

    expect(occurrences(source, "typedef struct list_u8_struct list_u8;")).toBe(1);
    expect(occurrences(source, "typedef struct list_Lu8E_struct list_Lu8E;")).toBe(1);
    expect(source.indexOf("// list[u8]")).toBeLessThan(
      source.indexOf("// list[list[u8]]")
    );
  });

  it("is identical for identical compilations", () => {
    const build = () => {
      const ctx = createCompilation();
      ctx.lists.resolve(primitive("s64"));
      ctx.lists.resolve(listOf(primitive("string")));
      return emitProgramHeaders(ctx);
    };
    expect(build()).toEqual(build());
  });

  it("omits the access cache when disabled", () => {
    const source = emitListHeader(createCompilation({ accessCache: false }));
    expect(source).not.toContain("this->cache_element = element;");
    expect(source).toContain("    this->cache_valid = false;");
  });
});

describe("emitProgramHeaders", () => {
  it("keys every header by file name", () => {
    const ctx = createCompilation();
    const headers = emitProgramHeaders(ctx);
    expect(Object.keys(headers)).toEqual([TYPES_HEADER, UTILITY_HEADER, LIST_HEADER]);
    expect(headers[LIST_HEADER]).toBe(emitListHeader(ctx));
  });
});
