import { describe, expect, it } from "vitest";
import { DiagnosticEmitter, DiagnosticError } from "../../diagnostics/index.js";
import {
  classType,
  formatElementType,
  isResolvedElementType,
  isValidClassName,
  listDefinitionName,
  listOf,
  parseElementType,
  primitive,
  typeParameter,
  unknownElementType,
  type ResolvedElementType,
} from "../element-type.js";

const parseFailure = (text: string): string => {
  try {
    parseElementType(text);
  } catch (error) {
    if (error instanceof DiagnosticError) return error.diagnostic.message;
    throw error;
  }
  throw new Error(`expected '${text}' to be rejected`);
};

describe("element types", () => {
  it("formats nested list types", () => {
    expect(formatElementType(listOf(listOf(primitive("u8"))))).toBe(
      "list[list[u8]]"
    );
    expect(formatElementType(listOf(unknownElementType))).toBe("list[<unknown>]");
  });

  it("treats bool as an alias of u1", () => {
    expect(primitive("bool")).toEqual({ kind: "primitive", name: "u1" });
  });

  it("only resolves concrete element types", () => {
    expect(isResolvedElementType(listOf(classType("Point")))).toBe(true);
    expect(isResolvedElementType(listOf(typeParameter("T")))).toBe(false);
    expect(isResolvedElementType(primitive("base"))).toBe(false);
    expect(isResolvedElementType(unknownElementType)).toBe(false);
  });

  it("rejects class names that clash with builtin types", () => {
    expect(isValidClassName("Point")).toBe(true);
    expect(isValidClassName("_node2")).toBe(true);
    expect(isValidClassName("2D")).toBe(false);
    expect(isValidClassName("u8")).toBe(false);
    expect(isValidClassName("bool")).toBe(false);
    expect(isValidClassName("list")).toBe(false);
  });
});

describe("definition names", () => {
  const resolved = (text: string): ResolvedElementType => {
    const type = parseElementType(text);
    if (!isResolvedElementType(type)) throw new Error(`${text} is unresolved`);
    return type;
  };

  it("mangles each element type kind", () => {
    expect(listDefinitionName(resolved("u8"))).toBe("list_u8");
    expect(listDefinitionName(resolved("bool"))).toBe("list_u1");
    expect(listDefinitionName(resolved("Point"))).toBe("list_C5Point");
    expect(listDefinitionName(resolved("list[u8]"))).toBe("list_Lu8E");
    expect(listDefinitionName(resolved("list[list[Point]]"))).toBe(
      "list_LLC5PointEE"
    );
  });

  it("keeps class names apart from list manglings", () => {
    expect(listDefinitionName(resolved("Lu8E"))).toBe("list_C4Lu8E");
    expect(listDefinitionName(resolved("list[u8]"))).not.toBe(
      listDefinitionName(resolved("Lu8E"))
    );
  });
});

describe("parseElementType", () => {
  it("parses primitives, classes and nested lists", () => {
    expect(parseElementType("s32")).toEqual({ kind: "primitive", name: "s32" });
    expect(parseElementType("Point")).toEqual({ kind: "class", name: "Point" });
    expect(parseElementType(" list [ list[ u8 ] ] ")).toEqual(
      listOf(listOf(primitive("u8")))
    );
  });

  it("reports malformed types", () => {
    expect(parseFailure("list[u8")).toBe(
      "cannot parse element type 'list[u8': expected ']' but reached the end"
    );
    expect(parseFailure("list u8")).toBe(
      "cannot parse element type 'list u8': expected '[' at 5, found 'u'"
    );
    expect(parseFailure("u8]")).toBe(
      "cannot parse element type 'u8]': unexpected ']' at 2"
    );
    expect(parseFailure("")).toBe(
      "cannot parse element type '': expected a type name but reached the end"
    );
  });

  it("records the failure on the given emitter", () => {
    const diagnostics = new DiagnosticEmitter();
    expect(() => parseElementType("list[]", diagnostics)).toThrow(DiagnosticError);
    expect(diagnostics.diagnostics).toHaveLength(1);
    expect(diagnostics.diagnostics[0]?.code).toBe("LW0004");
    expect(diagnostics.diagnostics[0]?.span).toEqual({
      file: "<element-type>",
      start: 5,
      end: 6,
    });
  });
});
