import { describe, expect, it } from "vitest";
import { InternalCompilerError } from "../../../diagnostics/index.js";
import {
  classType,
  listOf,
  primitive,
  typeParameter,
} from "../../../types/element-type.js";
import { arrow, id, verbatim } from "../../c/syntax.js";
import { createCompilation } from "../../compilation.js";
import { lowerListUse, lowerListUseToC, type ListUse } from "../lowering.js";

const u8 = primitive("u8");
const xs = { target: id("xs") };

const lower = (use: ListUse) =>
  lowerListUseToC({ ctx: createCompilation({ preludeElementTypes: [] }), use });

describe("lowerListUse", () => {
  it("declares and constructs list variables", () => {
    expect(lower({ kind: "list-declaration", name: "xs", elementType: u8 })).toBe(
      "list_u8 xs;\nlist_u8_constructor(&xs);"
    );
  });

  it("appends literal elements in order", () => {
    expect(
      lower({
        kind: "list-literal",
        name: "xs",
        elementType: u8,
        values: [verbatim("1"), verbatim("2")],
      })
    ).toBe(
      [
        "list_u8 xs;",
        "list_u8_constructor(&xs);",
        "list_u8_add(&xs, 1);",
        "list_u8_add(&xs, 2);",
      ].join("\n")
    );
  });

  it("maps methods onto the instantiation's functions", () => {
    expect(
      lower({
        kind: "list-call",
        elementType: u8,
        receiver: xs,
        method: "insert",
        args: [verbatim("1"), verbatim("9")],
      })
    ).toBe("list_u8_insert(&xs, 1, 9)");
    expect(
      lower({ kind: "list-call", elementType: u8, receiver: xs, method: "size", args: [] })
    ).toBe("list_u8_size(&xs)");
    expect(
      lower({
        kind: "list-call",
        elementType: u8,
        receiver: xs,
        method: "add",
        args: [verbatim("7")],
      })
    ).toBe("list_u8_add(&xs, 7)");
  });

  it("passes references through unchanged", () => {
    expect(
      lower({
        kind: "list-call",
        elementType: classType("Point"),
        receiver: { target: id("points"), isReference: true },
        method: "del",
        args: [verbatim("0")],
      })
    ).toBe("list_C5Point_del(points, 0)");
  });

  it("lowers indexing to get and set", () => {
    const receiver = { target: arrow(id("self"), "items") };
    const elementType = primitive("s32");
    expect(
      lower({ kind: "list-index", elementType, receiver, index: id("i") })
    ).toBe("list_s32_get(&self->items, i)");
    expect(
      lower({
        kind: "list-index-assign",
        elementType,
        receiver,
        index: id("i"),
        value: verbatim("x + 1"),
      })
    ).toBe("list_s32_set(&self->items, i, x + 1)");
  });

  it("returns structured output for further code generation", () => {
    const ctx = createCompilation({ preludeElementTypes: [] });
    const lowered = lowerListUse({
      ctx,
      use: { kind: "list-index", elementType: u8, receiver: xs, index: id("i") },
    });
    expect(lowered).toEqual({
      kind: "expression",
      expression: {
        kind: "call",
        callee: "list_u8_get",
        args: [
          { kind: "address-of", operand: { kind: "identifier", name: "xs" } },
          { kind: "identifier", name: "i" },
        ],
      },
    });
  });

  it("instantiates each element type once across uses", () => {
    const ctx = createCompilation({ preludeElementTypes: [] });
    const nested = listOf(u8);
    lowerListUse({ ctx, use: { kind: "list-declaration", name: "rows", elementType: nested } });
    lowerListUse({ ctx, use: { kind: "list-declaration", name: "row", elementType: u8 } });
    lowerListUse({
      ctx,
      use: {
        kind: "list-call",
        elementType: nested,
        receiver: { target: id("rows") },
        method: "add",
        args: [id("row")],
      },
    });

    expect(ctx.lists.entries().map((entry) => entry.name)).toEqual([
      "list_u8",
      "list_Lu8E",
    ]);
  });
});

describe("lowerListUse failures", () => {
  const failure = (use: ListUse): InternalCompilerError => {
    try {
      lower(use);
    } catch (error) {
      if (error instanceof InternalCompilerError) return error;
      throw error;
    }
    throw new Error("expected the list use to be rejected");
  };

  it("rejects unknown methods", () => {
    const error = failure({
      kind: "list-call",
      elementType: u8,
      receiver: xs,
      method: "push",
      args: [verbatim("1")],
      span: { file: "main.kl", start: 10, end: 17 },
    });
    expect(error.diagnostic.code).toBe("LW0003");
    expect(error.diagnostic.span).toEqual({ file: "main.kl", start: 10, end: 17 });
    expect(error.diagnostic.message).toBe("unknown list method 'push' on 'list[u8]'");
  });

  it("rejects calls with the wrong number of arguments", () => {
    expect(
      failure({ kind: "list-call", elementType: u8, receiver: xs, method: "get", args: [] })
        .diagnostic.message
    ).toBe("list method 'get' expects 1 argument(s), received 0");
  });

  it("rejects uses whose element type is still generic", () => {
    expect(
      failure({ kind: "list-declaration", name: "xs", elementType: typeParameter("T") })
        .diagnostic.code
    ).toBe("LW0001");
  });
});
