import { describe, expect, it } from "vitest";
import { printDecls, printExpr, printStmt } from "../printer.js";
import {
  addressOf,
  arrow,
  binary,
  call,
  id,
  ifStmt,
  int,
  named,
  pointer,
  returnStmt,
  verbatim,
} from "../syntax.js";

describe("C expression printer", () => {
  it("parenthesizes by precedence and associativity", () => {
    const [a, b, c] = [id("a"), id("b"), id("c")];
    expect(printExpr(binary(binary(a, "-", b), "-", c))).toBe("a - b - c");
    expect(printExpr(binary(a, "-", binary(b, "-", c)))).toBe("a - (b - c)");
    expect(printExpr(binary(binary(a, "||", b), "&&", c))).toBe("(a || b) && c");
    expect(printExpr(binary(a, "||", binary(b, "&&", c)))).toBe("a || b && c");
  });

  it("wraps compound operands of address-of and member access", () => {
    expect(printExpr(addressOf(arrow(id("self"), "items")))).toBe("&self->items");
    expect(printExpr(addressOf(verbatim("self.items")))).toBe("&(self.items)");
    expect(printExpr(arrow(verbatim("nodes[0]"), "next"))).toBe("(nodes[0])->next");
  });

  it("escapes string literals", () => {
    expect(printExpr({ kind: "string", value: 'say "hi"\n' })).toBe(
      '"say \\"hi\\"\\n"'
    );
  });

  it("prints call arguments verbatim", () => {
    expect(printExpr(call("list_u8_add", id("xs"), verbatim("x + 1")))).toBe(
      "list_u8_add(xs, x + 1)"
    );
  });
});

describe("C declaration printer", () => {
  it("indents nested blocks by four spaces", () => {
    expect(
      printStmt(ifStmt(binary(id("n"), ">", int(0)), returnStmt(id("n"))), 1)
    ).toEqual(["    if (n > 0) {", "        return n;", "    }"]);
  });

  it("separates sections with a blank line", () => {
    const source = printDecls([
      { kind: "pragma", text: "once" },
      { kind: "include", path: "stdint.h", system: true },
      { kind: "comment", text: "a pair" },
      {
        kind: "struct",
        name: "pair",
        fields: [
          { type: named("u8"), name: "left" },
          { type: pointer(named("pair")), name: "right" },
        ],
      },
      {
        kind: "function",
        returnType: named("u8"),
        name: "pair_left",
        params: [{ type: pointer(named("pair")), name: "this" }],
        body: [returnStmt(arrow(id("this"), "left"))],
      },
    ]);

    expect(source).toBe(
      [
        "#pragma once",
        "#include <stdint.h>",
        "",
        "// a pair",
        "typedef struct pair_struct pair;",
        "struct pair_struct {",
        "    u8 left;",
        "    pair* right;",
        "};",
        "",
        "u8 pair_left(pair* this) {",
        "    return this->left;",
        "}",
        "",
      ].join("\n")
    );
  });
});
