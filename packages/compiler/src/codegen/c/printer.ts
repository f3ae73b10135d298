import type {
  CBinaryOperator,
  CDecl,
  CExpr,
  CField,
  CStmt,
  CType,
} from "./syntax.js";

const INDENT = "    ";

const precedence: Record<CBinaryOperator, number> = {
  "||": 1,
  "&&": 2,
  "==": 3,
  "!=": 3,
  "<": 4,
  "<=": 4,
  ">": 4,
  ">=": 4,
  "+": 5,
  "-": 5,
};

const SIMPLE_VERBATIM = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const printType = (type: CType): string =>
  type.kind === "named" ? type.name : `${printType(type.to)}*`;

const printField = ({ type, name }: CField): string =>
  `${printType(type)} ${name}`;

const escapeString = (value: string): string =>
  value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n");

const printOperand = (
  child: CExpr,
  parent: CBinaryOperator,
  side: "left" | "right"
): string => {
  const printed = printExpr(child);
  if (child.kind === "assign") return `(${printed})`;
  if (child.kind !== "binary") return printed;
  const childPrecedence = precedence[child.op];
  const parentPrecedence = precedence[parent];
  const needsParens =
    childPrecedence < parentPrecedence ||
    (childPrecedence === parentPrecedence && side === "right");
  return needsParens ? `(${printed})` : printed;
};

// Operand of a postfix/prefix operator or member access.
const printTightOperand = (expr: CExpr): string => {
  const printed = printExpr(expr);
  switch (expr.kind) {
    case "binary":
    case "assign":
    case "address-of":
      return `(${printed})`;
    case "verbatim":
      return SIMPLE_VERBATIM.test(expr.code) ? printed : `(${printed})`;
    default:
      return printed;
  }
};

export const printExpr = (expr: CExpr): string => {
  switch (expr.kind) {
    case "identifier":
      return expr.name;
    case "integer":
      return `${expr.value}`;
    case "string":
      return `"${escapeString(expr.value)}"`;
    case "verbatim":
      return expr.code;
    case "binary":
      return `${printOperand(expr.left, expr.op, "left")} ${expr.op} ${printOperand(expr.right, expr.op, "right")}`;
    case "address-of":
      return `&${printTightOperand(expr.operand)}`;
    case "member":
      return `${printTightOperand(expr.object)}${expr.through}${expr.field}`;
    case "call":
      return `${expr.callee}(${expr.args.map(printExpr).join(", ")})`;
    case "assign":
      return `${printExpr(expr.target)} ${expr.op} ${printExpr(expr.value)}`;
    case "postfix":
      return `${printTightOperand(expr.operand)}${expr.op}`;
    case "sizeof":
      return `sizeof(${printType(expr.type)})`;
  }
};

const printBlock = (stmts: readonly CStmt[], depth: number): string[] =>
  stmts.flatMap((stmt) => printStmt(stmt, depth));

export const printStmt = (stmt: CStmt, depth = 0): string[] => {
  const pad = INDENT.repeat(depth);
  switch (stmt.kind) {
    case "expression":
      return [`${pad}${printExpr(stmt.expr)};`];
    case "variable": {
      const declarator = printField(stmt);
      return stmt.init
        ? [`${pad}${declarator} = ${printExpr(stmt.init)};`]
        : [`${pad}${declarator};`];
    }
    case "if":
      return [
        `${pad}if (${printExpr(stmt.condition)}) {`,
        ...printBlock(stmt.then, depth + 1),
        `${pad}}`,
      ];
    case "while":
      return [
        `${pad}while (${printExpr(stmt.condition)}) {`,
        ...printBlock(stmt.body, depth + 1),
        `${pad}}`,
      ];
    case "return":
      return stmt.value
        ? [`${pad}return ${printExpr(stmt.value)};`]
        : [`${pad}return;`];
    case "comment":
      return [`${pad}// ${stmt.text}`];
  }
};

export const printDecl = (decl: CDecl): string[] => {
  switch (decl.kind) {
    case "pragma":
      return [`#pragma ${decl.text}`];
    case "include":
      return [decl.system ? `#include <${decl.path}>` : `#include "${decl.path}"`];
    case "define":
      return [`#define ${decl.name} ${decl.value}`];
    case "typedef":
      return [`typedef ${printType(decl.type)} ${decl.name};`];
    case "struct":
      return [
        `typedef struct ${decl.name}_struct ${decl.name};`,
        `struct ${decl.name}_struct {`,
        ...decl.fields.map((field) => `${INDENT}${printField(field)};`),
        "};",
      ];
    case "function":
      return [
        `${printType(decl.returnType)} ${decl.name}(${decl.params.map(printField).join(", ")}) {`,
        ...printBlock(decl.body, 1),
        "}",
      ];
    case "comment":
      return [`// ${decl.text}`];
  }
};

const startsSection = (decl: CDecl): boolean =>
  decl.kind === "function" || decl.kind === "struct" || decl.kind === "comment";

/**
 * Renders declarations as a C source fragment. Functions, structs and comment
 * blocks are separated by a blank line; a comment stays attached to the
 * declaration that follows it.
 */
export const printDecls = (decls: readonly CDecl[]): string => {
  const lines: string[] = [];
  decls.forEach((decl, index) => {
    const previous = index > 0 ? decls[index - 1] : undefined;
    if (previous && previous.kind !== "comment" && startsSection(decl)) {
      lines.push("");
    }
    lines.push(...printDecl(decl));
  });
  return `${lines.join("\n")}\n`;
};
