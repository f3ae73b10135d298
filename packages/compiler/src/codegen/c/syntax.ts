export type CType =
  | { kind: "named"; name: string }
  | { kind: "pointer"; to: CType };

export type CBinaryOperator =
  | "||"
  | "&&"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "+"
  | "-";

export type CExpr =
  | { kind: "identifier"; name: string }
  | { kind: "integer"; value: number }
  | { kind: "string"; value: string }
  /** Expression text produced elsewhere in code generation. */
  | { kind: "verbatim"; code: string }
  | { kind: "binary"; op: CBinaryOperator; left: CExpr; right: CExpr }
  | { kind: "address-of"; operand: CExpr }
  | { kind: "member"; object: CExpr; field: string; through: "." | "->" }
  | { kind: "call"; callee: string; args: readonly CExpr[] }
  | { kind: "assign"; target: CExpr; op: "=" | "-="; value: CExpr }
  | { kind: "postfix"; op: "++" | "--"; operand: CExpr }
  | { kind: "sizeof"; type: CType };

export type CStmt =
  | { kind: "expression"; expr: CExpr }
  | { kind: "variable"; type: CType; name: string; init?: CExpr }
  | { kind: "if"; condition: CExpr; then: readonly CStmt[] }
  | { kind: "while"; condition: CExpr; body: readonly CStmt[] }
  | { kind: "return"; value?: CExpr }
  | { kind: "comment"; text: string };

export type CField = { type: CType; name: string };

export type CDecl =
  | { kind: "pragma"; text: string }
  | { kind: "include"; path: string; system: boolean }
  | { kind: "define"; name: string; value: string }
  | { kind: "typedef"; type: CType; name: string }
  | { kind: "struct"; name: string; fields: readonly CField[] }
  | {
      kind: "function";
      returnType: CType;
      name: string;
      params: readonly CField[];
      body: readonly CStmt[];
    }
  | { kind: "comment"; text: string };

export const named = (name: string): CType => ({ kind: "named", name });
export const pointer = (to: CType): CType => ({ kind: "pointer", to });

export const verbatim = (code: string): CExpr => ({ kind: "verbatim", code });

export const id = (name: string): CExpr => ({ kind: "identifier", name });
export const int = (value: number): CExpr => ({ kind: "integer", value });
export const NULL = id("NULL");

export const binary = (
  left: CExpr,
  op: CBinaryOperator,
  right: CExpr
): CExpr => ({ kind: "binary", op, left, right });

export const arrow = (object: CExpr, field: string): CExpr => ({
  kind: "member",
  object,
  field,
  through: "->",
});

export const addressOf = (operand: CExpr): CExpr => ({
  kind: "address-of",
  operand,
});

export const call = (callee: string, ...args: CExpr[]): CExpr => ({
  kind: "call",
  callee,
  args,
});

export const assign = (target: CExpr, value: CExpr): CExpr => ({
  kind: "assign",
  target,
  op: "=",
  value,
});

export const exprStmt = (expr: CExpr): CStmt => ({ kind: "expression", expr });

export const assignStmt = (target: CExpr, value: CExpr): CStmt =>
  exprStmt(assign(target, value));

export const increment = (operand: CExpr): CStmt =>
  exprStmt({ kind: "postfix", op: "++", operand });

export const decrement = (operand: CExpr): CStmt =>
  exprStmt({ kind: "postfix", op: "--", operand });

export const variable = (type: CType, name: string, init?: CExpr): CStmt => ({
  kind: "variable",
  type,
  name,
  init,
});

export const ifStmt = (condition: CExpr, ...then: CStmt[]): CStmt => ({
  kind: "if",
  condition,
  then,
});

export const whileStmt = (condition: CExpr, ...body: CStmt[]): CStmt => ({
  kind: "while",
  condition,
  body,
});

export const returnStmt = (value?: CExpr): CStmt => ({ kind: "return", value });

export const comment = (text: string): CStmt => ({ kind: "comment", text });
