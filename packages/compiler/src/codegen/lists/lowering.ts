import {
  findListMethod,
  listOperationName,
  type ListOperation,
} from "@keel/lib/container-contract.js";
import {
  internalCompilerFault,
  type SourceSpan,
} from "../../diagnostics/index.js";
import {
  formatElementType,
  listOf,
  type ElementType,
} from "../../types/element-type.js";
import {
  addressOf,
  call,
  exprStmt,
  id,
  named,
  variable,
  type CExpr,
  type CStmt,
} from "../c/syntax.js";
import { printExpr, printStmt } from "../c/printer.js";
import type { CompilationContext } from "../context.js";

/**
 * A list-typed value a call is made on. Lists live in variables or fields and
 * are handed to the runtime by address, unless the value already is a
 * reference (a list parameter, for instance).
 */
export type ListReceiver = {
  target: CExpr;
  isReference?: boolean;
};

type ListUseBase = {
  /** Concrete element type, as resolved by the type checker. */
  elementType: ElementType;
  span?: SourceSpan;
};

export type ListUse =
  | (ListUseBase & { kind: "list-declaration"; name: string })
  | (ListUseBase & {
      kind: "list-literal";
      name: string;
      values: readonly CExpr[];
    })
  | (ListUseBase & {
      kind: "list-call";
      receiver: ListReceiver;
      method: string;
      args: readonly CExpr[];
    })
  | (ListUseBase & { kind: "list-index"; receiver: ListReceiver; index: CExpr })
  | (ListUseBase & {
      kind: "list-index-assign";
      receiver: ListReceiver;
      index: CExpr;
      value: CExpr;
    });

export type LoweredListUse =
  | { kind: "statements"; statements: CStmt[] }
  | { kind: "expression"; expression: CExpr };

const receiverArgument = ({ target, isReference }: ListReceiver): CExpr =>
  isReference ? target : addressOf(target);

const lowerDeclaration = (listName: string, name: string): CStmt[] => [
  variable(named(listName), name),
  exprStmt(call(listOperationName(listName, "create"), addressOf(id(name)))),
];

const resolveMethod = ({
  ctx,
  use,
}: {
  ctx: CompilationContext;
  use: Extract<ListUse, { kind: "list-call" }>;
}): ListOperation => {
  const operation = findListMethod(use.method);
  if (!operation) {
    return internalCompilerFault({
      ctx,
      code: "LW0003",
      params: {
        kind: "unknown-list-method",
        method: use.method,
        list: formatElementType(listOf(use.elementType)),
      },
      span: use.span,
    });
  }
  if (operation.arity !== use.args.length) {
    return internalCompilerFault({
      ctx,
      code: "LW0003",
      params: {
        kind: "list-method-arity",
        method: use.method,
        expected: operation.arity,
        received: use.args.length,
      },
      span: use.span,
    });
  }
  return operation;
};

/**
 * Lowers one type-checked use of the generic list type. Declarations and
 * literals become statements; calls and indexing become expressions whose
 * value is the operation's result.
 */
export const lowerListUse = ({
  ctx,
  use,
}: {
  ctx: CompilationContext;
  use: ListUse;
}): LoweredListUse => {
  const listName = ctx.lists.resolve(use.elementType, use.span);

  switch (use.kind) {
    case "list-declaration":
      return {
        kind: "statements",
        statements: lowerDeclaration(listName, use.name),
      };
    case "list-literal": {
      const add = listOperationName(listName, "append");
      return {
        kind: "statements",
        statements: [
          ...lowerDeclaration(listName, use.name),
          ...use.values.map((value) =>
            exprStmt(call(add, addressOf(id(use.name)), value))
          ),
        ],
      };
    }
    case "list-call": {
      const operation = resolveMethod({ ctx, use });
      return {
        kind: "expression",
        expression: call(
          listOperationName(listName, operation.kind),
          receiverArgument(use.receiver),
          ...use.args
        ),
      };
    }
    case "list-index":
      return {
        kind: "expression",
        expression: call(
          listOperationName(listName, "get"),
          receiverArgument(use.receiver),
          use.index
        ),
      };
    case "list-index-assign":
      return {
        kind: "expression",
        expression: call(
          listOperationName(listName, "set"),
          receiverArgument(use.receiver),
          use.index,
          use.value
        ),
      };
  }
};

/** Lowers a list use straight to C text, one statement per line. */
export const lowerListUseToC = (params: {
  ctx: CompilationContext;
  use: ListUse;
}): string => {
  const lowered = lowerListUse(params);
  return lowered.kind === "expression"
    ? printExpr(lowered.expression)
    : lowered.statements.flatMap((stmt) => printStmt(stmt)).join("\n");
};
