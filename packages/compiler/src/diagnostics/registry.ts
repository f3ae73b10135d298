import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const resolvedTypesHint: DiagnosticHint = {
  message:
    "List uses must reach lowering with a concrete element type; this points at a type checker bug.",
};

type DiagnosticParamsMap = {
  CG0001: {
    kind: "definition-name-collision";
    name: string;
    existing: string;
    incoming: string;
  };
  LW0001: { kind: "unresolved-element-type"; elementType: string };
  LW0002:
    | { kind: "void-element" }
    | { kind: "invalid-class-name"; name: string };
  LW0003:
    | { kind: "unknown-list-method"; method: string; list: string }
    | {
        kind: "list-method-arity";
        method: string;
        expected: number;
        received: number;
      };
  LW0004: { kind: "unparsable-element-type"; text: string; reason: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  CG0001: {
    code: "CG0001",
    message: (params) =>
      `definition name '${params.name}' is already used by '${params.existing}' (requested for '${params.incoming}')`,
    severity: "error",
    phase: "codegen",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CG0001"]>,
  LW0001: {
    code: "LW0001",
    message: (params) =>
      `cannot instantiate a list for unresolved element type '${params.elementType}'`,
    severity: "error",
    phase: "lowering",
    hints: [resolvedTypesHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0001"]>,
  LW0002: {
    code: "LW0002",
    message: (params) =>
      params.kind === "void-element"
        ? "list element type cannot be 'void'"
        : `'${params.name}' is not a valid class name for a list element`,
    severity: "error",
    phase: "lowering",
    hints: [resolvedTypesHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0002"]>,
  LW0003: {
    code: "LW0003",
    message: (params) =>
      params.kind === "unknown-list-method"
        ? `unknown list method '${params.method}' on '${params.list}'`
        : `list method '${params.method}' expects ${params.expected} argument(s), received ${params.received}`,
    severity: "error",
    phase: "lowering",
    hints: [resolvedTypesHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0003"]>,
  LW0004: {
    code: "LW0004",
    message: (params) =>
      `cannot parse element type '${params.text}': ${params.reason}`,
    severity: "error",
    phase: "lowering",
    hints: [
      {
        message:
          "Element types are primitive keywords, class names or list[T], e.g. list[list[u8]].",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0004"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];
