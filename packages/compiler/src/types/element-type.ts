import {
  DiagnosticEmitter,
  emitDiagnostic,
} from "../diagnostics/index.js";
import {
  getPrimitive,
  isPrimitiveKeyword,
  lookupPrimitive,
  type PrimitiveName,
} from "./primitives.js";

/**
 * Type of the values held by a list, as handed over by the type checker.
 * `type-parameter` and `unknown` only exist so the lowering phase can reject
 * them; a checked program never produces them at a list use.
 */
export type ElementType =
  | { kind: "primitive"; name: PrimitiveName }
  | { kind: "class"; name: string }
  | { kind: "list"; element: ElementType }
  | { kind: "type-parameter"; name: string }
  | { kind: "unknown" };

export type ResolvedElementType = Extract<
  ElementType,
  { kind: "primitive" | "class" | "list" }
>;

export const primitive = (keyword: PrimitiveName | "bool"): ElementType => {
  const info = lookupPrimitive(keyword);
  if (!info) {
    throw new Error(`unknown primitive type ${keyword}`);
  }
  return { kind: "primitive", name: info.name };
};

export const classType = (name: string): ElementType => ({ kind: "class", name });

export const listOf = (element: ElementType): ElementType => ({
  kind: "list",
  element,
});

export const typeParameter = (name: string): ElementType => ({
  kind: "type-parameter",
  name,
});

export const unknownElementType: ElementType = { kind: "unknown" };

export const formatElementType = (type: ElementType): string => {
  switch (type.kind) {
    case "primitive":
    case "class":
    case "type-parameter":
      return type.name;
    case "list":
      return `list[${formatElementType(type.element)}]`;
    case "unknown":
      return "<unknown>";
  }
};

export const isResolvedElementType = (
  type: ElementType
): type is ResolvedElementType => {
  switch (type.kind) {
    case "primitive":
      return getPrimitive(type.name).resolved;
    case "class":
      return true;
    case "list":
      return isResolvedElementType(type.element);
    case "type-parameter":
    case "unknown":
      return false;
  }
};

const CLASS_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const isValidClassName = (name: string): boolean =>
  CLASS_NAME.test(name) && name !== "list" && !isPrimitiveKeyword(name);

/**
 * Canonical mangling of an element type. Primitives keep their keyword,
 * classes are length-prefixed (`C5Point`) and nested lists are bracketed
 * (`L...E`), which keeps the encoding injective: no two identities share a
 * mangled form.
 */
export const mangleElementType = (type: ResolvedElementType): string => {
  switch (type.kind) {
    case "primitive":
      return type.name;
    case "class":
      return `C${type.name.length}${type.name}`;
    case "list": {
      const element = type.element;
      if (!isResolvedElementType(element)) {
        throw new Error(`cannot mangle ${formatElementType(type)}`);
      }
      return `L${mangleElementType(element)}E`;
    }
  }
};

export const listDefinitionName = (element: ResolvedElementType): string =>
  `list_${mangleElementType(element)}`;

export const parseElementType = (
  text: string,
  diagnostics: DiagnosticEmitter = new DiagnosticEmitter()
): ElementType => {
  let position = 0;

  const fail = (reason: string): never =>
    emitDiagnostic({
      ctx: diagnostics,
      code: "LW0004",
      params: { kind: "unparsable-element-type", text, reason },
      span: { file: "<element-type>", start: position, end: text.length },
    });

  const skipWhitespace = () => {
    while (position < text.length && /\s/.test(text.charAt(position))) {
      position++;
    }
  };

  const expect = (char: string) => {
    skipWhitespace();
    if (position >= text.length) {
      fail(`expected '${char}' but reached the end`);
    }
    if (text.charAt(position) !== char) {
      fail(`expected '${char}' at ${position}, found '${text.charAt(position)}'`);
    }
    position++;
  };

  const readIdentifier = (): string => {
    skipWhitespace();
    const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(position));
    if (!match) {
      return position >= text.length
        ? fail("expected a type name but reached the end")
        : fail(`unexpected '${text.charAt(position)}' at ${position}`);
    }
    position += match[0].length;
    return match[0];
  };

  const parseType = (): ElementType => {
    const name = readIdentifier();
    if (name === "list") {
      expect("[");
      const element = parseType();
      expect("]");
      return listOf(element);
    }
    const info = lookupPrimitive(name);
    return info ? { kind: "primitive", name: info.name } : classType(name);
  };

  const type = parseType();
  skipWhitespace();
  if (position < text.length) {
    fail(`unexpected '${text.charAt(position)}' at ${position}`);
  }
  return type;
};
