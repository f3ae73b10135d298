import {
  internalCompilerFault,
  type DiagnosticEmitter,
  type SourceSpan,
} from "../../diagnostics/index.js";
import type { CompilerPerf } from "../../perf.js";
import { getPrimitive } from "../../types/primitives.js";
import {
  formatElementType,
  isResolvedElementType,
  isValidClassName,
  listDefinitionName,
  listOf,
  type ElementType,
  type ResolvedElementType,
} from "../../types/element-type.js";
import { named, type CDecl, type CType } from "../c/syntax.js";
import { emitChainRuntime } from "./chain-runtime.js";

export type ListInstantiation = Readonly<{
  name: string;
  elementType: ResolvedElementType;
  /** Source spelling of the list type, e.g. `list[u8]`. */
  label: string;
  elementCType: CType;
  declarations: readonly CDecl[];
}>;

export type ListInstantiationRegistry = {
  resolve: (elementType: ElementType, span?: SourceSpan) => string;
  has: (elementType: ElementType) => boolean;
  nameOf: (elementType: ElementType) => string | undefined;
  /** Instantiations in the order they were first resolved. */
  entries: () => readonly ListInstantiation[];
};

export const createListInstantiationRegistry = ({
  diagnostics,
  perf,
  accessCache,
}: {
  diagnostics: DiagnosticEmitter;
  perf: CompilerPerf;
  accessCache: boolean;
}): ListInstantiationRegistry => {
  const byName = new Map<string, ListInstantiation>();
  const ordered: ListInstantiation[] = [];

  const validate = (
    type: ElementType,
    requested: ElementType,
    span?: SourceSpan
  ): ResolvedElementType => {
    const unresolved = (): never =>
      internalCompilerFault({
        ctx: diagnostics,
        code: "LW0001",
        params: {
          kind: "unresolved-element-type",
          elementType: formatElementType(requested),
        },
        span,
      });

    switch (type.kind) {
      case "unknown":
      case "type-parameter":
        return unresolved();
      case "primitive": {
        const info = getPrimitive(type.name);
        if (!info.resolved) {
          return unresolved();
        }
        if (!info.storable) {
          return internalCompilerFault({
            ctx: diagnostics,
            code: "LW0002",
            params: { kind: "void-element" },
            span,
          });
        }
        return type;
      }
      case "class":
        if (!isValidClassName(type.name)) {
          return internalCompilerFault({
            ctx: diagnostics,
            code: "LW0002",
            params: { kind: "invalid-class-name", name: type.name },
            span,
          });
        }
        return type;
      case "list":
        validate(type.element, requested, span);
        return type;
    }
  };

  // Nested lists are stored by value, so their definition has to be emitted
  // first; resolving it here also fixes the output order.
  const lowerElementCType = (
    type: ResolvedElementType,
    span?: SourceSpan
  ): CType => {
    switch (type.kind) {
      case "primitive":
      case "class":
        return named(type.name);
      case "list":
        return named(resolve(type.element, span));
    }
  };

  const resolve = (elementType: ElementType, span?: SourceSpan): string => {
    perf.count("lists.resolve");
    const resolved = validate(elementType, elementType, span);
    const name = listDefinitionName(resolved);
    const label = formatElementType(listOf(resolved));

    const existing = byName.get(name);
    if (existing) {
      if (existing.label !== label) {
        return internalCompilerFault({
          ctx: diagnostics,
          code: "CG0001",
          params: {
            kind: "definition-name-collision",
            name,
            existing: existing.label,
            incoming: label,
          },
          span,
        });
      }
      perf.count("lists.resolve.hit");
      return existing.name;
    }

    const elementCType = lowerElementCType(resolved, span);
    const instantiation: ListInstantiation = Object.freeze({
      name,
      elementType: resolved,
      label,
      elementCType,
      declarations: Object.freeze(
        emitChainRuntime({ name, elementCType, label, accessCache })
      ),
    });
    byName.set(name, instantiation);
    ordered.push(instantiation);
    perf.count("lists.instantiate");
    return name;
  };

  const nameOf = (elementType: ElementType): string | undefined => {
    if (!isResolvedElementType(elementType)) {
      return undefined;
    }
    return byName.get(listDefinitionName(elementType))?.name;
  };

  return {
    resolve,
    has: (elementType) => nameOf(elementType) !== undefined,
    nameOf,
    entries: () => ordered,
  };
};
