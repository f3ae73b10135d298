export type PrimitiveName =
  | "void"
  | "u1"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "s8"
  | "s16"
  | "s32"
  | "s64"
  | "f32"
  | "f64"
  | "char"
  | "string"
  | "base";

export interface PrimitiveTypeInfo {
  name: PrimitiveName;
  /** C spelling of the type; a typedef bridges the two when they differ. */
  cType: string;
  aliases: readonly string[];
  /** Whether values of the type can be stored, e.g. as list elements. */
  storable: boolean;
  /**
   * `base` is the type of integer literals whose width has not been settled
   * yet. It never survives type checking.
   */
  resolved: boolean;
}

const numeric = (name: PrimitiveName, cType: string): PrimitiveTypeInfo => ({
  name,
  cType,
  aliases: [],
  storable: true,
  resolved: true,
});

export const PRIMITIVE_TYPES: readonly PrimitiveTypeInfo[] = [
  { name: "void", cType: "void", aliases: [], storable: false, resolved: true },
  { name: "u1", cType: "bool", aliases: ["bool"], storable: true, resolved: true },
  numeric("u8", "uint8_t"),
  numeric("u16", "uint16_t"),
  numeric("u32", "uint32_t"),
  numeric("u64", "uint64_t"),
  numeric("s8", "int8_t"),
  numeric("s16", "int16_t"),
  numeric("s32", "int32_t"),
  numeric("s64", "int64_t"),
  numeric("f32", "float"),
  numeric("f64", "double"),
  { name: "char", cType: "char", aliases: [], storable: true, resolved: true },
  { name: "string", cType: "char*", aliases: [], storable: true, resolved: true },
  { name: "base", cType: "int64_t", aliases: [], storable: true, resolved: false },
];

const primitivesByKeyword = new Map<string, PrimitiveTypeInfo>(
  PRIMITIVE_TYPES.flatMap((info) =>
    [info.name, ...info.aliases].map((keyword) => [keyword, info] as const)
  )
);

export const lookupPrimitive = (keyword: string): PrimitiveTypeInfo | undefined =>
  primitivesByKeyword.get(keyword);

export const getPrimitive = (name: PrimitiveName): PrimitiveTypeInfo => {
  const info = primitivesByKeyword.get(name);
  if (!info) {
    throw new Error(`unknown primitive type ${name}`);
  }
  return info;
};

export const isPrimitiveKeyword = (keyword: string): boolean =>
  primitivesByKeyword.has(keyword);
