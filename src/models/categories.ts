// ─── Type Categories ────────────────────────────────────────────────────────

export const TypeCategory = {
  Char: "char",
  Short: "short",
  Int: "int",
  Long: "long",
  LongLong: "long_long",
  Pointer: "pointer",
} as const;

export type TypeCategoryValue = (typeof TypeCategory)[keyof typeof TypeCategory];

/** Categories in conventional promotion order, pointer last. */
export const ALL_TYPE_CATEGORIES: readonly TypeCategoryValue[] = Object.freeze([
  TypeCategory.Char,
  TypeCategory.Short,
  TypeCategory.Int,
  TypeCategory.Long,
  TypeCategory.LongLong,
  TypeCategory.Pointer,
]);

/** Number of bits in a `char`. Assumed, not modeled per data model. */
export const CHAR_BIT = 8;

export interface TypeCategoryInfo {
  /** Spelling of the type in C source. */
  cName: string;
  /** Smallest width in bits the C standard allows. */
  minBits: number;
}

export const TYPE_CATEGORY_INFO: Readonly<Record<TypeCategoryValue, TypeCategoryInfo>> =
  Object.freeze({
    // smallest addressable unit of the machine
    [TypeCategory.Char]: { cName: "char", minBits: 8 },
    [TypeCategory.Short]: { cName: "short", minBits: 16 },
    [TypeCategory.Int]: { cName: "int", minBits: 16 },
    [TypeCategory.Long]: { cName: "long", minBits: 32 },
    [TypeCategory.LongLong]: { cName: "long long", minBits: 64 },
    [TypeCategory.Pointer]: { cName: "size_t", minBits: 16 },
  });

export function cTypeName(category: TypeCategoryValue): string {
  return TYPE_CATEGORY_INFO[category].cName;
}
