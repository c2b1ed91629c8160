/**
 * C type mapping for code generators targeting a known data model.
 */

import { ALL_TYPE_CATEGORIES, cTypeName, type TypeCategoryValue } from "../models/categories.ts";
import type { DataModelValue } from "../models/kinds.ts";
import { bitsOf, sizeOf } from "../models/registry.ts";

// ─── Type mapping ───────────────────────────────────────────────────────────

/**
 * The `<stdint.h>` type with the same width as `category` under `model`,
 * or null when the model leaves the size unspecified.
 */
export function emitFixedWidthCType(
  model: DataModelValue,
  category: TypeCategoryValue,
  signed: boolean
): string | null {
  const bits = bitsOf(model, category);
  if (bits === 0) return null;
  return signed ? `int${bits}_t` : `uint${bits}_t`;
}

// ─── Static asserts ─────────────────────────────────────────────────────────

/** `_Static_assert` lines pinning every specified size of `model`. */
export function emitStaticAsserts(model: DataModelValue): string {
  const lines: string[] = [];
  for (const category of ALL_TYPE_CATEGORIES) {
    const size = sizeOf(model, category);
    if (size === 0) continue;
    const cName = cTypeName(category);
    lines.push(
      `_Static_assert(sizeof(${cName}) == ${size}, "${model}: sizeof(${cName}) must be ${size}");`
    );
  }
  return lines.join("\n");
}
