// ─── Name parsing ───────────────────────────────────────────────────────────

import { ALL_TYPE_CATEGORIES, TypeCategory, type TypeCategoryValue } from "./categories.ts";
import { ALL_DATA_MODELS, type DataModelValue } from "./kinds.ts";

/** Look up a data model by name, ignoring case and surrounding whitespace. */
export function parseDataModel(text: string): DataModelValue | undefined {
  const wanted = text.trim().toLowerCase();
  return ALL_DATA_MODELS.find((m) => m.toLowerCase() === wanted);
}

const CATEGORY_ALIASES: ReadonlyMap<string, TypeCategoryValue> = new Map([
  ["long long", TypeCategory.LongLong],
  ["longlong", TypeCategory.LongLong],
  ["size_t", TypeCategory.Pointer],
  ["ptr", TypeCategory.Pointer],
]);

/** Look up a type category by tag or by its C spelling. */
export function parseTypeCategory(text: string): TypeCategoryValue | undefined {
  const wanted = text.trim().toLowerCase().replace(/\s+/g, " ");
  return CATEGORY_ALIASES.get(wanted) ?? ALL_TYPE_CATEGORIES.find((c) => c === wanted);
}
