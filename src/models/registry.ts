/**
 * Forward and reverse lookups over the data model size table.
 *
 * Both directions are total: an unsupported pair yields `0`, an unmatched
 * triple yields `DataModel.Unknown`. Neither throws.
 */

import { CHAR_BIT, type TypeCategoryValue } from "./categories.ts";
import { DataModel, type DataModelValue } from "./kinds.ts";
import { SIZE_TABLE, type SizeRow } from "./table.ts";

/** Size in bytes of `category` under `model`, or 0 when unspecified. */
export function sizeOf(model: DataModelValue, category: TypeCategoryValue): number {
  return SIZE_TABLE[model][category];
}

export function bitsOf(model: DataModelValue, category: TypeCategoryValue): number {
  return sizeOf(model, category) * CHAR_BIT;
}

/** The full row of sizes for `model`. */
export function sizesOf(model: DataModelValue): SizeRow {
  return SIZE_TABLE[model];
}

// ─── Reverse lookup ─────────────────────────────────────────────────────────

/**
 * Guess the data model from the byte sizes of `int`, `long` and a pointer.
 *
 * SILP64 is never returned. It shares (8, 8, 8) with ILP64 and only differs
 * in `short`, which is not part of the key.
 *
 * @example
 * ```ts
 * const model = guessDataModel(4, 8, 8); // DataModel.LP64
 * sizeOf(model, TypeCategory.Pointer);   // 8
 * ```
 */
export function guessDataModel(
  intSize: number,
  longSize: number,
  pointerSize: number
): DataModelValue {
  switch (`${intSize}/${longSize}/${pointerSize}`) {
    case "2/0/2":
      return DataModel.IP16;
    case "2/4/2":
      return DataModel.IP16L32;
    case "2/4/4":
      return DataModel.LP32;
    case "4/4/4":
      return DataModel.ILP32;
    case "4/4/8":
      return DataModel.LLP64;
    case "4/8/8":
      return DataModel.LP64;
    case "8/8/8":
      return DataModel.ILP64;
    default:
      return DataModel.Unknown;
  }
}
