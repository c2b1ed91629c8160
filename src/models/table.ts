/**
 * Byte sizes of each type category under each data model.
 *
 * Rows are written out per model rather than computed: the conventions are
 * irregular, and several models differ from a neighbour in a single column.
 * A `0` means the type does not exist or has no specified size in that model.
 */

import { TypeCategory, type TypeCategoryValue } from "./categories.ts";
import { DataModel, type DataModelValue } from "./kinds.ts";

export type SizeRow = Readonly<Record<TypeCategoryValue, number>>;

function row(
  char: number,
  short: number,
  int: number,
  long: number,
  longLong: number,
  pointer: number
): SizeRow {
  return Object.freeze({
    [TypeCategory.Char]: char,
    [TypeCategory.Short]: short,
    [TypeCategory.Int]: int,
    [TypeCategory.Long]: long,
    [TypeCategory.LongLong]: longLong,
    [TypeCategory.Pointer]: pointer,
  });
}

// ─── Size Table ─────────────────────────────────────────────────────────────

export const SIZE_TABLE: Readonly<Record<DataModelValue, SizeRow>> = Object.freeze({
  //                          char short int long llong ptr
  [DataModel.IP16]:     row(1,   0,    2,  0,   0,    2), // 16-bit PDP-11
  [DataModel.IP16L32]:  row(1,   2,    2,  4,   0,    2), // 32-bit PDP-11
  [DataModel.LP32]:     row(1,   2,    2,  4,   8,    4), // m68k Mac, Win16
  [DataModel.ILP32]:    row(1,   2,    4,  4,   8,    4), // Win32, older Unix
  [DataModel.LLP64]:    row(1,   2,    4,  4,   8,    8), // Win64
  [DataModel.LP64]:     row(1,   2,    4,  8,   8,    8), // Linux, macOS
  [DataModel.ILP64]:    row(1,   2,    8,  8,   8,    8), // HAL/Fujitsu SPARC64
  [DataModel.SILP64]:   row(1,   8,    8,  8,   8,    8), // Cray UNICOS
  [DataModel.Unknown]:  row(0,   0,    0,  0,   0,    0),
});
