import { describe, expect, test } from "vitest";
import { ALL_TYPE_CATEGORIES, TypeCategory, type TypeCategoryValue } from "../../src/models/categories.ts";
import { ALL_DATA_MODELS, DataModel, type DataModelValue } from "../../src/models/kinds.ts";
import { bitsOf, guessDataModel, sizeOf, sizesOf } from "../../src/models/registry.ts";

//                                   char short int long llong ptr
const EXPECTED_SIZES: [DataModelValue, number[]][] = [
  [DataModel.IP16,    [1, 0, 2, 0, 0, 2]],
  [DataModel.IP16L32, [1, 2, 2, 4, 0, 2]],
  [DataModel.LP32,    [1, 2, 2, 4, 8, 4]],
  [DataModel.ILP32,   [1, 2, 4, 4, 8, 4]],
  [DataModel.LLP64,   [1, 2, 4, 4, 8, 8]],
  [DataModel.LP64,    [1, 2, 4, 8, 8, 8]],
  [DataModel.ILP64,   [1, 2, 8, 8, 8, 8]],
  [DataModel.SILP64,  [1, 8, 8, 8, 8, 8]],
  [DataModel.Unknown, [0, 0, 0, 0, 0, 0]],
];

const PROMOTION_ORDER: TypeCategoryValue[] = [
  TypeCategory.Char,
  TypeCategory.Short,
  TypeCategory.Int,
  TypeCategory.Long,
  TypeCategory.LongLong,
];

describe("Registry — sizeOf", () => {
  for (const [model, sizes] of EXPECTED_SIZES) {
    test(`${model} row matches the table`, () => {
      expect(ALL_TYPE_CATEGORIES.map((c) => sizeOf(model, c))).toEqual(sizes);
    });
  }

  test("covers every model exactly once", () => {
    expect(EXPECTED_SIZES.map(([m]) => m)).toEqual([...ALL_DATA_MODELS]);
  });

  test("Unknown reports 0 for every category", () => {
    for (const category of ALL_TYPE_CATEGORIES) {
      expect(sizeOf(DataModel.Unknown, category)).toBe(0);
    }
  });

  test("IP16 has no short, long or long long", () => {
    expect(sizeOf(DataModel.IP16, TypeCategory.Short)).toBe(0);
    expect(sizeOf(DataModel.IP16, TypeCategory.Long)).toBe(0);
    expect(sizeOf(DataModel.IP16, TypeCategory.LongLong)).toBe(0);
    expect(sizeOf(DataModel.IP16L32, TypeCategory.LongLong)).toBe(0);
  });

  test("fully specified rows are non-decreasing in promotion order", () => {
    for (const model of ALL_DATA_MODELS) {
      const sizes = PROMOTION_ORDER.map((c) => sizeOf(model, c));
      if (sizes.includes(0)) continue;
      for (let i = 1; i < sizes.length; i++) {
        expect(sizes[i]).toBeGreaterThanOrEqual(sizes[i - 1] ?? 0);
      }
    }
  });

  test("repeated lookups return the same value", () => {
    const first = sizeOf(DataModel.LLP64, TypeCategory.Pointer);
    for (let i = 0; i < 5; i++) {
      expect(sizeOf(DataModel.LLP64, TypeCategory.Pointer)).toBe(first);
    }
  });

  test("bitsOf is eight times the byte size", () => {
    expect(bitsOf(DataModel.LP64, TypeCategory.Long)).toBe(64);
    expect(bitsOf(DataModel.ILP32, TypeCategory.Short)).toBe(16);
    expect(bitsOf(DataModel.IP16, TypeCategory.Long)).toBe(0);
  });

  test("sizesOf returns a frozen row", () => {
    const row = sizesOf(DataModel.SILP64);
    expect(row[TypeCategory.Short]).toBe(8);
    expect(Object.isFrozen(row)).toBe(true);
  });
});

describe("Registry — guessDataModel", () => {
  const GUESSES: [[number, number, number], DataModelValue][] = [
    [[2, 0, 2], DataModel.IP16],
    [[2, 4, 2], DataModel.IP16L32],
    [[2, 4, 4], DataModel.LP32],
    [[4, 4, 4], DataModel.ILP32],
    [[4, 4, 8], DataModel.LLP64],
    [[4, 8, 8], DataModel.LP64],
    [[8, 8, 8], DataModel.ILP64],
    [[9, 9, 9], DataModel.Unknown],
    [[0, 0, 0], DataModel.Unknown],
    [[4, 8, 4], DataModel.Unknown],
  ];

  for (const [[i, l, p], expected] of GUESSES) {
    test(`(${i}, ${l}, ${p}) → ${expected}`, () => {
      expect(guessDataModel(i, l, p)).toBe(expected);
    });
  }

  test("(8, 8, 8) never yields SILP64", () => {
    expect(guessDataModel(8, 8, 8)).not.toBe(DataModel.SILP64);
  });

  test("no triple yields SILP64", () => {
    const widths = [0, 1, 2, 4, 8, 16];
    for (const i of widths) {
      for (const l of widths) {
        for (const p of widths) {
          expect(guessDataModel(i, l, p)).not.toBe(DataModel.SILP64);
        }
      }
    }
  });

  test("every model except SILP64 and Unknown round-trips through its triple", () => {
    for (const model of ALL_DATA_MODELS) {
      if (model === DataModel.SILP64 || model === DataModel.Unknown) continue;
      const guessed = guessDataModel(
        sizeOf(model, TypeCategory.Int),
        sizeOf(model, TypeCategory.Long),
        sizeOf(model, TypeCategory.Pointer)
      );
      expect(guessed).toBe(model);
    }
  });
});

describe("Registry — end to end", () => {
  test("LP64", () => {
    const model = DataModel.LP64;
    expect(sizeOf(model, TypeCategory.Pointer)).toBe(8);
    expect(sizeOf(model, TypeCategory.Int)).toBe(4);
    expect(sizeOf(model, TypeCategory.Long)).toBe(8);
  });

  test("LLP64", () => {
    const model = DataModel.LLP64;
    expect(sizeOf(model, TypeCategory.Long)).toBe(4);
    expect(sizeOf(model, TypeCategory.Pointer)).toBe(8);
  });

  test("guessed ILP32", () => {
    const model = guessDataModel(4, 4, 4);
    expect(sizeOf(model, TypeCategory.Pointer)).toBe(4);
  });
});
