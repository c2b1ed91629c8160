/**
 * Human-readable background for each data model, and a check of a model's
 * sizes against the minimum widths the C standard requires.
 */

import type { Diagnostic } from "../errors/index.ts";
import { warning } from "../errors/index.ts";
import { ALL_TYPE_CATEGORIES, TYPE_CATEGORY_INFO } from "./categories.ts";
import { DataModel, type DataModelValue } from "./kinds.ts";
import { bitsOf } from "./registry.ts";

export interface DataModelDescription {
  name: DataModelValue;
  summary: string;
  /** Platforms or ABIs known to have used the model. */
  platforms: readonly string[];
}

const DESCRIPTIONS: Readonly<Record<DataModelValue, Omit<DataModelDescription, "name">>> = {
  [DataModel.IP16]: {
    summary: "16-bit int and pointer",
    platforms: ["16-bit PDP-11"],
  },
  [DataModel.IP16L32]: {
    summary: "16-bit int and pointer, 32-bit long",
    platforms: ["32-bit PDP-11"],
  },
  [DataModel.LP32]: {
    summary: "16-bit int, 32-bit long and pointer",
    platforms: ["m68k Macintosh", "Win16 API"],
  },
  [DataModel.ILP32]: {
    summary: "32-bit int, long and pointer",
    platforms: ["Win32 API", "Unix and Unix-like systems before the mid-1990s"],
  },
  [DataModel.LLP64]: {
    summary: "32-bit int and long, 64-bit pointer",
    platforms: ["Win64 API"],
  },
  [DataModel.LP64]: {
    summary: "32-bit int, 64-bit long and pointer",
    platforms: ["Unix and Unix-like systems after the 1990s", "Linux", "macOS"],
  },
  [DataModel.ILP64]: {
    summary: "64-bit int, long and pointer",
    platforms: ["HAL/Fujitsu SPARC64"],
  },
  [DataModel.SILP64]: {
    summary: "64-bit short, int, long and pointer",
    platforms: ["Cray UNICOS"],
  },
  [DataModel.Unknown]: {
    summary: "data model could not be determined",
    platforms: [],
  },
};

export function describeDataModel(model: DataModelValue): DataModelDescription {
  return { name: model, ...DESCRIPTIONS[model] };
}

/** One warning per category whose non-zero width is below the C minimum. */
export function checkStandardMinimums(model: DataModelValue): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const category of ALL_TYPE_CATEGORIES) {
    const bits = bitsOf(model, category);
    if (bits === 0) continue;
    const { cName, minBits } = TYPE_CATEGORY_INFO[category];
    if (bits < minBits) {
      diagnostics.push(
        warning(`${model}: '${cName}' is ${bits} bits, below the required minimum of ${minBits}`)
      );
    }
  }
  return diagnostics;
}
