/**
 * Plain-text rendering of the size table and model details.
 */

import { ALL_TYPE_CATEGORIES, cTypeName } from "../models/categories.ts";
import { describeDataModel } from "../models/descriptions.ts";
import type { DataModelValue } from "../models/kinds.ts";
import { bitsOf, sizeOf } from "../models/registry.ts";

/** Left-aligned columns separated by two spaces, trailing blanks trimmed. */
function renderColumns(rows: readonly string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => cell.padEnd(widths[i] ?? 0))
      .join("  ")
      .trimEnd()
  );
}

export function formatSizeTable(models: readonly DataModelValue[]): string[] {
  const header = ["model", ...ALL_TYPE_CATEGORIES.map(cTypeName)];
  const rows = models.map((model) => [
    model,
    ...ALL_TYPE_CATEGORIES.map((c) => String(sizeOf(model, c))),
  ]);
  return renderColumns([header, ...rows]);
}

export function formatModelDetails(model: DataModelValue): string[] {
  const { summary, platforms } = describeDataModel(model);
  const lines = [
    `${model}: ${summary}`,
    `platforms: ${platforms.length > 0 ? platforms.join(", ") : "(none)"}`,
  ];
  const sizes = renderColumns(
    ALL_TYPE_CATEGORIES.map((c) => {
      const size = sizeOf(model, c);
      const value = size === 0 ? "unspecified" : `${size} (${bitsOf(model, c)} bits)`;
      return [`  ${cTypeName(c)}`, value];
    })
  );
  return [...lines, ...sizes];
}
