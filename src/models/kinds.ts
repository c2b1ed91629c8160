// ─── Data Model Constants ───────────────────────────────────────────────────

/**
 * Named conventions for the widths of C integer types. The name spells which
 * types share the trailing width: ILP32 means (I)nt, (L)ong and (P)ointer are
 * 32 bits. The scheme is not applied consistently across models.
 */
export const DataModel = {
  IP16: "IP16",
  IP16L32: "IP16L32",
  LP32: "LP32",
  ILP32: "ILP32",
  LLP64: "LLP64",
  LP64: "LP64",
  ILP64: "ILP64",
  SILP64: "SILP64",
  Unknown: "Unknown",
} as const;

export type DataModelValue = (typeof DataModel)[keyof typeof DataModel];

/** All nine data models in declaration order, `Unknown` last. */
export const ALL_DATA_MODELS: readonly DataModelValue[] = Object.freeze([
  DataModel.IP16,
  DataModel.IP16L32,
  DataModel.LP32,
  DataModel.ILP32,
  DataModel.LLP64,
  DataModel.LP64,
  DataModel.ILP64,
  DataModel.SILP64,
  DataModel.Unknown,
]);

export function isKnownDataModel(model: DataModelValue): boolean {
  return model !== DataModel.Unknown;
}
