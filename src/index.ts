export { emitFixedWidthCType, emitStaticAsserts } from "./backend/c-types.ts";
export { type CliIo, runCli } from "./cli/run.ts";
export { type Diagnostic, formatDiagnostic, Severity } from "./errors/index.ts";
export {
  ALL_TYPE_CATEGORIES,
  CHAR_BIT,
  cTypeName,
  TYPE_CATEGORY_INFO,
  TypeCategory,
  type TypeCategoryInfo,
  type TypeCategoryValue,
} from "./models/categories.ts";
export {
  checkStandardMinimums,
  type DataModelDescription,
  describeDataModel,
} from "./models/descriptions.ts";
export {
  ALL_DATA_MODELS,
  DataModel,
  type DataModelValue,
  isKnownDataModel,
} from "./models/kinds.ts";
export { parseDataModel, parseTypeCategory } from "./models/parse.ts";
export { bitsOf, guessDataModel, sizeOf, sizesOf } from "./models/registry.ts";
export { SIZE_TABLE, type SizeRow } from "./models/table.ts";
