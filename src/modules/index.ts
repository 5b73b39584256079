/**
 * Pipeline modules export
 */

export { SourceTable } from "./source-table";
export { TableTransform } from "./table-transform";
export { ColumnIdMapper } from "./id-mapper";
export { ValueSubber, ROW_INDEX_COLUMN } from "./value-subber";
export { ColumnReplacer } from "./column-replacer";
export { Mapper } from "./mapper";
export { execute, planGraph } from "./scheduler";
export { stats } from "./stats";

export type { SourceTableOptions } from "./source-table";
export type { TableTransformOptions } from "./table-transform";
export type { ValueSubberOptions } from "./value-subber";
export type { ColumnReplacerOptions } from "./column-replacer";
export type { MapperOptions } from "./mapper";
