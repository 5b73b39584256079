/**
 * Utility exports
 */

// Naming
export { abbreviateNames } from "./abbreviate-names";

// Id maps
export {
  buildIdMap,
  serializeIdMap,
  parseIdMap,
  toLookup,
  createMissingPredicate,
  ID_COLUMN,
  MISSING_SENTINEL,
} from "./id-map";
export type { MissingPredicate } from "./id-map";

// Tables
export {
  parseRecords,
  parseTable,
  serializeRecords,
  serializeTable,
  readText,
  readTable,
} from "./table-io";
export type { ParsedTable } from "./table-io";

// Filesystem utilities
export { fileExists, writeFileAtomic, removeFile } from "./fs";
export { FileTarget } from "./file-target";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export { createContext } from "./create-context";

// Errors
export {
  RemapError,
  InputError,
  ReadError,
  ColumnNotFoundError,
  RowAlignmentError,
  MappingCoverageError,
  UnmappedValueError,
  NamingError,
  GraphError,
  isNotFoundError,
} from "./errors";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
