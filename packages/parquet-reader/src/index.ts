export {
  DEFAULT_SAMPLE_ROWS,
  buildOverview,
  buildRowGroups,
  buildSchemaLines,
  loadParquetFile,
  openParquetFile,
  resolveColumns,
  summarizeRowGroups,
} from "./reader.js";
export { NULL_CELL, formatCellValue, safeStringify } from "./formatting.js";
export { createResultSet, filterRows, resultSetFromRecords } from "./result-set.js";
export { isRemoteInput, resolveParquetUrl } from "./urls.js";
export type { ResolvedParquetUrl } from "./urls.js";
export type * from "./types.js";
