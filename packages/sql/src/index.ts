export { createQueryEngine } from "./engine.js";
export type { QueryEngine } from "./engine.js";
export { normalizeQueryRows, tableToResultSet } from "./normalize.js";
export { EMPTY_QUERY_MESSAGE, runQuery } from "./query.js";
export type { QueryExecutor, QueryOutcome } from "./types.js";
