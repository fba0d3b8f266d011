import type { QueryExecutor, QueryOutcome } from "./types.js";

export const EMPTY_QUERY_MESSAGE = "Empty query";

export function runQuery(executor: QueryExecutor, filePath: string, query: string): QueryOutcome {
  if (query.trim().length === 0) {
    return { ok: false, message: EMPTY_QUERY_MESSAGE };
  }

  return executor.execute(filePath, query);
}
