import type { TabularResultSet } from "@parqscope/parquet-reader";

export type QueryOutcome =
  | { ok: true; result: TabularResultSet }
  | { ok: false; message: string };

export type QueryExecutor = {
  execute: (filePath: string, query: string) => QueryOutcome;
};
