import { describe, expect, it, vi } from "vitest";

import { createResultSet } from "@parqscope/parquet-reader";

import { EMPTY_QUERY_MESSAGE, runQuery } from "./query.js";
import type { QueryExecutor, QueryOutcome } from "./types.js";

function stubExecutor(outcome: QueryOutcome) {
  const execute = vi.fn<QueryExecutor["execute"]>(() => outcome);
  return { execute };
}

describe("runQuery", () => {
  it("rejects empty and blank queries without calling the executor", () => {
    const executor = stubExecutor({ ok: true, result: createResultSet([], []) });

    expect(runQuery(executor, "a.parquet", "")).toEqual({ ok: false, message: "Empty query" });
    expect(runQuery(executor, "a.parquet", "   \t")).toEqual({
      ok: false,
      message: EMPTY_QUERY_MESSAGE,
    });
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it("forwards the path and text to the executor", () => {
    const result = createResultSet(["n"], [["1"]]);
    const executor = stubExecutor({ ok: true, result });

    const outcome = runQuery(executor, "a.parquet", "select 1 as n");

    expect(executor.execute).toHaveBeenCalledWith("a.parquet", "select 1 as n");
    expect(outcome).toEqual({ ok: true, result });
  });

  it("returns executor failures verbatim", () => {
    const executor = stubExecutor({ ok: false, message: "Parser Error: syntax error at end of input" });

    expect(runQuery(executor, "a.parquet", "select")).toEqual({
      ok: false,
      message: "Parser Error: syntax error at end of input",
    });
  });
});
