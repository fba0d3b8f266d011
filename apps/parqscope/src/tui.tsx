import { render } from "ink";
import React from "react";

import { filterRows, loadParquetFile, type ParquetFileContext } from "@parqscope/parquet-reader";
import { createQueryEngine, type QueryEngine, type QueryExecutor } from "@parqscope/sql";

import { App } from "./tui/app.js";
import type { ExplorerContext, TuiOptions } from "./tui/types.js";

export function createExplorerContext(
  filePath: string,
  file: ParquetFileContext,
  queries: QueryExecutor,
): ExplorerContext {
  return {
    filePath,
    file,
    filterRows: (query) => filterRows(file.sample, query),
    queries,
  };
}

function unavailableEngine(message: string): QueryExecutor {
  return {
    execute: () => ({ ok: false, message }),
  };
}

export async function runTui(input: string, options: TuiOptions): Promise<void> {
  const [file, engine] = await Promise.all([
    loadParquetFile(input, {
      columns: options.columns.length > 0 ? options.columns : undefined,
      sampleRows: options.sampleRows,
    }),
    createQueryEngine().then(
      (created): QueryEngine | string => created,
      (caught: unknown) => `query engine unavailable: ${caught instanceof Error ? caught.message : String(caught)}`,
    ),
  ]);

  const queries = typeof engine === "string" ? unavailableEngine(engine) : engine;
  const instance = render(<App context={createExplorerContext(input, file, queries)} />, {
    exitOnCtrlC: false,
  });

  try {
    await instance.waitUntilExit();
  } finally {
    if (typeof engine !== "string") {
      engine.close();
    }
  }
}
