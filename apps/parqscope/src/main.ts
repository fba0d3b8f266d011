#!/usr/bin/env node
import path from "node:path";

import { loadParquetFile, type TabularResultSet } from "@parqscope/parquet-reader";
import { createQueryEngine, runQuery } from "@parqscope/sql";

import { DEFAULT_PLAIN_ROWS, parseArgs, shouldOpenTui, usage, type CliOptions } from "./cli.js";
import { formatFileHeader, formatSchemaListing, renderTable, toJsonLines } from "./output.js";

function writeRows(data: TabularResultSet, json: boolean): void {
  if (json) {
    for (const line of toJsonLines(data)) {
      process.stdout.write(`${line}\n`);
    }
    return;
  }

  process.stdout.write(`${renderTable(data, process.stdout.columns || 120)}\n`);
}

async function runSql(input: string, sql: string, options: CliOptions): Promise<void> {
  const engine = await createQueryEngine();
  try {
    const outcome = runQuery(engine, input, sql);
    if (!outcome.ok) {
      throw new Error(outcome.message);
    }
    writeRows(outcome.result, options.json);
  } finally {
    engine.close();
  }
}

async function runPlain(input: string, options: CliOptions): Promise<void> {
  const file = await loadParquetFile(input, {
    columns: options.columns.length > 0 ? options.columns : undefined,
    sampleRows: options.schemaOnly ? 0 : (options.sampleRows ?? DEFAULT_PLAIN_ROWS),
  });

  if (!options.json && (options.showSchema || options.schemaOnly)) {
    process.stdout.write(`${formatFileHeader(file, path.basename(input))}\n`);
    process.stdout.write(`${formatSchemaListing(file.schema)}\n`);
  }

  if (options.schemaOnly) {
    return;
  }

  writeRows(file.sample, options.json);
}

async function main(): Promise<void> {
  const { input, options, help, error } = parseArgs(process.argv.slice(2));

  if (help) {
    process.stdout.write(usage());
    return;
  }

  if (error) {
    process.stderr.write(`parqscope: ${error}\n`);
    process.stdout.write(usage());
    process.exitCode = 1;
    return;
  }

  if (!input) {
    process.stderr.write("parqscope: missing input file (pass a path or URL)\n");
    process.exitCode = 1;
    return;
  }

  if (options.sql !== undefined) {
    await runSql(input, options.sql, options);
    return;
  }

  const interactive = Boolean(process.stdin.isTTY && process.stdout.isTTY);
  if (shouldOpenTui(options, interactive)) {
    if (!interactive) {
      process.stderr.write("parqscope: explorer requires a tty, falling back to plain output\n");
    } else {
      const { runTui } = await import("./tui.js");
      await runTui(input, { columns: options.columns, sampleRows: options.sampleRows });
      return;
    }
  }

  await runPlain(input, options);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`parqscope: ${message}\n`);
  process.exitCode = 1;
});
