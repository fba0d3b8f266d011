import type { ParquetFileContext, SchemaLine, TabularResultSet } from "@parqscope/parquet-reader";
import CliTable3 from "cli-table3";

const MIN_COLUMN_WIDTH = 6;
const MAX_COLUMN_WIDTH = 60;

export function formatSchemaListing(schema: readonly SchemaLine[]): string {
  return schema
    .map((line) => {
      const indent = "  ".repeat(line.depth);
      const logical = line.logicalType ? ` (${line.logicalType})` : "";
      const type = line.kind === "group" ? "group" : line.physicalType;
      return `${indent}${line.name}: ${type}${logical} ${line.repetition.toLowerCase()}`;
    })
    .join("\n");
}

export function formatFileHeader(file: ParquetFileContext, title: string): string {
  const { overview, sample } = file;
  return [
    `file: ${title}`,
    `rows: ${overview.rowCount} (${sample.rowCount} loaded)`,
    `row groups: ${overview.rowGroupCount}`,
    "schema:",
  ].join("\n");
}

export function truncateCell(value: string, maxWidth: number): string {
  const oneLine = value.replace(/\n/g, " ");
  if (oneLine.length <= maxWidth) {
    return oneLine;
  }
  return oneLine.slice(0, maxWidth - 3) + "...";
}

/** Render a result set as a bordered table scaled to the terminal width. */
export function renderTable(data: TabularResultSet, termWidth: number): string {
  if (data.rowCount === 0) {
    return "(no rows)";
  }

  const numCols = data.columnCount;
  // │ col │ col │ = 1 + (3 * numCols)
  const borderOverhead = 1 + 3 * numCols;
  const availableWidth = Math.max(termWidth - borderOverhead, numCols * MIN_COLUMN_WIDTH);

  const idealWidths = data.columns.map((name, index) => {
    const maxContent = data.rows.reduce(
      (max, row) => Math.max(max, (row[index] ?? "").replace(/\n/g, " ").length),
      0,
    );
    return Math.min(MAX_COLUMN_WIDTH, Math.max(name.length, maxContent));
  });

  const totalIdeal = idealWidths.reduce((sum, width) => sum + width, 0);
  const scale = totalIdeal > 0 ? Math.min(1, availableWidth / totalIdeal) : 1;
  const colWidths = idealWidths.map((ideal) => Math.max(MIN_COLUMN_WIDTH, Math.floor(ideal * scale)));

  const table = new CliTable3({
    head: data.columns.map((name, index) => truncateCell(name, colWidths[index])),
    style: { head: [], border: [] },
    colWidths: colWidths.map((width) => width + 2),
    wordWrap: false,
  });

  for (const row of data.rows) {
    table.push(row.map((cell, index) => truncateCell(cell, colWidths[index])));
  }

  return table.toString();
}

export function toJsonLines(data: TabularResultSet): string[] {
  return data.rows.map((row) => {
    const record: Record<string, string> = {};
    data.columns.forEach((name, index) => {
      record[name] = row[index] ?? "";
    });
    return JSON.stringify(record);
  });
}
