import { formatCellValue } from "./formatting.js";
import type { ParquetRow, TabularResultSet } from "./types.js";

export function createResultSet(
  columns: readonly string[],
  rows: ReadonlyArray<readonly string[]>,
): TabularResultSet {
  rows.forEach((row, index) => {
    if (row.length !== columns.length) {
      throw new Error(
        `row ${index} has ${row.length} cells, expected ${columns.length}`,
      );
    }
  });

  return Object.freeze({
    columns: Object.freeze([...columns]),
    rows: Object.freeze(rows.map((row) => Object.freeze([...row]))),
    rowCount: rows.length,
    columnCount: columns.length,
  });
}

export function resultSetFromRecords(
  records: readonly ParquetRow[],
  columns: readonly string[],
): TabularResultSet {
  const rows = records.map((record) => columns.map((name) => formatCellValue(record[name])));
  return createResultSet(columns, rows);
}

// Rows match when the needle appears anywhere in their space-joined cells.
export function filterRows(source: TabularResultSet, query: string): TabularResultSet {
  const needle = query.toLowerCase();
  const matching = source.rows.filter((row) => row.join(" ").toLowerCase().includes(needle));
  return createResultSet(source.columns, matching);
}
