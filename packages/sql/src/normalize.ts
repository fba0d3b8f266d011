import type { Table } from "apache-arrow";

import { createResultSet, formatCellValue } from "@parqscope/parquet-reader";
import type { TabularResultSet } from "@parqscope/parquet-reader";

export function normalizeQueryRows(
  columns: readonly string[],
  rows: ReadonlyArray<readonly unknown[]>,
): TabularResultSet {
  return createResultSet(
    columns,
    rows.map((row) => row.map((value) => formatCellValue(value))),
  );
}

export function tableToResultSet(table: Table): TabularResultSet {
  const fields = table.schema.fields.map((field) => field.name);
  const rows: unknown[][] = [];

  for (const batch of table.batches) {
    const vectors = fields.map((_, index) => batch.getChildAt(index));

    for (let rowIndex = 0; rowIndex < batch.numRows; rowIndex += 1) {
      rows.push(vectors.map((vector) => vector?.get(rowIndex)));
    }
  }

  return normalizeQueryRows(fields, rows);
}
