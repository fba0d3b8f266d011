import type { TabularResultSet } from "@parqscope/parquet-reader";

import { DEFAULT_COLUMN_WIDTH, MAX_COLUMN_WIDTH } from "./constants.js";
import type { ViewId } from "./types.js";

export type TableLineOptions = {
  scroll: number;
  capacity: number;
  columnOffset: number;
  width: number;
};

export type TableLines = {
  header: string;
  separator: string;
  rows: string[];
};

export function clampNumber(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}

export function formatBigInt(value: bigint): string {
  return value.toLocaleString("en-US");
}

export function formatBytes(input: bigint | number): string {
  const bytes = typeof input === "bigint" ? input : BigInt(Math.max(0, Math.round(input)));
  if (bytes < 0n) return "0 B";
  if (bytes < 1024n) return `${bytes} B`;
  if (bytes < 1024n * 1024n) {
    const kb = Number(bytes * 10n / 1024n) / 10;
    return `${kb.toFixed(1)} KB`;
  }
  if (bytes < 1024n * 1024n * 1024n) {
    const mb = Number(bytes * 10n / (1024n * 1024n)) / 10;
    return `${mb.toFixed(1)} MB`;
  }
  const gb = Number(bytes * 10n / (1024n * 1024n * 1024n)) / 10;
  return `${gb.toFixed(1)} GB`;
}

export function formatRatio(uncompressed: bigint, compressed: bigint): string {
  if (compressed <= 0n) {
    return "n/a";
  }
  const hundredths = Number((uncompressed * 100n) / compressed);
  return `${(hundredths / 100).toFixed(2)}x`;
}

export function padCell(value: string, width: number): string {
  const normalized = normalizeCell(value);
  if (normalized.length > width) {
    if (width <= 3) {
      return normalized.slice(0, width);
    }
    return `${normalized.slice(0, width - 3)}...`;
  }
  return normalized.padEnd(width, " ");
}

export function normalizeCell(value: string): string {
  return value.replace(/\r?\n/g, "\\n").replace(/\t/g, "\\t");
}

export function fitLine(line: string, width: number): string {
  if (width <= 0) {
    return "";
  }
  return line.slice(0, width).padEnd(width, " ");
}

/**
 * Lay out the visible window of a result set as fixed-width text lines.
 * Columns before `columnOffset` are scrolled out; the row number column
 * always stays.
 */
export function buildTableLines(data: TabularResultSet, options: TableLineOptions): TableLines {
  const { scroll, capacity, columnOffset, width } = options;
  const windowRows = data.rows.slice(scroll, scroll + capacity);
  const columnIndexes = data.columns.map((_, index) => index).slice(columnOffset);

  const rowNumberWidth = Math.max(String(scroll + windowRows.length).length, 3);
  const columnWidths = columnIndexes.map((columnIndex) => {
    const longestCell = windowRows.reduce(
      (max, row) => Math.max(max, normalizeCell(row[columnIndex] ?? "").length),
      data.columns[columnIndex].length,
    );
    return Math.min(Math.max(longestCell, DEFAULT_COLUMN_WIDTH), MAX_COLUMN_WIDTH);
  });
  const widths = [rowNumberWidth, ...columnWidths];

  const header = buildLine(["#", ...columnIndexes.map((index) => data.columns[index])], widths);
  const separator = widths.map((cellWidth) => "─".repeat(cellWidth)).join("  ");
  const rows = windowRows.map((row, offset) =>
    buildLine(
      [String(scroll + offset + 1), ...columnIndexes.map((index) => row[index] ?? "")],
      widths,
    ),
  );

  return {
    header: fitLine(header, width),
    separator: fitLine(separator, width),
    rows: rows.map((line) => fitLine(line, width)),
  };
}

function buildLine(values: string[], widths: number[]): string {
  return values
    .map((value, index) => {
      const width = widths[index] ?? DEFAULT_COLUMN_WIDTH;
      return padCell(value, width);
    })
    .join("  ");
}

export function cycleView(current: ViewId, order: readonly ViewId[], direction: 1 | -1): ViewId {
  const index = order.indexOf(current);
  const startIndex = index >= 0 ? index : 0;
  const nextIndex = (startIndex + direction + order.length) % order.length;
  return order[nextIndex];
}

export function getViewFromKeyName(name: string, order: readonly ViewId[]): ViewId | null {
  const position = Number.parseInt(name, 10);
  if (name.length !== 1 || !Number.isInteger(position) || position < 1) {
    return null;
  }
  return order[position - 1] ?? null;
}
