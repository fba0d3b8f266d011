import type { ColumnChunkInfo, FileOverview, RowGroupInfo, RowGroupStats } from "@parqscope/parquet-reader";

import { formatBigInt, formatBytes, formatRatio } from "./utils.js";

export type DetailRow = [label: string, value: string];

export function describeOverview(overview: FileOverview): DetailRow[] {
  const rows: DetailRow[] = [
    ["path", overview.path],
    ["format version", overview.version === undefined ? "unknown" : String(overview.version)],
    ["created by", overview.createdBy ?? "unknown"],
    ["rows", formatBigInt(overview.rowCount)],
    ["row groups", String(overview.rowGroupCount)],
    ["columns", String(overview.columnCount)],
    ["compressed size", formatBytes(overview.compressedBytes)],
    ["uncompressed size", formatBytes(overview.uncompressedBytes)],
    ["compression ratio", formatRatio(overview.uncompressedBytes, overview.compressedBytes)],
  ];
  return rows;
}

export function describeKeyValueMetadata(overview: FileOverview): DetailRow[] {
  return Object.entries(overview.keyValueMetadata).map(([key, value]) => [key, value]);
}

export function describeRowGroupStats(stats: RowGroupStats, groups: readonly RowGroupInfo[]): DetailRow[] {
  return [
    ["row groups", String(groups.length)],
    ["average rows", stats.averageRows.toFixed(1)],
    ["median rows", stats.medianRows.toFixed(1)],
    ["average compressed", formatBytes(stats.averageCompressedBytes)],
    ["median compressed", formatBytes(stats.medianCompressedBytes)],
  ];
}

export function describeRowGroup(group: RowGroupInfo): DetailRow[] {
  return [
    ["rows", formatBigInt(group.numRows)],
    ["columns", String(group.columns.length)],
    ["compressed", formatBytes(group.compressedBytes)],
    ["uncompressed", formatBytes(group.uncompressedBytes)],
    ["compression ratio", formatRatio(group.uncompressedBytes, group.compressedBytes)],
  ];
}

export function describeColumnChunk(chunk: ColumnChunkInfo): DetailRow[] {
  const rows: DetailRow[] = [
    ["path", chunk.path],
    ["physical type", chunk.physicalType],
    ["codec", chunk.codec],
    ["encodings", chunk.encodings.join(", ")],
    ["values", formatBigInt(chunk.numValues)],
    ["compressed", formatBytes(chunk.compressedBytes)],
    ["uncompressed", formatBytes(chunk.uncompressedBytes)],
    ["data page offset", formatBigInt(chunk.dataPageOffset)],
  ];
  if (chunk.dictionaryPageOffset !== undefined) {
    rows.push(["dictionary page offset", formatBigInt(chunk.dictionaryPageOffset)]);
  }

  const stats = chunk.statistics;
  if (stats === null) {
    rows.push(["statistics", "none"]);
    return rows;
  }
  if (stats.min !== undefined) rows.push(["min", stats.min]);
  if (stats.max !== undefined) rows.push(["max", stats.max]);
  if (stats.nullCount !== undefined) rows.push(["null count", formatBigInt(stats.nullCount)]);
  if (stats.distinctCount !== undefined) rows.push(["distinct count", formatBigInt(stats.distinctCount)]);
  return rows;
}
