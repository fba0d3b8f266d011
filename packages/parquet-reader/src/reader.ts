import { Buffer } from "node:buffer";

import type { AsyncBuffer, FileMetaData } from "hyparquet";
import {
  asyncBufferFromFile,
  asyncBufferFromUrl,
  parquetMetadataAsync,
  parquetReadObjects,
  parquetSchema,
} from "hyparquet";
import { compressors } from "hyparquet-compressors";

import { formatCellValue } from "./formatting.js";
import { resultSetFromRecords } from "./result-set.js";
import type {
  ColumnChunkInfo,
  ColumnStatistics,
  FileOverview,
  ParquetFileContext,
  ParquetReadOptions,
  ParquetRow,
  RowGroupInfo,
  RowGroupStats,
  SchemaLine,
} from "./types.js";
import { resolveParquetUrl } from "./urls.js";

export const DEFAULT_SAMPLE_ROWS = 1000;

// Structural views of the decoded footer; hyparquet's own types satisfy them.
export type SchemaElementInput = {
  name: string;
  type?: string;
  repetition_type?: string;
  converted_type?: string;
  logical_type?: unknown;
  num_children?: number;
  type_length?: number;
  precision?: number;
  scale?: number;
};

export type SchemaNodeInput = {
  element: SchemaElementInput;
  children: SchemaNodeInput[];
  path: string[];
};

export type StatisticsInput = {
  min?: unknown;
  max?: unknown;
  min_value?: unknown;
  max_value?: unknown;
  null_count?: unknown;
  distinct_count?: unknown;
};

export type ColumnMetaInput = {
  type?: string;
  encodings?: string[];
  path_in_schema?: string[];
  codec?: string;
  num_values?: unknown;
  total_uncompressed_size?: unknown;
  total_compressed_size?: unknown;
  data_page_offset?: unknown;
  dictionary_page_offset?: unknown;
  statistics?: StatisticsInput;
};

export type RowGroupInput = {
  num_rows?: unknown;
  total_byte_size?: unknown;
  total_compressed_size?: unknown;
  columns: Array<{ meta_data?: ColumnMetaInput }>;
};

export type FileMetaInput = {
  version?: number;
  created_by?: string;
  num_rows?: unknown;
  key_value_metadata?: Array<{ key: string; value?: string }>;
  row_groups?: RowGroupInput[];
};

export async function openParquetFile(input: string): Promise<AsyncBuffer> {
  const resolved = resolveParquetUrl(input);
  if (resolved) {
    return asyncBufferFromUrl({ url: resolved.url });
  }

  return asyncBufferFromFile(input);
}

/**
 * Read everything the explorer needs from a parquet file up front: the footer
 * metadata, the flattened schema, per row group column chunk details and a
 * sample of the first rows.
 */
export async function loadParquetFile(
  input: string,
  options: ParquetReadOptions = {},
): Promise<ParquetFileContext> {
  const file = await openParquetFile(input);
  const metadata = await parquetMetadataAsync(file);
  const tree = parquetSchema(metadata);
  const schema = buildSchemaLines(tree);
  const rowGroups = buildRowGroups(metadata.row_groups);

  const available = tree.children.map((child) => child.element.name);
  const columns = resolveColumns(available, options.columns ?? []);
  const sampleRows = Math.max(0, options.sampleRows ?? DEFAULT_SAMPLE_ROWS);
  const records = await readSampleRecords(file, metadata, columns, sampleRows);

  return {
    overview: buildOverview(input, metadata, schema, rowGroups),
    schema,
    rowGroups,
    rowGroupStats: summarizeRowGroups(rowGroups),
    sample: resultSetFromRecords(records, columns),
  };
}

async function readSampleRecords(
  file: AsyncBuffer,
  metadata: FileMetaData,
  columns: string[],
  sampleRows: number,
): Promise<ParquetRow[]> {
  const totalRows = Number(normalizeBigInt(metadata.num_rows) ?? 0n);
  const rowEnd = Math.min(totalRows, sampleRows);
  if (rowEnd <= 0) {
    return [];
  }

  return parquetReadObjects({
    file,
    metadata,
    columns,
    rowStart: 0,
    rowEnd,
    compressors,
  });
}

export function resolveColumns(available: string[], requested: string[]): string[] {
  if (requested.length === 0) {
    return available;
  }

  const known = new Set(available);
  const missing = requested.filter((name) => !known.has(name));
  if (missing.length > 0) {
    throw new Error(`unknown columns: ${missing.join(", ")}`);
  }

  return requested;
}

export function buildOverview(
  path: string,
  metadata: FileMetaInput,
  schema: SchemaLine[],
  rowGroups: RowGroupInfo[],
): FileOverview {
  return {
    path,
    version: metadata.version,
    createdBy: metadata.created_by,
    rowCount: normalizeBigInt(metadata.num_rows) ?? 0n,
    rowGroupCount: rowGroups.length,
    columnCount: schema.filter((line) => line.kind === "primitive").length,
    compressedBytes: rowGroups.reduce((sum, rowGroup) => sum + rowGroup.compressedBytes, 0n),
    uncompressedBytes: rowGroups.reduce((sum, rowGroup) => sum + rowGroup.uncompressedBytes, 0n),
    keyValueMetadata: normalizeKeyValueMetadata(metadata.key_value_metadata),
  };
}

export function buildSchemaLines(root: SchemaNodeInput): SchemaLine[] {
  const lines: SchemaLine[] = [];

  const visit = (node: SchemaNodeInput, depth: number) => {
    const element = node.element;
    const repetition = element.repetition_type ?? "REQUIRED";
    const logicalType = formatLogicalType(element.logical_type) ?? element.converted_type;

    if (node.children.length > 0 || element.num_children) {
      lines.push({
        kind: "group",
        name: element.name,
        depth,
        path: node.path,
        repetition,
        logicalType,
        childCount: node.children.length,
      });
      for (const child of node.children) {
        visit(child, depth + 1);
      }
      return;
    }

    lines.push({
      kind: "primitive",
      name: element.name,
      depth,
      path: node.path,
      repetition,
      physicalType: element.type ?? "UNKNOWN",
      logicalType,
      typeLength: element.type_length,
      precision: element.precision,
      scale: element.scale,
    });
  };

  for (const child of root.children) {
    visit(child, 0);
  }

  return lines;
}

export function buildRowGroups(rowGroups: RowGroupInput[] | undefined): RowGroupInfo[] {
  return (rowGroups ?? []).map((rowGroup, index) => {
    const columns = rowGroup.columns
      .map((chunk) => (chunk.meta_data ? buildColumnChunk(chunk.meta_data) : null))
      .filter((chunk): chunk is ColumnChunkInfo => chunk !== null);
    const fromColumns = columns.reduce((sum, chunk) => sum + chunk.compressedBytes, 0n);

    return {
      index,
      numRows: normalizeBigInt(rowGroup.num_rows) ?? 0n,
      compressedBytes: normalizeBigInt(rowGroup.total_compressed_size) ?? fromColumns,
      uncompressedBytes:
        normalizeBigInt(rowGroup.total_byte_size) ??
        columns.reduce((sum, chunk) => sum + chunk.uncompressedBytes, 0n),
      columns,
    };
  });
}

function buildColumnChunk(meta: ColumnMetaInput): ColumnChunkInfo {
  const path = meta.path_in_schema ?? [];

  return {
    path: path.length > 0 ? path.join(".") : "(unknown)",
    physicalType: meta.type ?? "UNKNOWN",
    codec: meta.codec ?? "UNCOMPRESSED",
    encodings: meta.encodings ?? [],
    numValues: normalizeBigInt(meta.num_values) ?? 0n,
    compressedBytes: normalizeBigInt(meta.total_compressed_size) ?? 0n,
    uncompressedBytes: normalizeBigInt(meta.total_uncompressed_size) ?? 0n,
    dataPageOffset: normalizeBigInt(meta.data_page_offset) ?? 0n,
    dictionaryPageOffset: normalizeBigInt(meta.dictionary_page_offset),
    statistics: meta.statistics ? buildStatistics(meta.statistics) : null,
  };
}

function buildStatistics(stats: StatisticsInput): ColumnStatistics {
  return {
    min: formatStatValue(stats.min_value ?? stats.min),
    max: formatStatValue(stats.max_value ?? stats.max),
    nullCount: normalizeBigInt(stats.null_count),
    distinctCount: normalizeBigInt(stats.distinct_count),
  };
}

function formatStatValue(value: unknown): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString("utf8");
  }

  return formatCellValue(value);
}

export function summarizeRowGroups(rowGroups: RowGroupInfo[]): RowGroupStats {
  const rows = rowGroups.map((rowGroup) => Number(rowGroup.numRows));
  const bytes = rowGroups.map((rowGroup) => Number(rowGroup.compressedBytes));

  return {
    averageRows: average(rows),
    medianRows: median(rows),
    averageCompressedBytes: average(bytes),
    medianCompressedBytes: median(bytes),
  };
}

function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function median(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((left, right) => left - right);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[middle - 1] + sorted[middle]) / 2;
  }
  return sorted[middle];
}

function formatLogicalType(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }

  if (value && typeof value === "object" && "type" in value && typeof value.type === "string") {
    return value.type;
  }

  return undefined;
}

function normalizeKeyValueMetadata(
  input: FileMetaInput["key_value_metadata"],
): Record<string, string> {
  const normalized: Record<string, string> = {};

  if (!input) {
    return normalized;
  }

  for (const entry of input) {
    if (!entry || typeof entry.key !== "string") {
      continue;
    }
    normalized[entry.key] = entry.value ?? "";
  }

  return normalized;
}

function normalizeBigInt(value: unknown): bigint | undefined {
  if (typeof value === "bigint") {
    if (value < 0n) {
      return 0n;
    }
    return value;
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return BigInt(Math.max(0, Math.trunc(value)));
  }

  return undefined;
}
