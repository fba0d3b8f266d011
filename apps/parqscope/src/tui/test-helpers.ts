import {
  createResultSet,
  filterRows,
  type ColumnChunkInfo,
  type ParquetFileContext,
  type RowGroupInfo,
  type SchemaLine,
} from "@parqscope/parquet-reader";
import type { QueryExecutor } from "@parqscope/sql";

import type { ExplorerContext } from "./types.js";

export const TEST_SCHEMA: SchemaLine[] = [
  { kind: "primitive", name: "id", depth: 0, path: ["id"], repetition: "REQUIRED", physicalType: "INT64" },
  {
    kind: "primitive",
    name: "name",
    depth: 0,
    path: ["name"],
    repetition: "OPTIONAL",
    physicalType: "BYTE_ARRAY",
    logicalType: "STRING",
  },
  { kind: "group", name: "address", depth: 0, path: ["address"], repetition: "OPTIONAL", childCount: 2 },
  {
    kind: "primitive",
    name: "city",
    depth: 1,
    path: ["address", "city"],
    repetition: "OPTIONAL",
    physicalType: "BYTE_ARRAY",
    logicalType: "STRING",
  },
  {
    kind: "primitive",
    name: "zip",
    depth: 1,
    path: ["address", "zip"],
    repetition: "OPTIONAL",
    physicalType: "INT32",
  },
];

function chunk(path: string, compressedBytes: bigint): ColumnChunkInfo {
  return {
    path,
    physicalType: "INT64",
    codec: "SNAPPY",
    encodings: ["PLAIN"],
    numValues: 10n,
    compressedBytes,
    uncompressedBytes: compressedBytes * 2n,
    dataPageOffset: 4n,
    statistics: null,
  };
}

function rowGroup(index: number, columnCount: number): RowGroupInfo {
  const columns = Array.from({ length: columnCount }, (_, column) => chunk(`col_${column}`, 100n));
  return {
    index,
    numRows: 10n,
    compressedBytes: BigInt(columnCount) * 100n,
    uncompressedBytes: BigInt(columnCount) * 200n,
    columns,
  };
}

export function createTestFile(rowCount = 100, rowGroupColumns: number[] = [4, 12]): ParquetFileContext {
  const rows = Array.from({ length: rowCount }, (_, index) => [String(index), `name-${index}`]);
  const rowGroups = rowGroupColumns.map((columns, index) => rowGroup(index, columns));
  return {
    overview: {
      path: "fixture.parquet",
      version: 2,
      createdBy: "fixture writer",
      rowCount: BigInt(rowCount),
      rowGroupCount: rowGroups.length,
      columnCount: 4,
      compressedBytes: 1600n,
      uncompressedBytes: 3200n,
      keyValueMetadata: {},
    },
    schema: TEST_SCHEMA,
    rowGroups,
    rowGroupStats: {
      averageRows: 10,
      medianRows: 10,
      averageCompressedBytes: 800,
      medianCompressedBytes: 800,
    },
    sample: createResultSet(["id", "name"], rows),
  };
}

export function createTestContext(
  file: ParquetFileContext = createTestFile(),
  queries: QueryExecutor = { execute: () => ({ ok: false, message: "no engine" }) },
): ExplorerContext {
  return {
    filePath: "fixture.parquet",
    file,
    filterRows: (query) => filterRows(file.sample, query),
    queries,
  };
}
