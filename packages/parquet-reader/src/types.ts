export type ParquetRow = Record<string, unknown>;

export type ParquetReadOptions = {
  columns?: string[];
  sampleRows?: number;
};

/**
 * Immutable rectangular dataset: ordered column names plus stringified rows.
 * Built either from the sampled rows of a file or from a query result.
 */
export type TabularResultSet = {
  readonly columns: readonly string[];
  readonly rows: ReadonlyArray<readonly string[]>;
  readonly rowCount: number;
  readonly columnCount: number;
};

export type SchemaGroupLine = {
  kind: "group";
  name: string;
  depth: number;
  path: string[];
  repetition: string;
  logicalType?: string;
  childCount: number;
};

export type SchemaPrimitiveLine = {
  kind: "primitive";
  name: string;
  depth: number;
  path: string[];
  repetition: string;
  physicalType: string;
  logicalType?: string;
  typeLength?: number;
  precision?: number;
  scale?: number;
};

export type SchemaLine = SchemaGroupLine | SchemaPrimitiveLine;

export type ColumnStatistics = {
  min?: string;
  max?: string;
  nullCount?: bigint;
  distinctCount?: bigint;
};

export type ColumnChunkInfo = {
  path: string;
  physicalType: string;
  codec: string;
  encodings: string[];
  numValues: bigint;
  compressedBytes: bigint;
  uncompressedBytes: bigint;
  dataPageOffset: bigint;
  dictionaryPageOffset?: bigint;
  statistics: ColumnStatistics | null;
};

export type RowGroupInfo = {
  index: number;
  numRows: bigint;
  compressedBytes: bigint;
  uncompressedBytes: bigint;
  columns: ColumnChunkInfo[];
};

export type RowGroupStats = {
  averageRows: number;
  medianRows: number;
  averageCompressedBytes: number;
  medianCompressedBytes: number;
};

export type FileOverview = {
  path: string;
  version?: number;
  createdBy?: string;
  rowCount: bigint;
  rowGroupCount: number;
  columnCount: number;
  compressedBytes: bigint;
  uncompressedBytes: bigint;
  keyValueMetadata: Record<string, string>;
};

export type ParquetFileContext = {
  overview: FileOverview;
  schema: SchemaLine[];
  rowGroups: RowGroupInfo[];
  rowGroupStats: RowGroupStats;
  sample: TabularResultSet;
};
