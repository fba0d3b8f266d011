import type { ParquetFileContext, TabularResultSet } from "@parqscope/parquet-reader";
import type { QueryExecutor } from "@parqscope/sql";

export type ViewId = "metadata" | "schema" | "row-groups" | "browse" | "query";

export type KeyEvent = {
  name: string;
  ctrl: boolean;
  shift: boolean;
};

export type InstructionHint = {
  shortcut: string;
  label: string;
};

/** Collaborators and immutable file data shared by every view. */
export type ExplorerContext = {
  filePath: string;
  file: ParquetFileContext;
  filterRows: (query: string) => TabularResultSet;
  queries: QueryExecutor;
};

export type TerminalSize = {
  width: number;
  height: number;
};

export type TuiOptions = {
  columns: string[];
  sampleRows?: number;
};
