import {
  createResultSet,
  type SchemaLine,
  type SchemaPrimitiveLine,
  type TabularResultSet,
} from "@parqscope/parquet-reader";
import { runQuery } from "@parqscope/sql";

import {
  appendQueryText,
  moveDown,
  moveLeft,
  moveRight,
  moveUp,
  openRowDetail,
  pageDown,
  pageUp,
  popQueryText,
  setHorizontalOffset,
  setQueryOutcome,
  type NavigationState,
} from "./state.js";
import { isPrintable } from "./keys.js";
import type { ExplorerContext, InstructionHint, KeyEvent, ViewId } from "./types.js";
import { clampNumber } from "./utils.js";

export type RowResolution =
  | { ok: true; title: string; columns: readonly string[]; cells: readonly string[] }
  | { ok: false; message: string };

export type ViewStrategy = {
  id: ViewId;
  label: string;
  /** Printable keys are input text, so global letter shortcuts are off. */
  capturesText: boolean;
  hints: InstructionHint[];
  handleKey: (event: KeyEvent, state: NavigationState, context: ExplorerContext) => NavigationState;
  resolveRow?: (row: number, state: NavigationState, context: ExplorerContext) => RowResolution;
};

export const ROW_OUT_OF_RANGE = "Row out of range";
export const NO_RESULT_DATA = "No result data";

const SCHEMA_TABLE_COLUMNS = [
  "column",
  "physical",
  "logical",
  "repetition",
  "length",
  "precision",
  "scale",
];

export function getSchemaLeaves(schema: readonly SchemaLine[]): SchemaPrimitiveLine[] {
  return schema.filter((line): line is SchemaPrimitiveLine => line.kind === "primitive");
}

export function buildSchemaTable(schema: readonly SchemaLine[]): TabularResultSet {
  return createResultSet(
    SCHEMA_TABLE_COLUMNS,
    getSchemaLeaves(schema).map((leaf) => [
      leaf.path.join("."),
      leaf.physicalType,
      leaf.logicalType ?? "",
      leaf.repetition,
      leaf.typeLength === undefined ? "" : String(leaf.typeLength),
      leaf.precision === undefined ? "" : String(leaf.precision),
      leaf.scale === undefined ? "" : String(leaf.scale),
    ]),
  );
}

export function getBrowseData(state: NavigationState, context: ExplorerContext): TabularResultSet {
  return state.filter?.result ?? context.file.sample;
}

export function getQueryData(state: NavigationState): TabularResultSet | null {
  const outcome = state.queryOutcome;
  return outcome?.ok ? outcome.result : null;
}

function isKey(event: KeyEvent, ...names: string[]): boolean {
  return !event.ctrl && names.includes(event.name);
}

/** Arrow, vim and page navigation over a row table. */
export function navigateTable(
  event: KeyEvent,
  state: NavigationState,
  data: TabularResultSet,
  allowLetters: boolean,
): NavigationState {
  const lastRow = Math.max(0, data.rowCount - 1);
  const lastColumn = Math.max(0, data.columnCount - 1);
  const letters = allowLetters && !event.ctrl;

  if (isKey(event, "down") || (letters && event.name === "j")) {
    return state.verticalOffset >= lastRow ? state : moveDown(state);
  }
  if (isKey(event, "up") || (letters && event.name === "k")) {
    return moveUp(state);
  }
  if (isKey(event, "right") || (letters && event.name === "l")) {
    return state.horizontalOffset >= lastColumn ? state : moveRight(state);
  }
  if (isKey(event, "left") || (letters && event.name === "h")) {
    return moveLeft(state);
  }
  if (isKey(event, "pagedown")) {
    return pageDown(state, state.visibleRowCapacity, data.rowCount);
  }
  if (isKey(event, "pageup")) {
    return pageUp(state, state.visibleRowCapacity, data.rowCount);
  }
  if (letters && event.name === "g") {
    return { ...state, verticalOffset: 0 };
  }
  if (letters && event.name === "G") {
    return { ...state, verticalOffset: lastRow };
  }
  return state;
}

/** Page a tree selection by the visible capacity, clamped to `maxIndex`. */
export function pageTree(state: NavigationState, direction: 1 | -1, maxIndex: number): NavigationState {
  const verticalOffset = clampNumber(
    state.verticalOffset + direction * state.visibleRowCapacity,
    0,
    Math.max(0, maxIndex),
  );
  return { ...state, verticalOffset };
}

function navigateTree(event: KeyEvent, state: NavigationState, maxIndex: number): NavigationState {
  if (isKey(event, "down", "j")) {
    return state.verticalOffset >= maxIndex ? state : moveDown(state);
  }
  if (isKey(event, "up", "k")) {
    return moveUp(state);
  }
  if (isKey(event, "pagedown")) {
    return pageTree(state, 1, maxIndex);
  }
  if (isKey(event, "pageup")) {
    return pageTree(state, -1, maxIndex);
  }
  if (isKey(event, "g")) {
    return { ...state, verticalOffset: 0 };
  }
  if (isKey(event, "G")) {
    return { ...state, verticalOffset: maxIndex };
  }
  return state;
}

function resolveTableRow(
  data: TabularResultSet,
  row: number,
  title: string,
): RowResolution {
  const cells = data.rows[row];
  if (row < 0 || cells === undefined) {
    return { ok: false, message: ROW_OUT_OF_RANGE };
  }
  return { ok: true, title, columns: data.columns, cells };
}

const metadataView: ViewStrategy = {
  id: "metadata",
  label: "Metadata",
  capturesText: false,
  hints: [],
  handleKey: (_event, state) => state,
};

const schemaView: ViewStrategy = {
  id: "schema",
  label: "Schema",
  capturesText: false,
  hints: [
    { shortcut: "↑↓", label: "select column" },
    { shortcut: "←→", label: "scroll table" },
  ],
  handleKey: (event, state, context) => {
    if (isKey(event, "right", "l")) {
      const lastColumn = SCHEMA_TABLE_COLUMNS.length - 1;
      return setHorizontalOffset(state, Math.min(state.horizontalOffset + 1, lastColumn));
    }
    if (isKey(event, "left", "h")) {
      return moveLeft(state);
    }
    return navigateTree(event, state, getSchemaLeaves(context.file.schema).length);
  },
};

const rowGroupsView: ViewStrategy = {
  id: "row-groups",
  label: "Row Groups",
  capturesText: false,
  hints: [
    { shortcut: "←→", label: "row group" },
    { shortcut: "↑↓", label: "column" },
  ],
  handleKey: (event, state, context) => {
    const { rowGroups } = context.file;
    if (isKey(event, "right", "l")) {
      const lastGroup = Math.max(0, rowGroups.length - 1);
      return setHorizontalOffset(state, Math.min(state.horizontalOffset + 1, lastGroup));
    }
    if (isKey(event, "left", "h")) {
      return moveLeft(state);
    }
    const group = rowGroups[state.horizontalOffset];
    return navigateTree(event, state, group?.columns.length ?? 0);
  },
};

const browseView: ViewStrategy = {
  id: "browse",
  label: "Browse",
  capturesText: false,
  hints: [
    { shortcut: "↑↓←→", label: "move" },
    { shortcut: "PgUp/PgDn", label: "page" },
    { shortcut: "Enter", label: "row detail" },
  ],
  handleKey: (event, state, context) => {
    if (isKey(event, "return", "v")) {
      return openRowDetail(state, state.verticalOffset);
    }
    return navigateTable(event, state, getBrowseData(state, context), true);
  },
  resolveRow: (row, state, context) =>
    resolveTableRow(getBrowseData(state, context), row, `Row ${row + 1} (Browse)`),
};

const queryView: ViewStrategy = {
  id: "query",
  label: "Query",
  capturesText: true,
  hints: [
    { shortcut: "Enter", label: "run" },
    { shortcut: "Ctrl+O", label: "row detail" },
    { shortcut: "Esc", label: "clear" },
  ],
  handleKey: (event, state, context) => {
    if (event.ctrl && event.name === "o") {
      return getQueryData(state) === null ? state : openRowDetail(state, state.verticalOffset);
    }
    if (isKey(event, "return")) {
      return setQueryOutcome(state, runQuery(context.queries, context.filePath, state.queryText));
    }
    if (isKey(event, "backspace")) {
      return popQueryText(state);
    }
    if (!event.ctrl && isPrintableName(event.name)) {
      return appendQueryText(state, event.name);
    }
    const data = getQueryData(state);
    return data === null ? state : navigateTable(event, state, data, false);
  },
  resolveRow: (row, state) => {
    const data = getQueryData(state);
    if (data === null) {
      return { ok: false, message: NO_RESULT_DATA };
    }
    return resolveTableRow(data, row, `Row ${row + 1} (Query result)`);
  },
};

export function isPrintableName(name: string): boolean {
  return [...name].length === 1 && isPrintable(name);
}

export const VIEWS: readonly ViewStrategy[] = [
  metadataView,
  schemaView,
  rowGroupsView,
  browseView,
  queryView,
];

export const VIEW_ORDER: readonly ViewId[] = VIEWS.map((view) => view.id);

export function getView(id: ViewId): ViewStrategy {
  return VIEWS.find((view) => view.id === id) ?? metadataView;
}
