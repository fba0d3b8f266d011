import type { TabularResultSet } from "@parqscope/parquet-reader";

import {
  CONTENT_BORDER_WIDTH,
  PANEL_RESERVED_LINES,
  QUERY_INPUT_LINES,
  TABLE_HEADER_LINES,
  TABLE_RESERVED_LINES,
} from "./constants.js";
import type { ExplorerState } from "./coordinator.js";
import {
  setDetailScroll,
  setHorizontalOffset,
  setTableSelection,
  setTreeSelection,
  setVisibleRowCapacity,
  type NavigationState,
} from "./state.js";
import type { ExplorerContext, InstructionHint, TerminalSize, ViewId } from "./types.js";
import { clampNumber } from "./utils.js";
import { syncScrollOffset } from "./viewport.js";
import {
  buildSchemaTable,
  getBrowseData,
  getQueryData,
  getSchemaLeaves,
  getView,
  ROW_OUT_OF_RANGE,
  type RowResolution,
} from "./views.js";

export type RowDetailContent = {
  title: string;
  lines: string[];
  error: boolean;
};

const DETAIL_HINTS: InstructionHint[] = [
  { shortcut: "↑↓", label: "scroll" },
  { shortcut: "←→", label: "pan" },
  { shortcut: "Esc", label: "close" },
];

export function computeVisibleRows(view: ViewId, height: number): number {
  switch (view) {
    case "browse":
      return Math.max(1, height - TABLE_RESERVED_LINES);
    case "query":
      return Math.max(1, height - TABLE_RESERVED_LINES - QUERY_INPUT_LINES);
    default:
      return Math.max(1, height - PANEL_RESERVED_LINES);
  }
}

/** Rows the schema column table shows beside the tree, below its header. */
export function schemaTableCapacity(visibleRowCapacity: number): number {
  return Math.max(1, visibleRowCapacity - TABLE_HEADER_LINES);
}

/**
 * Bring the navigation state in line with what is about to be drawn. Runs
 * once per render, before any key is handled against the frame.
 */
export function prepareFrame(
  state: ExplorerState,
  context: ExplorerContext,
  size: TerminalSize,
): ExplorerState {
  const capacity = computeVisibleRows(state.activeView, size.height);
  let nav = setVisibleRowCapacity(state.nav, capacity);

  switch (state.activeView) {
    case "browse":
      nav = clampTable(nav, getBrowseData(nav, context));
      break;
    case "query": {
      const data = getQueryData(nav);
      if (data !== null) {
        nav = clampTable(nav, data);
      }
      break;
    }
    case "schema":
      nav = clampSchemaTree(nav, context);
      break;
    case "row-groups":
      nav = clampRowGroupTree(nav, context);
      break;
    case "metadata":
      break;
  }

  if (nav.overlay?.kind === "detail") {
    const detail = buildRowDetail(state.activeView, nav, context);
    nav = clampDetailScroll(nav, detail.lines, size);
  }

  return nav === state.nav ? state : { ...state, nav };
}

function clampTable(nav: NavigationState, data: TabularResultSet): NavigationState {
  const selection = clampNumber(nav.verticalOffset, 0, Math.max(0, data.rowCount - 1));
  const scroll = syncScrollOffset({
    selection,
    scroll: nav.dataScrollOffset,
    visible: nav.visibleRowCapacity,
    total: data.rowCount,
  });
  const next = setTableSelection(nav, selection, scroll);
  return setHorizontalOffset(next, clampNumber(nav.horizontalOffset, 0, Math.max(0, data.columnCount - 1)));
}

function clampSchemaTree(nav: NavigationState, context: ExplorerContext): NavigationState {
  const { schema } = context.file;
  const leaves = getSchemaLeaves(schema);
  const selection = clampNumber(nav.verticalOffset, 0, leaves.length);
  const selectedLeaf = selection > 0 ? leaves[selection - 1] : undefined;
  const treeIndex = selectedLeaf === undefined ? -1 : schema.indexOf(selectedLeaf);
  const scroll = syncScrollOffset({
    selection: treeIndex >= 0 ? treeIndex : nav.treeScrollOffset,
    scroll: nav.treeScrollOffset,
    visible: nav.visibleRowCapacity,
    total: schema.length,
  });
  // The column table scrolls with its own window over the leaves.
  const table = buildSchemaTable(schema);
  const tableScroll = syncScrollOffset({
    selection: selection > 0 ? selection - 1 : nav.dataScrollOffset,
    scroll: nav.dataScrollOffset,
    visible: schemaTableCapacity(nav.visibleRowCapacity),
    total: table.rowCount,
  });
  let next = setTreeSelection(nav, selection, scroll);
  if (next.dataScrollOffset !== tableScroll) {
    next = { ...next, dataScrollOffset: tableScroll };
  }
  return setHorizontalOffset(next, clampNumber(nav.horizontalOffset, 0, Math.max(0, table.columnCount - 1)));
}

function clampRowGroupTree(nav: NavigationState, context: ExplorerContext): NavigationState {
  const { rowGroups } = context.file;
  const groupIndex = clampNumber(nav.horizontalOffset, 0, Math.max(0, rowGroups.length - 1));
  const columnCount = rowGroups[groupIndex]?.columns.length ?? 0;
  const selection = clampNumber(nav.verticalOffset, 0, columnCount);
  const scroll = syncScrollOffset({
    selection: selection > 0 ? selection - 1 : nav.treeScrollOffset,
    scroll: nav.treeScrollOffset,
    visible: nav.visibleRowCapacity,
    total: columnCount,
  });
  return setHorizontalOffset(setTreeSelection(nav, selection, scroll), groupIndex);
}

function clampDetailScroll(nav: NavigationState, lines: string[], size: TerminalSize): NavigationState {
  if (nav.overlay?.kind !== "detail") {
    return nav;
  }
  const visibleLines = detailVisibleLines(size);
  const visibleWidth = Math.max(1, size.width - CONTENT_BORDER_WIDTH);
  const longest = lines.reduce((max, line) => Math.max(max, line.length), 0);
  return setDetailScroll(
    nav,
    clampNumber(nav.overlay.scrollVertical, 0, Math.max(0, lines.length - visibleLines)),
    clampNumber(nav.overlay.scrollHorizontal, 0, Math.max(0, longest - visibleWidth)),
  );
}

export function detailVisibleLines(size: TerminalSize): number {
  return Math.max(1, size.height - PANEL_RESERVED_LINES);
}

export function buildRowDetailLines(resolution: RowResolution): string[] {
  if (!resolution.ok) {
    return [resolution.message];
  }
  return resolution.columns.map((column, index) => `${column}: ${resolution.cells[index] ?? ""}`);
}

export function buildRowDetail(
  activeView: ViewId,
  nav: NavigationState,
  context: ExplorerContext,
): RowDetailContent {
  const view = getView(activeView);
  const row = nav.overlay?.kind === "detail" ? nav.overlay.row : nav.verticalOffset;
  const resolution: RowResolution = view.resolveRow
    ? view.resolveRow(row, nav, context)
    : { ok: false, message: ROW_OUT_OF_RANGE };
  return {
    title: resolution.ok ? resolution.title : "Row detail",
    lines: buildRowDetailLines(resolution),
    error: !resolution.ok,
  };
}

export function formatHints(hints: InstructionHint[]): string {
  return hints.map((hint) => `${hint.shortcut} ${hint.label}`).join("  ");
}

export function buildFooter(state: ExplorerState): string {
  const { nav } = state;
  if (nav.overlay?.kind === "search") {
    return `Search: ${nav.overlay.query}|`;
  }
  if (nav.overlay?.kind === "detail") {
    return formatHints(DETAIL_HINTS);
  }

  const view = getView(state.activeView);
  const globals: InstructionHint[] = view.capturesText
    ? [
        { shortcut: "Tab", label: "views" },
        { shortcut: "Ctrl+F", label: "search" },
        { shortcut: "Ctrl+C", label: "quit" },
      ]
    : [
        { shortcut: "Tab/1-5", label: "views" },
        { shortcut: "/", label: "search" },
        { shortcut: "q", label: "quit" },
      ];
  const hints = formatHints([...view.hints, ...globals]);

  if (nav.filter !== null) {
    return `${hints}  ${nav.filter.result.rowCount} rows filtered (Esc to show all)`;
  }
  return hints;
}
