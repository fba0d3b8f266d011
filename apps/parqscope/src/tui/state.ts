import type { TabularResultSet } from "@parqscope/parquet-reader";
import type { QueryOutcome } from "@parqscope/sql";

import { DEFAULT_VISIBLE_ROWS } from "./constants.js";
import { syncScrollOffset } from "./viewport.js";

export type ActiveFilter = {
  query: string;
  result: TabularResultSet;
};

export type SearchOverlay = {
  kind: "search";
  query: string;
};

export type RowDetailOverlay = {
  kind: "detail";
  row: number;
  scrollVertical: number;
  scrollHorizontal: number;
};

export type Overlay = SearchOverlay | RowDetailOverlay;

export type InteractionMode = "normal" | "search" | "detail";

/**
 * Cursor, scroll and modal state of the explorer. Every transition returns a
 * new record; nothing here is mutated in place.
 */
export type NavigationState = {
  readonly horizontalOffset: number;
  readonly verticalOffset: number;
  readonly treeScrollOffset: number;
  readonly dataScrollOffset: number;
  readonly visibleRowCapacity: number;
  readonly filter: ActiveFilter | null;
  readonly queryText: string;
  readonly queryOutcome: QueryOutcome | null;
  readonly overlay: Overlay | null;
};

export function createNavigationState(): NavigationState {
  return {
    horizontalOffset: 0,
    verticalOffset: 0,
    treeScrollOffset: 0,
    dataScrollOffset: 0,
    visibleRowCapacity: DEFAULT_VISIBLE_ROWS,
    filter: null,
    queryText: "",
    queryOutcome: null,
    overlay: null,
  };
}

export function getMode(state: NavigationState): InteractionMode {
  return state.overlay?.kind ?? "normal";
}

export function moveDown(state: NavigationState): NavigationState {
  return { ...state, verticalOffset: state.verticalOffset + 1 };
}

export function moveUp(state: NavigationState): NavigationState {
  return { ...state, verticalOffset: Math.max(0, state.verticalOffset - 1) };
}

export function moveRight(state: NavigationState): NavigationState {
  return { ...state, horizontalOffset: state.horizontalOffset + 1 };
}

export function moveLeft(state: NavigationState): NavigationState {
  return { ...state, horizontalOffset: Math.max(0, state.horizontalOffset - 1) };
}

export function resetOffsets(state: NavigationState): NavigationState {
  return {
    ...state,
    horizontalOffset: 0,
    verticalOffset: 0,
    treeScrollOffset: 0,
    dataScrollOffset: 0,
  };
}

export function clearSearchFilter(state: NavigationState): NavigationState {
  if (state.filter === null) {
    return state;
  }
  return { ...state, filter: null };
}

export function setVisibleRowCapacity(state: NavigationState, capacity: number): NavigationState {
  const visibleRowCapacity = Math.max(1, capacity);
  if (visibleRowCapacity === state.visibleRowCapacity) {
    return state;
  }
  return { ...state, visibleRowCapacity };
}

export function pageDown(state: NavigationState, visibleRows: number, maxRows: number): NavigationState {
  const verticalOffset = Math.min(state.verticalOffset + visibleRows, Math.max(0, maxRows - 1));
  return adjustScrollToSelection({ ...state, verticalOffset }, visibleRows, maxRows);
}

export function pageUp(state: NavigationState, visibleRows: number, maxRows: number): NavigationState {
  const verticalOffset = Math.max(0, state.verticalOffset - visibleRows);
  return adjustScrollToSelection({ ...state, verticalOffset }, visibleRows, maxRows);
}

function adjustScrollToSelection(
  state: NavigationState,
  visibleRows: number,
  maxRows: number,
): NavigationState {
  return {
    ...state,
    dataScrollOffset: syncScrollOffset({
      selection: state.verticalOffset,
      scroll: state.dataScrollOffset,
      visible: visibleRows,
      total: maxRows,
    }),
  };
}

// Row detail overlay

export function openRowDetail(state: NavigationState, row: number): NavigationState {
  return {
    ...state,
    overlay: { kind: "detail", row, scrollVertical: 0, scrollHorizontal: 0 },
  };
}

export function closeRowDetail(state: NavigationState): NavigationState {
  if (state.overlay?.kind !== "detail") {
    return state;
  }
  return { ...state, overlay: null };
}

export function scrollDetail(
  state: NavigationState,
  vertical: number,
  horizontal: number,
): NavigationState {
  const overlay = state.overlay;
  if (overlay?.kind !== "detail") {
    return state;
  }
  return {
    ...state,
    overlay: {
      ...overlay,
      scrollVertical: Math.max(0, overlay.scrollVertical + vertical),
      scrollHorizontal: Math.max(0, overlay.scrollHorizontal + horizontal),
    },
  };
}

export function setDetailScroll(
  state: NavigationState,
  scrollVertical: number,
  scrollHorizontal: number,
): NavigationState {
  const overlay = state.overlay;
  if (overlay?.kind !== "detail") {
    return state;
  }
  if (overlay.scrollVertical === scrollVertical && overlay.scrollHorizontal === scrollHorizontal) {
    return state;
  }
  return { ...state, overlay: { ...overlay, scrollVertical, scrollHorizontal } };
}

// Search entry overlay

export function startSearch(state: NavigationState): NavigationState {
  return { ...state, overlay: { kind: "search", query: "" } };
}

export function appendSearchText(state: NavigationState, text: string): NavigationState {
  if (state.overlay?.kind !== "search") {
    return state;
  }
  return { ...state, overlay: { kind: "search", query: state.overlay.query + text } };
}

export function popSearchText(state: NavigationState): NavigationState {
  if (state.overlay?.kind !== "search") {
    return state;
  }
  return { ...state, overlay: { kind: "search", query: state.overlay.query.slice(0, -1) } };
}

export function cancelSearch(state: NavigationState): NavigationState {
  if (state.overlay?.kind !== "search") {
    return state;
  }
  return { ...state, overlay: null };
}

export function commitSearch(
  state: NavigationState,
  query: string,
  result: TabularResultSet,
): NavigationState {
  return resetOffsets({ ...state, overlay: null, filter: { query, result } });
}

// Query text

export function appendQueryText(state: NavigationState, text: string): NavigationState {
  return { ...state, queryText: state.queryText + text };
}

export function popQueryText(state: NavigationState): NavigationState {
  return { ...state, queryText: state.queryText.slice(0, -1) };
}

export function setQueryOutcome(state: NavigationState, outcome: QueryOutcome): NavigationState {
  return resetOffsets({ ...state, queryOutcome: outcome });
}

export function clearQuery(state: NavigationState): NavigationState {
  return { ...state, queryText: "", queryOutcome: null };
}

export function setTableSelection(
  state: NavigationState,
  verticalOffset: number,
  dataScrollOffset: number,
): NavigationState {
  if (state.verticalOffset === verticalOffset && state.dataScrollOffset === dataScrollOffset) {
    return state;
  }
  return { ...state, verticalOffset, dataScrollOffset };
}

export function setTreeSelection(
  state: NavigationState,
  verticalOffset: number,
  treeScrollOffset: number,
): NavigationState {
  if (state.verticalOffset === verticalOffset && state.treeScrollOffset === treeScrollOffset) {
    return state;
  }
  return { ...state, verticalOffset, treeScrollOffset };
}

export function setHorizontalOffset(state: NavigationState, horizontalOffset: number): NavigationState {
  if (state.horizontalOffset === horizontalOffset) {
    return state;
  }
  return { ...state, horizontalOffset };
}
