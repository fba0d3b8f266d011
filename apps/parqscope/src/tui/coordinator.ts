import { DETAIL_PAGE_SIZE } from "./constants.js";
import {
  appendSearchText,
  cancelSearch,
  clearQuery,
  clearSearchFilter,
  closeRowDetail,
  commitSearch,
  createNavigationState,
  popSearchText,
  resetOffsets,
  scrollDetail,
  startSearch,
  type NavigationState,
} from "./state.js";
import type { ExplorerContext, KeyEvent, ViewId } from "./types.js";
import { cycleView, getViewFromKeyName } from "./utils.js";
import { VIEW_ORDER, getView, isPrintableName } from "./views.js";

export type ExplorerState = {
  readonly activeView: ViewId;
  readonly nav: NavigationState;
};

export type KeyResult = {
  state: ExplorerState;
  exit: boolean;
};

export function createExplorerState(activeView: ViewId = "metadata"): ExplorerState {
  return { activeView, nav: createNavigationState() };
}

export function switchView(state: ExplorerState, activeView: ViewId): ExplorerState {
  return { activeView, nav: resetOffsets(state.nav) };
}

/**
 * Route one key event by mode: termination first, then the row detail
 * overlay, then search entry, then normal-mode globals and finally the
 * active view.
 */
export function handleKey(state: ExplorerState, event: KeyEvent, context: ExplorerContext): KeyResult {
  if (event.ctrl && (event.name === "c" || event.name === "x")) {
    return { state, exit: true };
  }

  const overlay = state.nav.overlay;
  if (overlay?.kind === "detail") {
    return { state: { ...state, nav: handleDetailKey(state.nav, event) }, exit: false };
  }
  if (overlay?.kind === "search") {
    return { state: { ...state, nav: handleSearchKey(state.nav, overlay.query, event, context) }, exit: false };
  }

  return handleNormalKey(state, event, context);
}

function handleDetailKey(nav: NavigationState, event: KeyEvent): NavigationState {
  if (event.ctrl) {
    return nav;
  }
  switch (event.name) {
    case "escape":
      return closeRowDetail(nav);
    case "down":
      return scrollDetail(nav, 1, 0);
    case "up":
      return scrollDetail(nav, -1, 0);
    case "pagedown":
      return scrollDetail(nav, DETAIL_PAGE_SIZE, 0);
    case "pageup":
      return scrollDetail(nav, -DETAIL_PAGE_SIZE, 0);
    case "right":
      return scrollDetail(nav, 0, 1);
    case "left":
      return scrollDetail(nav, 0, -1);
    default:
      return nav;
  }
}

function handleSearchKey(
  nav: NavigationState,
  query: string,
  event: KeyEvent,
  context: ExplorerContext,
): NavigationState {
  if (event.ctrl) {
    return nav;
  }
  if (event.name === "escape") {
    return cancelSearch(nav);
  }
  if (event.name === "return") {
    return commitSearch(nav, query, context.filterRows(query));
  }
  if (event.name === "backspace") {
    return popSearchText(nav);
  }
  if (isPrintableName(event.name)) {
    return appendSearchText(nav, event.name);
  }
  return nav;
}

function handleNormalKey(state: ExplorerState, event: KeyEvent, context: ExplorerContext): KeyResult {
  const view = getView(state.activeView);

  if (!event.ctrl && event.name === "escape") {
    return { state: { ...state, nav: handleEscape(state) }, exit: false };
  }

  if (!event.ctrl && event.name === "tab") {
    const next = cycleView(state.activeView, VIEW_ORDER, event.shift ? -1 : 1);
    return { state: switchView(state, next), exit: false };
  }

  if (event.ctrl && event.name === "f") {
    return { state: { ...state, nav: startSearch(state.nav) }, exit: false };
  }

  if (!event.ctrl && !view.capturesText) {
    const target = getViewFromKeyName(event.name, VIEW_ORDER);
    if (target !== null) {
      return { state: switchView(state, target), exit: false };
    }
    if (event.name === "q") {
      return { state, exit: true };
    }
    if (event.name === "/") {
      return { state: { ...state, nav: startSearch(state.nav) }, exit: false };
    }
  }

  return { state: { ...state, nav: view.handleKey(event, state.nav, context) }, exit: false };
}

function handleEscape(state: ExplorerState): NavigationState {
  const { nav } = state;
  if (nav.filter !== null) {
    return resetOffsets(clearSearchFilter(nav));
  }
  if (state.activeView === "query" && (nav.queryText.length > 0 || nav.queryOutcome !== null)) {
    return resetOffsets(clearQuery(nav));
  }
  return resetOffsets(nav);
}
