import { createResultSet, filterRows } from "@parqscope/parquet-reader";
import type { QueryExecutor } from "@parqscope/sql";
import { describe, expect, it, vi } from "vitest";

import { createExplorerState, handleKey, switchView, type ExplorerState } from "./coordinator.js";
import { createTestContext, createTestFile } from "./test-helpers.js";
import type { ExplorerContext, KeyEvent } from "./types.js";

function key(name: string, modifiers: { ctrl?: boolean; shift?: boolean } = {}): KeyEvent {
  return { name, ctrl: modifiers.ctrl ?? false, shift: modifiers.shift ?? false };
}

function typeKeys(state: ExplorerState, context: ExplorerContext, events: KeyEvent[]): ExplorerState {
  return events.reduce((current, event) => handleKey(current, event, context).state, state);
}

function chars(text: string): KeyEvent[] {
  return [...text].map((character) => key(character));
}

function logContext(): ExplorerContext {
  const rows = Array.from({ length: 1000 }, (_, index) => [
    String(index),
    [3, 500, 999].includes(index) ? "ERROR disk full" : "info heartbeat",
  ]);
  const file = { ...createTestFile(), sample: createResultSet(["id", "message"], rows) };
  return { ...createTestContext(file), filterRows: vi.fn((query: string) => filterRows(file.sample, query)) };
}

describe("termination", () => {
  it("exits on ctrl+c and ctrl+x in every mode", () => {
    const context = createTestContext();
    const searching = handleKey(createExplorerState("browse"), key("/"), context).state;

    expect(handleKey(createExplorerState(), key("c", { ctrl: true }), context).exit).toBe(true);
    expect(handleKey(searching, key("x", { ctrl: true }), context).exit).toBe(true);
  });

  it("exits on q outside text-capturing views only", () => {
    const context = createTestContext();

    expect(handleKey(createExplorerState("browse"), key("q"), context).exit).toBe(true);

    const query = handleKey(createExplorerState("query"), key("q"), context);
    expect(query.exit).toBe(false);
    expect(query.state.nav.queryText).toBe("q");
  });
});

describe("view switching", () => {
  it("cycles with tab and shift+tab and resets offsets", () => {
    const context = createTestContext();
    const moved = typeKeys(createExplorerState("browse"), context, [key("down"), key("down")]);
    expect(moved.nav.verticalOffset).toBe(2);

    const next = handleKey(moved, key("tab"), context).state;
    expect(next.activeView).toBe("query");
    expect(next.nav.verticalOffset).toBe(0);

    const back = handleKey(createExplorerState("metadata"), key("tab", { shift: true }), context).state;
    expect(back.activeView).toBe("query");
  });

  it("jumps with digits except while typing a query", () => {
    const context = createTestContext();

    expect(handleKey(createExplorerState(), key("4"), context).state.activeView).toBe("browse");

    const typed = handleKey(createExplorerState("query"), key("4"), context).state;
    expect(typed.activeView).toBe("query");
    expect(typed.nav.queryText).toBe("4");
  });

  it("keeps the filter and query text across switches", () => {
    const state = switchView(
      { activeView: "query", nav: { ...createExplorerState().nav, queryText: "select 1", horizontalOffset: 3 } },
      "browse",
    );

    expect(state.nav.queryText).toBe("select 1");
    expect(state.nav.horizontalOffset).toBe(0);
  });
});

describe("search entry", () => {
  it("filters rows on commit and resets the selection", () => {
    const context = logContext();
    let state = typeKeys(createExplorerState("browse"), context, [key("pagedown"), key("pagedown")]);
    expect(state.nav.verticalOffset).toBe(40);

    state = typeKeys(state, context, [key("/"), ...chars("error"), key("return")]);

    expect(context.filterRows).toHaveBeenCalledTimes(1);
    expect(context.filterRows).toHaveBeenCalledWith("error");
    expect(state.nav.filter?.result.rows.map((row) => row[0])).toEqual(["3", "500", "999"]);
    expect(state.nav.verticalOffset).toBe(0);
    expect(state.nav.dataScrollOffset).toBe(0);
    expect(state.nav.overlay).toBeNull();
  });

  it("starts from the query view with ctrl+f and keeps the query text", () => {
    const context = logContext();
    const typed = typeKeys(createExplorerState("query"), context, [...chars("a/b"), key("f", { ctrl: true })]);

    expect(typed.nav.queryText).toBe("a/b");
    expect(typed.nav.overlay).toEqual({ kind: "search", query: "" });

    const state = typeKeys(typed, context, [...chars("error"), key("return")]);
    expect(state.activeView).toBe("query");
    expect(state.nav.filter?.result.rowCount).toBe(3);
    expect(state.nav.queryText).toBe("a/b");
  });

  it("swallows global shortcuts while typing", () => {
    const context = createTestContext();
    const state = typeKeys(createExplorerState("browse"), context, [key("/"), key("q"), key("tab"), key("2")]);

    expect(state.activeView).toBe("browse");
    expect(state.nav.overlay).toEqual({ kind: "search", query: "q2" });
  });

  it("cancels without touching an existing filter", () => {
    const context = logContext();
    const filtered = typeKeys(createExplorerState("browse"), context, [key("/"), ...chars("error"), key("return")]);
    const cancelled = typeKeys(filtered, context, [key("/"), ...chars("info"), key("escape")]);

    expect(cancelled.nav.overlay).toBeNull();
    expect(cancelled.nav.filter?.query).toBe("error");
  });

  it("applies an empty search as a filter matching every row", () => {
    const context = createTestContext();
    const state = typeKeys(createExplorerState("browse"), context, [key("/"), key("return")]);

    expect(state.nav.filter?.result.rowCount).toBe(100);
  });
});

describe("escape in normal mode", () => {
  it("clears an active filter first", () => {
    const context = logContext();
    const filtered = typeKeys(createExplorerState("browse"), context, [key("/"), ...chars("error"), key("return")]);
    const moved = handleKey(filtered, key("down"), context).state;

    const cleared = handleKey(moved, key("escape"), context).state;

    expect(cleared.nav.filter).toBeNull();
    expect(cleared.nav.verticalOffset).toBe(0);
  });

  it("clears the query text and outcome on the query view", () => {
    const context = createTestContext();
    const typed = typeKeys(createExplorerState("query"), context, [...chars("select"), key("return")]);
    expect(typed.nav.queryOutcome).toEqual({ ok: false, message: "no engine" });

    const cleared = handleKey(typed, key("escape"), context).state;

    expect(cleared.nav.queryText).toBe("");
    expect(cleared.nav.queryOutcome).toBeNull();
  });

  it("otherwise resets offsets", () => {
    const context = createTestContext();
    const moved = typeKeys(createExplorerState("browse"), context, [key("down"), key("right")]);

    const reset = handleKey(moved, key("escape"), context).state;

    expect(reset.nav.verticalOffset).toBe(0);
    expect(reset.nav.horizontalOffset).toBe(0);
  });
});

describe("query execution", () => {
  it("rejects a blank query without calling the executor", () => {
    const execute = vi.fn<QueryExecutor["execute"]>();
    const context = createTestContext(createTestFile(), { execute });

    const state = typeKeys(createExplorerState("query"), context, [...chars("   "), key("return")]);

    expect(execute).not.toHaveBeenCalled();
    expect(state.nav.queryOutcome).toEqual({ ok: false, message: "Empty query" });
  });

  it("stores the executor outcome", () => {
    const result = createResultSet(["n"], [["1"]]);
    const execute = vi.fn<QueryExecutor["execute"]>(() => ({ ok: true, result }));
    const context = createTestContext(createTestFile(), { execute });

    const state = typeKeys(createExplorerState("query"), context, [...chars("select 1"), key("return")]);

    expect(execute).toHaveBeenCalledWith("fixture.parquet", "select 1");
    expect(state.nav.queryOutcome).toEqual({ ok: true, result });
  });
});

describe("row detail", () => {
  it("scrolls, ignores other keys and closes on escape", () => {
    const context = createTestContext();
    let state = typeKeys(createExplorerState("browse"), context, [key("down"), key("return")]);
    expect(state.nav.overlay).toEqual({ kind: "detail", row: 1, scrollVertical: 0, scrollHorizontal: 0 });

    state = typeKeys(state, context, [key("pagedown"), key("up"), key("right")]);
    expect(state.nav.overlay).toEqual({ kind: "detail", row: 1, scrollVertical: 9, scrollHorizontal: 1 });

    const ignored = handleKey(state, key("q"), context);
    expect(ignored.exit).toBe(false);
    expect(ignored.state).toEqual(state);

    state = handleKey(state, key("escape"), context).state;
    expect(state.nav.overlay).toBeNull();
    expect(state.nav.verticalOffset).toBe(1);
  });
});
