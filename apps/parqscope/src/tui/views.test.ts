import { createResultSet } from "@parqscope/parquet-reader";
import { describe, expect, it } from "vitest";

import { createNavigationState, setQueryOutcome, type NavigationState } from "./state.js";
import { createTestContext, createTestFile } from "./test-helpers.js";
import type { KeyEvent } from "./types.js";
import {
  NO_RESULT_DATA,
  ROW_OUT_OF_RANGE,
  VIEW_ORDER,
  buildSchemaTable,
  getSchemaLeaves,
  getView,
  navigateTable,
  pageTree,
} from "./views.js";

function key(name: string, ctrl = false): KeyEvent {
  return { name, ctrl, shift: false };
}

function press(viewState: NavigationState, view: ReturnType<typeof getView>, ...names: string[]) {
  const context = createTestContext();
  return names.reduce((state, name) => view.handleKey(key(name), state, context), viewState);
}

describe("view registry", () => {
  it("lists views in a fixed order", () => {
    expect(VIEW_ORDER).toEqual(["metadata", "schema", "row-groups", "browse", "query"]);
  });

  it("marks only the query view as text-capturing", () => {
    expect(VIEW_ORDER.filter((id) => getView(id).capturesText)).toEqual(["query"]);
  });
});

describe("metadata view", () => {
  it("ignores keys", () => {
    const state = createNavigationState();

    expect(press(state, getView("metadata"), "down", "right")).toBe(state);
  });
});

describe("schema view", () => {
  it("lists leaves with dotted paths", () => {
    const table = buildSchemaTable(createTestFile().schema);

    expect(getSchemaLeaves(createTestFile().schema)).toHaveLength(4);
    expect(table.rows[2]).toEqual(["address.city", "BYTE_ARRAY", "STRING", "OPTIONAL", "", "", ""]);
  });

  it("moves the selection up to the last leaf", () => {
    const state = press(createNavigationState(), getView("schema"), "down", "j", "down", "down", "down", "down");

    expect(state.verticalOffset).toBe(4);
  });

  it("scrolls the column table horizontally within its columns", () => {
    const names = Array.from({ length: 10 }, () => "right");
    const state = press(createNavigationState(), getView("schema"), ...names);

    expect(state.horizontalOffset).toBe(6);
  });
});

describe("row-groups view", () => {
  it("moves between row groups and clamps at the last", () => {
    const state = press(createNavigationState(), getView("row-groups"), "right", "right", "right");

    expect(state.horizontalOffset).toBe(1);
  });

  it("bounds the column selection by the group's column count", () => {
    const state = press(createNavigationState(), getView("row-groups"), "pagedown", "pagedown");

    expect(state.verticalOffset).toBe(4);
  });
});

describe("pageTree", () => {
  it("moves by the visible capacity and clamps", () => {
    const state = { ...createNavigationState(), visibleRowCapacity: 5, verticalOffset: 3 };

    expect(pageTree(state, 1, 12).verticalOffset).toBe(8);
    expect(pageTree(state, -1, 12).verticalOffset).toBe(0);
    expect(pageTree({ ...state, verticalOffset: 10 }, 1, 12).verticalOffset).toBe(12);
  });
});

describe("navigateTable", () => {
  const data = createResultSet(["a", "b"], [["1", "x"], ["2", "y"], ["3", "z"]]);

  it("stops at the last row and column", () => {
    let state = createNavigationState();
    for (const name of ["down", "down", "down", "right", "right"]) {
      state = navigateTable(key(name), state, data, true);
    }

    expect(state.verticalOffset).toBe(2);
    expect(state.horizontalOffset).toBe(1);
  });

  it("jumps to the ends with g and G only when letters are allowed", () => {
    const bottom = navigateTable(key("G"), createNavigationState(), data, true);
    expect(bottom.verticalOffset).toBe(2);
    expect(navigateTable(key("g"), bottom, data, true).verticalOffset).toBe(0);
    expect(navigateTable(key("G"), createNavigationState(), data, false).verticalOffset).toBe(0);
  });
});

describe("browse view", () => {
  it("opens the row detail on the selected row", () => {
    const state = press(createNavigationState(), getView("browse"), "down", "down", "return");

    expect(state.overlay).toEqual({ kind: "detail", row: 2, scrollVertical: 0, scrollHorizontal: 0 });
  });

  it("resolves rows of the sample", () => {
    const resolved = getView("browse").resolveRow?.(3, createNavigationState(), createTestContext());

    expect(resolved).toEqual({
      ok: true,
      title: "Row 4 (Browse)",
      columns: ["id", "name"],
      cells: ["3", "name-3"],
    });
  });

  it("reports a stale selection", () => {
    const resolved = getView("browse").resolveRow?.(100, createNavigationState(), createTestContext());

    expect(resolved).toEqual({ ok: false, message: ROW_OUT_OF_RANGE });
  });
});

describe("query view", () => {
  const query = getView("query");

  it("types letters, digits and shortcuts as query text", () => {
    const state = press(createNavigationState(), query, "s", "q", "/", "1", " ", "x", "backspace");

    expect(state.queryText).toBe("sq/1 ");
  });

  it("opens the row detail only after a successful query", () => {
    const context = createTestContext();
    const empty = createNavigationState();
    expect(query.handleKey(key("o", true), empty, context)).toBe(empty);

    const ran = setQueryOutcome(empty, { ok: true, result: createResultSet(["n"], [["1"]]) });
    expect(query.handleKey(key("o", true), ran, context).overlay?.kind).toBe("detail");
  });

  it("has no row to show without a result", () => {
    const failed = setQueryOutcome(createNavigationState(), { ok: false, message: "bad" });

    expect(query.resolveRow?.(0, failed, createTestContext())).toEqual({ ok: false, message: NO_RESULT_DATA });
  });

  it("titles rows of the query result", () => {
    const ran = setQueryOutcome(createNavigationState(), { ok: true, result: createResultSet(["n"], [["1"]]) });

    expect(query.resolveRow?.(0, ran, createTestContext())).toEqual({
      ok: true,
      title: "Row 1 (Query result)",
      columns: ["n"],
      cells: ["1"],
    });
  });
});
