import { createResultSet } from "@parqscope/parquet-reader";
import { describe, expect, it } from "vitest";

import { formatSchemaListing, renderTable, toJsonLines, truncateCell } from "./output.js";
import { TEST_SCHEMA } from "./tui/test-helpers.js";

describe("formatSchemaListing", () => {
  it("indents nested fields", () => {
    expect(formatSchemaListing(TEST_SCHEMA).split("\n")).toEqual([
      "id: INT64 required",
      "name: BYTE_ARRAY (STRING) optional",
      "address: group optional",
      "  city: BYTE_ARRAY (STRING) optional",
      "  zip: INT32 optional",
    ]);
  });
});

describe("truncateCell", () => {
  it("flattens newlines and shortens long values", () => {
    expect(truncateCell("a\nb", 10)).toBe("a b");
    expect(truncateCell("abcdefghij", 6)).toBe("abc...");
  });
});

describe("renderTable", () => {
  it("prints a placeholder for no rows", () => {
    expect(renderTable(createResultSet(["id"], []), 80)).toBe("(no rows)");
  });

  it("draws headers and cells", () => {
    const output = renderTable(createResultSet(["id", "city"], [["1", "Oslo"]]), 80);
    const lines = output.split("\n");

    expect(lines).toHaveLength(5);
    expect(lines[1]).toBe("│ id     │ city   │");
    expect(lines[3]).toBe("│ 1      │ Oslo   │");
  });
});

describe("toJsonLines", () => {
  it("emits one object per row", () => {
    expect(toJsonLines(createResultSet(["id", "city"], [["1", "Oslo"], ["2", "NULL"]]))).toEqual([
      '{"id":"1","city":"Oslo"}',
      '{"id":"2","city":"NULL"}',
    ]);
  });
});
