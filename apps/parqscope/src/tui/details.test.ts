import { describe, expect, it } from "vitest";

import { describeColumnChunk, describeOverview, describeRowGroupStats } from "./details.js";
import { createTestFile } from "./test-helpers.js";

describe("describeOverview", () => {
  it("summarises the file footer", () => {
    const rows = describeOverview(createTestFile().overview);

    expect(rows).toEqual([
      ["path", "fixture.parquet"],
      ["format version", "2"],
      ["created by", "fixture writer"],
      ["rows", "100"],
      ["row groups", "2"],
      ["columns", "4"],
      ["compressed size", "1.5 KB"],
      ["uncompressed size", "3.1 KB"],
      ["compression ratio", "2.00x"],
    ]);
  });
});

describe("describeRowGroupStats", () => {
  it("formats averages and medians", () => {
    const file = createTestFile();

    expect(describeRowGroupStats(file.rowGroupStats, file.rowGroups)).toEqual([
      ["row groups", "2"],
      ["average rows", "10.0"],
      ["median rows", "10.0"],
      ["average compressed", "800 B"],
      ["median compressed", "800 B"],
    ]);
  });
});

describe("describeColumnChunk", () => {
  it("includes statistics when present", () => {
    const chunk = {
      ...createTestFile().rowGroups[0].columns[0],
      dictionaryPageOffset: 0n,
      statistics: { min: "a", max: "z", nullCount: 2n },
    };

    expect(describeColumnChunk(chunk).slice(-4)).toEqual([
      ["dictionary page offset", "0"],
      ["min", "a"],
      ["max", "z"],
      ["null count", "2"],
    ]);
  });

  it("notes missing statistics", () => {
    const rows = describeColumnChunk(createTestFile().rowGroups[0].columns[0]);

    expect(rows[rows.length - 1]).toEqual(["statistics", "none"]);
  });
});
