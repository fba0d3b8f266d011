import { describe, expect, it } from "vitest";

import { formatCellValue, safeStringify } from "./formatting.js";

describe("safeStringify", () => {
  it("renders bigint arrays as JSON-friendly strings", () => {
    const value = [1n, 2n, 3n];

    expect(safeStringify(value)).toBe("[\"1\",\"2\",\"3\"]");
  });

  it("renders arrays of objects with nested maps", () => {
    const value = [{ tags: new Map([["alpha", "beta"]]) }];

    expect(safeStringify(value)).toBe("[{\"tags\":{\"alpha\":\"beta\"}}]");
  });
});

describe("formatCellValue", () => {
  it("renders missing values as NULL", () => {
    expect(formatCellValue(null)).toBe("NULL");
    expect(formatCellValue(undefined)).toBe("NULL");
  });

  it("renders scalars in their display form", () => {
    expect(formatCellValue(42n)).toBe("42");
    expect(formatCellValue(1.5)).toBe("1.5");
    expect(formatCellValue(false)).toBe("false");
    expect(formatCellValue(new Date("2024-03-01T12:00:00.000Z"))).toBe(
      "2024-03-01T12:00:00.000Z",
    );
  });

  it("summarizes binary values and stringifies nested ones", () => {
    expect(formatCellValue(new Uint8Array([1, 2, 3]))).toBe("Uint8Array(3)");
    expect(formatCellValue({ city: "Lyon", visits: 3n })).toBe("{\"city\":\"Lyon\",\"visits\":\"3\"}");
  });
});
