import { describe, expect, it } from "vitest";

import { parseArgs, shouldOpenTui } from "./cli.js";

describe("parseArgs", () => {
  it("reads the input and defaults", () => {
    const parsed = parseArgs(["data.parquet"]);

    expect(parsed.input).toBe("data.parquet");
    expect(parsed.help).toBe(false);
    expect(parsed.options).toEqual({
      columns: [],
      json: false,
      schemaOnly: false,
      showSchema: true,
      tuiMode: "auto",
    });
  });

  it("accepts values as separate or inline arguments", () => {
    const parsed = parseArgs(["data.parquet", "--sample-rows", "50", "--columns=a, b,,c", "--sql=SELECT 1"]);

    expect(parsed.options.sampleRows).toBe(50);
    expect(parsed.options.columns).toEqual(["a", "b", "c"]);
    expect(parsed.options.sql).toBe("SELECT 1");
  });

  it("rejects a bad sample size", () => {
    expect(parseArgs(["data.parquet", "--sample-rows=-3"]).error).toBe("invalid --sample-rows value: -3");
    expect(parseArgs(["data.parquet", "--sample-rows=1.5"]).error).toBe("invalid --sample-rows value: 1.5");
  });

  it("rejects unknown options and extra inputs", () => {
    expect(parseArgs(["--bogus"]).error).toBe("unknown option: --bogus");
    expect(parseArgs(["a.parquet", "b.parquet"]).error).toBe("unexpected extra argument: b.parquet");
  });

  it("turns the explorer off for machine-readable output", () => {
    expect(parseArgs(["a.parquet", "--json"]).options.tuiMode).toBe("off");
    expect(parseArgs(["a.parquet", "--schema"]).options.tuiMode).toBe("off");
    expect(parseArgs(["a.parquet", "--no-tui"]).options.tuiMode).toBe("off");
  });

  it("stops at help", () => {
    expect(parseArgs(["-h", "--bogus"]).help).toBe(true);
  });
});

describe("shouldOpenTui", () => {
  it("opens on a terminal by default", () => {
    expect(shouldOpenTui(parseArgs(["a.parquet"]).options, true)).toBe(true);
    expect(shouldOpenTui(parseArgs(["a.parquet"]).options, false)).toBe(false);
  });

  it("honours --tui without a terminal and --plain with one", () => {
    expect(shouldOpenTui(parseArgs(["a.parquet", "--tui"]).options, false)).toBe(true);
    expect(shouldOpenTui(parseArgs(["a.parquet", "--plain"]).options, true)).toBe(false);
  });

  it("never opens for sql or json output", () => {
    expect(shouldOpenTui(parseArgs(["a.parquet", "--tui", "--sql", "SELECT 1"]).options, true)).toBe(false);
    expect(shouldOpenTui(parseArgs(["a.parquet", "--tui", "--json"]).options, true)).toBe(false);
  });
});
