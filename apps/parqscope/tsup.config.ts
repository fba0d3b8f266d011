import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/main.ts", "src/tui.tsx"],
  format: ["esm"],
  sourcemap: true,
  external: [
    "ink",
    "react",
    "cli-table3",
    "hyparquet",
    "hyparquet-compressors",
    "@duckdb/duckdb-wasm",
    "apache-arrow",
  ],
  noExternal: ["@parqscope/parquet-reader", "@parqscope/sql"],
});
