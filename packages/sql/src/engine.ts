import { randomUUID } from "node:crypto";
import { createRequire as nodeCreateRequire } from "node:module";
import path from "node:path";

import {
  DuckDBAccessMode,
  DuckDBBindings,
  DuckDBBundles,
  DuckDBDataProtocol,
  NODE_RUNTIME,
  VoidLogger,
  createDuckDB,
} from "@duckdb/duckdb-wasm/blocking";
import { isRemoteInput } from "@parqscope/parquet-reader";

import { tableToResultSet } from "./normalize.js";
import type { QueryExecutor, QueryOutcome } from "./types.js";

export type QueryEngine = QueryExecutor & {
  close: () => void;
};

type RegisteredFile = {
  filePath: string;
  fileName: string;
};

let duckDbPromise: Promise<DuckDBBindings> | null = null;

/**
 * Instantiate DuckDB once and hand back a synchronous executor. Each query
 * runs against the view `data`, which points at the file passed to
 * `execute`.
 */
export async function createQueryEngine(): Promise<QueryEngine> {
  const db = await getDuckDb();
  const conn = db.connect();
  let current: RegisteredFile | null = null;

  const useFile = (filePath: string) => {
    if (current?.filePath === filePath) {
      return;
    }

    const fileName = buildDuckDbFileName(filePath);
    db.registerFileURL(fileName, path.resolve(filePath), DuckDBDataProtocol.NODE_FS, true);
    try {
      conn.query(
        `CREATE OR REPLACE VIEW data AS SELECT * FROM read_parquet(${quoteLiteral(fileName)})`,
      );
    } catch (caught) {
      db.dropFile(fileName);
      throw caught;
    }

    if (current) {
      db.dropFile(current.fileName);
    }
    current = { filePath, fileName };
  };

  return {
    execute: (filePath: string, query: string): QueryOutcome => {
      if (isRemoteInput(filePath)) {
        return { ok: false, message: "queries require a local file" };
      }

      try {
        useFile(filePath);
        return { ok: true, result: tableToResultSet(conn.query(query)) };
      } catch (caught) {
        const message = caught instanceof Error ? caught.message : String(caught);
        return { ok: false, message };
      }
    },
    close: () => {
      conn.close();
      if (current) {
        db.dropFile(current.fileName);
        current = null;
      }
    },
  };
}

async function getDuckDb(): Promise<DuckDBBindings> {
  if (!duckDbPromise) {
    duckDbPromise = (async () => {
      const db = await createDuckDB(getDuckDbBundles(), new VoidLogger(), NODE_RUNTIME);
      await db.instantiate();
      db.open({ accessMode: DuckDBAccessMode.READ_WRITE });
      return db;
    })();
  }

  return duckDbPromise;
}

function getDuckDbBundles(): DuckDBBundles {
  const localRequire = nodeCreateRequire(import.meta.url);
  const mvpModule = localRequire.resolve("@duckdb/duckdb-wasm/dist/duckdb-mvp.wasm");
  const mvpWorker = localRequire.resolve("@duckdb/duckdb-wasm/dist/duckdb-node-mvp.worker.cjs");
  const ehModule = localRequire.resolve("@duckdb/duckdb-wasm/dist/duckdb-eh.wasm");
  const ehWorker = localRequire.resolve("@duckdb/duckdb-wasm/dist/duckdb-node-eh.worker.cjs");

  return {
    mvp: {
      mainModule: mvpModule,
      mainWorker: mvpWorker,
    },
    eh: {
      mainModule: ehModule,
      mainWorker: ehWorker,
    },
  };
}

function buildDuckDbFileName(input: string): string {
  const suffix = path.extname(input) || ".parquet";
  return `parqscope-${randomUUID()}${suffix}`;
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
