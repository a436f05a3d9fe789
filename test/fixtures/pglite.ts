import { PGlite } from "@electric-sql/pglite";
import type { SqlConnection, SqlPool, SqlResult } from "../../src/store/pg-store.js";

const INT8_OID = 20;

/**
 * In-process Postgres behind the store's pool interface. PGlite has a single
 * connection, so sessions take turns: `connect` resolves once the previous
 * session has been released.
 */
export class PglitePool implements SqlPool {
  readonly db = new PGlite({
    parsers: { [INT8_OID]: (value: string) => parseInt(value, 10) },
  });
  private turn: Promise<void> = Promise.resolve();

  async connect(): Promise<SqlConnection> {
    const previous = this.turn;
    let release = () => {};
    this.turn = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    await previous;

    const db = this.db;
    let released = false;
    return {
      query: async <R>(text: string, values?: unknown[]): Promise<SqlResult<R>> => {
        const result = await db.query<R>(text, values);
        return { rows: result.rows, rowCount: result.affectedRows ?? null };
      },
      exec: async (script: string): Promise<void> => {
        await db.exec(script);
      },
      release: () => {
        if (released) return;
        released = true;
        release();
      },
    };
  }

  async end(): Promise<void> {
    await this.db.close();
  }
}
