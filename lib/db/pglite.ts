/**
 * PGlite database wrapper.
 */

import {PGlite} from '@electric-sql/pglite';
import {readFile, writeFile} from 'fs/promises';
import {SCHEMA} from './schema';

export interface TransactionScope {
  query<T>(sql: string, params?: unknown[]): Promise<T[]>;
  exec(sql: string): Promise<void>;
}

export class PGliteDatabase implements TransactionScope {
  private constructor(private db: PGlite) {}

  /** Create a new in-memory database */
  static async create(): Promise<PGliteDatabase> {
    const db = await PGlite.create();
    return new PGliteDatabase(db);
  }

  /** Load database from a file (gzipped tarball) */
  static async fromFile(path: string): Promise<PGliteDatabase> {
    const buffer = await readFile(path);
    const db = await PGlite.create({loadDataDir: new Blob([buffer])});
    return new PGliteDatabase(db);
  }

  /** Initialize schema (idempotent) */
  async initSchema(): Promise<void> {
    await this.db.exec(SCHEMA);
  }

  /** Execute a parameterized query */
  async query<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[],
  ): Promise<T[]> {
    const result = await this.db.query<T>(sql, params);
    return result.rows;
  }

  /** Execute raw SQL (no params, multiple statements OK) */
  async exec(sql: string): Promise<void> {
    await this.db.exec(sql);
  }

  /** Run a transaction; it rolls back if `fn` throws */
  async transaction<T>(fn: (tx: TransactionScope) => Promise<T>): Promise<T> {
    return this.db.transaction(async pgTx => {
      const scope: TransactionScope = {
        query: async <R>(sql: string, params?: unknown[]) => {
          const result = await pgTx.query<R>(sql, params);
          return result.rows;
        },
        exec: async (sql: string) => {
          await pgTx.exec(sql);
        },
      };
      return fn(scope);
    });
  }

  // Export

  /** Dump database to a gzipped tarball */
  async dump(): Promise<Blob> {
    // File extends Blob, so either return type is usable as-is
    return this.db.dumpDataDir('gzip');
  }

  /** Save dump to file */
  async dumpToFile(path: string): Promise<void> {
    const blob = await this.dump();
    const buffer = Buffer.from(await blob.arrayBuffer());
    await writeFile(path, buffer);
  }

  /** Close the database */
  async close(): Promise<void> {
    await this.db.close();
  }
}
