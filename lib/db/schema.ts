/**
 * Database schema and TypeScript types.
 */

/** Internal tables - executed on init */
export const SCHEMA = `
  -- Single-row checkpoint written once per run
  CREATE TABLE IF NOT EXISTS _sync_state (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    state JSONB NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;

/** DDL for a synced sheet table; `quotedName` must already be an escaped identifier */
export function sheetTableDDL(quotedName: string): string {
  return `
  CREATE TABLE IF NOT EXISTS ${quotedName} (
    id TEXT PRIMARY KEY,
    data JSONB NOT NULL,
    synced_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;
}

/** Double-quote an identifier, escaping embedded quotes */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

// TypeScript Types

export interface SyncStateRow {
  id: 1;
  state: unknown;
  updated_at: Date;
}

export interface SheetRow {
  id: string;
  data: Record<string, unknown>;
  synced_at: Date;
}
