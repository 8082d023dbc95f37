/**
 * Destination contract over PGlite: upsert-by-key, delete-by-key and an
 * opaque checkpoint blob.
 */

import type {RowId, SyncRecord, SyncState} from '../connector/types';
import type {TransactionScope} from './pglite';
import {quoteIdent, sheetTableDDL} from './schema';
import type {SyncStateRow} from './schema';

export class PGliteDestination {
  private declared = new Set<string>();

  constructor(private readonly scope: TransactionScope) {}

  /** Create the table for a sheet if it does not exist yet */
  async declareTable(table: string): Promise<void> {
    if (this.declared.has(table)) return;
    await this.scope.exec(sheetTableDDL(quoteIdent(table)));
    this.declared.add(table);
  }

  async upsert(table: string, record: SyncRecord): Promise<void> {
    await this.declareTable(table);
    await this.scope.query(
      `INSERT INTO ${quoteIdent(table)} (id, data, synced_at)
       VALUES ($1, $2::jsonb, NOW())
       ON CONFLICT (id) DO UPDATE SET
         data = EXCLUDED.data,
         synced_at = EXCLUDED.synced_at`,
      [String(record.id), JSON.stringify(record)],
    );
  }

  async delete(table: string, id: RowId): Promise<void> {
    await this.declareTable(table);
    await this.scope.query(`DELETE FROM ${quoteIdent(table)} WHERE id = $1`, [
      String(id),
    ]);
  }

  /** Replace the stored checkpoint */
  async saveState(state: SyncState): Promise<void> {
    await this.scope.query(
      `INSERT INTO _sync_state (id, state, updated_at)
       VALUES (1, $1::jsonb, NOW())
       ON CONFLICT (id) DO UPDATE SET
         state = EXCLUDED.state,
         updated_at = EXCLUDED.updated_at`,
      [JSON.stringify(state)],
    );
  }

  /** Stored checkpoint blob, or undefined before the first run */
  async loadState(): Promise<unknown> {
    const rows = await this.scope.query<Pick<SyncStateRow, 'state'>>(
      'SELECT state FROM _sync_state WHERE id = 1',
    );
    return rows.length > 0 ? rows[0].state : undefined;
  }
}
