/**
 * Core types shared by the connector, the reconciler and the destination.
 */

/** Scalar cell value; the variant is told apart by `typeof` */
export type CellValue = string | number | boolean | null;

/** Row identifier, unique within its sheet */
export type RowId = string | number;

/** Flat destination record: column name to scalar value */
export type SyncRecord = Record<string, CellValue>;

/** Whether a run fetches complete snapshots or only rows changed since the cursor */
export type SyncMode = 'full' | 'incremental';

/** Persisted connector state, round-tripped verbatim by the destination */
export interface SyncState {
  sync_cursor?: string;
  all_ids?: Record<string, RowId[]>;
}

/** Destination table declaration */
export interface TableDeclaration {
  table: string;
  primary_key: ['id'];
}

export interface UpsertOperation {
  type: 'upsert';
  table: string;
  data: SyncRecord;
}

export interface DeleteOperation {
  type: 'delete';
  table: string;
  keys: {id: RowId};
}

export interface CheckpointOperation {
  type: 'checkpoint';
  state: SyncState;
}

/** Ordered stream element produced by `update` */
export type Operation = UpsertOperation | DeleteOperation | CheckpointOperation;

/** Raw connector configuration, as read from a file or the environment */
export type RawConfiguration = Record<string, unknown>;
