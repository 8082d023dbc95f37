/**
 * Connector module - re-exports all public APIs.
 */

// Types
export type {
  CellValue,
  RowId,
  SyncRecord,
  SyncMode,
  SyncState,
  TableDeclaration,
  UpsertOperation,
  DeleteOperation,
  CheckpointOperation,
  Operation,
  RawConfiguration,
} from './types';

// Configuration
export {parseConnectorConfiguration} from './config';
export type {ConnectorConfiguration} from './config';
export {ConfigurationError, describeError} from './errors';

// Cursor and state
export {STALE_CURSOR_DAYS, determineSyncMode, formatCursor} from './cursor';
export type {ModeDecision, FullSyncReason} from './cursor';
export {parseSyncState} from './state';

// Normalization and reconciliation
export {
  RESERVED_FIELDS,
  buildColumnMap,
  formatTableName,
  normalizeRow,
  tableNameFor,
} from './normalize';
export type {NormalizeResult, SheetColumn} from './normalize';
export {IdSetReconciler} from './reconcile';
export type {Reconciler, ReconcilePlan} from './reconcile';

// Connector
export {Connector} from './connector';
export type {ConnectorHandlers} from './connector';
export {createSmartsheetConnector} from './smartsheet-connector';
export type {SmartsheetConnectorOptions} from './smartsheet-connector';
