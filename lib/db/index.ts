/**
 * Database module - re-exports all public APIs.
 */

export {PGliteDatabase} from './pglite';
export type {TransactionScope} from './pglite';

export {PGliteDestination} from './destination';

export {SCHEMA, quoteIdent, sheetTableDDL} from './schema';
export type {SyncStateRow, SheetRow} from './schema';
