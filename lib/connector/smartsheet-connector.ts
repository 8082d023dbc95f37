/**
 * Smartsheet connector: full and incremental sheet sync with delete detection.
 */

import {logger as defaultLogger} from '../logger';
import type {Logger} from '../logger';
import {getSmartsheetClient} from '../smartsheet/client';
import type {Sheet, SheetFetcher} from '../smartsheet/client';
import {parseConnectorConfiguration} from './config';
import {Connector} from './connector';
import {STALE_CURSOR_DAYS, determineSyncMode, formatCursor} from './cursor';
import type {ModeDecision} from './cursor';
import {describeError} from './errors';
import {buildColumnMap, normalizeRow, tableNameFor} from './normalize';
import {IdSetReconciler} from './reconcile';
import type {Reconciler} from './reconcile';
import type {
  Operation,
  RawConfiguration,
  RowId,
  SyncMode,
  SyncState,
  TableDeclaration,
} from './types';

export interface SmartsheetConnectorOptions {
  logger?: Logger;
  /** Build the fetcher for a run from the configured API token */
  createClient?: (token: string) => SheetFetcher;
  /** Clock; the value read at run start becomes the next cursor */
  now?: () => Date;
  staleAfterDays?: number;
  reconciler?: Reconciler;
}

function describeDecision(decision: ModeDecision): string {
  if (decision.mode === 'incremental') {
    return `Attempting incremental sync from cursor: ${decision.cursor}`;
  }
  switch (decision.reason) {
    case 'stale-cursor':
      return 'Forcing full sync due to age of sync_cursor';
    case 'invalid-cursor':
      return 'Could not parse sync_cursor. Forcing full sync';
    case 'no-cursor':
      return 'Performing full sync (no cursor)';
  }
}

export function createSmartsheetConnector(
  options: SmartsheetConnectorOptions = {},
): Connector {
  const {
    logger = defaultLogger,
    createClient = (token: string) => getSmartsheetClient({token, logger}),
    now = () => new Date(),
    staleAfterDays = STALE_CURSOR_DAYS,
    reconciler = new IdSetReconciler(),
  } = options;

  const schema = async (
    configuration: RawConfiguration,
  ): Promise<TableDeclaration[]> => {
    const {apiToken, collectionIds} = parseConnectorConfiguration(configuration);
    const client = createClient(apiToken);
    const tables: TableDeclaration[] = [];

    for (const sheetId of collectionIds) {
      let sheetName: string | undefined;
      try {
        const sheet = await client.getSheet(sheetId);
        sheetName = sheet.name;
      } catch (error) {
        logger.warn(
          `Could not look up name of sheet ${sheetId}: ${describeError(error)}`,
        );
      }
      tables.push({table: tableNameFor(sheetId, sheetName), primary_key: ['id']});
    }

    return tables;
  };

  async function* update(
    configuration: RawConfiguration,
    state: SyncState,
  ): AsyncGenerator<Operation, void, undefined> {
    const {apiToken, collectionIds} = parseConnectorConfiguration(configuration);

    const runStartedAt = now();
    const nextCursor = formatCursor(runStartedAt);
    const decision = determineSyncMode(
      state.sync_cursor,
      runStartedAt,
      staleAfterDays,
    );
    logger.info(describeDecision(decision));

    const client = createClient(apiToken);
    const allIds = new Map<string, RowId[]>(Object.entries(state.all_ids ?? {}));

    for (const sheetId of collectionIds) {
      logger.info(`Processing sheet ${sheetId}`);
      const previous = allIds.get(sheetId);

      // A sheet without a recorded ID set needs a complete first snapshot.
      let cursor: string | undefined;
      if (decision.mode === 'incremental') {
        if (previous === undefined) {
          logger.info(`Sheet ${sheetId} has no recorded rows; fetching it in full`);
        } else {
          cursor = decision.cursor;
        }
      }
      const mode: SyncMode = cursor === undefined ? 'full' : 'incremental';

      let sheet: Sheet;
      try {
        sheet = await client.getSheet(
          sheetId,
          cursor === undefined ? {} : {rowsModifiedSince: cursor},
        );
      } catch (error) {
        logger.error(`Failed to fetch sheet ${sheetId}: ${describeError(error)}`);
        continue;
      }

      const table = tableNameFor(sheetId, sheet.name);
      const columnMap = buildColumnMap(sheet.columns);
      const observed: RowId[] = [];
      let processedRows = 0;

      for (const raw of sheet.rows) {
        const result = normalizeRow(raw, columnMap);
        if (result.id !== undefined) observed.push(result.id);

        if (!result.ok) {
          logger.error(
            `Error processing row ${result.id ?? 'unknown'} in sheet ${sheetId}: ${result.reason}`,
          );
          continue;
        }

        yield {type: 'upsert', table, data: result.record};
        processedRows++;
      }

      const plan = reconciler.reconcile(previous, observed, mode);
      for (const id of plan.deleted) {
        yield {type: 'delete', table, keys: {id}};
      }

      allIds.set(sheetId, plan.current);
      logger.info(
        `Processed ${processedRows} rows for sheet ${sheetId} ` +
          `(${mode} sync, ${plan.deleted.length} deleted, ${plan.current.length} tracked)`,
      );
    }

    yield {
      type: 'checkpoint',
      state: {sync_cursor: nextCursor, all_ids: Object.fromEntries(allIds)},
    };
  }

  return new Connector({schema, update});
}
