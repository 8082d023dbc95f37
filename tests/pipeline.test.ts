/**
 * End-to-end runs of the sync pipeline against in-memory sheets.
 */

import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {unlink} from 'fs/promises';
import {createSyncPipeline} from '../lib/pipeline/sync-pipeline';
import {createSmartsheetConnector} from '../lib/connector/smartsheet-connector';
import {PGliteDatabase} from '../lib/db/pglite';
import type {SheetRow} from '../lib/db/schema';
import type {SyncPipelineConfig} from '../lib/pipeline/config';
import {MockLogger, MockSheetFetcher, createMockSheet} from './mocks';

const DB_PATH = './test-pipeline.db.tar.gz';

describe('SyncPipeline', () => {
  let fetcher: MockSheetFetcher;
  let logger: MockLogger;
  let clock: Date;
  let config: SyncPipelineConfig;

  const runOnce = () =>
    createSyncPipeline(
      config,
      createSmartsheetConnector({
        logger,
        createClient: fetcher.createClient,
        now: () => clock,
      }),
    ).run();

  const readTable = async (table: string): Promise<SheetRow[]> => {
    const db = await PGliteDatabase.fromFile(DB_PATH);
    try {
      return await db.query<SheetRow>(`SELECT id, data FROM ${table}`);
    } finally {
      await db.close();
    }
  };

  beforeEach(() => {
    fetcher = new MockSheetFetcher(
      new Map([['111', createMockSheet('Budget 2024', [1, 2, 3])]]),
    );
    logger = new MockLogger();
    clock = new Date('2024-05-10T12:00:00Z');
    config = {
      logger,
      smartsheet: {api_token: 'test-token', collection_ids: '111'},
      existingDbPath: DB_PATH,
      export: {outputPath: DB_PATH},
    };
  });

  afterEach(async () => {
    await unlink(DB_PATH).catch(() => {});
  });

  it('should run a full sync then an incremental one from the stored checkpoint', async () => {
    const first = await runOnce();

    expect(first.success).toBe(true);
    expect(first.summary).toEqual({
      upserts: 3,
      deletes: 0,
      tables: {budget_2024: {upserts: 3, deletes: 0}},
      checkpoint: {sync_cursor: '2024-05-10T12:00:00Z', all_ids: {'111': [1, 2, 3]}},
    });
    expect(first.phases.schema.steps.map(s => s.name)).toEqual(['declare-tables']);
    expect(first.phases.sync.steps.map(s => s.name)).toEqual(['apply-operations']);
    expect(first.phases.export.steps.map(s => s.name)).toEqual(['export-database']);

    clock = new Date('2024-05-11T12:00:00Z');
    fetcher.setSheet('111', createMockSheet('Budget 2024', [4]));
    const second = await runOnce();

    // Each run looks the sheet up once for its name, then fetches its rows.
    expect(fetcher.requests.map(r => r.options)).toEqual([
      {},
      {},
      {},
      {rowsModifiedSince: '2024-05-10T12:00:00Z'},
    ]);
    expect(second.summary?.checkpoint).toEqual({
      sync_cursor: '2024-05-11T12:00:00Z',
      all_ids: {'111': [1, 2, 3, 4]},
    });
    const rows = await readTable('budget_2024');
    expect(rows.map(r => r.id).sort()).toEqual(['1', '2', '3', '4']);
  });

  it('should delete rows that vanished once the cursor goes stale', async () => {
    await runOnce();

    clock = new Date('2024-05-20T12:00:00Z');
    fetcher.setSheet('111', createMockSheet('Budget 2024', [2]));
    const second = await runOnce();

    expect(second.summary?.deletes).toBe(2);
    const rows = await readTable('budget_2024');
    expect(rows.map(r => r.id)).toEqual(['2']);
    expect(logger.hasMessage('Forcing full sync due to age of sync_cursor')).toBe(true);
  });

  it('should checkpoint even when a sheet fails to load', async () => {
    fetcher.setSheet('111', new Error('service unavailable'));

    const result = await runOnce();

    expect(result.summary).toEqual({
      upserts: 0,
      deletes: 0,
      tables: {},
      checkpoint: {sync_cursor: '2024-05-10T12:00:00Z', all_ids: {}},
    });
    expect(logger.getErrors()).toEqual([
      'Failed to fetch sheet 111: service unavailable',
    ]);
  });

  it('should leave the stored database untouched when configuration is invalid', async () => {
    await runOnce();

    config = {...config, smartsheet: {collection_ids: '111'}};
    await expect(runOnce()).rejects.toThrow('Missing API token or sheet IDs');

    const rows = await readTable('budget_2024');
    expect(rows).toHaveLength(3);
    expect(logger.hasMessage('Pipeline failed')).toBe(true);
  });
});
