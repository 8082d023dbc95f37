/**
 * Unit tests for configuration and stored-state parsing.
 */

import {describe, it, expect, afterEach} from 'vitest';
import {existsSync, unlinkSync, writeFileSync} from 'fs';
import {parseConnectorConfiguration} from '../lib/connector/config';
import {ConfigurationError} from '../lib/connector/errors';
import {parseSyncState} from '../lib/connector/state';
import {loadPipelineConfig} from '../lib/pipeline/load-config';

describe('parseConnectorConfiguration', () => {
  it('should split and trim the sheet id list', () => {
    const config = parseConnectorConfiguration({
      api_token: 'test-token',
      collection_ids: ' 111, 222 ,,333 ',
    });

    expect(config).toEqual({
      apiToken: 'test-token',
      collectionIds: ['111', '222', '333'],
    });
  });

  it('should reject a missing token', () => {
    expect(() =>
      parseConnectorConfiguration({collection_ids: '111'}),
    ).toThrow(ConfigurationError);
    expect(() =>
      parseConnectorConfiguration({collection_ids: '111'}),
    ).toThrow(
      'Missing API token or sheet IDs in configuration: api_token is required',
    );
  });

  it('should reject a blank token', () => {
    expect(() =>
      parseConnectorConfiguration({api_token: '   ', collection_ids: '111'}),
    ).toThrow('api_token must not be empty');
  });

  it('should reject an empty id list', () => {
    expect(() =>
      parseConnectorConfiguration({api_token: 'test-token', collection_ids: ' , '}),
    ).toThrow('collection_ids must name a sheet');
    expect(() =>
      parseConnectorConfiguration({api_token: 'test-token'}),
    ).toThrow('collection_ids is required');
  });
});

describe('parseSyncState', () => {
  it('should read a stored checkpoint', () => {
    const state = parseSyncState({
      sync_cursor: '2024-05-01T12:00:00Z',
      all_ids: {'111': [1, 2, 3]},
    });

    expect(state).toEqual({
      sync_cursor: '2024-05-01T12:00:00Z',
      all_ids: {'111': [1, 2, 3]},
    });
  });

  it('should read a missing or non-object blob as empty state', () => {
    expect(parseSyncState(undefined)).toEqual({});
    expect(parseSyncState(null)).toEqual({});
    expect(parseSyncState('oops')).toEqual({});
  });

  it('should drop malformed fields and keep the rest', () => {
    const state = parseSyncState({
      sync_cursor: 42,
      all_ids: {'111': [1, 2]},
    });

    expect(state).toEqual({all_ids: {'111': [1, 2]}});
    expect(parseSyncState({all_ids: ['not', 'a', 'map']})).toEqual({});
  });
});

describe('loadPipelineConfig', () => {
  const configPath = './test-configuration.json';

  afterEach(() => {
    if (existsSync(configPath)) {
      unlinkSync(configPath);
    }
  });

  it('should read connector settings from the environment', async () => {
    const config = await loadPipelineConfig({
      env: {
        SMARTSHEET_API_TOKEN: 'test-token',
        SMARTSHEET_SHEET_IDS: '111,222',
        SYNC_DB_PATH: './state.tar.gz',
      },
    });

    expect(config.smartsheet).toEqual({
      api_token: 'test-token',
      collection_ids: '111,222',
    });
    expect(config.existingDbPath).toBe('./state.tar.gz');
    expect(config.export).toEqual({outputPath: './state.tar.gz'});
  });

  it('should skip the export without a database path', async () => {
    const config = await loadPipelineConfig({env: {}});

    expect(config.existingDbPath).toBeUndefined();
    expect(config.export).toBeUndefined();
  });

  it('should prefer a configuration file', async () => {
    writeFileSync(
      configPath,
      JSON.stringify({api_token: 'file-token', collection_ids: '333'}),
    );

    const config = await loadPipelineConfig({
      configPath,
      env: {SMARTSHEET_API_TOKEN: 'env-token'},
    });

    expect(config.smartsheet).toEqual({
      api_token: 'file-token',
      collection_ids: '333',
    });
  });

  it('should reject a file that is not a JSON object', async () => {
    writeFileSync(configPath, '[1, 2]');

    await expect(loadPipelineConfig({configPath})).rejects.toThrow(
      ConfigurationError,
    );
  });

  it('should reject a missing file', async () => {
    await expect(
      loadPipelineConfig({configPath: './does-not-exist.json'}),
    ).rejects.toThrow('Could not read configuration file ./does-not-exist.json');
  });
});
