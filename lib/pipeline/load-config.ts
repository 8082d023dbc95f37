/**
 * Build the pipeline configuration from the environment or a JSON file.
 */

import {readFile} from 'fs/promises';
import {z} from 'zod';
import {ConfigurationError, describeError} from '../connector/errors';
import type {RawConfiguration} from '../connector/types';
import type {Logger} from '../logger';
import type {SyncPipelineConfig} from './config';

const configurationFileSchema = z.record(z.string(), z.unknown());

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** JSON file holding `{api_token, collection_ids}`; overrides the environment */
  configPath?: string;
  /** Database tarball loaded at start and written back at the end */
  dbPath?: string;
  logger?: Logger;
}

async function readConfigurationFile(path: string): Promise<RawConfiguration> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read configuration file ${path}: ${describeError(error)}`,
    );
  }
  const result = configurationFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      `Configuration file ${path} must contain a JSON object`,
    );
  }
  return result.data;
}

export async function loadPipelineConfig(
  options: LoadConfigOptions = {},
): Promise<SyncPipelineConfig> {
  const env = options.env ?? process.env;

  const smartsheet: RawConfiguration = options.configPath
    ? await readConfigurationFile(options.configPath)
    : {
        api_token: env.SMARTSHEET_API_TOKEN,
        collection_ids: env.SMARTSHEET_SHEET_IDS,
      };

  const dbPath = options.dbPath ?? env.SYNC_DB_PATH;

  return {
    logger: options.logger,
    smartsheet,
    ...(dbPath ? {existingDbPath: dbPath, export: {outputPath: dbPath}} : {}),
  };
}
