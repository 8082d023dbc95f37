/**
 * Typed configuration for the sync pipeline.
 */

import type {RawConfiguration} from '../connector/types';
import type {Logger} from '../logger';

/** Base configuration all pipelines need */
export interface BaseConfig {
  logger?: Logger;
  existingDbPath?: string; // Path to load existing DB from
}

/** Connector configuration, `{api_token, collection_ids}` */
export interface SmartsheetConfig {
  smartsheet: RawConfiguration;
}

/** Configuration required by the export step */
export interface ExportConfig {
  export?: {
    outputPath: string;
  };
}

/**
 * Full sync pipeline config - intersection of all required configs.
 */
export type SyncPipelineConfig = BaseConfig & SmartsheetConfig & ExportConfig;
