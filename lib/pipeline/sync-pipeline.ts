/**
 * Factory function to create a fully configured sync pipeline.
 */

import type {Connector} from '../connector/connector';
import {createSmartsheetConnector} from '../connector/smartsheet-connector';
import type {SyncPipelineConfig} from './config';
import {SyncPipeline} from './pipeline';
import {
  ApplyOperationsStep,
  DeclareTablesStep,
  ExportDatabaseStep,
} from './steps';

/**
 * Create a fully configured sync pipeline.
 *
 * The export step is only added when `config.export` is set.
 */
export function createSyncPipeline(
  config: SyncPipelineConfig,
  connector: Connector = createSmartsheetConnector({logger: config.logger}),
): SyncPipeline {
  const pipeline = new SyncPipeline(config);

  // Schema phase
  pipeline.addStep(new DeclareTablesStep(connector, config.smartsheet));

  // Sync phase
  pipeline.addStep(new ApplyOperationsStep(connector, config.smartsheet));

  // Export phase
  if (config.export) {
    pipeline.addStep(new ExportDatabaseStep(config.export.outputPath));
  }

  return pipeline;
}
