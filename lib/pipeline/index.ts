/**
 * Pipeline module - re-exports all public APIs.
 */

// Types
export type {
  Phase,
  TableCounts,
  SyncSummary,
  StepResult,
  StepSummary,
  PipelineResult,
  PhaseResult,
} from './types';
export {isSyncSummary} from './types';

// Config
export type {
  BaseConfig,
  SmartsheetConfig,
  ExportConfig,
  SyncPipelineConfig,
} from './config';

// Step base class
export {PipelineStep} from './step';
export type {Logger, StepContext} from './step';

// Pipeline orchestrator
export {SyncPipeline} from './pipeline';

// Factory function
export {createSyncPipeline} from './sync-pipeline';

// Steps
export * from './steps';
