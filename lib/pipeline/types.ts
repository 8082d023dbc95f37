/**
 * Core types for the sync pipeline.
 */

import type {SyncState} from '../connector/types';

/** Phases of the sync pipeline */
export type Phase = 'schema' | 'sync' | 'export';

/** Operations written to one destination table */
export interface TableCounts {
  upserts: number;
  deletes: number;
}

/** What the sync phase wrote to the destination */
export interface SyncSummary {
  upserts: number;
  deletes: number;
  tables: Record<string, TableCounts>;
  /** State committed with the run, null if the stream never checkpointed */
  checkpoint: SyncState | null;
}

/** Step execution result */
export interface StepResult<T> {
  data: T;
  duration: number;
}

/** Summary of a step execution */
export interface StepSummary {
  name: string;
  duration: number;
  success: boolean;
}

/** Result of running a pipeline phase */
export interface PhaseResult {
  output: unknown;
  duration: number;
  steps: StepSummary[];
}

/** Full pipeline execution result */
export interface PipelineResult {
  success: boolean;
  totalDuration: number;
  /** Null when no step of the sync phase reported one */
  summary: SyncSummary | null;
  phases: {
    schema: {duration: number; steps: StepSummary[]};
    sync: {duration: number; steps: StepSummary[]};
    export: {duration: number; steps: StepSummary[]};
  };
}

export function isSyncSummary(value: unknown): value is SyncSummary {
  return (
    typeof value === 'object' &&
    value !== null &&
    'upserts' in value &&
    typeof value.upserts === 'number' &&
    'deletes' in value &&
    typeof value.deletes === 'number' &&
    'tables' in value &&
    'checkpoint' in value
  );
}
