/**
 * Three-phase pipeline orchestrator: schema, sync, export.
 */

import {parseSyncState} from '../connector/state';
import type {SyncState} from '../connector/types';
import {PGliteDatabase, PGliteDestination} from '../db';
import {logger as defaultLogger} from '../logger';
import type {BaseConfig} from './config';
import type {PipelineStep, StepContext, Logger} from './step';
import {isSyncSummary} from './types';
import type {PhaseResult, PipelineResult, StepSummary} from './types';

/**
 * Three-phase pipeline around one connector run.
 *
 * The stored checkpoint is read from the destination between the schema and
 * the sync phase and handed to the sync phase as its input.
 */
export class SyncPipeline {
  private schemaSteps: PipelineStep<unknown, unknown>[] = [];
  private syncSteps: PipelineStep<unknown, unknown>[] = [];
  private exportSteps: PipelineStep<unknown, unknown>[] = [];

  private db: PGliteDatabase | null = null;

  constructor(private readonly config: BaseConfig = {}) {}

  /** Add a step to the appropriate phase based on step.phase */
  addStep<TIn, TOut>(step: PipelineStep<TIn, TOut>): this {
    switch (step.phase) {
      case 'schema':
        this.schemaSteps.push(step);
        break;
      case 'sync':
        this.syncSteps.push(step);
        break;
      case 'export':
        this.exportSteps.push(step);
        break;
    }
    return this;
  }

  /** Run the complete pipeline */
  async run(): Promise<PipelineResult> {
    const totalStart = performance.now();
    const logger = this.logger;

    try {
      this.db = await this.loadOrCreateDatabase();
      const db = this.db;

      // SCHEMA PHASE - Declare destination tables
      logger.info('═══ SCHEMA PHASE ═══');
      const schemaResult = await this.runPhase(db, this.schemaSteps, undefined);

      // STATE - Read the last committed checkpoint
      const state = await this.loadState(db);

      // SYNC PHASE - Stream operations into the destination
      logger.info('═══ SYNC PHASE ═══');
      const syncResult = await this.runPhase(db, this.syncSteps, state);
      const summary = isSyncSummary(syncResult.output) ? syncResult.output : null;

      // EXPORT PHASE - Persist the database
      logger.info('═══ EXPORT PHASE ═══');
      const exportResult = await this.runPhase(
        db,
        this.exportSteps,
        syncResult.output,
      );

      return {
        success: true,
        totalDuration: performance.now() - totalStart,
        summary,
        phases: {
          schema: {duration: schemaResult.duration, steps: schemaResult.steps},
          sync: {duration: syncResult.duration, steps: syncResult.steps},
          export: {duration: exportResult.duration, steps: exportResult.steps},
        },
      };
    } catch (error) {
      logger.error(`Pipeline failed: ${error}`);
      throw error;
    } finally {
      await this.close();
    }
  }

  private get logger(): Logger {
    return this.config.logger ?? defaultLogger;
  }

  private async loadOrCreateDatabase(): Promise<PGliteDatabase> {
    const logger = this.logger;
    let db: PGliteDatabase | null = null;

    if (this.config.existingDbPath) {
      try {
        logger.info('[Pipeline] Loading existing database...');
        db = await PGliteDatabase.fromFile(this.config.existingDbPath);
      } catch (error) {
        logger.info(
          `[Pipeline] Could not load existing DB (${error}), creating new...`,
        );
      }
    }

    if (!db) {
      logger.info('[Pipeline] Creating new in-memory database...');
      db = await PGliteDatabase.create();
    }
    await db.initSchema();
    return db;
  }

  private async loadState(db: PGliteDatabase): Promise<SyncState> {
    const stored = await new PGliteDestination(db).loadState();
    const state = parseSyncState(stored);
    this.logger.info(
      state.sync_cursor
        ? `[Pipeline] Loaded checkpoint with cursor ${state.sync_cursor}`
        : '[Pipeline] No usable checkpoint cursor stored',
    );
    return state;
  }

  private async runPhase(
    db: PGliteDatabase,
    steps: PipelineStep<unknown, unknown>[],
    initialInput: unknown,
  ): Promise<PhaseResult> {
    const start = performance.now();
    const stepSummaries: StepSummary[] = [];
    let currentInput = initialInput;

    const ctx: StepContext = {logger: this.logger, db};

    for (const step of steps) {
      const result = await step.run(currentInput, ctx);
      stepSummaries.push({
        name: step.name,
        duration: result.duration,
        success: true,
      });
      currentInput = result.data;
    }

    return {
      output: currentInput,
      duration: performance.now() - start,
      steps: stepSummaries,
    };
  }

  async close(): Promise<void> {
    await this.db?.close();
    this.db = null;
  }
}
