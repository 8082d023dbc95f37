/**
 * Write the connector's operation stream to the destination.
 */

import type {Connector} from '../../connector/connector';
import type {RawConfiguration, SyncState} from '../../connector/types';
import {PGliteDestination} from '../../db/destination';
import {PipelineStep} from '../step';
import type {SyncSummary, TableCounts} from '../types';

export class ApplyOperationsStep extends PipelineStep<SyncState, SyncSummary> {
  readonly name = 'apply-operations';
  readonly description = 'Apply upserts, deletes and the checkpoint in one transaction';
  readonly phase = 'sync' as const;

  constructor(
    private readonly connector: Connector,
    private readonly configuration: RawConfiguration,
  ) {
    super();
  }

  protected async execute(state: SyncState): Promise<SyncSummary> {
    // Rows and checkpoint commit together; a failed run leaves both untouched.
    const summary = await this.db.transaction(async tx => {
      const destination = new PGliteDestination(tx);
      const tables = new Map<string, TableCounts>();
      let upserts = 0;
      let deletes = 0;
      let checkpoint: SyncState | null = null;

      const countsFor = (table: string): TableCounts => {
        let counts = tables.get(table);
        if (!counts) {
          counts = {upserts: 0, deletes: 0};
          tables.set(table, counts);
        }
        return counts;
      };

      for await (const op of this.connector.update(this.configuration, state)) {
        switch (op.type) {
          case 'upsert':
            await destination.upsert(op.table, op.data);
            upserts++;
            countsFor(op.table).upserts++;
            break;
          case 'delete':
            await destination.delete(op.table, op.keys.id);
            deletes++;
            countsFor(op.table).deletes++;
            break;
          case 'checkpoint':
            await destination.saveState(op.state);
            checkpoint = op.state;
            break;
        }
      }

      if (checkpoint === null) {
        throw new Error('Operation stream ended without a checkpoint');
      }
      // fromEntries keeps a table named `__proto__` an own key.
      const result: SyncSummary = {
        upserts,
        deletes,
        tables: Object.fromEntries(tables),
        checkpoint,
      };
      return result;
    });

    this.log(
      `Applied ${summary.upserts} upserts and ${summary.deletes} deletes ` +
        `across ${Object.keys(summary.tables).length} tables`,
    );
    return summary;
  }
}
