/**
 * Declare one destination table per configured sheet.
 */

import type {Connector} from '../../connector/connector';
import type {RawConfiguration, TableDeclaration} from '../../connector/types';
import {PGliteDestination} from '../../db/destination';
import {PipelineStep} from '../step';

export class DeclareTablesStep extends PipelineStep<void, TableDeclaration[]> {
  readonly name = 'declare-tables';
  readonly description = 'Create a destination table for each configured sheet';
  readonly phase = 'schema' as const;

  constructor(
    private readonly connector: Connector,
    private readonly configuration: RawConfiguration,
  ) {
    super();
  }

  protected async execute(): Promise<TableDeclaration[]> {
    const tables = await this.connector.schema(this.configuration);
    const destination = new PGliteDestination(this.db);

    for (const {table} of tables) {
      await destination.declareTable(table);
    }

    this.log(`Declared ${tables.length} tables: ${tables.map(t => t.table).join(', ')}`);
    return tables;
  }
}
