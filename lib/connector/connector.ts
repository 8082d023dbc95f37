/**
 * Connector object binding a schema handler and an update handler.
 */

import type {
  Operation,
  RawConfiguration,
  SyncState,
  TableDeclaration,
} from './types';

export interface ConnectorHandlers {
  /** Declare one destination table per configured source */
  schema: (configuration: RawConfiguration) => Promise<TableDeclaration[]>;
  /**
   * Produce the ordered operation stream for one run. The stream ends with
   * exactly one checkpoint operation.
   */
  update: (
    configuration: RawConfiguration,
    state: SyncState,
  ) => AsyncGenerator<Operation, void, undefined>;
}

/**
 * Created once at process start and handed to the pipeline.
 */
export class Connector {
  constructor(private readonly handlers: ConnectorHandlers) {}

  schema(configuration: RawConfiguration): Promise<TableDeclaration[]> {
    return this.handlers.schema(configuration);
  }

  update(
    configuration: RawConfiguration,
    state: SyncState,
  ): AsyncGenerator<Operation, void, undefined> {
    return this.handlers.update(configuration, state);
  }
}
