/**
 * Export database to file.
 */

import {PipelineStep} from '../step';

export class ExportDatabaseStep extends PipelineStep<unknown, Blob> {
  readonly name = 'export-database';
  readonly description = 'Export database to file';
  readonly phase = 'export' as const;

  constructor(private readonly outputPath: string) {
    super();
  }

  protected async execute(): Promise<Blob> {
    await this.db.dumpToFile(this.outputPath);
    const blob = await this.db.dump();

    this.log(`Exported database to ${this.outputPath}`);
    return blob;
  }
}
