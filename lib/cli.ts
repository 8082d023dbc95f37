/**
 * Command-line definition for a one-shot sync run.
 */

import {Command} from 'commander';
import {z} from 'zod';

const syncOptionsSchema = z.object({
  config: z.string().optional(),
  db: z.string().optional(),
});

export type SyncCommandOptions = z.infer<typeof syncOptionsSchema>;

export function createSyncCommand(
  action: (options: SyncCommandOptions) => Promise<void>,
): Command {
  return new Command()
    .name('sheet-sync')
    .description('Sync Smartsheet sheets into a PGlite database')
    .version('0.1.0')
    .option('-c, --config <file>', 'JSON file with api_token and collection_ids')
    .option('--db <path>', 'Database tarball to load and write back')
    .action(async (options: unknown) => {
      await action(syncOptionsSchema.parse(options));
    });
}
