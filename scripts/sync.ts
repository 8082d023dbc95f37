import 'dotenv/config';
import {createSyncCommand} from '../lib/cli';
import {describeError} from '../lib/connector';
import {createSyncPipeline} from '../lib/pipeline';
import {loadPipelineConfig} from '../lib/pipeline/load-config';
import {logger} from '../lib/logger';

const program = createSyncCommand(async options => {
  const config = await loadPipelineConfig({
    configPath: options.config,
    dbPath: options.db,
    logger,
  });

  const result = await createSyncPipeline(config).run();

  const summary = result.summary;
  logger.info(
    summary
      ? `Sync finished in ${result.totalDuration.toFixed(0)}ms: ` +
          `${summary.upserts} upserts, ${summary.deletes} deletes, ` +
          `cursor ${summary.checkpoint?.sync_cursor ?? 'none'}`
      : `Sync finished in ${result.totalDuration.toFixed(0)}ms`,
  );
});

program.parseAsync().catch(error => {
  logger.error(`Sync failed: ${describeError(error)}`);
  process.exitCode = 1;
});
