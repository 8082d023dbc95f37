import {z} from 'zod';
import type {SyncState} from './types';

const rowIdSchema = z.union([z.number(), z.string()]);

// Fields that fail validation are dropped rather than failing the run.
const syncStateSchema = z.object({
  sync_cursor: z.string().optional().catch(undefined),
  all_ids: z
    .record(z.string(), z.array(rowIdSchema))
    .optional()
    .catch(undefined),
});

/** Read a stored state blob; anything that is not a state object reads as empty */
export function parseSyncState(raw: unknown): SyncState {
  const result = syncStateSchema.safeParse(raw);
  if (!result.success) return {};

  const state: SyncState = {};
  if (result.data.sync_cursor !== undefined) {
    state.sync_cursor = result.data.sync_cursor;
  }
  if (result.data.all_ids !== undefined) {
    state.all_ids = result.data.all_ids;
  }
  return state;
}
