/**
 * Sync cursor lifecycle: mode selection from the stored cursor, and the
 * cursor recorded for the next run.
 */

import {z} from 'zod';

/** A stored cursor at least this old forces a full resync */
export const STALE_CURSOR_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

const isoDateTime = z.string().datetime({offset: true});

export type FullSyncReason = 'no-cursor' | 'stale-cursor' | 'invalid-cursor';

export type ModeDecision =
  | {mode: 'full'; reason: FullSyncReason}
  | {mode: 'incremental'; cursor: string};

/**
 * Decide once per run whether sheets are fetched whole or filtered by the
 * stored cursor.
 */
export function determineSyncMode(
  storedCursor: string | undefined,
  now: Date,
  staleAfterDays: number = STALE_CURSOR_DAYS,
): ModeDecision {
  if (!storedCursor) {
    return {mode: 'full', reason: 'no-cursor'};
  }

  const parsed = isoDateTime.safeParse(storedCursor);
  if (!parsed.success) {
    return {mode: 'full', reason: 'invalid-cursor'};
  }

  const lastSync = Date.parse(parsed.data);
  if (Number.isNaN(lastSync)) {
    return {mode: 'full', reason: 'invalid-cursor'};
  }

  if (now.getTime() - lastSync >= staleAfterDays * DAY_MS) {
    return {mode: 'full', reason: 'stale-cursor'};
  }

  return {mode: 'incremental', cursor: parsed.data};
}

/** ISO-8601 UTC with whole seconds, e.g. `2024-05-01T12:00:00Z` */
export function formatCursor(at: Date): string {
  return at.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
