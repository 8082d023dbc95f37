/**
 * Delta computation between the stored and the observed row-ID sets.
 */

import type {RowId, SyncMode} from './types';

/** Result of comparing a sheet's observed rows with its stored ID set */
export interface ReconcilePlan {
  current: RowId[]; // ID set to persist for the sheet
  deleted: RowId[]; // IDs to delete from the destination
}

export interface Reconciler {
  /**
   * Compare the IDs seen in this fetch with the IDs recorded by the last
   * checkpoint. `previous` is undefined for a sheet synced for the first time.
   */
  reconcile(
    previous: readonly RowId[] | undefined,
    observed: readonly RowId[],
    mode: SyncMode,
  ): ReconcilePlan;
}

/**
 * Set-based reconciler.
 *
 * A full fetch is a complete snapshot, so anything previously known and not
 * observed is gone. An incremental fetch only holds changed rows and cannot
 * prove absence: the stored set only grows and nothing is deleted.
 * IDs are compared by their string form.
 */
export class IdSetReconciler implements Reconciler {
  reconcile(
    previous: readonly RowId[] | undefined,
    observed: readonly RowId[],
    mode: SyncMode,
  ): ReconcilePlan {
    const observedById = this.index(observed);

    if (mode === 'incremental') {
      const merged = this.index(previous ?? []);
      for (const [key, id] of observedById) {
        if (!merged.has(key)) merged.set(key, id);
      }
      return {current: [...merged.values()], deleted: []};
    }

    const deleted = [...this.index(previous ?? []).entries()]
      .filter(([key]) => !observedById.has(key))
      .map(([, id]) => id);

    return {current: [...observedById.values()], deleted};
  }

  private index(ids: readonly RowId[]): Map<string, RowId> {
    const byKey = new Map<string, RowId>();
    for (const id of ids) {
      const key = String(id);
      if (!byKey.has(key)) byKey.set(key, id);
    }
    return byKey;
  }
}
