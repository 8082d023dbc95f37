/**
 * Row normalization: raw sheet rows to flat destination records.
 */

import {z} from 'zod';
import type {CellValue, RowId, SyncRecord} from './types';

/** Column definition as returned with every sheet fetch */
export interface SheetColumn {
  id: number | string;
  title: string;
}

export type NormalizeResult =
  | {ok: true; id: RowId; record: SyncRecord}
  | {ok: false; id?: RowId; reason: string};

/** Metadata fields every record carries; cells never overwrite them */
export const RESERVED_FIELDS: ReadonlySet<string> = new Set([
  'id',
  'row_number',
  'expanded',
  'created_at',
  'modified_at',
]);

const rowIdSchema = z.union([z.number().int(), z.string().min(1)]);

const cellValueSchema: z.ZodType<CellValue> = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

const cellSchema = z.object({
  columnId: z.union([z.number(), z.string()]),
  value: cellValueSchema.optional(),
});

const rowSchema = z.object({
  id: rowIdSchema,
  rowNumber: z.number().int().optional(),
  expanded: z.boolean().optional(),
  createdAt: z.string().optional(),
  modifiedAt: z.string().optional(),
  cells: z.array(cellSchema).default([]),
});

/** Column ID to column title, rebuilt from each fetch response */
export function buildColumnMap(columns: SheetColumn[]): Map<string, string> {
  return new Map(columns.map(col => [String(col.id), col.title]));
}

/** Lower-case the sheet name and replace spaces with underscores */
export function formatTableName(sheetName: string): string {
  return sheetName.toLowerCase().replace(/ /g, '_');
}

/** Destination table for a sheet, falling back to `source_<id>` without a name */
export function tableNameFor(sheetId: string, sheetName?: string): string {
  return sheetName ? formatTableName(sheetName) : `source_${sheetId}`;
}

/**
 * Flatten a raw row into a record keyed by column title.
 *
 * Cells whose column ID is not in `columnMap` are dropped. A row without a
 * usable ID, or with a malformed cell, is rejected with a reason; the ID is
 * still reported when it parsed so the caller can count the row as present.
 */
export function normalizeRow(
  raw: unknown,
  columnMap: ReadonlyMap<string, string>,
): NormalizeResult {
  const idResult = z.object({id: rowIdSchema}).safeParse(raw);
  if (!idResult.success) {
    return {ok: false, reason: 'missing or invalid row id'};
  }
  const id = idResult.data.id;

  const rowResult = rowSchema.safeParse(raw);
  if (!rowResult.success) {
    const issues = rowResult.error.issues
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    return {ok: false, id, reason: `malformed row (${issues})`};
  }
  const row = rowResult.data;

  const entries: [string, CellValue][] = [
    ['id', id],
    ['row_number', row.rowNumber ?? null],
    ['expanded', row.expanded ?? null],
    ['created_at', row.createdAt ?? null],
    ['modified_at', row.modifiedAt ?? null],
  ];

  for (const cell of row.cells) {
    const columnName = columnMap.get(String(cell.columnId));
    if (!columnName || RESERVED_FIELDS.has(columnName)) continue;
    entries.push([columnName, cell.value ?? null]);
  }

  // fromEntries defines own keys, so a `__proto__` title stays a field.
  const record: SyncRecord = Object.fromEntries(entries);

  return {ok: true, id, record};
}
