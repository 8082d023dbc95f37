import {z} from 'zod';
import type {SheetColumn} from '../connector/normalize';
import type {Logger} from '../logger';

export const DEFAULT_TIMEOUT_MS = 30_000;

export const DEFAULT_BASE_URL = 'https://api.smartsheet.com/2.0';

/** A fetched sheet. Rows stay unvalidated until normalization. */
export interface Sheet {
  id?: number | string;
  name?: string;
  columns: SheetColumn[];
  rows: unknown[];
}

export interface GetSheetOptions {
  /** Only return rows modified at or after this ISO-8601 instant */
  rowsModifiedSince?: string;
}

export interface SheetFetcher {
  getSheet: (sheetId: string, options?: GetSheetOptions) => Promise<Sheet>;
}

export interface SmartsheetClientParams {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Backoff unit; the wait before attempt n+1 is 2^n times this */
  retryBaseMs?: number;
  logger?: Pick<Logger, 'warn'>;
}

export class SmartsheetApiError extends Error {
  constructor(
    readonly sheetId: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Smartsheet request for sheet ${sheetId} failed with ${status}`);
    this.name = 'SmartsheetApiError';
  }
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_BASE_MS = 500;
const RETRYABLE_STATUS = new Set([429, 503]);

const sheetSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  name: z.string().optional(),
  columns: z
    .array(
      z.object({
        id: z.union([z.number(), z.string()]),
        title: z.string(),
      }),
    )
    .default([]),
  rows: z.array(z.unknown()).default([]),
});

function causeCode(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined;
  const cause = err.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    return String(cause.code);
  }
  return undefined;
}

export function getSmartsheetClient(
  params: SmartsheetClientParams,
): SheetFetcher {
  const {
    token,
    baseUrl = DEFAULT_BASE_URL,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    maxRetries = DEFAULT_MAX_RETRIES,
    retryBaseMs = DEFAULT_RETRY_BASE_MS,
    logger,
  } = params;

  const sleep = (ms: number) => new Promise(res => setTimeout(res, ms));

  const withRetry = async <T>(
    fn: () => Promise<T>,
    attempt = 1,
  ): Promise<T> => {
    try {
      return await fn();
    } catch (err) {
      const isRetryable =
        (err instanceof SmartsheetApiError && RETRYABLE_STATUS.has(err.status)) ||
        causeCode(err) === 'UND_ERR_CONNECT_TIMEOUT';

      if (isRetryable && attempt <= maxRetries) {
        const wait = 2 ** attempt * retryBaseMs;
        const code =
          err instanceof SmartsheetApiError ? err.status : causeCode(err);
        logger?.warn(
          `[Smartsheet] ${code}. retrying in ${wait}ms (attempt ${attempt})`,
        );
        await sleep(wait);
        return withRetry(fn, attempt + 1);
      }
      throw err;
    }
  };

  const sheetUrl = (sheetId: string, options: GetSheetOptions): string => {
    const url = new URL(
      `${baseUrl.replace(/\/+$/, '')}/sheets/${encodeURIComponent(sheetId)}`,
    );
    if (options.rowsModifiedSince) {
      url.searchParams.set('rowsModifiedSince', options.rowsModifiedSince);
    }
    return url.toString();
  };

  /** Public: fetch one sheet with its columns and rows */
  const getSheet = async (
    sheetId: string,
    options: GetSheetOptions = {},
  ): Promise<Sheet> => {
    const url = sheetUrl(sheetId, options);

    const body = await withRetry(async () => {
      const res = await fetch(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!res.ok) {
        throw new SmartsheetApiError(sheetId, res.status, await res.text());
      }
      const json: unknown = await res.json();
      return json;
    });

    return sheetSchema.parse(body);
  };

  return {getSheet};
}
