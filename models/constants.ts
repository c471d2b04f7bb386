/** Default lifetime of a cached repository entry (15 minutes). */
export const DEFAULT_CACHE_TTL_MS = 15 * 60 * 1000;

/** Rows per statement chunk for bulk operations. */
export const DEFAULT_BULK_BATCH_SIZE = 100;

export const MAX_CACHED_STATEMENTS = 50;

export const BUSY_TIMEOUT_MS = 3000;
