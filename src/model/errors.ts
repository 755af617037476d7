// mysql2 sets this code when a UNIQUE index rejects a row
export const DUPLICATE_ENTRY = 'ER_DUP_ENTRY';

export const isDuplicateEntry = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === DUPLICATE_ENTRY;
