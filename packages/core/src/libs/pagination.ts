import { EscrowError, EscrowErrorCode } from "../errors";

export interface Page<T> {
  items: T[];
  /** Cursor to pass for the next page */
  cursor: number;
}

export function assertPageRequest(cursor: number, howMany: number): void {
  if (!Number.isSafeInteger(cursor) || cursor < 0) {
    throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `cursor must be a non-negative integer, got ${cursor}`);
  }
  if (!Number.isSafeInteger(howMany) || howMany < 0) {
    throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `howMany must be a non-negative integer, got ${howMany}`);
  }
}

/**
 * Slice `howMany` items from `source` starting at `cursor`, clamped to the
 * end. A cursor at or past the end yields an empty page that keeps the cursor.
 */
export function fetchPage<T>(
  source: readonly T[],
  cursor: number,
  howMany: number
): Page<T> {
  assertPageRequest(cursor, howMany);
  const length = Math.max(0, Math.min(howMany, source.length - cursor));
  return {
    items: source.slice(cursor, cursor + length),
    cursor: cursor + length,
  };
}
