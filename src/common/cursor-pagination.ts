import { BadRequestException } from '@nestjs/common';

export interface CursorPage<T> {
  results: T[];
  nextCursor: string | null;
  previousCursor: string | null;
}

/** Cursors are opaque to clients; they carry a row offset. */
export function encodeCursor(offset: number): string {
  return Buffer.from(`o=${offset}`, 'utf8').toString('base64url');
}

export function decodeCursor(cursor: string | undefined): number {
  if (!cursor) return 0;
  const match = /^o=(\d+)$/.exec(Buffer.from(cursor, 'base64url').toString('utf8'));
  if (!match) {
    throw new BadRequestException('Invalid cursor');
  }
  return Number(match[1]);
}

export function toCursorPage<T>(rows: T[], offset: number, pageSize: number): CursorPage<T> {
  const hasNext = rows.length > pageSize;
  return {
    results: hasNext ? rows.slice(0, pageSize) : rows,
    nextCursor: hasNext ? encodeCursor(offset + pageSize) : null,
    previousCursor: offset > 0 ? encodeCursor(Math.max(0, offset - pageSize)) : null,
  };
}
