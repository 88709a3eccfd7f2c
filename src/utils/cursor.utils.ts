import { invalidQuery } from './errors';

interface CursorPayload {
  o: number;                           // next bucket offset
  f: string;                           // query fingerprint
}

export const encodeCursor = (offset: number, fingerprint: string): string =>
  Buffer.from(JSON.stringify({ o: offset, f: fingerprint } satisfies CursorPayload), 'utf8').toString('base64url');

const isCursorPayload = (value: unknown): value is CursorPayload =>
  typeof value === 'object' &&
  value !== null &&
  'o' in value &&
  'f' in value &&
  Number.isInteger(value.o) &&
  typeof value.f === 'string';

/**
 * Decodes a cursor produced by encodeCursor and checks it belongs to the
 * same query. Returns the bucket offset it points at.
 */
export const decodeCursor = (cursor: string, fingerprint: string): number => {
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
  } catch {
    throw invalidQuery('Cursor is not valid', { cursor });
  }

  if (!isCursorPayload(payload) || payload.o < 0) {
    throw invalidQuery('Cursor is not valid', { cursor });
  }

  if (payload.f !== fingerprint) {
    throw invalidQuery('Cursor does not belong to this query', { cursor });
  }

  return payload.o;
};
