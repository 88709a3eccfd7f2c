import crypto from 'crypto';

type JsonLike = null | boolean | number | string | JsonLike[] | { [key: string]: JsonLike };

/**
 * SHA256 of a JSON payload, with object keys sorted recursively so the same
 * data always produces the same hash.
 */
export function computeContentHash(payload: JsonLike): string {
  const jsonString = JSON.stringify(normalizeJSON(payload));
  return crypto.createHash('sha256').update(jsonString).digest('hex');
}

function normalizeJSON(value: JsonLike): JsonLike {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(normalizeJSON);
  }

  const sorted: { [key: string]: JsonLike } = {};
  Object.keys(value)
    .sort()
    .forEach(key => {
      sorted[key] = normalizeJSON(value[key]);
    });

  return sorted;
}

// Short fingerprint used inside opaque cursors
export const shortHash = (payload: JsonLike, length: number = 12): string =>
  computeContentHash(payload).slice(0, length);
