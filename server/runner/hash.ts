import { createHash } from 'crypto';

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }

  if (value && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (entry === undefined) {
        continue;
      }
      sorted[key] = normalize(entry);
    }
    return sorted;
  }

  return value;
}

/** JSON with object keys sorted at every depth; used for hashing, signing and record keys. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value));
}

export function hashObject(value: unknown): string {
  return createHash('sha256').update(stableStringify(value)).digest('hex');
}
