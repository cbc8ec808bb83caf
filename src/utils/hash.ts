/**
 * Hashing utilities for knowledge base versions and consultation IDs
 */

import { createHash } from 'crypto';

export function hashObject(obj: unknown): string {
  // Sort keys so equal documents hash equally regardless of key order
  const str = JSON.stringify(obj, (_key, value: unknown) => {
    if (value && typeof value === 'object' && !Array.isArray(value)) {
      const record: Record<string, unknown> = { ...value };
      return Object.keys(record)
        .sort()
        .reduce((sorted: Record<string, unknown>, k) => {
          sorted[k] = record[k];
          return sorted;
        }, {});
    }
    return value;
  });
  return hashString(str);
}

export function hashString(str: string): string {
  return createHash('sha256').update(str).digest('hex');
}

export function shortHash(str: string, length: number = 8): string {
  return hashString(str).substring(0, length);
}
