import { createHash } from 'crypto';
import type { TaskFields } from '../entities/Task.js';

export const CHECKSUM_LENGTH = 16;

type Canonical = string | number | boolean | null | Canonical[] | { [key: string]: Canonical };

/**
 * Serializes a value with object keys sorted at every level
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(normalize(value));
}

function normalize(value: unknown): Canonical {
  if (value === null || value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.map(normalize);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    const sorted: { [key: string]: Canonical } = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = normalize(Reflect.get(value, key));
    }
    return sorted;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  return String(value);
}

/**
 * Calculate a short SHA-256 fingerprint of a task's fields.
 * Any `checksum` key on the input is ignored.
 */
export function calculateChecksum(task: TaskFields & { checksum?: string }): string {
  const { checksum: _ignored, ...fields } = task;
  return createHash('sha256')
    .update(canonicalize(fields), 'utf8')
    .digest('hex')
    .substring(0, CHECKSUM_LENGTH);
}
