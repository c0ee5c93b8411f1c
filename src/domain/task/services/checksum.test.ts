import { describe, it, expect } from 'vitest';
import { calculateChecksum, canonicalize, CHECKSUM_LENGTH } from './checksum.js';
import type { TaskFields } from '../entities/Task.js';

const fields: TaskFields = {
  id: 7,
  title: 'Write release notes',
  description: null,
  status: 'pending',
  priority: 'medium',
  category: 'documentation',
  assignee: 'dana',
  estimated_hours: 2.5,
  actual_hours: null,
  tags: ['docs', 'release'],
  dependencies: [3],
  created_at: '2025-03-01T09:00:00.000Z',
  updated_at: null,
  completed_at: null
};

describe('canonicalize', () => {
  it('sorts object keys at every level', () => {
    expect(canonicalize({ b: 1, a: { d: 2, c: [3, { f: null, e: 'x' }] } })).toBe(
      '{"a":{"c":[3,{"e":"x","f":null}],"d":2},"b":1}'
    );
  });

  it('keeps array order', () => {
    expect(canonicalize(['b', 'a'])).toBe('["b","a"]');
  });
});

describe('calculateChecksum', () => {
  it('produces a fixed-length hex fingerprint', () => {
    const checksum = calculateChecksum(fields);
    expect(checksum).toHaveLength(CHECKSUM_LENGTH);
    expect(checksum).toMatch(/^[0-9a-f]{16}$/);
  });

  it('is deterministic and independent of key order', () => {
    const reordered: TaskFields = {
      completed_at: null,
      updated_at: null,
      created_at: '2025-03-01T09:00:00.000Z',
      dependencies: [3],
      tags: ['docs', 'release'],
      actual_hours: null,
      estimated_hours: 2.5,
      assignee: 'dana',
      category: 'documentation',
      priority: 'medium',
      status: 'pending',
      description: null,
      title: 'Write release notes',
      id: 7
    };
    expect(calculateChecksum(fields)).toBe(calculateChecksum(fields));
    expect(calculateChecksum(reordered)).toBe(calculateChecksum(fields));
  });

  it('changes when any field changes', () => {
    const base = calculateChecksum(fields);
    expect(calculateChecksum({ ...fields, title: 'Write release notes!' })).not.toBe(base);
    expect(calculateChecksum({ ...fields, estimated_hours: 3 })).not.toBe(base);
    expect(calculateChecksum({ ...fields, tags: ['release', 'docs'] })).not.toBe(base);
    expect(calculateChecksum({ ...fields, updated_at: '2025-03-01T10:00:00.000Z' })).not.toBe(base);
  });

  it('ignores a checksum already on the input', () => {
    expect(calculateChecksum({ ...fields, checksum: 'stale' })).toBe(calculateChecksum(fields));
  });
});
