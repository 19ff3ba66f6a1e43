import { describe, it, expect } from 'vitest';
import { generateDedupKey } from '../../src/utils/hash';
import { makeCandidate } from '../helpers/fixtures';

describe('generateDedupKey', () => {
  it('keys on source identity when present', () => {
    const a = makeCandidate({ sourceId: '123', title: 'Backend Engineer' });
    const b = makeCandidate({ sourceId: '123', title: 'Something else' });
    expect(generateDedupKey(a)).toBe(generateDedupKey(b));
    expect(generateDedupKey(a)).not.toBe(generateDedupKey({ ...a, source: 'feedB' }));
  });

  it('falls back to normalized title, company and type', () => {
    const a = makeCandidate({ title: ' Backend Engineer ', company: 'ACME' });
    const b = makeCandidate({ title: 'backend engineer', company: 'acme' });
    expect(generateDedupKey(a)).toBe(generateDedupKey(b));
    expect(generateDedupKey(a)).not.toBe(generateDedupKey({ ...b, type: 'internship' }));
    expect(generateDedupKey(a)).toMatch(/^[0-9a-f]{64}$/);
  });
});
