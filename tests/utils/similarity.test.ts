import { describe, it, expect } from 'vitest';
import { indelDistance, overlapSimilar, similarityRatio } from '../../src/utils/similarity';

describe('similarityRatio', () => {
  it('scores near-identical titles above the default threshold', () => {
    expect(indelDistance('software engineering intern', 'software engineer intern')).toBe(3);
    expect(similarityRatio('Software Engineering Intern', 'Software Engineer Intern')).toBeCloseTo(48 / 51, 6);
    expect(similarityRatio('Software Engineering Intern', 'Software Engineer Intern')).toBeGreaterThanOrEqual(0.85);
  });

  it('scores unrelated titles below the default threshold', () => {
    expect(similarityRatio('Software Engineer', 'Marketing Intern')).toBeLessThan(0.85);
  });

  it('ignores case and surrounding whitespace', () => {
    expect(similarityRatio('  ABC ', 'abc')).toBe(1);
    expect(similarityRatio('', '')).toBe(1);
  });
});

describe('overlapSimilar', () => {
  it('accepts exact matches and containment', () => {
    expect(overlapSimilar('Backend Engineer', 'backend engineer', 0.85)).toBe(true);
    expect(overlapSimilar('Engineer', 'Senior Engineer', 0.85)).toBe(true);
  });

  it('compares word overlap against the threshold', () => {
    expect(overlapSimilar('Data Engineer Remote', 'Data Engineer Onsite', 0.85)).toBe(false);
    expect(overlapSimilar('Data Engineer Remote', 'Data Engineer Onsite', 0.6)).toBe(true);
  });
});
