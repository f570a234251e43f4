import { describe, it, expect } from 'vitest';
import { SAFETY_LIMITS, assessSafety, isSafetyLevel } from '../src/linker/safety.js';

describe('assessSafety', () => {
  it('should accept batches within the limits', () => {
    expect(assessSafety('paranoid', 5, 25)).toEqual({
      isSafe: true,
      safetyLevel: 'paranoid',
      limits: { maxFiles: 5, maxChanges: 25 },
      fileCount: 5,
      changeCount: 25,
      blockers: [],
    });
  });

  it('should list every exceeded limit', () => {
    const report = assessSafety('conservative', 26, 101);
    expect(report.isSafe).toBe(false);
    expect(report.blockers).toEqual(['Too many files: 26 > 25', 'Too many changes: 101 > 100']);
  });

  it('should define increasing ceilings', () => {
    expect(SAFETY_LIMITS.balanced).toEqual({ maxFiles: 50, maxChanges: 250 });
    expect(SAFETY_LIMITS.aggressive).toEqual({ maxFiles: 100, maxChanges: 500 });
  });
});

describe('isSafetyLevel', () => {
  it('should recognize known levels only', () => {
    expect(isSafetyLevel('balanced')).toBe(true);
    expect(isSafetyLevel('reckless')).toBe(false);
  });
});
