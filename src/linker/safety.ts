/**
 * Safety tiers for batch link insertion. A batch that exceeds either ceiling
 * of its tier is rejected as a whole.
 */

export const SAFETY_LEVELS = ['paranoid', 'conservative', 'balanced', 'aggressive'] as const;

export type SafetyLevel = typeof SAFETY_LEVELS[number];

export interface SafetyLimits {
  maxFiles: number;
  maxChanges: number;
}

export const SAFETY_LIMITS: Readonly<Record<SafetyLevel, SafetyLimits>> = Object.freeze({
  paranoid: { maxFiles: 5, maxChanges: 25 },
  conservative: { maxFiles: 25, maxChanges: 100 },
  balanced: { maxFiles: 50, maxChanges: 250 },
  aggressive: { maxFiles: 100, maxChanges: 500 },
});

export interface SafetyReport {
  isSafe: boolean;
  safetyLevel: SafetyLevel;
  limits: SafetyLimits;
  fileCount: number;
  changeCount: number;
  blockers: string[];
}

export function isSafetyLevel(value: string): value is SafetyLevel {
  return SAFETY_LEVELS.some(level => level === value);
}

export function assessSafety(safetyLevel: SafetyLevel, fileCount: number, changeCount: number): SafetyReport {
  const limits = SAFETY_LIMITS[safetyLevel];
  const blockers: string[] = [];

  if (fileCount > limits.maxFiles) {
    blockers.push(`Too many files: ${fileCount} > ${limits.maxFiles}`);
  }
  if (changeCount > limits.maxChanges) {
    blockers.push(`Too many changes: ${changeCount} > ${limits.maxChanges}`);
  }

  return {
    isSafe: blockers.length === 0,
    safetyLevel,
    limits,
    fileCount,
    changeCount,
    blockers,
  };
}
