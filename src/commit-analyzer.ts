import type { BumpType, Classification, CommitsConfig } from '@/types';
import { BUMP_TYPE, BUMP_TYPE_PRIORITY } from '@/utils/constants';

/**
 * Orders two bump types by severity (NONE < PATCH < MINOR < MAJOR).
 *
 * @returns A negative number, zero or a positive number, usable as a sort comparator
 */
export function compareBumpTypes(a: BumpType, b: BumpType): number {
  return BUMP_TYPE_PRIORITY[a] - BUMP_TYPE_PRIORITY[b];
}

/**
 * Returns the higher-priority bump type between two values (MAJOR > MINOR > PATCH > NONE).
 *
 * Used to accumulate the highest-priority bump across multiple commits.
 *
 * @example
 * ```typescript
 * higherPriorityBumpType('none', 'patch')  // → 'patch'
 * higherPriorityBumpType('patch', 'minor') // → 'minor'
 * higherPriorityBumpType('major', 'patch') // → 'major'
 * ```
 */
export function higherPriorityBumpType(current: BumpType, candidate: BumpType): BumpType {
  return compareBumpTypes(candidate, current) > 0 ? candidate : current;
}

function includesType(types: ReadonlyArray<string>, type: string): boolean {
  return types.some((candidate) => candidate.toLowerCase() === type);
}

/**
 * Determines the bump a single classified commit contributes.
 *
 * - Breaking change (`!` or a body line matching the breaking pattern) → MAJOR
 * - Type listed in `majorTypes` → MAJOR
 * - Type listed in `minorTypes` → MINOR
 * - Type listed in `patchTypes` → PATCH
 * - Anything else, including non-conventional commits → NONE
 *
 * Type matching is case-insensitive.
 */
export function getCommitBumpType(classification: Classification, config: CommitsConfig): BumpType {
  if (classification.isBreaking) {
    return BUMP_TYPE.MAJOR;
  }

  if (classification.type === null) {
    return BUMP_TYPE.NONE;
  }

  const type = classification.type.toLowerCase();
  if (includesType(config.majorTypes, type)) {
    return BUMP_TYPE.MAJOR;
  }
  if (includesType(config.minorTypes, type)) {
    return BUMP_TYPE.MINOR;
  }
  if (includesType(config.patchTypes, type)) {
    return BUMP_TYPE.PATCH;
  }

  return BUMP_TYPE.NONE;
}

/**
 * Computes the highest-priority bump across a set of classified commits.
 *
 * The result is the maximum of the individual contributions, so the order of the input never changes it and
 * an empty input yields `none`.
 *
 * @example
 * ```typescript
 * calculateBump([featCommit, fixCommit], DEFAULT_COMMITS_CONFIG)
 * // → 'minor'
 * ```
 */
export function calculateBump(classifications: ReadonlyArray<Classification>, config: CommitsConfig): BumpType {
  let result: BumpType = BUMP_TYPE.NONE;

  for (const classification of classifications) {
    result = higherPriorityBumpType(result, getCommitBumpType(classification, config));
    if (result === BUMP_TYPE.MAJOR) {
      break;
    }
  }

  return result;
}
