import type { Classification, RawCommit } from '@/types';

let commitCounter = 0;

/**
 * Creates a commit with a unique id. The id is a 40 character hex string so short SHAs are predictable:
 * the first commit is `0000000000000000000000000000000000000001`.
 */
export function createCommit(message: string, overrides: Partial<RawCommit> = {}): RawCommit {
  commitCounter++;
  return {
    id: commitCounter.toString(16).padStart(40, '0'),
    message,
    author: 'Test Author',
    timestamp: new Date('2024-01-15T12:00:00Z'),
    ...overrides,
  };
}

/**
 * Creates a classification directly, bypassing the classifier.
 */
export function createClassification(overrides: Partial<Classification> = {}): Classification {
  return {
    isConventional: true,
    type: 'feat',
    scope: null,
    description: 'add feature',
    isBreaking: false,
    commit: createCommit('feat: add feature', { id: 'abcdef1234567890' }),
    ...overrides,
  };
}
