import type { RawCommit } from '@/types';

/**
 * Checks whether a commit message contains any of the given markers. Comparison is a case-insensitive
 * substring match.
 *
 * @example
 * ```typescript
 * hasSkipReleaseMarker('docs: typo [Skip Release]', ['[skip release]']) // → true
 * ```
 */
export function hasSkipReleaseMarker(message: string, markers: ReadonlyArray<string>): boolean {
  const lowered = message.toLowerCase();
  return markers.some((marker) => lowered.includes(marker.toLowerCase()));
}

/**
 * Removes commits whose message carries a skip-release marker, preserving order.
 * With no markers the input commits are returned as they are.
 */
export function filterSkipReleaseCommits(
  commits: ReadonlyArray<RawCommit>,
  markers: ReadonlyArray<string>,
): RawCommit[] {
  if (markers.length === 0) {
    return [...commits];
  }

  return commits.filter((commit) => !hasSkipReleaseMarker(commit.message, markers));
}
