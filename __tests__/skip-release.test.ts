import { filterSkipReleaseCommits, hasSkipReleaseMarker } from '@/skip-release';
import { createCommit } from '@/tests/helpers/commits';
import { DEFAULT_COMMITS_CONFIG } from '@/utils/constants';
import { describe, expect, it } from 'vitest';

const markers = DEFAULT_COMMITS_CONFIG.skipReleaseMarkers;

describe('skip-release', () => {
  describe('hasSkipReleaseMarker', () => {
    it('should match markers case-insensitively', () => {
      expect(hasSkipReleaseMarker('docs: typo [Skip Release]', markers)).toBe(true);
      expect(hasSkipReleaseMarker('chore: tidy [NO RELEASE]', markers)).toBe(true);
    });

    it('should match markers in the body', () => {
      expect(hasSkipReleaseMarker('fix: a\n\n[release skip]', markers)).toBe(true);
    });

    it('should require the exact marker text', () => {
      expect(hasSkipReleaseMarker('fix: skip release notes', markers)).toBe(false);
      expect(hasSkipReleaseMarker('fix: [skip-release]', markers)).toBe(false);
    });

    it('should never match with no markers', () => {
      expect(hasSkipReleaseMarker('fix: [skip release]', [])).toBe(false);
    });
  });

  describe('filterSkipReleaseCommits', () => {
    it('should remove marked commits and preserve order', () => {
      const a = createCommit('feat: a');
      const b = createCommit('fix: b [skip release]');
      const c = createCommit('fix: c');
      expect(filterSkipReleaseCommits([a, b, c], markers)).toEqual([a, c]);
    });

    it('should return the same commits when no markers are configured', () => {
      const commits = [createCommit('feat: a [skip release]'), createCommit('fix: b')];
      const result = filterSkipReleaseCommits(commits, []);
      expect(result).toHaveLength(2);
      expect(result[0]).toBe(commits[0]);
      expect(result[1]).toBe(commits[1]);
    });

    it('should be idempotent', () => {
      const commits = [createCommit('feat: a'), createCommit('fix: b [no release]'), createCommit('fix: c')];
      const once = filterSkipReleaseCommits(commits, markers);
      expect(filterSkipReleaseCommits(once, markers)).toEqual(once);
    });

    it('should honour custom markers', () => {
      const commits = [createCommit('chore: bump [ci-only]'), createCommit('feat: x')];
      expect(filterSkipReleaseCommits(commits, ['[CI-ONLY]']).map(({ message }) => message)).toEqual(['feat: x']);
    });
  });
});
