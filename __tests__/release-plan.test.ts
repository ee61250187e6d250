import { createReleasePlan, findLatestVersion, getNextPrereleaseCounter } from '@/release-plan';
import { createCommit } from '@/tests/helpers/commits';
import type { RawCommit, ReleasePlanInput } from '@/types';
import { DEFAULT_COMMITS_CONFIG } from '@/utils/constants';
import { Version } from '@/version';
import { describe, expect, it } from 'vitest';

function createInput(commits: RawCommit[], overrides: Partial<ReleasePlanInput> = {}): ReleasePlanInput {
  return {
    commits,
    tags: ['v1.0.0', 'v1.1.0', 'docs-site'],
    commitsConfig: DEFAULT_COMMITS_CONFIG,
    tagPrefix: 'v',
    initialVersion: Version.parse('0.1.0'),
    prerelease: null,
    versionOverride: null,
    includeSha: false,
    date: new Date('2024-05-01T08:00:00Z'),
    ...overrides,
  };
}

describe('release-plan', () => {
  describe('findLatestVersion', () => {
    it('should return the highest stable version with the prefix', () => {
      const tags = ['v1.2.0', 'v1.10.0', 'v1.9.9', 'v2.0.0-rc.1', 'docs', 'v1.x', 'release-9.0.0'];
      expect(findLatestVersion(tags, 'v')?.toString()).toBe('1.10.0');
    });

    it('should include prereleases when requested', () => {
      expect(findLatestVersion(['v1.2.0', 'v2.0.0-rc.1'], 'v', true)?.toString()).toBe('2.0.0-rc.1');
    });

    it('should support an empty and a longer prefix', () => {
      expect(findLatestVersion(['1.0.0', 'v3.0.0', '2.1.0'], '')?.toString()).toBe('2.1.0');
      expect(findLatestVersion(['release-1.0.0', 'v3.0.0'], 'release-')?.toString()).toBe('1.0.0');
    });

    it('should ignore tags whose numbers are too large to represent', () => {
      expect(findLatestVersion(['v1.0.0', 'v99999999999999999.0.0'], 'v')?.toString()).toBe('1.0.0');
    });

    it('should return null when no tag qualifies', () => {
      expect(findLatestVersion([], 'v')).toBeNull();
      expect(findLatestVersion(['latest', 'v1.0', 'v2.0.0-beta'], 'v')).toBeNull();
    });
  });

  describe('getNextPrereleaseCounter', () => {
    it('should start at 1', () => {
      expect(getNextPrereleaseCounter(['v1.2.0'], 'v', Version.parse('1.3.0'), 'rc')).toBe(1);
    });

    it('should return one more than the highest tagged counter for the same core and label', () => {
      const tags = ['v1.3.0-rc.1', 'v1.3.0-rc.4', 'v1.3.0-beta.9', 'v1.2.0-rc.7', 'v1.3.0-rc.2'];
      expect(getNextPrereleaseCounter(tags, 'v', Version.parse('1.3.0'), 'rc')).toBe(5);
    });

    it('should treat a label without a counter as counter 0', () => {
      expect(getNextPrereleaseCounter(['v1.3.0-rc'], 'v', Version.parse('1.3.0'), 'rc')).toBe(1);
    });
  });

  describe('createReleasePlan', () => {
    it('should plan from the representable tags when a stray tag overflows', () => {
      const plan = createReleasePlan(
        createInput([createCommit('feat: add search')], { tags: ['v1.0.0', 'v99999999999999999.0.0'] }),
      );

      expect(plan.currentVersion?.toString()).toBe('1.0.0');
      expect(plan.nextVersion?.toString()).toBe('1.1.0');
    });

    it('should ignore an overflowing prerelease counter', () => {
      expect(
        getNextPrereleaseCounter(['v1.3.0-rc.2', 'v1.3.0-rc.99999999999999999'], 'v', Version.parse('1.3.0'), 'rc'),
      ).toBe(3);
    });

    it('should not release without commits', () => {
      expect(createReleasePlan(createInput([]))).toEqual({
        currentVersion: Version.parse('1.1.0'),
        nextVersion: null,
        bumpType: 'none',
        reason: 'no-commits',
        releaseNeeded: false,
        isFirstRelease: false,
        classifications: [],
        skippedCount: 0,
        changelog: '',
      });
    });

    it('should not release when every commit is skipped', () => {
      const plan = createReleasePlan(
        createInput([createCommit('feat: a [skip release]'), createCommit('fix: b\n\n[no release]')]),
      );
      expect(plan).toMatchObject({ reason: 'all-skipped', releaseNeeded: false, skippedCount: 2, nextVersion: null });
    });

    it('should not release when no commit warrants a bump', () => {
      const plan = createReleasePlan(createInput([createCommit('docs: readme'), createCommit('Merge branch x')]));
      expect(plan).toMatchObject({
        reason: 'no-releasable-changes',
        releaseNeeded: false,
        bumpType: 'none',
        nextVersion: null,
        changelog: '',
      });
      expect(plan.classifications).toHaveLength(2);
    });

    it('should bump the latest stable version', () => {
      const plan = createReleasePlan(
        createInput([createCommit('fix: a'), createCommit('feat(cli): b')], {
          tags: ['v1.2.0', 'v1.10.0', 'v2.0.0-rc.1'],
        }),
      );
      expect(plan.reason).toBe('bump');
      expect(plan.bumpType).toBe('minor');
      expect(plan.currentVersion?.toString()).toBe('1.10.0');
      expect(plan.nextVersion?.toString()).toBe('1.11.0');
      expect(plan.releaseNeeded).toBe(true);
      expect(plan.isFirstRelease).toBe(false);
    });

    it('should count skipped commits and leave them out of the changelog', () => {
      const plan = createReleasePlan(
        createInput([createCommit('fix: kept'), createCommit('feat: dropped [Release Skip]')]),
      );
      expect(plan.skippedCount).toBe(1);
      expect(plan.bumpType).toBe('patch');
      expect(plan.nextVersion?.toString()).toBe('1.1.1');
      expect(plan.changelog).toBe(['## [1.1.1] - 2024-05-01', '', '### 🐛 Bug Fixes', '', '- kept'].join('\n'));
    });

    it('should use the initial version on a first release', () => {
      const plan = createReleasePlan(createInput([createCommit('docs: first')], { tags: ['unrelated'] }));
      expect(plan).toMatchObject({ reason: 'initial', releaseNeeded: true, isFirstRelease: true, bumpType: 'none' });
      expect(plan.currentVersion).toBeNull();
      expect(plan.nextVersion?.toString()).toBe('0.1.0');
      expect(plan.changelog).toBe(['## [0.1.0] - 2024-05-01', '', '### 📚 Documentation', '', '- first'].join('\n'));
    });

    it('should ignore prerelease tags when deciding on a first release', () => {
      const plan = createReleasePlan(createInput([createCommit('feat: a')], { tags: ['v0.1.0-beta.1'] }));
      expect(plan.isFirstRelease).toBe(true);
      expect(plan.nextVersion?.toString()).toBe('0.1.0');
    });

    it('should let a version override win', () => {
      const plan = createReleasePlan(
        createInput([createCommit('docs: only docs')], { versionOverride: Version.parse('3.0.0') }),
      );
      expect(plan).toMatchObject({ reason: 'override', releaseNeeded: true, bumpType: 'none' });
      expect(plan.currentVersion?.toString()).toBe('1.1.0');
      expect(plan.nextVersion?.toString()).toBe('3.0.0');
    });

    it('should apply a prerelease label with the next free counter', () => {
      const plan = createReleasePlan(
        createInput([createCommit('feat: a')], {
          tags: ['v1.2.0', 'v1.3.0-rc.1', 'v1.3.0-rc.2'],
          prerelease: 'rc',
        }),
      );
      expect(plan.currentVersion?.toString()).toBe('1.2.0');
      expect(plan.nextVersion?.toString()).toBe('1.3.0-rc.3');
      expect(plan.changelog.split('\n')[0]).toBe('## [1.3.0-rc.3] - 2024-05-01');
    });

    it('should apply a prerelease label to the initial version', () => {
      const plan = createReleasePlan(createInput([createCommit('feat: a')], { tags: [], prerelease: 'beta' }));
      expect(plan.nextVersion?.toString()).toBe('0.1.0-beta.1');
    });

    it('should keep the prerelease of an override that already carries one', () => {
      const plan = createReleasePlan(
        createInput([createCommit('feat: a')], { versionOverride: Version.parse('2.0.0-rc.5'), prerelease: 'rc' }),
      );
      expect(plan.nextVersion?.toString()).toBe('2.0.0-rc.5');
    });

    it('should bump to major on a breaking change', () => {
      const plan = createReleasePlan(createInput([createCommit('fix: a\n\nBREAKING CHANGE: b')]));
      expect(plan.bumpType).toBe('major');
      expect(plan.nextVersion?.toString()).toBe('2.0.0');
    });

    it('should not release when the scope pattern filters out every commit', () => {
      const plan = createReleasePlan(
        createInput([createCommit('feat(web): a')], {
          commitsConfig: { ...DEFAULT_COMMITS_CONFIG, scopePattern: 'api' },
        }),
      );
      expect(plan).toMatchObject({ reason: 'no-releasable-changes', classifications: [], releaseNeeded: false });
    });

    it('should include short shas in the changelog when requested', () => {
      const commit = createCommit('fix: a', { id: '1234567890abcdef' });
      const plan = createReleasePlan(createInput([commit], { includeSha: true }));
      expect(plan.changelog).toBe(['## [1.1.1] - 2024-05-01', '', '### 🐛 Bug Fixes', '', '- a (1234567)'].join('\n'));
    });
  });
});
