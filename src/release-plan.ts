import { renderChangelog } from '@/changelog';
import { calculateBump } from '@/commit-analyzer';
import { parseCommits } from '@/commit-classifier';
import { InvalidVersionFormatError } from '@/errors';
import { filterSkipReleaseCommits } from '@/skip-release';
import type { ReleasePlan, ReleasePlanInput } from '@/types';
import { BUMP_TYPE, PLAN_REASON } from '@/utils/constants';
import { Version } from '@/version';

/**
 * Parses the version carried by a tag, or returns `null` when the tag is not a version tag for the prefix.
 */
function parseVersionTag(tag: string, tagPrefix: string): Version | null {
  if (!tag.startsWith(tagPrefix)) {
    return null;
  }

  try {
    return Version.parse(tag.slice(tagPrefix.length));
  } catch (error) {
    if (error instanceof InvalidVersionFormatError) {
      return null;
    }
    throw error;
  }
}

/**
 * Finds the highest version among tags carrying the given prefix. Tags that do not start with the prefix, or
 * whose remainder is not a version, are ignored.
 *
 * @param {ReadonlyArray<string>} tags - All tag names in the repository.
 * @param {string} tagPrefix - Prefix in front of version tags, e.g. `v`.
 * @param {boolean} includePrereleases - Whether prerelease versions are candidates.
 * @returns {Version | null} The highest version, or `null` when no tag qualifies.
 *
 * @example
 * ```typescript
 * findLatestVersion(['v1.2.0', 'v1.10.0', 'v2.0.0-rc.1', 'docs'], 'v')
 * // → Version 1.10.0
 * ```
 */
export function findLatestVersion(
  tags: ReadonlyArray<string>,
  tagPrefix: string,
  includePrereleases = false,
): Version | null {
  let latest: Version | null = null;

  for (const tag of tags) {
    const version = parseVersionTag(tag, tagPrefix);
    if (version === null || (!includePrereleases && version.isPrerelease)) {
      continue;
    }
    if (latest === null || version.compare(latest) > 0) {
      latest = version;
    }
  }

  return latest;
}

/**
 * Returns the next free prerelease counter for a version core and label: one more than the highest counter
 * already tagged, starting at 1.
 *
 * @example
 * ```typescript
 * getNextPrereleaseCounter(['v1.3.0-rc.1', 'v1.3.0-rc.2'], 'v', Version.parse('1.3.0'), 'rc') // → 3
 * ```
 */
export function getNextPrereleaseCounter(
  tags: ReadonlyArray<string>,
  tagPrefix: string,
  version: Version,
  label: string,
): number {
  const core = version.withoutPrerelease();
  let highest = 0;

  for (const tag of tags) {
    const tagged = parseVersionTag(tag, tagPrefix);
    const prerelease = tagged?.prerelease ?? null;
    if (tagged === null || prerelease === null || prerelease.label !== label) {
      continue;
    }
    if (tagged.withoutPrerelease().equals(core)) {
      highest = Math.max(highest, prerelease.counter ?? 0);
    }
  }

  return highest + 1;
}

/**
 * Decides whether a set of commits warrants a release and, if so, which version and changelog it carries.
 *
 * 1. No commits → no release
 * 2. Commits carrying a skip marker are removed; nothing left → no release
 * 3. The remaining commits are classified and the aggregate bump computed
 * 4. The current version is the latest stable version tag
 * 5. An explicit version wins, then the initial version on a first release, then `current.bump(bump)`;
 *    a `none` bump on an existing release means no release
 * 6. A prerelease label is applied with the next free counter
 * 7. The changelog is rendered for the next version
 *
 * Performs no I/O. The version override is used as given when it already carries a prerelease.
 */
export function createReleasePlan(input: ReleasePlanInput): ReleasePlan {
  const { commits, tags, commitsConfig, tagPrefix } = input;
  const currentVersion = findLatestVersion(tags, tagPrefix);
  const isFirstRelease = currentVersion === null;

  const noRelease = (
    reason: ReleasePlan['reason'],
    partial: Pick<ReleasePlan, 'bumpType' | 'classifications' | 'skippedCount'>,
  ): ReleasePlan => ({
    currentVersion,
    nextVersion: null,
    reason,
    releaseNeeded: false,
    isFirstRelease,
    changelog: '',
    ...partial,
  });

  if (commits.length === 0) {
    return noRelease(PLAN_REASON.NO_COMMITS, { bumpType: BUMP_TYPE.NONE, classifications: [], skippedCount: 0 });
  }

  const releasable = filterSkipReleaseCommits(commits, commitsConfig.skipReleaseMarkers);
  const skippedCount = commits.length - releasable.length;
  if (releasable.length === 0) {
    return noRelease(PLAN_REASON.ALL_SKIPPED, { bumpType: BUMP_TYPE.NONE, classifications: [], skippedCount });
  }

  const classifications = parseCommits(releasable, commitsConfig);
  const bumpType = calculateBump(classifications, commitsConfig);

  let nextVersion: Version;
  let reason: ReleasePlan['reason'];
  if (input.versionOverride !== null) {
    nextVersion = input.versionOverride;
    reason = PLAN_REASON.OVERRIDE;
  } else if (currentVersion === null) {
    nextVersion = input.initialVersion;
    reason = PLAN_REASON.INITIAL;
  } else if (bumpType === BUMP_TYPE.NONE) {
    return noRelease(PLAN_REASON.NO_RELEASABLE_CHANGES, { bumpType, classifications, skippedCount });
  } else {
    nextVersion = currentVersion.bump(bumpType);
    reason = PLAN_REASON.BUMP;
  }

  if (input.prerelease && !nextVersion.isPrerelease) {
    const counter = getNextPrereleaseCounter(tags, tagPrefix, nextVersion, input.prerelease);
    nextVersion = nextVersion.withPrerelease(input.prerelease, counter);
  }

  return {
    currentVersion,
    nextVersion,
    bumpType,
    reason,
    releaseNeeded: true,
    isFirstRelease,
    classifications,
    skippedCount,
    changelog: renderChangelog(classifications, nextVersion, input.date, input.includeSha),
  };
}
