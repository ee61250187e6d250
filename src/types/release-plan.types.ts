import type { Version } from '@/version';
import type { Classification, CommitsConfig, RawCommit } from '@/types/commit.types';
import type { BumpType, PlanReason } from '@/types/common.types';

/**
 * Inputs to {@link createReleasePlan}. Everything is supplied by the caller; the planner performs no I/O.
 */
export interface ReleasePlanInput {
  /** Commits under consideration, in the order the version-control collaborator supplied them */
  commits: readonly RawCommit[];

  /** Every tag name present in the repository */
  tags: readonly string[];

  commitsConfig: CommitsConfig;

  /** Prefix in front of version tags, e.g. `v` */
  tagPrefix: string;

  /** Version used when no stable version tag exists yet */
  initialVersion: Version;

  /** Optional prerelease label applied to the next version */
  prerelease: string | null;

  /** Optional explicit next version that wins over the computed one */
  versionOverride: Version | null;

  /** Whether changelog lines carry the short commit id */
  includeSha: boolean;

  /** Release date shown in the changelog header */
  date: Date;
}

/**
 * The release decision for a set of commits.
 */
export interface ReleasePlan {
  /** Latest stable version found in the tags, or `null` on a first release */
  currentVersion: Version | null;

  /** Version of the next release, or `null` when no release is needed */
  nextVersion: Version | null;

  /** Aggregate severity of the considered commits */
  bumpType: BumpType;

  /** Why the plan reached its decision */
  reason: PlanReason;

  releaseNeeded: boolean;
  isFirstRelease: boolean;

  /** Classifications that survived skip-marker and scope filtering */
  classifications: Classification[];

  /** Number of commits removed by skip markers */
  skippedCount: number;

  /** Rendered changelog for `nextVersion`, or an empty string */
  changelog: string;
}
