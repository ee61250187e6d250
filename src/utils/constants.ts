import type { CommitsConfig, TitleValidationOptions } from '@/types';

/**
 * Regular expression that matches a version string of the form `MAJOR.MINOR.PATCH[-label[.counter]]`.
 *
 * Group 1: Major version number
 * Group 2: Minor version number
 * Group 3: Patch version number
 * Group 4: Prerelease label (optional)
 * Group 5: Prerelease counter (optional, only together with a label)
 *
 * Numeric parts carry no leading zeros so that every accepted string is the canonical form of the version
 * it denotes.
 */
export const VERSION_REGEX = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([A-Za-z][0-9A-Za-z-]*)(?:\.(0|[1-9]\d*))?)?$/;

/**
 * A prerelease label: a letter followed by letters, digits or hyphens.
 */
export const PRERELEASE_LABEL_REGEX = /^[A-Za-z][0-9A-Za-z-]*$/;

/**
 * Bump severity constants for semantic versioning
 */
export const BUMP_TYPE = {
  NONE: 'none',
  PATCH: 'patch',
  MINOR: 'minor',
  MAJOR: 'major',
} as const;

/**
 * Rank of each bump severity. Aggregation keeps the highest rank.
 */
export const BUMP_TYPE_PRIORITY = {
  [BUMP_TYPE.NONE]: 0,
  [BUMP_TYPE.PATCH]: 1,
  [BUMP_TYPE.MINOR]: 2,
  [BUMP_TYPE.MAJOR]: 3,
} as const;

/**
 * Release plan reason constants - why a plan does or does not release
 */
export const PLAN_REASON = {
  NO_COMMITS: 'no-commits',
  ALL_SKIPPED: 'all-skipped',
  NO_RELEASABLE_CHANGES: 'no-releasable-changes',
  INITIAL: 'initial',
  OVERRIDE: 'override',
  BUMP: 'bump',
} as const;

/**
 * Title validation failure kinds, in the order the rules run
 */
export const TITLE_ERROR_KIND = {
  EMPTY_TITLE: 'EmptyTitle',
  NOT_CONVENTIONAL_FORMAT: 'NotConventionalFormat',
  INVALID_COMMIT_TYPE: 'InvalidCommitType',
  MISSING_SCOPE: 'MissingScope',
  TITLE_TOO_LONG: 'TitleTooLong',
} as const;

/**
 * Bucket used for commits without a type, and for types outside {@link CHANGELOG_SECTIONS}.
 */
export const OTHER_COMMIT_TYPE = 'other';

/**
 * Changelog sections in rendering order. Breaking changes are always rendered before these.
 */
export const CHANGELOG_SECTIONS: ReadonlyArray<{ readonly type: string; readonly label: string }> = [
  { type: 'feat', label: '✨ Features' },
  { type: 'fix', label: '🐛 Bug Fixes' },
  { type: 'perf', label: '⚡ Performance' },
  { type: 'docs', label: '📚 Documentation' },
  { type: 'refactor', label: '♻️ Refactoring' },
  { type: 'test', label: '🧪 Tests' },
  { type: 'build', label: '📦 Build' },
  { type: 'ci', label: '🔧 CI' },
  { type: 'style', label: '💄 Style' },
  { type: 'chore', label: '🔨 Chores' },
  { type: OTHER_COMMIT_TYPE, label: '📝 Other' },
];

export const BREAKING_CHANGES_LABEL = '⚠️ Breaking Changes';

/**
 * Number of leading characters of a commit id shown in changelog lines.
 */
export const SHORT_SHA_LENGTH = 7;

/**
 * Commit types accepted in pull request titles unless configured otherwise.
 */
export const DEFAULT_ALLOWED_TYPES: readonly string[] = Object.freeze([
  'feat',
  'fix',
  'perf',
  'docs',
  'refactor',
  'test',
  'build',
  'ci',
  'style',
  'chore',
  'revert',
]);

/**
 * Engine defaults. Frozen; callers pass their own object instead of mutating this one.
 */
export const DEFAULT_COMMITS_CONFIG: CommitsConfig = Object.freeze({
  breakingPattern: 'BREAKING[ -]CHANGE:',
  majorTypes: Object.freeze([]),
  minorTypes: Object.freeze(['feat']),
  patchTypes: Object.freeze(['fix', 'perf']),
  scopePattern: null,
  skipReleaseMarkers: Object.freeze(['[skip release]', '[release skip]', '[no release]']),
});

export const DEFAULT_TITLE_VALIDATION_OPTIONS: TitleValidationOptions = Object.freeze({
  maxLength: null,
  requireScope: false,
  allowedTypes: DEFAULT_ALLOWED_TYPES,
});

export const GITHUB_ACTIONS_BOT_USER_ID = 41898282;

export const PR_SUMMARY_MARKER = '<!-- conventional-release-action - release-plan-marker -->';
