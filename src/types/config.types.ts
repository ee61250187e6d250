/**
 * Configuration related types
 */

/**
 * Configuration interface used for defining key GitHub Action input configuration.
 */
export interface Config {
  /**
   * Regular expression matched against every line of each commit message. A match marks the commit as a
   * breaking change and forces a major version bump.
   */
  breakingPattern: string;

  /**
   * List of commit types that trigger a major version bump in addition to breaking changes.
   */
  majorTypes: string[];

  /**
   * List of commit types that trigger a minor version bump.
   */
  minorTypes: string[];

  /**
   * List of commit types that trigger a patch version bump.
   */
  patchTypes: string[];

  /**
   * Optional regular expression a commit scope must match for the commit to be considered. An empty string
   * disables scope filtering.
   */
  scopePattern: string;

  /**
   * Case-insensitive markers that exclude a commit from release consideration, e.g. `[skip release]`.
   */
  skipReleaseMarkers: string[];

  /**
   * Whether the pull request title is validated against the Conventional Commits format.
   */
  validateTitle: boolean;

  /**
   * Commit types accepted in the pull request title.
   */
  titleAllowedTypes: string[];

  /**
   * Maximum pull request title length. Zero disables the length check.
   */
  titleMaxLength: number;

  /**
   * Whether the pull request title must include a scope, e.g. `feat(api): ...`.
   */
  titleRequireScope: boolean;

  /**
   * Prefix in front of version tags. With the default `v`, tags look like `v1.2.3`.
   */
  tagPrefix: string;

  /**
   * Version used for the first release when the repository has no version tag yet (e.g. `0.1.0`).
   */
  initialVersion: string;

  /**
   * Optional prerelease label (e.g. `rc`). When set, the next version becomes `X.Y.Z-label.N` where `N` is the
   * next free counter among existing tags.
   */
  prerelease: string;

  /**
   * Optional explicit version that overrides the computed next version. An empty string disables the override.
   */
  releaseVersion: string;

  /**
   * Whether changelog entries end with the short commit SHA.
   */
  changelogIncludeSha: boolean;

  /**
   * Whether to skip posting the release plan comment on the pull request.
   */
  disablePrComment: boolean;

  /**
   * The GitHub token (`GITHUB_TOKEN`) used for API authentication.
   */
  githubToken: string;
}
