/**
 * Commit related types shared by the classifier, the bump calculator and the changelog.
 */

/**
 * A commit as supplied by the version-control collaborator. The engine never mutates it.
 */
export interface RawCommit {
  /** Opaque commit identifier (the SHA for GitHub commits) */
  readonly id: string;

  /** Full commit message: header line plus optional body */
  readonly message: string;

  /** Display name of the commit author */
  readonly author: string;

  /** Authoring time of the commit */
  readonly timestamp: Date;
}

/**
 * Result of applying the Conventional Commits header grammar to a single line.
 */
export interface ConventionalHeader {
  /** The commit type, lowercased (e.g. `feat`, `fix`) */
  type: string;
  /** The scope without parentheses, preserved as written */
  scope: string | null;
  /** Whether the header carries the `!` breaking-change marker */
  breaking: boolean;
  /** The trimmed description after the separator, never empty */
  description: string;
}

/**
 * Structured facts derived from one commit.
 *
 * When `isConventional` is false, `type` and `scope` are `null` and `description` holds the trimmed
 * header line verbatim.
 */
export interface Classification {
  readonly isConventional: boolean;
  readonly type: string | null;
  readonly scope: string | null;
  readonly description: string;
  readonly isBreaking: boolean;
  /** The commit this classification was derived from */
  readonly commit: RawCommit;
}

/**
 * Engine configuration for commit classification, filtering and bump calculation.
 */
export interface CommitsConfig {
  /**
   * Regular expression source matched against every line of a commit message. A match marks the commit
   * as breaking.
   */
  readonly breakingPattern: string;

  /** Commit types that force a major bump, in addition to breaking changes */
  readonly majorTypes: readonly string[];

  /** Commit types that trigger a minor bump */
  readonly minorTypes: readonly string[];

  /** Commit types that trigger a patch bump */
  readonly patchTypes: readonly string[];

  /**
   * Optional regular expression source a scope must match (anchored at the start of the scope). When set,
   * unscoped commits and commits with a non-matching scope are dropped from the parsed set.
   */
  readonly scopePattern: string | null;

  /** Case-insensitive substrings that exclude a commit from release consideration */
  readonly skipReleaseMarkers: readonly string[];
}
