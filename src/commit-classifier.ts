import { parseConventionalHeader } from '@/conventional-header';
import type { Classification, CommitsConfig, RawCommit } from '@/types';

/**
 * Splits a message into lines, accepting both `\n` and `\r\n` endings.
 */
function splitLines(message: string): string[] {
  return message.split(/\r?\n/);
}

/**
 * Derives the structured facts of one commit.
 *
 * The header is the first line of the trimmed message. When it follows the Conventional Commits grammar the
 * parsed type, scope and description are copied; otherwise the commit is classified as non-conventional and
 * the trimmed header becomes the description.
 *
 * A commit is breaking when its header carries `!` or when any line of the message, header or body, matches
 * `breakingPattern`. The pattern is checked for non-conventional commits as well.
 *
 * Never throws for any message text.
 *
 * @example
 * ```typescript
 * classifyCommit({ id: 'abc', message: 'feat: x\n\nBREAKING CHANGE: y', ... }, /BREAKING[ -]CHANGE:/)
 * // → { isConventional: true, type: 'feat', scope: null, description: 'x', isBreaking: true, commit }
 * ```
 */
export function classifyCommit(commit: RawCommit, breakingPattern: RegExp): Classification {
  const trimmed = commit.message.trim();
  const lines = splitLines(trimmed);
  const header = lines[0].trim();
  const parsed = parseConventionalHeader(header);

  // Stateful (g/y) patterns would make `test()` depend on the previous call
  const matcher =
    breakingPattern.global || breakingPattern.sticky
      ? new RegExp(breakingPattern.source, breakingPattern.flags.replace(/[gy]/g, ''))
      : breakingPattern;
  const bodyBreaking = lines.some((line) => matcher.test(line));

  if (!parsed) {
    return {
      isConventional: false,
      type: null,
      scope: null,
      description: header,
      isBreaking: bodyBreaking,
      commit,
    };
  }

  return {
    isConventional: true,
    type: parsed.type,
    scope: parsed.scope,
    description: parsed.description,
    isBreaking: parsed.breaking || bodyBreaking,
    commit,
  };
}

/**
 * Classifies every commit in input order.
 *
 * When `config.scopePattern` is set, only commits whose scope matches it at the start of the scope are kept;
 * unscoped commits are dropped.
 */
export function parseCommits(commits: ReadonlyArray<RawCommit>, config: CommitsConfig): Classification[] {
  const breakingPattern = new RegExp(config.breakingPattern);
  const scopePattern = config.scopePattern ? new RegExp(`^(?:${config.scopePattern})`) : null;

  const classifications = commits.map((commit) => classifyCommit(commit, breakingPattern));
  if (scopePattern === null) {
    return classifications;
  }

  return classifications.filter(({ scope }) => scope !== null && scopePattern.test(scope));
}
