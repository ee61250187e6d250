import { CommitParser } from 'conventional-commits-parser';
import type { ConventionalHeader } from '@/types';

/**
 * Header parser shared by the commit classifier and the pull request title validator.
 *
 * Only ever given a single header line, so body notes and references never apply; breaking-change footers are
 * matched separately by the classifier against a configurable pattern.
 *
 * - `headerPattern`: Matches `<type>[(<scope>)][!]:<blank><description>`:
 *   - `type` is one or more word characters (`[A-Za-z0-9_]`)
 *   - the scope, when present, is one or more characters other than `)`; `feat():` does not match, neither
 *     does an unterminated `feat(api:`
 *   - the `!` sits between the scope and the colon; `feat!(api):` does not match
 *   - the colon is followed by at least one space or tab, and the description must contain a non-blank
 *     character
 *
 * - `breakingHeaderPattern`: Same as above with `!` required. When it matches, the library pushes a
 *   `BREAKING CHANGE` entry onto `notes`, which is how the marker is detected.
 *
 * - `headerCorrespondence`: Maps the three capture groups to `type`, `scope` and `subject`.
 */
const headerParser = new CommitParser({
  headerPattern: /^(\w+)(?:\(([^)]+)\))?!?:[ \t]+(.*\S.*)$/,
  breakingHeaderPattern: /^(\w+)(?:\(([^)]+)\))?!:[ \t]+(.*\S.*)$/,
  headerCorrespondence: ['type', 'scope', 'subject'],
});

/**
 * Applies the Conventional Commits header grammar to a single line.
 *
 * The expected format is: `<type>[(scope)][!]: <description>`
 *
 * @param line - A single header line. Callers pass the first line of a message.
 * @returns The parsed header with the type lowercased and the description trimmed, or `null` when the line
 *   does not follow the grammar
 *
 * @example
 * ```typescript
 * parseConventionalHeader('feat(api): add user endpoint')
 * // → { type: 'feat', scope: 'api', breaking: false, description: 'add user endpoint' }
 *
 * parseConventionalHeader('Fix!: critical security patch')
 * // → { type: 'fix', scope: null, breaking: true, description: 'critical security patch' }
 *
 * parseConventionalHeader('update readme')
 * // → null
 * ```
 */
export function parseConventionalHeader(line: string): ConventionalHeader | null {
  // The parser rejects blank input, and a header never spans lines
  if (line.trim() === '' || /[\r\n]/.test(line)) {
    return null;
  }

  const parsed = headerParser.parse(line);
  if (typeof parsed.type !== 'string' || typeof parsed.subject !== 'string') {
    return null;
  }

  return {
    type: parsed.type.toLowerCase(),
    scope: typeof parsed.scope === 'string' ? parsed.scope : null,
    breaking: parsed.notes.length > 0,
    description: parsed.subject.trim(),
  };
}
