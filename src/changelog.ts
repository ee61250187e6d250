import type { Classification } from '@/types';
import type { Version } from '@/version';
import { BREAKING_CHANGES_LABEL, CHANGELOG_SECTIONS, OTHER_COMMIT_TYPE, SHORT_SHA_LENGTH } from '@/utils/constants';

const SECTION_TYPES = new Set(CHANGELOG_SECTIONS.map(({ type }) => type));

/**
 * Groups classifications by commit type.
 *
 * Keys appear in first-seen order and each group keeps input order. Commits without a type are collected
 * under `other`.
 *
 * @param {ReadonlyArray<Classification>} classifications - The classified commits to group.
 * @returns {Map<string, Classification[]>} The groups keyed by type.
 */
export function groupByType(classifications: ReadonlyArray<Classification>): Map<string, Classification[]> {
  const groups = new Map<string, Classification[]>();

  for (const classification of classifications) {
    const key = classification.type ?? OTHER_COMMIT_TYPE;
    const group = groups.get(key);
    if (group) {
      group.push(classification);
    } else {
      groups.set(key, [classification]);
    }
  }

  return groups;
}

/**
 * Returns the breaking classifications in input order.
 */
export function getBreakingChanges(classifications: ReadonlyArray<Classification>): Classification[] {
  return classifications.filter(({ isBreaking }) => isBreaking);
}

/**
 * Renders one changelog bullet.
 *
 * @param {Classification} classification - The commit to render.
 * @param {boolean} includeScope - Whether to prefix the description with the bold scope, when there is one.
 * @param {boolean} includeSha - Whether to append the short commit id in parentheses.
 * @returns {string} The markdown line, e.g. `- [BREAKING] **api:** drop v1 routes (a1b2c3d)`.
 */
export function formatCommitLine(classification: Classification, includeScope = true, includeSha = false): string {
  const parts: string[] = ['-'];

  if (classification.isBreaking) {
    parts.push('[BREAKING]');
  }
  if (includeScope && classification.scope !== null) {
    parts.push(`**${classification.scope}:**`);
  }
  parts.push(classification.description);
  if (includeSha) {
    parts.push(`(${classification.commit.id.slice(0, SHORT_SHA_LENGTH)})`);
  }

  return parts.join(' ');
}

function renderSection(label: string, lines: string[]): string {
  return `### ${label}\n\n${lines.join('\n')}`;
}

/**
 * Renders the markdown changelog for a release.
 *
 * Breaking changes are listed first under their own heading and are not repeated in their type section.
 * The remaining commits render in fixed section order; types without a section of their own render under
 * Other. Empty sections are omitted and blocks are separated by one blank line.
 *
 * @param {ReadonlyArray<Classification>} classifications - The commits going into the release.
 * @param {Version} version - The version the changelog describes.
 * @param {Date} date - The release date, rendered as its UTC calendar date.
 * @param {boolean} includeSha - Whether each line carries the short commit id.
 * @returns {string} The changelog, or an empty string when there are no commits.
 */
export function renderChangelog(
  classifications: ReadonlyArray<Classification>,
  version: Version,
  date: Date,
  includeSha = false,
): string {
  if (classifications.length === 0) {
    return '';
  }

  const releaseDate = date.toISOString().split('T')[0]; // Format: YYYY-MM-DD
  const changelogContent: string[] = [`## [${version.toString()}] - ${releaseDate}`];

  const breaking = getBreakingChanges(classifications);
  if (breaking.length > 0) {
    changelogContent.push(
      renderSection(
        BREAKING_CHANGES_LABEL,
        breaking.map((classification) => formatCommitLine(classification, true, includeSha)),
      ),
    );
  }

  // Types without a section of their own share the Other section in input order
  const sections = groupByType(
    classifications
      .filter(({ isBreaking }) => !isBreaking)
      .map((classification) =>
        classification.type !== null && SECTION_TYPES.has(classification.type)
          ? classification
          : { ...classification, type: OTHER_COMMIT_TYPE },
      ),
  );

  for (const { type, label } of CHANGELOG_SECTIONS) {
    const entries = sections.get(type) ?? [];
    if (entries.length > 0) {
      changelogContent.push(
        renderSection(
          label,
          entries.map((classification) => formatCommitLine(classification, true, includeSha)),
        ),
      );
    }
  }

  return changelogContent.join('\n\n');
}
