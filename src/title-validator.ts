import { parseConventionalHeader } from '@/conventional-header';
import type {
  ConventionalHeader,
  TitleErrorKind,
  TitleValidationError,
  TitleValidationOptions,
  TitleValidationResult,
} from '@/types';
import { DEFAULT_TITLE_VALIDATION_OPTIONS, TITLE_ERROR_KIND } from '@/utils/constants';

/**
 * What every rule sees: the title as received, and its parsed header once the format rule has passed.
 */
interface TitleRuleInput {
  raw: string;
  header: ConventionalHeader | null;
  options: TitleValidationOptions;
}

interface TitleRule {
  kind: TitleErrorKind;
  /** Returns the failure message, or `null` when the title passes this rule */
  check: (input: TitleRuleInput) => string | null;
}

/**
 * Rules in evaluation order. Validation stops at the first failure.
 */
const TITLE_RULES: readonly TitleRule[] = [
  {
    kind: TITLE_ERROR_KIND.EMPTY_TITLE,
    check: ({ raw }) => (raw.trim() === '' ? 'Pull request title cannot be empty' : null),
  },
  {
    kind: TITLE_ERROR_KIND.NOT_CONVENTIONAL_FORMAT,
    check: ({ header }) =>
      header === null
        ? "Pull request title must follow the conventional commit format: 'type(scope): description'"
        : null,
  },
  {
    kind: TITLE_ERROR_KIND.INVALID_COMMIT_TYPE,
    check: ({ header, options }) => {
      if (header === null) {
        return null;
      }
      const allowed = options.allowedTypes.map((type) => type.toLowerCase());
      return allowed.includes(header.type)
        ? null
        : `Invalid commit type '${header.type}'. Allowed types: ${[...allowed].sort().join(', ')}`;
    },
  },
  {
    kind: TITLE_ERROR_KIND.MISSING_SCOPE,
    check: ({ header, options }) =>
      options.requireScope && header?.scope === null
        ? "Pull request title must include a scope: 'type(scope): description'"
        : null,
  },
  {
    kind: TITLE_ERROR_KIND.TITLE_TOO_LONG,
    check: ({ raw, options }) => {
      // Count code points so an emoji counts as one character
      const length = [...raw].length;
      return options.maxLength !== null && length > options.maxLength
        ? `Pull request title exceeds ${options.maxLength} characters (${length})`
        : null;
    },
  },
];

/**
 * Validates a pull request title against the Conventional Commits format.
 *
 * The length rule measures the title as received, including surrounding whitespace; every other rule works
 * on the trimmed title. Parsed fields are populated whenever the format matched, even if a later rule failed.
 *
 * @param {string} title - The pull request title.
 * @param {Partial<TitleValidationOptions>} options - Overrides for the default options.
 * @returns {TitleValidationResult} The validation outcome.
 *
 * @example
 * ```typescript
 * validateTitle('feat(core)!: change API structure')
 * // → { isValid: true, error: null, type: 'feat', scope: 'core', description: 'change API structure', isBreaking: true }
 * ```
 */
export function validateTitle(title: string, options: Partial<TitleValidationOptions> = {}): TitleValidationResult {
  const effectiveOptions: TitleValidationOptions = { ...DEFAULT_TITLE_VALIDATION_OPTIONS, ...options };
  const header = parseConventionalHeader(title.trim());
  const input: TitleRuleInput = { raw: title, header, options: effectiveOptions };

  let error: TitleValidationError | null = null;
  for (const rule of TITLE_RULES) {
    const message = rule.check(input);
    if (message !== null) {
      error = { kind: rule.kind, message };
      break;
    }
  }

  return {
    isValid: error === null,
    error,
    type: header?.type ?? null,
    scope: header?.scope ?? null,
    description: header?.description ?? '',
    isBreaking: header?.breaking ?? false,
  };
}

/**
 * Validates each title independently. Results are index-aligned with the input.
 */
export function validateTitles(
  titles: ReadonlyArray<string>,
  options: Partial<TitleValidationOptions> = {},
): TitleValidationResult[] {
  return titles.map((title) => validateTitle(title, options));
}
