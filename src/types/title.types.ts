import type { TitleErrorKind } from '@/types/common.types';

/**
 * Options controlling pull request title validation.
 */
export interface TitleValidationOptions {
  /** Maximum raw title length, or `null` for no limit */
  readonly maxLength: number | null;

  /** Whether the title must carry a scope */
  readonly requireScope: boolean;

  /** Commit types accepted in the title (compared lowercased) */
  readonly allowedTypes: readonly string[];
}

/**
 * A failed title check, tagged by kind.
 */
export interface TitleValidationError {
  kind: TitleErrorKind;
  message: string;
}

/**
 * Outcome of validating a single title. The parsed fields are populated whenever the title matched the
 * Conventional Commits grammar, even if a later rule rejected it.
 */
export interface TitleValidationResult {
  isValid: boolean;
  error: TitleValidationError | null;
  type: string | null;
  scope: string | null;
  description: string;
  isBreaking: boolean;
}
