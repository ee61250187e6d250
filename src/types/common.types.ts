import type { BUMP_TYPE, PLAN_REASON, TITLE_ERROR_KIND } from '@/utils/constants';

/**
 * Common types used across the application
 */

/**
 * Represents the severity of a version change.
 *
 * This type is derived from the `BUMP_TYPE` constant object, ensuring that only valid
 * predefined severities can be used. Severities are totally ordered `none < patch < minor < major`.
 *
 * @see {@link BUMP_TYPE} for the available values
 */
export type BumpType = (typeof BUMP_TYPE)[keyof typeof BUMP_TYPE];

/**
 * Represents why a release plan reached its decision.
 *
 * @see {@link PLAN_REASON} for the available values
 */
export type PlanReason = (typeof PLAN_REASON)[keyof typeof PLAN_REASON];

/**
 * Represents the kind of a pull request title validation failure.
 *
 * @see {@link TITLE_ERROR_KIND} for the available values
 */
export type TitleErrorKind = (typeof TITLE_ERROR_KIND)[keyof typeof TITLE_ERROR_KIND];
