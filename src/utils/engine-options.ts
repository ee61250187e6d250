import type { CommitsConfig, Config, TitleValidationOptions } from '@/types';

/**
 * Converts the action configuration into the commit engine's configuration.
 */
export function toCommitsConfig(actionConfig: Config): CommitsConfig {
  return {
    breakingPattern: actionConfig.breakingPattern,
    majorTypes: actionConfig.majorTypes,
    minorTypes: actionConfig.minorTypes,
    patchTypes: actionConfig.patchTypes,
    scopePattern: actionConfig.scopePattern === '' ? null : actionConfig.scopePattern,
    skipReleaseMarkers: actionConfig.skipReleaseMarkers,
  };
}

/**
 * Converts the action configuration into title validation options. A max length of zero means unlimited.
 */
export function toTitleValidationOptions(actionConfig: Config): TitleValidationOptions {
  return {
    maxLength: actionConfig.titleMaxLength === 0 ? null : actionConfig.titleMaxLength,
    requireScope: actionConfig.titleRequireScope,
    allowedTypes: actionConfig.titleAllowedTypes,
  };
}
