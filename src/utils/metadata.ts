import type { ActionInputMetadata, Config } from '@/types';
import { getBooleanInput, getInput } from '@actions/core';

/**
 * Factory functions to reduce duplication in ACTION_INPUTS metadata definitions.
 */
const requiredString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'string',
});

const optionalString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'string',
});

const requiredBoolean = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'boolean',
});

const requiredArray = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'array',
});

const optionalArray = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'array',
});

const requiredNumber = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'number',
});

/**
 * Complete mapping of all GitHub Action inputs to their metadata.
 * This is the single source of truth for input configuration; defaults live in action.yml.
 */
export const ACTION_INPUTS: Record<string, ActionInputMetadata> = {
  'breaking-pattern': requiredString('breakingPattern'),
  'major-types': optionalArray('majorTypes'),
  'minor-types': optionalArray('minorTypes'),
  'patch-types': optionalArray('patchTypes'),
  'scope-pattern': optionalString('scopePattern'),
  'skip-release-markers': optionalArray('skipReleaseMarkers'),
  'validate-title': requiredBoolean('validateTitle'),
  'title-allowed-types': requiredArray('titleAllowedTypes'),
  'title-max-length': requiredNumber('titleMaxLength'),
  'title-require-scope': requiredBoolean('titleRequireScope'),
  'tag-prefix': optionalString('tagPrefix'),
  'initial-version': requiredString('initialVersion'),
  prerelease: optionalString('prerelease'),
  'release-version': optionalString('releaseVersion'),
  'changelog-include-sha': requiredBoolean('changelogIncludeSha'),
  'disable-pr-comment': requiredBoolean('disablePrComment'),
  github_token: requiredString('githubToken'),
} as const;

/**
 * Splits a comma-separated input into trimmed, non-empty, de-duplicated items.
 */
export function parseListInput(input: string): string[] {
  return Array.from(
    new Set(
      input
        .split(',')
        .map((item: string) => item.trim())
        .filter(Boolean),
    ),
  );
}

/**
 * Creates a config object by reading inputs using GitHub Actions API and converting them
 * according to the metadata definitions.
 */
export function createConfigFromInputs(): Config {
  const config = {} as Config;

  for (const [inputName, metadata] of Object.entries(ACTION_INPUTS)) {
    const { configKey, required, type } = metadata;

    try {
      let value: unknown;

      if (type === 'boolean') {
        value = getBooleanInput(inputName, { required });
      } else if (type === 'array') {
        value = parseListInput(getInput(inputName, { required }));
      } else if (type === 'number') {
        // Anything but a plain base-10 integer becomes NaN and is rejected during validation
        const input = getInput(inputName, { required });
        value = /^-?\d+$/.test(input) ? Number.parseInt(input, 10) : Number.NaN;
      } else {
        value = getInput(inputName, { required });
      }

      Object.assign(config, { [configKey]: value });
    } catch (error) {
      throw new Error(
        `Failed to process input '${inputName}': ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  return config;
}
