import { InvalidVersionFormatError } from '@/errors';
import type { Config } from '@/types';
import { PRERELEASE_LABEL_REGEX } from '@/utils/constants';
import { createConfigFromInputs } from '@/utils/metadata';
import { Version } from '@/version';
import { endGroup, info, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * Resets the singleton so the next access re-reads the (mocked) action inputs.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different config variations
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

function assertCompiles(label: string, pattern: string): void {
  try {
    new RegExp(pattern);
  } catch (error) {
    throw new TypeError(
      `${label} must be a valid regular expression. Got: '${pattern}' (${error instanceof Error ? error.message : String(error)})`,
      { cause: error },
    );
  }
}

function assertVersion(label: string, value: string): void {
  try {
    Version.parse(value);
  } catch (error) {
    if (error instanceof InvalidVersionFormatError) {
      throw new TypeError(`${label} must be a version in format #.#.# (e.g., 1.0.0). Got: '${value}'`, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Lazy-initialized configuration object. This is kept separate from the exported
 * config to allow testing utilities to be imported without triggering initialization.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    const instance = createConfigFromInputs();

    assertCompiles('Breaking pattern', instance.breakingPattern);
    if (instance.scopePattern !== '') {
      assertCompiles('Scope pattern', instance.scopePattern);
    }

    assertVersion('Initial version', instance.initialVersion);
    if (instance.releaseVersion !== '') {
      assertVersion('Release version', instance.releaseVersion);
    }

    if (instance.prerelease !== '' && !PRERELEASE_LABEL_REGEX.test(instance.prerelease)) {
      throw new TypeError(
        `Prerelease label must start with a letter and contain only letters, digits or hyphens. Got: '${instance.prerelease}'`,
      );
    }

    if (!Number.isInteger(instance.titleMaxLength) || instance.titleMaxLength < 0) {
      throw new TypeError('Title max length must be an integer greater than or equal to zero');
    }

    if (instance.titleAllowedTypes.length === 0) {
      throw new TypeError('Title allowed types must contain at least one commit type');
    }

    // Types compare lowercased everywhere downstream
    for (const key of ['majorTypes', 'minorTypes', 'patchTypes', 'titleAllowedTypes'] as const) {
      instance[key] = Array.from(new Set(instance[key].map((type) => type.toLowerCase())));
    }

    info(`Breaking Pattern: ${instance.breakingPattern}`);
    info(`Major Types: ${instance.majorTypes.join(', ')}`);
    info(`Minor Types: ${instance.minorTypes.join(', ')}`);
    info(`Patch Types: ${instance.patchTypes.join(', ')}`);
    info(`Scope Pattern: ${instance.scopePattern}`);
    info(`Skip Release Markers: ${instance.skipReleaseMarkers.join(', ')}`);
    info(`Validate Title: ${instance.validateTitle}`);
    info(`Title Allowed Types: ${instance.titleAllowedTypes.join(', ')}`);
    info(`Title Max Length: ${instance.titleMaxLength}`);
    info(`Title Require Scope: ${instance.titleRequireScope}`);
    info(`Tag Prefix: ${instance.tagPrefix}`);
    info(`Initial Version: ${instance.initialVersion}`);
    info(`Prerelease: ${instance.prerelease}`);
    info(`Release Version: ${instance.releaseVersion}`);
    info(`Changelog Include SHA: ${instance.changelogIncludeSha}`);
    info(`Disable PR Comment: ${instance.disablePrComment}`);

    configInstance = instance;
    return configInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}

export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return getConfig()[prop as keyof Config];
  },
});
