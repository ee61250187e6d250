import type { Config } from '@/types/config.types';

/**
 * Supported parsing strategies for action inputs.
 * - `string`: the raw (trimmed) value
 * - `boolean`: YAML 1.2 core schema booleans via `getBooleanInput`
 * - `number`: base-10 integer
 * - `array`: comma-separated list, trimmed and de-duplicated
 */
export type ActionInputType = 'string' | 'boolean' | 'number' | 'array';

/**
 * Describes how one input declared in `action.yml` becomes a {@link Config} property.
 * `createConfigFromInputs()` walks these entries to build the config without a hand-written mapping.
 *
 * @see {@link https://docs.github.com/en/actions/reference/metadata-syntax-for-github-actions#inputs} GitHub Actions input reference
 */
export interface ActionInputMetadata {
  /** The config property the parsed value is stored under */
  configKey: keyof Config;

  /** Whether an empty value fails the action */
  required: boolean;

  type: ActionInputType;
}
