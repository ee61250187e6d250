import * as fs from 'node:fs';
import * as path from 'node:path';
import { ACTION_INPUTS } from '@/utils/metadata';
import * as yaml from 'js-yaml';

/**
 * The part of action.yml these helpers read
 */
interface ActionYml {
  inputs: Record<string, { description?: string; required?: boolean; default?: string }>;
}

function isActionYml(value: unknown): value is ActionYml {
  return typeof value === 'object' && value !== null && 'inputs' in value && typeof value.inputs === 'object';
}

/**
 * Parses action.yml from the current working directory.
 */
export function loadActionYml(): ActionYml {
  const actionYmlPath = path.join(process.cwd(), 'action.yml');
  const actionYml: unknown = yaml.load(fs.readFileSync(actionYmlPath, 'utf8'));
  if (!isActionYml(actionYml)) {
    throw new Error(`Unexpected action.yml structure in ${actionYmlPath}`);
  }

  return actionYml;
}

/**
 * Extracts default values for every input in ACTION_INPUTS from action.yml.
 *
 * @returns A record mapping each input name to its default value, or undefined when it has none.
 */
export function getActionDefaults(): Record<string, string | undefined> {
  const { inputs } = loadActionYml();
  const defaults: Record<string, string | undefined> = {};

  for (const inputName of Object.keys(ACTION_INPUTS)) {
    defaults[inputName] = inputs[inputName]?.default;
  }

  return defaults;
}
