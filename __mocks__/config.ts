import type { Config } from '@/types';

/**
 * Configuration interface with added utility methods
 */
interface ConfigWithMethods extends Config {
  set: (overrides: Partial<Config>) => void;
  resetDefaults: () => void;
}

/**
 * Default configuration object, mirroring the action.yml defaults.
 */
const defaultConfig: Config = {
  breakingPattern: 'BREAKING[ -]CHANGE:',
  majorTypes: [],
  minorTypes: ['feat'],
  patchTypes: ['fix', 'perf'],
  scopePattern: '',
  skipReleaseMarkers: ['[skip release]', '[release skip]', '[no release]'],
  validateTitle: true,
  titleAllowedTypes: ['feat', 'fix', 'perf', 'docs', 'refactor', 'test', 'build', 'ci', 'style', 'chore', 'revert'],
  titleMaxLength: 0,
  titleRequireScope: false,
  tagPrefix: 'v',
  initialVersion: '0.1.0',
  prerelease: '',
  releaseVersion: '',
  changelogIncludeSha: false,
  disablePrComment: false,
  githubToken: 'test-token',
};

function isConfigKey(key: string): key is keyof Config {
  return Object.hasOwn(defaultConfig, key);
}

// Store the actual configuration data
let currentConfig: Config = { ...defaultConfig };

/**
 * Config proxy handler.
 */
const configProxyHandler: ProxyHandler<ConfigWithMethods> = {
  set(_target: ConfigWithMethods, key: string | symbol, value: unknown): boolean {
    if (typeof key !== 'string' || !isConfigKey(key)) {
      throw new Error(`Invalid config key: ${String(key)}`);
    }

    const expectedValue = defaultConfig[key];
    if ((Array.isArray(expectedValue) && Array.isArray(value)) || typeof expectedValue === typeof value) {
      Object.assign(currentConfig, { [key]: value });
      return true;
    }

    throw new TypeError(`Invalid value type for config key: ${key}`);
  },

  get(_target: ConfigWithMethods, prop: string | symbol): unknown {
    if (typeof prop !== 'string') {
      return undefined;
    }
    if (prop === 'set') {
      return (overrides: Partial<Config> = {}) => {
        currentConfig = { ...currentConfig, ...overrides };
      };
    }
    if (prop === 'resetDefaults') {
      return () => {
        currentConfig = { ...defaultConfig };
      };
    }

    return isConfigKey(prop) ? currentConfig[prop] : undefined;
  },
};

/**
 * Returns the current configuration.
 */
export function getConfig(): Config {
  return currentConfig;
}

/**
 * Create and export the config object directly with the proxy
 */
export const config: ConfigWithMethods = new Proxy({} as ConfigWithMethods, configProxyHandler);
