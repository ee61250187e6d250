import { createDefaultOctokitMock } from '@/tests/helpers/octokit';
import type { Context, Repo } from '@/types';
import { merge } from 'ts-deepmerge';

/**
 * Default repository configuration
 */
const defaultRepo: Repo = {
  owner: 'octo-org',
  repo: 'octo-repo',
};

/**
 * Context interface with added utility methods
 */
export interface ContextWithMethods extends Context {
  set: (overrides?: Partial<Context>) => void;
  reset: () => void;
}

/**
 * Default context values
 */
const createDefaultContext = (): Context => ({
  repo: defaultRepo,
  repoUrl: 'https://github.com/octo-org/octo-repo',
  octokit: createDefaultOctokitMock(),
  prNumber: 1,
  prTitle: 'feat: add release planning',
  issueNumber: 1,
  isPrMergeEvent: false,
});

function isContextKey(key: string): key is keyof Context {
  return ['repo', 'repoUrl', 'octokit', 'prNumber', 'prTitle', 'issueNumber', 'isPrMergeEvent'].includes(key);
}

// Store the current context configuration
let currentContext: Context = createDefaultContext();

/**
 * Context proxy handler
 */
const contextProxyHandler: ProxyHandler<ContextWithMethods> = {
  set(_target: ContextWithMethods, key: string | symbol, value: unknown): boolean {
    if (typeof key !== 'string' || !isContextKey(key)) {
      throw new Error(`Invalid context key: ${String(key)}`);
    }
    if (typeof currentContext[key] !== typeof value) {
      throw new TypeError(`Invalid value type for context key: ${key}`);
    }

    Object.assign(currentContext, { [key]: value });
    return true;
  },

  get(_target: ContextWithMethods, prop: string | symbol): unknown {
    if (typeof prop !== 'string') {
      return undefined;
    }
    if (prop === 'set') {
      return (overrides: Partial<Context> = {}) => {
        // Note: No need for deep merge
        currentContext = { ...currentContext, ...overrides };
      };
    }
    if (prop === 'reset') {
      return () => {
        currentContext = createDefaultContext();
      };
    }

    return isContextKey(prop) ? currentContext[prop] : undefined;
  },
};

/**
 * Create and export the context mock directly with the proxy
 */
export const context = new Proxy({} as ContextWithMethods, contextProxyHandler);

/**
 * Returns the current context configuration
 */
export function getContext(): Context {
  return currentContext;
}

/**
 * Default pull request payload for testing
 */
const defaultPullRequestPayload = {
  action: 'opened',
  pull_request: {
    number: 123,
    title: 'feat: add release planning',
    body: 'Adds the release planner.',
    merged: false,
  },
  repository: {
    full_name: 'octo-org/octo-repo',
  },
};

/**
 * Create a mock pull request payload, deep-merging the given overrides into the defaults
 */
export function createPullRequestMock(overrides: Record<string, unknown> = {}) {
  return merge(defaultPullRequestPayload, overrides);
}
