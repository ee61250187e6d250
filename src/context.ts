import * as fs from 'node:fs';
import { config } from '@/config';
import type { Context, OctokitRestApi, PullRequestEventSummary, Repo } from '@/types';
import { endGroup, info, startGroup } from '@actions/core';
import { Octokit } from '@octokit/core';
import { paginateRest } from '@octokit/plugin-paginate-rest';
import { restEndpointMethods } from '@octokit/plugin-rest-endpoint-methods';
import type { PullRequestEvent } from '@octokit/webhooks-types';
import { homepage, version } from '../package.json';

let contextInstance: Context | null = null;

function getRequiredEnvironmentVar(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(
      `The ${name} environment variable is missing or invalid. This variable should be automatically set by GitHub for each workflow run. Please review the workflow setup.`,
    );
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Checks the fields of the webhook payload the release plan reads.
 */
function isPullRequestEvent(payload: unknown): payload is PullRequestEvent {
  if (!isRecord(payload) || !isRecord(payload.pull_request)) {
    return false;
  }

  const { pull_request: pullRequest } = payload;
  return (
    typeof payload.action === 'string' &&
    typeof pullRequest.number === 'number' &&
    typeof pullRequest.title === 'string'
  );
}

/**
 * Splits `GITHUB_REPOSITORY` (`owner/name`) into its parts.
 */
function parseRepository(repository: string): Repo {
  const [owner, repo, ...rest] = repository.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`GITHUB_REPOSITORY must have the form 'owner/name'. Got: '${repository}'`);
  }

  return { owner, repo };
}

/**
 * Reads the `pull_request` webhook payload GitHub writes to `GITHUB_EVENT_PATH`.
 */
function readPullRequestEvent(eventPath: string): PullRequestEventSummary {
  if (!fs.existsSync(eventPath)) {
    throw new Error(`Specified GITHUB_EVENT_PATH ${eventPath} does not exist`);
  }

  const payload: unknown = JSON.parse(fs.readFileSync(eventPath, { encoding: 'utf8' }));
  if (!isPullRequestEvent(payload)) {
    throw new Error('Event payload did not match expected pull_request event payload');
  }

  return {
    action: payload.action,
    number: payload.pull_request.number,
    title: payload.pull_request.title,
    merged: payload.pull_request.merged === true,
  };
}

function createOctokit(token: string): OctokitRestApi {
  const OctokitRestApiClient = Octokit.plugin(restEndpointMethods, paginateRest);
  return new OctokitRestApiClient({
    auth: `token ${token}`,
    userAgent: `[octokit] conventional-release-action/${version} (${homepage})`,
  });
}

/**
 * Clears the cached context instance during testing. Only takes effect when NODE_ENV is `test`.
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Builds the context once per run: the repository, the pull request that triggered the workflow and an
 * authenticated client.
 *
 * A `closed` event for a merged pull request is flagged so the run can skip commenting on a pull request
 * that is already merged.
 *
 * @throws {Error} If a GitHub environment variable is missing, the event is not `pull_request`, or the event
 *   payload cannot be read.
 */
function initializeContext(): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const eventName = getRequiredEnvironmentVar('GITHUB_EVENT_NAME');
    const serverUrl = getRequiredEnvironmentVar('GITHUB_SERVER_URL');
    const repo = parseRepository(getRequiredEnvironmentVar('GITHUB_REPOSITORY'));
    const eventPath = getRequiredEnvironmentVar('GITHUB_EVENT_PATH');

    if (eventName !== 'pull_request') {
      throw new Error(
        'This workflow is not running in the context of a pull request. Ensure this workflow is triggered by a pull request event.',
      );
    }

    const pullRequest = readPullRequestEvent(eventPath);

    contextInstance = {
      repo,
      repoUrl: `${serverUrl}/${repo.owner}/${repo.repo}`,
      octokit: createOctokit(config.githubToken),
      prNumber: pullRequest.number,
      prTitle: pullRequest.title,
      issueNumber: pullRequest.number,
      isPrMergeEvent: pullRequest.action === 'closed' && pullRequest.merged,
    };

    info(`Repository: ${repo.owner}/${repo.repo} (${contextInstance.repoUrl})`);
    info(`Pull Request: #${pullRequest.number} ${pullRequest.action}${pullRequest.merged ? ' (merged)' : ''}`);
    info(`Pull Request Title: ${pullRequest.title}`);
    info(`Is Pull Request Merge Event: ${contextInstance.isPrMergeEvent}`);

    return contextInstance;
  } finally {
    endGroup();
  }
}

export const getContext = (): Context => {
  return initializeContext();
};

export const context: Context = new Proxy({} as Context, {
  get(_target, prop) {
    return getContext()[prop as keyof Context];
  },
});
