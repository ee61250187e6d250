import type { PaginateInterface } from '@octokit/plugin-paginate-rest';
import type { Api } from '@octokit/plugin-rest-endpoint-methods';

/**
 * Octokit client with the REST endpoint methods and pagination plugins applied. The action only calls
 * `pulls.listCommits`, `repos.listTags` and the issue comment endpoints.
 */
export type OctokitRestApi = Api & { paginate: PaginateInterface };

/**
 * Owner and name of the repository the workflow runs in, split from `GITHUB_REPOSITORY`.
 */
export interface Repo {
  owner: string;
  repo: string;
}

/**
 * The parts of a `pull_request` webhook payload the release plan depends on.
 */
export interface PullRequestEventSummary {
  /** Webhook action, e.g. `opened`, `synchronize`, `closed` */
  action: string;
  number: number;
  /** Title as received, untrimmed */
  title: string;
  merged: boolean;
}
