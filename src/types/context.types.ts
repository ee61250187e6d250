import type { OctokitRestApi, Repo } from '@/types/github.types';

/**
 * Context and runtime related types
 */

/**
 * Interface representing the context required by this GitHub Action.
 * It contains the GitHub API client, repository details and pull request information.
 */
export interface Context {
  /**
   * The repository details (owner and name).
   */
  repo: Repo;

  /**
   * The URL of the repository. (e.g. https://github.com/octo-org/octo-repo)
   */
  repoUrl: string;

  /**
   * An instance of the Octokit class with REST API and pagination plugins enabled.
   * This instance is authenticated using a GitHub token.
   */
  octokit: OctokitRestApi;

  /**
   * The pull request number associated with the workflow run.
   */
  prNumber: number;

  /**
   * The title of the pull request exactly as received, so the length check sees surrounding whitespace.
   */
  prTitle: string;

  /**
   * The GitHub API issue number associated with the pull request.
   */
  issueNumber: number;

  /**
   * Flag to indicate if the current event is a pull request merge event.
   */
  isPrMergeEvent: boolean;
}
