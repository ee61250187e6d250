import { context } from '@/context';
import type { PlanReason, RawCommit, ReleasePlan, TitleValidationResult } from '@/types';
import { GITHUB_ACTIONS_BOT_USER_ID, PLAN_REASON, PR_SUMMARY_MARKER } from '@/utils/constants';
import { debug, endGroup, info, startGroup } from '@actions/core';
import { RequestError } from '@octokit/request-error';

const REASON_LABELS: Record<PlanReason, string> = {
  [PLAN_REASON.NO_COMMITS]: 'No commits found in this pull request.',
  [PLAN_REASON.ALL_SKIPPED]: 'Every commit in this pull request carries a skip-release marker.',
  [PLAN_REASON.NO_RELEASABLE_CHANGES]: 'No commit in this pull request warrants a version bump.',
  [PLAN_REASON.INITIAL]: '🆕 Initial Release',
  [PLAN_REASON.OVERRIDE]: '📌 Version Override',
  [PLAN_REASON.BUMP]: '⬆️ Version Bump',
};

/**
 * Retrieves the commits of the current pull request in the order GitHub lists them.
 *
 * The author falls back from the git author name to the GitHub login and finally to `unknown`; the timestamp
 * prefers the author date over the committer date.
 *
 * @returns {Promise<RawCommit[]>} A promise that resolves to the pull request commits.
 * @throws {Error} Throws an error if the request fails or if permissions are insufficient to read the
 *                 pull request.
 */
export async function getPullRequestCommits(): Promise<RawCommit[]> {
  console.time('Elapsed time fetching commits');
  startGroup('Fetching pull request commits');

  try {
    const {
      octokit,
      repo: { owner, repo },
      prNumber: pull_number,
    } = context;

    const iterator = octokit.paginate.iterator(octokit.rest.pulls.listCommits, { owner, repo, pull_number });

    const commits: RawCommit[] = [];
    for await (const { data } of iterator) {
      for (const { sha, commit, author } of data) {
        const date = commit.author?.date ?? commit.committer?.date;
        commits.push({
          id: sha,
          message: commit.message,
          author: commit.author?.name ?? author?.login ?? 'unknown',
          timestamp: date ? new Date(date) : new Date(0),
        });
      }
    }

    info(`Found ${commits.length} commit${commits.length !== 1 ? 's' : ''}.`);
    debug(JSON.stringify(commits, null, 2));

    return commits;
  } catch (error) {
    if (error instanceof RequestError && error.status === 403) {
      throw new Error(
        `Unable to read pull request commits due to insufficient permissions. Ensure the workflow permissions.pull-requests is set to "read".\n${error.message}`,
        { cause: error },
      );
    }

    throw new Error(`Error getting pull request commits: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  } finally {
    console.timeEnd('Elapsed time fetching commits');
    endGroup();
  }
}

/**
 * Builds the markdown body of the release plan comment.
 *
 * @param {ReleasePlan} plan - The release decision to summarize.
 * @param {TitleValidationResult | null} titleResult - The title check outcome, or `null` when title
 * validation is disabled.
 * @returns {string} The comment body, starting with the hidden marker used to find previous plan comments.
 */
export function createReleasePlanCommentBody(plan: ReleasePlan, titleResult: TitleValidationResult | null): string {
  const commentBody: string[] = [PR_SUMMARY_MARKER];

  if (titleResult !== null && !titleResult.isValid) {
    commentBody.push('\n# ⚠️ Release Plan\n');
    commentBody.push('> ⚠️ **IMPORTANT**: _See Title Check error below._\n');
  } else {
    commentBody.push('\n# 📋 Release Plan\n');
  }

  const reasonLabel = REASON_LABELS[plan.reason];
  if (plan.releaseNeeded && plan.nextVersion !== null) {
    commentBody.push(
      '| Current<br>Version | Next<br>Version | Bump | Release<br>Details |',
      '|--|--|--|--|',
      `| ${plan.currentVersion?.toString() ?? ''} | **${plan.nextVersion.toString()}** | ${plan.bumpType} | ${reasonLabel} |`,
    );
  } else {
    commentBody.push(`No release needed. ${reasonLabel}`);
  }

  if (plan.skippedCount > 0) {
    commentBody.push(
      `\n⏭️ ${plan.skippedCount} commit${plan.skippedCount !== 1 ? 's' : ''} excluded by a skip-release marker.`,
    );
  }

  if (plan.changelog !== '') {
    commentBody.push('\n# 📝 Changelog\n', plan.changelog);
  }

  commentBody.push('\n<h2><sub>Title Check</sub></h2>\n');
  if (titleResult === null) {
    commentBody.push('🚫 Title validation **disabled** via `validate-title` flag.');
  } else if (titleResult.error === null) {
    commentBody.push('✅ The pull request title follows the conventional commit format.');
  } else {
    commentBody.push(`❌ **${titleResult.error.kind}**: ${titleResult.error.message}`);
  }

  return commentBody.join('\n').trim();
}

/**
 * Comments on the pull request with the release plan, then deletes the action's previous plan comments.
 *
 * @param {ReleasePlan} plan - The release decision to summarize.
 * @param {TitleValidationResult | null} titleResult - The title check outcome, or `null` when disabled.
 * @returns {Promise<void>} A promise that resolves when the comment has been posted and previous
 * summary comments have been deleted.
 * @throws {Error} Throws an error if there are permission issues or other failures when posting
 * to the GitHub API.
 */
export async function addReleasePlanComment(
  plan: ReleasePlan,
  titleResult: TitleValidationResult | null,
): Promise<void> {
  console.time('Elapsed time commenting on pull request');
  startGroup('Adding pull request release plan comment');

  try {
    const {
      octokit,
      repo: { owner, repo },
      issueNumber: issue_number,
    } = context;

    // Create new PR comment (Requires permission > pull-requests: write)
    const { data: newComment } = await octokit.rest.issues.createComment({
      issue_number,
      owner,
      repo,
      body: createReleasePlanCommentBody(plan, titleResult),
    });
    info(`Posted comment ${newComment.id} @ ${newComment.html_url}`);

    const commentsToDelete: Array<{ id: number; created_at: string }> = [];
    for await (const { data } of octokit.paginate.iterator(octokit.rest.issues.listComments, {
      issue_number,
      owner,
      repo,
    })) {
      for (const comment of data) {
        if (
          comment.id !== newComment.id &&
          comment.user?.id === GITHUB_ACTIONS_BOT_USER_ID &&
          comment.body?.includes(PR_SUMMARY_MARKER)
        ) {
          commentsToDelete.push(comment);
        }
      }
    }

    // Delete all our previous comments
    for (const comment of commentsToDelete) {
      info(`Deleting previous PR comment from ${comment.created_at}`);
      await octokit.rest.issues.deleteComment({ comment_id: comment.id, owner, repo });
    }
  } catch (error) {
    if (error instanceof RequestError) {
      throw new Error(
        [
          `Failed to create a comment on the pull request: ${error.message} - Ensure that the`,
          'GitHub Actions workflow has the correct permissions to write comments. To grant the required permissions,',
          'update your workflow YAML file with the following block under "permissions":\n\npermissions:\n',
          ' pull-requests: write',
        ].join(' '),
        { cause: error },
      );
    }

    const errorMessage = error instanceof Error ? error.message.trim() : String(error).trim();
    throw new Error(`Failed to create a comment on the pull request: ${errorMessage}`, { cause: error });
  } finally {
    console.timeEnd('Elapsed time commenting on pull request');
    endGroup();
  }
}
