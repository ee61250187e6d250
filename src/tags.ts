import { context } from '@/context';
import { debug, endGroup, info, startGroup } from '@actions/core';
import { RequestError } from '@octokit/request-error';

/**
 * Lists the repository's tags that carry the version tag prefix, in the order GitHub returns them.
 *
 * Tags without the prefix cannot hold a release version and are dropped here; whether the remainder parses
 * as a version is left to the release planner. An empty prefix keeps every tag.
 *
 * @param {string} tagPrefix - Prefix in front of version tags, e.g. `v`.
 * @returns {Promise<string[]>} The candidate version tag names.
 * @throws {Error} Wraps any failure of the request to list tags.
 */
export async function getVersionTags(tagPrefix: string): Promise<string[]> {
  console.time('Elapsed time fetching tags');
  startGroup('Fetching version tags');

  try {
    const {
      octokit,
      repo: { owner, repo },
    } = context;

    let totalCount = 0;
    const versionTags: string[] = [];

    for await (const { data } of octokit.paginate.iterator(octokit.rest.repos.listTags, { owner, repo })) {
      totalCount += data.length;
      versionTags.push(...data.map(({ name }) => name).filter((name) => name.startsWith(tagPrefix)));
    }

    info(
      `Found ${versionTags.length} tag${versionTags.length !== 1 ? 's' : ''} with prefix '${tagPrefix}' (${totalCount} total).`,
    );
    debug(JSON.stringify(versionTags, null, 2));

    return versionTags;
  } catch (error) {
    if (error instanceof RequestError) {
      throw new Error(`Failed to fetch tags: ${error.message.trim()} (status: ${error.status})`, { cause: error });
    }

    throw new Error(`Failed to fetch tags: ${error instanceof Error ? error.message.trim() : String(error)}`, {
      cause: error,
    });
  } finally {
    console.timeEnd('Elapsed time fetching tags');
    endGroup();
  }
}
