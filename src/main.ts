import { getConfig } from '@/config';
import { getContext } from '@/context';
import { addReleasePlanComment, getPullRequestCommits } from '@/pull-request';
import { createReleasePlan } from '@/release-plan';
import { getVersionTags } from '@/tags';
import { validateTitle } from '@/title-validator';
import type { Config, Context, ReleasePlan, TitleValidationResult } from '@/types';
import { toCommitsConfig, toTitleValidationOptions } from '@/utils/engine-options';
import { Version } from '@/version';
import { endGroup, info, setFailed, setOutput, startGroup } from '@actions/core';

/**
 * Initializes and returns the configuration and context objects.
 * Config must be initialized before context due to dependency constraints.
 *
 * @returns {{ config: Config; context: Context }} Initialized config and context objects.
 */
function initialize(): { config: Config; context: Context } {
  const configInstance = getConfig();
  const contextInstance = getContext();

  return { config: configInstance, context: contextInstance };
}

/**
 * Sets the GitHub Action outputs describing the release plan.
 *
 * - `release-needed`: whether the pull request warrants a release
 * - `bump-type`: aggregate bump severity
 * - `current-version`: latest stable version, empty on a first release
 * - `next-version`: version of the next release, empty when none is needed
 * - `is-first-release`: whether no version tag exists yet
 * - `changelog`: rendered markdown changelog
 * - `title-valid`: title check outcome, empty when title validation is disabled
 */
function setActionOutputs(plan: ReleasePlan, titleResult: TitleValidationResult | null): void {
  const outputs: Record<string, string | boolean> = {
    'release-needed': plan.releaseNeeded,
    'bump-type': plan.bumpType,
    'current-version': plan.currentVersion?.toString() ?? '',
    'next-version': plan.nextVersion?.toString() ?? '',
    'is-first-release': plan.isFirstRelease,
    changelog: plan.changelog,
    'title-valid': titleResult === null ? '' : titleResult.isValid,
  };

  startGroup('GitHub Action Outputs');
  for (const [name, value] of Object.entries(outputs)) {
    info(`${name}: ${String(value)}`);
    setOutput(name, value);
  }
  endGroup();
}

/**
 * Executes the main process of the action.
 *
 * 1. Initializes config and context
 * 2. Validates the pull request title when enabled
 * 3. Collects pull request commits and repository tags
 * 4. Creates the release plan
 * 5. Comments the plan on the pull request unless disabled or the pull request was merged
 * 6. Sets the action outputs
 *
 * An invalid title fails the step after the outputs are set.
 *
 * @returns {Promise<void>} A promise that resolves when the process completes
 * @throws Will capture and report any errors through setFailed
 */
export async function run(): Promise<void> {
  try {
    const { config, context } = initialize();

    let titleResult: TitleValidationResult | null = null;
    if (config.validateTitle) {
      titleResult = validateTitle(context.prTitle, toTitleValidationOptions(config));
      info(
        titleResult.error === null
          ? 'Pull request title is valid.'
          : `Pull request title is invalid: ${titleResult.error.message}`,
      );
    } else {
      info('Pull request title validation is disabled.');
    }

    const commits = await getPullRequestCommits();
    const tags = await getVersionTags(config.tagPrefix);

    const plan = createReleasePlan({
      commits,
      tags,
      commitsConfig: toCommitsConfig(config),
      tagPrefix: config.tagPrefix,
      initialVersion: Version.parse(config.initialVersion),
      prerelease: config.prerelease === '' ? null : config.prerelease,
      versionOverride: config.releaseVersion === '' ? null : Version.parse(config.releaseVersion),
      includeSha: config.changelogIncludeSha,
      date: new Date(),
    });

    if (plan.releaseNeeded) {
      const current = plan.currentVersion?.toString() ?? '(none)';
      info(`Release needed: ${current} → ${String(plan.nextVersion)} (${plan.reason})`);
    } else {
      info(`No release needed (${plan.reason}).`);
    }

    if (context.isPrMergeEvent) {
      info('Pull request merge event. Skipping release plan comment.');
    } else if (config.disablePrComment) {
      info('Release plan comment is disabled. Skipping.');
    } else {
      await addReleasePlanComment(plan, titleResult);
    }

    setActionOutputs(plan, titleResult);

    if (titleResult?.error) {
      setFailed(titleResult.error.message);
    }
  } catch (error) {
    setFailed(error instanceof Error ? error.message : String(error));
  }
}
