import { resolveGitHubConnection } from "../lib/auth.js";
import { describeDiff } from "../lib/gitParsers.js";
import { IssueTrackerClient } from "../lib/issueTracker.js";
import { runMergeBranch, type MergeOptions } from "../lib/mergeBranch.js";
import { createGitHubConfig } from "../lib/pullRequests.js";
import type { CommandContext } from "./context.js";

export async function mergeBranchCommand(
  ctx: CommandContext,
  options: MergeOptions,
): Promise<void> {
  const { config, git, reporter } = ctx;
  const projectType = options.projectType ?? config.projectType;

  reporter.heading(
    `🔀 Merging ${options.targetBranch} into a new branch${options.dryRun ? " (dry run)" : ""}`,
  );

  const issueTracker = new IssueTrackerClient(config.jira, {
    timeoutMs: config.httpTimeoutMs,
  });

  const result = await runMergeBranch(
    { ...options, projectType },
    {
      git,
      remote: config.git.remote,
      confirm: ctx.confirm,
      getGitHub: async () =>
        createGitHubConfig(await resolveGitHubConnection(config, git)),
      issueTracker: issueTracker.isConfigured() ? issueTracker : undefined,
      reviewers: config.reviewers,
    },
    {
      onStep: (message) => reporter.step(message),
      onWarning: (message) => reporter.warn(message),
    },
  );

  switch (result.outcome) {
    case "dry-run":
      reporter.info(`Original branch: ${result.originalBranch}`);
      reporter.info(`New branch:      ${result.newBranch}`);
      reporter.info(`Issue:           ${result.issueKey ?? "none"}`);
      reporter.success("Dry run complete; nothing was changed");
      return;
    case "no-difference":
      reporter.success(
        `${result.originalBranch} already contains ${result.targetBranch}; nothing to merge`,
      );
      return;
    case "pushed":
      if (result.diff) {
        reporter.info(describeDiff(result.diff));
      }
      reporter.success(`Pushed ${result.newBranch}`);
      if (result.pullRequest) {
        reporter.success(
          `${result.pullRequest.alreadyExisted ? "Found existing" : "Created"} PR #${result.pullRequest.number}: ${result.pullRequest.url}`,
        );
      }
      if (result.issueUpdated && result.issueKey) {
        reporter.success(`Updated ${result.issueKey}`);
      }
      return;
  }
}
