import { IssueTrackerClient } from "../lib/issueTracker.js";
import { getRepositoryStatus, getTopicBranches } from "../lib/repoInspector.js";
import type { CommandContext } from "./context.js";

export async function statusCommand(ctx: CommandContext): Promise<void> {
  const { reporter } = ctx;
  const status = await getRepositoryStatus(ctx.git, ctx.config.git.remote);

  if (!status.isRepository) {
    reporter.warn("Not in a Git repository");
    return;
  }
  reporter.heading("📍 Repository status");
  reporter.info(`Branch:              ${status.currentBranch ?? "(detached HEAD)"}`);
  reporter.info(`Uncommitted changes: ${status.hasUncommittedChanges ? "yes" : "no"}`);
  reporter.info(`Unpushed commits:    ${status.hasUnpushedCommits ? "yes" : "no"}`);
}

export async function topicBranchesCommand(
  ctx: CommandContext,
  branch: string | undefined,
): Promise<void> {
  const { reporter } = ctx;
  const { prefix, branches } = await getTopicBranches(
    ctx.git,
    ctx.config.git.remote,
    branch,
  );

  if (branches.length === 0) {
    reporter.info(`No branches found with prefix '${prefix}'`);
    return;
  }
  reporter.heading(`🌿 Branches with prefix '${prefix}':`);
  for (const name of branches) {
    reporter.info(`  ${name}`);
  }
}

export async function issueCommand(ctx: CommandContext, key: string): Promise<void> {
  const { config, reporter } = ctx;
  const client = new IssueTrackerClient(config.jira, {
    timeoutMs: config.httpTimeoutMs,
  });

  const issue = await client.getIssue(key);
  reporter.heading(`${issue.key} [${issue.type}] ${issue.summary}`);
  if (issue.description) {
    reporter.info("");
    reporter.info(issue.description);
  }
}
