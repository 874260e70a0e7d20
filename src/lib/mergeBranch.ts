import {
  deriveIssueKey,
  formatBranchTimestamp,
  mergePullRequestTitle,
  newMergeBranchName,
} from "./branchNaming.js";
import type { ReviewerTable } from "./config.js";
import {
  BranchflowError,
  toError,
  type BranchflowErrorKind,
} from "./errors.js";
import { describeDiff, isEmptyDiff } from "./gitParsers.js";
import type {
  DiffSummary,
  MergeOutcome,
  MergeState,
  MergeWorkflowState,
} from "./gitTypes.js";
import type { GitFunctions } from "./gitUtils.js";
import type { IssueTrackerClient } from "./issueTracker.js";
import { logger } from "./logger.js";
import {
  createPullRequest,
  reviewersForProject,
  type CreatedPullRequest,
  type GitHubConfig,
} from "./pullRequests.js";
import {
  currentBranch,
  hasUnpushedCommits,
  isRepository,
  isWorkingTreeClean,
} from "./repoInspector.js";

export type Confirm = (prompt: string) => Promise<boolean>;

export interface MergeOptions {
  targetBranch: string;
  projectType?: string;
  dryRun?: boolean;
  createPullRequest?: boolean;
  updateIssue?: boolean;
}

export interface MergeDependencies {
  git: GitFunctions;
  remote: string;
  // Decides whether unpushed commits are pushed before continuing
  confirm: Confirm;
  now?: () => Date;
  // Resolved lazily: a missing PR configuration only matters after the push
  getGitHub?: () => Promise<GitHubConfig>;
  issueTracker?: Pick<IssueTrackerClient, "appendDescription">;
  reviewers?: ReviewerTable;
}

export interface MergeCallbacks {
  onStateChange?: (state: MergeState, workflow: MergeWorkflowState) => void;
  onStep?: (message: string) => void;
  onWarning?: (message: string) => void;
}

export interface MergeResult extends MergeWorkflowState {
  outcome: MergeOutcome;
  diff?: DiffSummary;
  pullRequest?: CreatedPullRequest;
  issueKey?: string;
  issueUpdated: boolean;
  warnings: string[];
}

function pad(n: number): string {
  return n.toString().padStart(2, "0");
}

export function formatNoteDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Block appended to the issue description once the merge PR exists
 */
export function formatIssueNote(note: {
  date: Date;
  sourceBranch: string;
  targetBranch: string;
  pullRequestUrl: string;
}): string {
  return [
    `Merge PR created ${formatNoteDate(note.date)}`,
    `Source branch: ${note.sourceBranch}`,
    `Target branch: ${note.targetBranch}`,
    `Pull request: ${note.pullRequestUrl}`,
  ].join("\n");
}

export function formatPullRequestBody(details: {
  originalBranch: string;
  targetBranch: string;
  newBranch: string;
  diff: DiffSummary;
  issueKey?: string;
}): string {
  const lines = [
    `Merges \`${details.originalBranch}\` into \`${details.targetBranch}\`.`,
    "",
    `\`${details.targetBranch}\` was merged into \`${details.newBranch}\` first, so any conflicts are resolved on that branch.`,
    "",
    `- Source branch: \`${details.originalBranch}\``,
    `- Target branch: \`${details.targetBranch}\``,
    `- Merge branch: \`${details.newBranch}\``,
  ];
  if (details.issueKey) {
    lines.push(`- Issue: ${details.issueKey}`);
  }
  lines.push("", describeDiff(details.diff));
  return lines.join("\n");
}

/**
 * Merge `targetBranch` into a fresh branch cut from the current one, push it,
 * open a PR and note the PR on the issue named by the branch.
 *
 * Validation failures throw before any git mutation. Once the workflow has
 * left the original branch it always switches back before returning. Failures
 * after the push (PR, reviewers, issue) are collected as warnings.
 */
export async function runMergeBranch(
  options: MergeOptions,
  deps: MergeDependencies,
  callbacks?: MergeCallbacks,
): Promise<MergeResult> {
  const { git, remote } = deps;
  const now = deps.now ?? (() => new Date());
  const warnings: string[] = [];

  const workflow: MergeWorkflowState = {
    originalBranch: "",
    targetBranch: options.targetBranch,
    timestamp: formatBranchTimestamp(now()),
    newBranch: "",
    state: "Idle",
  };

  const transition = (state: MergeState) => {
    logger.debug(`merge-branch: ${workflow.state} -> ${state}`);
    workflow.state = state;
    callbacks?.onStateChange?.(state, { ...workflow });
  };
  const step = (message: string) => callbacks?.onStep?.(message);
  const warn = (message: string) => {
    warnings.push(message);
    callbacks?.onWarning?.(message);
  };
  const failure = (
    kind: BranchflowErrorKind,
    message: string,
    cause?: unknown,
  ) => new BranchflowError(kind, message, { state: workflow.state, cause });
  const vcs = async <T>(operation: () => Promise<T>, message: string) => {
    try {
      return await operation();
    } catch (error) {
      throw failure("VcsOperationFailed", `${message}: ${toError(error).message}`, error);
    }
  };

  const finish = (outcome: MergeOutcome, extra: Partial<MergeResult> = {}): MergeResult => {
    workflow.outcome = outcome;
    transition("Done");
    return {
      ...workflow,
      outcome,
      issueUpdated: false,
      warnings,
      ...extra,
    };
  };

  try {
    // Idle -> Validated
    if (!(await isRepository(git))) {
      throw failure("NotARepository", "Not in a Git repository.");
    }
    const original = await currentBranch(git);
    if (!original) {
      throw failure("NotARepository", "Failed to get current branch.");
    }
    workflow.originalBranch = original;
    workflow.newBranch = newMergeBranchName(
      original,
      options.targetBranch,
      workflow.timestamp,
    );
    const issueKey = deriveIssueKey(original);

    if (!(await isWorkingTreeClean(git))) {
      throw failure(
        "DirtyWorkingTree",
        "Your branch has uncommitted or unstaged changes. Please commit or stash them before proceeding.",
      );
    }

    if (await hasUnpushedCommits(git, remote, original)) {
      if (options.dryRun) {
        warn(`${original} has unpushed commits; a real run asks to push them first.`);
      } else {
        const push = await deps.confirm(
          `You have unpushed commits on ${original}. Push them before proceeding?`,
        );
        if (!push) {
          throw failure(
            "UnpushedCommitsDeclined",
            "Operation aborted. Please push your commits and try again.",
          );
        }
        step(`Pushing ${original} to ${remote}`);
        await vcs(
          () => git.push(remote, original, true),
          "Failed to push commits. Please push manually and try again",
        );
      }
    }
    transition("Validated");

    if (options.dryRun) {
      step(
        `Would merge ${options.targetBranch} into ${workflow.newBranch} and open "${mergePullRequestTitle(original, options.targetBranch)}"`,
      );
      return finish("dry-run", { issueKey });
    }

    const diff = await mergeAndPush(original);
    if (diff === undefined) {
      return finish("no-difference", { issueKey });
    }

    // Post-push steps only warn: the branch is already published
    const pullRequest = await openPullRequest(original, diff, issueKey);
    const issueUpdated = pullRequest
      ? await noteOnIssue(original, pullRequest, issueKey)
      : false;

    return finish("pushed", { diff, pullRequest, issueKey, issueUpdated });
  } catch (error) {
    const failed =
      error instanceof BranchflowError
        ? error
        : failure("VcsOperationFailed", toError(error).message, error);
    transition("Failed");
    throw failed;
  }

  /**
   * Validated -> ... -> Pushed, or NoDifference (returns undefined). The
   * original branch is checked out again on every exit.
   */
  async function mergeAndPush(original: string): Promise<DiffSummary | undefined> {
    const target = options.targetBranch;
    const newBranch = workflow.newBranch;
    let leftOriginal = false;

    try {
      step(`Updating ${target} from ${remote}`);
      leftOriginal = true;
      await vcs(() => git.checkout(target), `Failed to check out ${target}`);
      await vcs(() => git.pull(remote, target), `Failed to pull ${target} from ${remote}`);
      transition("TargetSynced");

      step(`Creating ${newBranch} from ${original}`);
      await vcs(() => git.checkout(original), `Failed to check out ${original}`);
      await vcs(() => git.createBranch(newBranch), `Failed to create ${newBranch}`);
      transition("Branched");

      step(`Merging ${target} into ${newBranch}`);
      try {
        await git.merge(target);
      } catch (error) {
        try {
          await git.abortMerge();
        } catch (abortError) {
          warn(`Could not abort the merge on ${newBranch}: ${toError(abortError).message}`);
        }
        throw failure(
          "MergeConflict",
          `Merge conflicts occurred merging ${target} into ${newBranch}. The branch was kept for manual resolution.`,
          error,
        );
      }
      transition("Merged");

      const diff = await vcs(
        () => git.diffStat(target, newBranch),
        `Failed to compare ${newBranch} with ${target}`,
      );

      if (isEmptyDiff(diff)) {
        transition("NoDifference");
        await vcs(() => git.checkout(original), `Failed to check out ${original}`);
        leftOriginal = false;
        await vcs(() => git.deleteLocalBranch(newBranch), `Failed to delete ${newBranch}`);
        warn(
          `No differences found between ${newBranch} and ${target}. Deleted ${newBranch}; any conflict resolution made on it was discarded.`,
        );
        return undefined;
      }
      transition("DifferenceFound");

      step(`Pushing ${newBranch} to ${remote}`);
      await vcs(
        () => git.push(remote, newBranch, true),
        `Failed to push new branch ${newBranch}`,
      );
      transition("Pushed");
      return diff;
    } finally {
      if (leftOriginal) {
        try {
          await git.checkout(original);
          step(`Switched back to ${original}`);
        } catch (error) {
          warn(`Failed to switch back to ${original}: ${toError(error).message}`);
        }
      }
    }
  }

  async function openPullRequest(
    original: string,
    diff: DiffSummary,
    issueKey: string | undefined,
  ): Promise<CreatedPullRequest | undefined> {
    if (options.createPullRequest === false) {
      step("Skipping pull request creation");
      return undefined;
    }
    if (!deps.getGitHub) {
      warn("Pull request service is not available; create the pull request manually.");
      return undefined;
    }

    const lookup = reviewersForProject(options.projectType, deps.reviewers ?? {});
    if (lookup.diagnostic) {
      warn(lookup.diagnostic);
    }

    const title = mergePullRequestTitle(original, options.targetBranch);
    try {
      const github = await deps.getGitHub();
      step(`Opening pull request "${title}"`);
      const pr = await createPullRequest(github, {
        title,
        head: workflow.newBranch,
        base: options.targetBranch,
        body: formatPullRequestBody({
          originalBranch: original,
          targetBranch: options.targetBranch,
          newBranch: workflow.newBranch,
          diff,
          issueKey,
        }),
        reviewers: lookup.reviewers,
      });
      if (pr.reviewerError) {
        warn(`Pull request created, but requesting reviewers failed: ${pr.reviewerError.message}`);
      }
      transition("PrCreated");
      return pr;
    } catch (error) {
      warn(`Failed to create pull request: ${toError(error).message}`);
      return undefined;
    }
  }

  async function noteOnIssue(
    original: string,
    pullRequest: CreatedPullRequest,
    issueKey: string | undefined,
  ): Promise<boolean> {
    if (options.updateIssue === false) {
      step("Skipping issue update");
      return false;
    }
    if (!issueKey) {
      warn(`No issue key found in ${original}; issue not updated.`);
      return false;
    }
    if (!deps.issueTracker) {
      warn(`Issue tracker is not available; ${issueKey} not updated.`);
      return false;
    }

    try {
      step(`Adding pull request details to ${issueKey}`);
      await deps.issueTracker.appendDescription(
        issueKey,
        formatIssueNote({
          date: now(),
          sourceBranch: original,
          targetBranch: options.targetBranch,
          pullRequestUrl: pullRequest.url,
        }),
      );
      transition("IssueUpdated");
      return true;
    } catch (error) {
      warn(`Failed to update ${issueKey}: ${toError(error).message}`);
      return false;
    }
  }
}
