import { BranchflowError, toError } from "./errors.js";
import { splitRemoteRef } from "./gitParsers.js";
import type { BranchEntry, BranchSet } from "./gitTypes.js";
import type { GitFunctions } from "./gitUtils.js";
import { logger } from "./logger.js";
import type { Confirm } from "./mergeBranch.js";
import { currentBranch, isRepository, listBranches } from "./repoInspector.js";

export type DeletionStatus = "deleted" | "skipped" | "failed";

export interface BranchDeletion extends BranchEntry {
  status: DeletionStatus;
  reason?: string;
  error?: Error;
  // Remote branch the local branch tracked, removed before the local one
  upstream?: string;
  upstreamError?: Error;
}

export type CleanupOutcome = "completed" | "aborted" | "no-branches" | "dry-run";

export interface CleanupResult {
  outcome: CleanupOutcome;
  branches: BranchEntry[];
  deletions: BranchDeletion[];
}

export interface CleanupDependencies {
  git: GitFunctions;
  remote: string;
  confirm: Confirm;
}

export interface CleanupCallbacks {
  onDeletion?: (deletion: BranchDeletion) => void;
}

export interface RemoveBranchesOptions {
  includeRemote?: boolean;
  dryRun?: boolean;
}

export function findMatching(
  git: GitFunctions,
  remote: string,
  substring: string,
  includeRemote: boolean,
): Promise<BranchSet> {
  return listBranches(git, remote, substring, includeRemote);
}

function describeBatch(entries: BranchEntry[], current: string | undefined): string {
  const names = entries.map((entry) => {
    if (entry.name === current) return `${entry.name} (current branch, skipped)`;
    return entry.location === "remote" ? `${entry.name} (remote only)` : entry.name;
  });
  const noun = entries.length === 1 ? "branch" : "branches";
  return `Delete ${entries.length} ${noun}: ${names.join(", ")}?`;
}

async function deleteUpstream(
  git: GitFunctions,
  name: string,
): Promise<Pick<BranchDeletion, "upstream" | "upstreamError">> {
  let upstream: string | undefined;
  try {
    upstream = await git.getUpstream(name);
  } catch (error) {
    return { upstreamError: toError(error) };
  }
  if (!upstream) {
    return {};
  }

  const ref = splitRemoteRef(upstream);
  if (!ref) {
    logger.debug(`Upstream ${upstream} of ${name} is not a remote branch`);
    return { upstream };
  }
  try {
    await git.deleteRemoteBranch(ref.remote, ref.branch);
    return { upstream };
  } catch (error) {
    return { upstream, upstreamError: toError(error) };
  }
}

async function deleteEntry(
  git: GitFunctions,
  remote: string,
  entry: BranchEntry,
  current: string | undefined,
): Promise<BranchDeletion> {
  if (entry.name === current) {
    return { ...entry, status: "skipped", reason: "current branch" };
  }

  if (entry.location === "remote") {
    try {
      await git.deleteRemoteBranch(remote, entry.name);
      return { ...entry, status: "deleted" };
    } catch (error) {
      return { ...entry, status: "failed", error: toError(error) };
    }
  }

  // The local delete runs whether or not the upstream delete worked
  const upstream = await deleteUpstream(git, entry.name);
  try {
    await git.deleteLocalBranch(entry.name);
    return { ...entry, ...upstream, status: "deleted" };
  } catch (error) {
    return { ...entry, ...upstream, status: "failed", error: toError(error) };
  }
}

/**
 * Delete every branch in the set after one confirmation for the whole batch.
 * Each branch succeeds or fails on its own; the current branch is skipped.
 */
export async function deleteBranches(
  deps: CleanupDependencies,
  branches: BranchSet,
  current: string | undefined,
  callbacks?: CleanupCallbacks,
): Promise<CleanupResult> {
  const entries = [...branches.values()];
  if (entries.length === 0) {
    return { outcome: "no-branches", branches: entries, deletions: [] };
  }

  if (!(await deps.confirm(describeBatch(entries, current)))) {
    return { outcome: "aborted", branches: entries, deletions: [] };
  }

  const deletions: BranchDeletion[] = [];
  for (const entry of entries) {
    const deletion = await deleteEntry(deps.git, deps.remote, entry, current);
    logger.debug(`${entry.name} (${entry.location}): ${deletion.status}`);
    deletions.push(deletion);
    callbacks?.onDeletion?.(deletion);
  }

  return { outcome: "completed", branches: entries, deletions };
}

/**
 * Find branches whose name contains `substring` and delete them
 */
export async function removeBranches(
  deps: CleanupDependencies,
  substring: string,
  options: RemoveBranchesOptions = {},
  callbacks?: CleanupCallbacks,
): Promise<CleanupResult> {
  if (!(await isRepository(deps.git))) {
    throw new BranchflowError("NotARepository", "Not in a Git repository.");
  }

  const branches = await findMatching(
    deps.git,
    deps.remote,
    substring,
    options.includeRemote ?? false,
  );
  const current = await currentBranch(deps.git);

  if (options.dryRun) {
    const entries = [...branches.values()];
    return {
      outcome: entries.length === 0 ? "no-branches" : "dry-run",
      branches: entries,
      deletions: entries.map((entry): BranchDeletion =>
        entry.name === current
          ? { ...entry, status: "skipped", reason: "current branch" }
          : { ...entry, status: "skipped", reason: "dry run" },
      ),
    };
  }

  return deleteBranches(deps, branches, current, callbacks);
}
