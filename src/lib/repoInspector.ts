import { getGitPrefix } from "./branchNaming.js";
import { BranchflowError } from "./errors.js";
import type { BranchSet, RepositoryStatus } from "./gitTypes.js";
import type { GitFunctions } from "./gitUtils.js";
import { logger } from "./logger.js";

export function isRepository(git: GitFunctions): Promise<boolean> {
  return git.isInsideWorkTree();
}

/**
 * Name of the checked-out branch; undefined outside a repository, on a
 * detached HEAD, or when git fails
 */
export async function currentBranch(
  git: GitFunctions,
): Promise<string | undefined> {
  if (!(await git.isInsideWorkTree())) {
    return undefined;
  }
  try {
    const branch = await git.getCurrentBranch();
    return branch === "" || branch === "HEAD" ? undefined : branch;
  } catch (error) {
    logger.debug(`Failed to read current branch: ${String(error)}`);
    return undefined;
  }
}

export async function isWorkingTreeClean(git: GitFunctions): Promise<boolean> {
  const entries = await git.getStatus();
  return entries.length === 0;
}

/**
 * Whether `branch` has commits that `{remote}/{branch}` lacks. A branch that
 * was never pushed counts as having unpushed commits.
 */
export async function hasUnpushedCommits(
  git: GitFunctions,
  remote: string,
  branch: string,
): Promise<boolean> {
  const remoteRef = `${remote}/${branch}`;
  if (!(await git.refExists(`refs/remotes/${remoteRef}`))) {
    logger.debug(`${remoteRef} does not exist; treating ${branch} as unpushed`);
    return true;
  }
  const commits = await git.listCommitsBetween(remoteRef, branch);
  return commits.length > 0;
}

/**
 * Local branches whose name contains `filter`, plus remote branches (remote
 * prefix stripped) when `includeRemote` is set. Names present on both sides
 * keep the local entry.
 */
export async function listBranches(
  git: GitFunctions,
  remote: string,
  filter: string,
  includeRemote: boolean,
): Promise<BranchSet> {
  const branches: BranchSet = new Map();

  for (const name of await git.listLocalBranches()) {
    if (name.includes(filter)) {
      branches.set(name, { name, location: "local" });
    }
  }

  if (includeRemote) {
    for (const name of await git.listRemoteBranches(remote)) {
      if (name.includes(filter) && !branches.has(name)) {
        branches.set(name, { name, location: "remote" });
      }
    }
  }

  return branches;
}

/**
 * Every local and remote branch whose name starts with `prefix`. Remote
 * branches are matched without their remote prefix but reported with it.
 */
export async function listBranchesWithPrefix(
  git: GitFunctions,
  remote: string,
  prefix: string,
): Promise<string[]> {
  const remotePrefix = `${remote}/`;
  const all = await git.listAllBranches();

  return all.filter((ref) => {
    if (ref === remote) return false;
    const name = ref.startsWith(remotePrefix)
      ? ref.slice(remotePrefix.length)
      : ref;
    return name !== "HEAD" && name.startsWith(prefix);
  });
}

export async function getRepositoryStatus(
  git: GitFunctions,
  remote: string,
): Promise<RepositoryStatus> {
  const branch = await currentBranch(git);
  if (!branch) {
    return {
      isRepository: await git.isInsideWorkTree(),
      hasUncommittedChanges: false,
      hasUnpushedCommits: false,
    };
  }

  return {
    isRepository: true,
    currentBranch: branch,
    hasUncommittedChanges: !(await isWorkingTreeClean(git)),
    hasUnpushedCommits: await hasUnpushedCommits(git, remote, branch),
  };
}

/**
 * Branches sharing a prefix with `branch` (the current branch when omitted)
 */
export async function getTopicBranches(
  git: GitFunctions,
  remote: string,
  branch?: string,
): Promise<{ prefix: string; branches: string[] }> {
  if (!(await isRepository(git))) {
    throw new BranchflowError("NotARepository", "Not in a Git repository.");
  }

  const reference = branch ?? (await currentBranch(git));
  if (!reference) {
    throw new BranchflowError(
      "NotFound",
      "Failed to get current branch; pass a branch name.",
    );
  }

  const prefix = getGitPrefix(reference);
  return {
    prefix,
    branches: await listBranchesWithPrefix(git, remote, prefix),
  };
}
