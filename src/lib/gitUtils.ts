import { execFile } from "child_process";
import { GitCommandError } from "./errors.js";
import {
  parseBranchList,
  parseDiffStat,
  parseRemoteBranchList,
  parseStatusPorcelain,
} from "./gitParsers.js";
import type { DiffSummary, GitConfig, StatusEntry } from "./gitTypes.js";
import { logger } from "./logger.js";

// Types for dependency injection
export type GitFunctions = {
  isInsideWorkTree: () => Promise<boolean>;
  getCurrentBranch: () => Promise<string>;
  getStatus: () => Promise<StatusEntry[]>;
  refExists: (ref: string) => Promise<boolean>;
  listCommitsBetween: (from: string, to: string) => Promise<string[]>;
  listLocalBranches: () => Promise<string[]>;
  listRemoteBranches: (remote: string) => Promise<string[]>;
  listAllBranches: () => Promise<string[]>;
  getUpstream: (branch: string) => Promise<string | undefined>;
  getRemoteUrl: (remote: string) => Promise<string | undefined>;
  checkout: (branch: string) => Promise<void>;
  createBranch: (branch: string) => Promise<void>;
  pull: (remote: string, branch: string) => Promise<void>;
  merge: (branch: string) => Promise<void>;
  abortMerge: () => Promise<void>;
  diffStat: (from: string, to: string) => Promise<DiffSummary>;
  push: (remote: string, branch: string, setUpstream: boolean) => Promise<void>;
  deleteLocalBranch: (branch: string) => Promise<void>;
  deleteRemoteBranch: (remote: string, branch: string) => Promise<void>;
};

interface GitOutput {
  stdout: string;
  stderr: string;
}

const MAX_BUFFER = 16 * 1024 * 1024;

/**
 * Run git and collect its output; rejects with GitCommandError on a non-zero exit
 */
function runGit(config: GitConfig, args: string[]): Promise<GitOutput> {
  return new Promise((resolve, reject) => {
    logger.debug(`$ ${config.binaryPath} ${args.join(" ")}`);
    execFile(
      config.binaryPath,
      args,
      { cwd: config.cwd, maxBuffer: MAX_BUFFER },
      (error, stdout, stderr) => {
        if (error) {
          const exitCode = typeof error.code === "number" ? error.code : null;
          logger.debug(`git ${args[0]} failed (${String(exitCode)}): ${stderr}`);
          return reject(new GitCommandError(args, exitCode, stderr, error));
        }
        resolve({ stdout, stderr });
      },
    );
  });
}

/**
 * Run git only for its exit status
 */
async function probeGit(config: GitConfig, args: string[]): Promise<boolean> {
  try {
    await runGit(config, args);
    return true;
  } catch (error) {
    if (error instanceof GitCommandError && error.exitCode !== null) {
      return false;
    }
    throw error;
  }
}

/**
 * Create configured GitFunctions from a config object
 */
export function createGitFunctions(config: GitConfig): GitFunctions {
  return {
    isInsideWorkTree: () => isInsideWorkTree(config),
    getCurrentBranch: () => getCurrentBranch(config),
    getStatus: () => getStatus(config),
    refExists: (ref) => probeGit(config, ["rev-parse", "--verify", "--quiet", ref]),
    listCommitsBetween: (from, to) => listCommitsBetween(config, from, to),
    listLocalBranches: () => listLocalBranches(config),
    listRemoteBranches: (remote) => listRemoteBranches(config, remote),
    listAllBranches: () => listAllBranches(config),
    getUpstream: (branch) => getUpstream(config, branch),
    getRemoteUrl: (remote) => getRemoteUrl(config, remote),
    checkout: (branch) => mutate(config, ["checkout", branch]),
    createBranch: (branch) => mutate(config, ["checkout", "-b", branch]),
    pull: (remote, branch) => mutate(config, ["pull", remote, branch]),
    merge: (branch) => mutate(config, ["merge", "--no-edit", branch]),
    abortMerge: () => mutate(config, ["merge", "--abort"]),
    diffStat: (from, to) => diffStat(config, from, to),
    push: (remote, branch, setUpstream) =>
      mutate(
        config,
        setUpstream
          ? ["push", "--set-upstream", remote, branch]
          : ["push", remote, branch],
      ),
    deleteLocalBranch: (branch) => mutate(config, ["branch", "-D", branch]),
    deleteRemoteBranch: (remote, branch) =>
      mutate(config, ["push", remote, "--delete", branch]),
  };
}

async function mutate(config: GitConfig, args: string[]): Promise<void> {
  const { stderr } = await runGit(config, args);
  // git reports progress for checkout, pull and push on stderr
  if (stderr.trim()) {
    logger.debug(stderr.trim());
  }
}

async function isInsideWorkTree(config: GitConfig): Promise<boolean> {
  try {
    const { stdout } = await runGit(config, ["rev-parse", "--is-inside-work-tree"]);
    return stdout.trim() === "true";
  } catch (error) {
    logger.debug(`Not inside a work tree: ${String(error)}`);
    return false;
  }
}

async function getCurrentBranch(config: GitConfig): Promise<string> {
  const { stdout } = await runGit(config, ["rev-parse", "--abbrev-ref", "HEAD"]);
  return stdout.trim();
}

async function getStatus(config: GitConfig): Promise<StatusEntry[]> {
  const { stdout } = await runGit(config, ["status", "--porcelain"]);
  return parseStatusPorcelain(stdout);
}

/**
 * Abbreviated hashes of commits reachable from `to` but not from `from`
 */
async function listCommitsBetween(
  config: GitConfig,
  from: string,
  to: string,
): Promise<string[]> {
  const { stdout } = await runGit(config, [
    "log",
    "--format=%h",
    `${from}..${to}`,
  ]);
  return parseBranchList(stdout);
}

async function listLocalBranches(config: GitConfig): Promise<string[]> {
  const { stdout } = await runGit(config, [
    "for-each-ref",
    "--format=%(refname:short)",
    "refs/heads",
  ]);
  return parseBranchList(stdout);
}

async function listRemoteBranches(
  config: GitConfig,
  remote: string,
): Promise<string[]> {
  const { stdout } = await runGit(config, [
    "for-each-ref",
    "--format=%(refname:short)",
    `refs/remotes/${remote}`,
  ]);
  return parseRemoteBranchList(stdout, remote);
}

async function listAllBranches(config: GitConfig): Promise<string[]> {
  const { stdout } = await runGit(config, [
    "for-each-ref",
    "--format=%(refname:short)",
    "refs/heads",
    "refs/remotes",
  ]);
  return parseBranchList(stdout);
}

async function getUpstream(
  config: GitConfig,
  branch: string,
): Promise<string | undefined> {
  const { stdout } = await runGit(config, [
    "for-each-ref",
    "--format=%(upstream:short)",
    `refs/heads/${branch}`,
  ]);
  const upstream = stdout.trim();
  return upstream === "" ? undefined : upstream;
}

async function getRemoteUrl(
  config: GitConfig,
  remote: string,
): Promise<string | undefined> {
  try {
    const { stdout } = await runGit(config, ["remote", "get-url", remote]);
    return stdout.trim() || undefined;
  } catch (error) {
    logger.debug(`No URL for remote ${remote}: ${String(error)}`);
    return undefined;
  }
}

async function diffStat(
  config: GitConfig,
  from: string,
  to: string,
): Promise<DiffSummary> {
  const { stdout } = await runGit(config, ["diff", "--stat", from, to, "--"]);
  return parseDiffStat(stdout);
}
