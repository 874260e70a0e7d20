import type {
  DiffFileStat,
  DiffSummary,
  RemoteRef,
  StatusEntry,
} from "./gitTypes.js";

function lines(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== "");
}

/**
 * Parse `%(refname:short)` ref listings. Pseudo-entries such as
 * `(HEAD detached at 1a2b3c4)` or `(no branch, rebasing x)` are dropped.
 */
export function parseBranchList(stdout: string): string[] {
  return lines(stdout)
    .map((line) => line.trim())
    .filter((line) => !line.startsWith("("));
}

/**
 * Parse `git for-each-ref --format=%(refname:short) refs/remotes` output into branch names
 * without the remote prefix. `{remote}/HEAD` (printed as the bare remote name
 * by newer git) and refs of other remotes are dropped.
 */
export function parseRemoteBranchList(stdout: string, remote: string): string[] {
  const prefix = `${remote}/`;
  const branches: string[] = [];

  for (const ref of parseBranchList(stdout)) {
    if (ref === remote || ref === `${prefix}HEAD`) continue;
    if (!ref.startsWith(prefix)) continue;
    branches.push(ref.slice(prefix.length));
  }

  return branches;
}

/**
 * Parse `git status --porcelain` (v1) output
 */
export function parseStatusPorcelain(stdout: string): StatusEntry[] {
  return stdout
    .split("\n")
    .filter((line) => line.length > 3)
    .map((line) => ({
      index: line[0],
      worktree: line[1],
      path: line.slice(3),
    }));
}

const FILE_STAT_LINE = /^\s*(.+?)\s+\|\s+(?:(\d+)|Bin\b)/;
const SUMMARY_LINE =
  /(\d+) files? changed(?:, (\d+) insertions?\(\+\))?(?:, (\d+) deletions?\(-\))?/;

/**
 * Parse `git diff --stat` output. Empty output means no difference.
 */
export function parseDiffStat(stdout: string): DiffSummary {
  const files: DiffFileStat[] = [];
  const summary: DiffSummary = {
    filesChanged: 0,
    insertions: 0,
    deletions: 0,
    files,
  };

  for (const line of lines(stdout)) {
    const summaryMatch = line.match(SUMMARY_LINE);
    if (summaryMatch && !line.includes("|")) {
      summary.filesChanged = Number(summaryMatch[1]);
      summary.insertions = Number(summaryMatch[2] ?? 0);
      summary.deletions = Number(summaryMatch[3] ?? 0);
      continue;
    }

    const fileMatch = line.match(FILE_STAT_LINE);
    if (fileMatch) {
      files.push({
        path: fileMatch[1],
        changes: fileMatch[2] === undefined ? 0 : Number(fileMatch[2]),
        binary: fileMatch[2] === undefined,
      });
    }
  }

  if (summary.filesChanged === 0) {
    summary.filesChanged = files.length;
  }

  return summary;
}

export function isEmptyDiff(summary: DiffSummary): boolean {
  return summary.filesChanged === 0;
}

export function describeDiff(summary: DiffSummary): string {
  const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? "" : "s"}`;
  return `${plural(summary.filesChanged, "file")} changed, ${plural(summary.insertions, "insertion")}(+), ${plural(summary.deletions, "deletion")}(-)`;
}

/**
 * Split a short remote ref such as `origin/HKBP-1/fix` at its first `/`
 */
export function splitRemoteRef(ref: string): RemoteRef | undefined {
  const idx = ref.indexOf("/");
  if (idx <= 0 || idx === ref.length - 1) {
    return undefined;
  }
  return { remote: ref.slice(0, idx), branch: ref.slice(idx + 1) };
}

/**
 * Owner and repository of a GitHub remote URL. Supports both formats:
 * - HTTPS: https://github.com/owner/repo.git
 * - SSH: git@github.com:owner/repo.git
 */
export function parseGitHubRemote(
  remoteUrl: string,
): { owner: string; repo: string } | undefined {
  const match = remoteUrl
    .trim()
    .match(/github\.com[:/]([^/]+)\/(.+?)(?:\.git)?\/?$/);
  if (!match) {
    return undefined;
  }
  return { owner: match[1], repo: match[2] };
}
