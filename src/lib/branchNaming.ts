const ISSUE_KEY_PATTERNS = [/^Bug\/([A-Z]+-\d+)/, /^([A-Z]+-\d+)/];

/**
 * Everything before the last `/` of a branch name, or the whole name when it
 * has no `/`. Purely lexical: `"main"` is its own prefix.
 */
export function getGitPrefix(branchName: string): string {
  const idx = branchName.lastIndexOf("/");
  return idx === -1 ? branchName : branchName.slice(0, idx);
}

/**
 * Local time as `YYYYMMDD_HHMMSS`
 */
export function formatBranchTimestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function newMergeBranchName(
  originalBranch: string,
  targetBranch: string,
  timestamp: string,
): string {
  return `${getGitPrefix(originalBranch)}/merge_${targetBranch}_${timestamp}`;
}

/**
 * Issue key encoded at the start of a branch name, e.g. `Bug/HKBP-222/...` or
 * `HKBP-222/...`
 */
export function deriveIssueKey(branchName: string): string | undefined {
  for (const pattern of ISSUE_KEY_PATTERNS) {
    const match = branchName.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

export function mergePullRequestTitle(
  originalBranch: string,
  targetBranch: string,
): string {
  return `Merge ${originalBranch} into ${targetBranch}`;
}
