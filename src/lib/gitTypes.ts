export interface RepositoryStatus {
  isRepository: boolean;
  currentBranch?: string;
  hasUncommittedChanges: boolean;
  hasUnpushedCommits: boolean;
}

export type BranchLocation = "local" | "remote";

export interface BranchEntry {
  name: string;
  location: BranchLocation;
}

// Keyed by branch name; a name seen both locally and on the remote keeps the local entry
export type BranchSet = Map<string, BranchEntry>;

export interface StatusEntry {
  index: string;
  worktree: string;
  path: string;
}

export interface DiffFileStat {
  path: string;
  changes: number;
  binary: boolean;
}

export interface DiffSummary {
  filesChanged: number;
  insertions: number;
  deletions: number;
  files: DiffFileStat[];
}

export interface RemoteRef {
  remote: string;
  branch: string;
}

export type MergeState =
  | "Idle"
  | "Validated"
  | "TargetSynced"
  | "Branched"
  | "Merged"
  | "DifferenceFound"
  | "NoDifference"
  | "Pushed"
  | "PrCreated"
  | "IssueUpdated"
  | "Done"
  | "Failed";

export type MergeOutcome = "pushed" | "no-difference" | "dry-run";

export interface MergeWorkflowState {
  originalBranch: string;
  targetBranch: string;
  timestamp: string;
  newBranch: string;
  state: MergeState;
  outcome?: MergeOutcome;
}

// Configuration for the git binary and the remote the workflows talk to
export interface GitConfig {
  binaryPath: string;
  remote: string;
  cwd?: string;
}
