// In-memory stand-ins for git and HTTP used by the test suites
import { GitCommandError } from "./errors.js";
import type { DiffSummary, StatusEntry } from "./gitTypes.js";
import type { GitFunctions } from "./gitUtils.js";

export type GitOperation = keyof GitFunctions;

export const MUTATING_OPERATIONS: ReadonlySet<GitOperation> = new Set([
  "checkout",
  "createBranch",
  "pull",
  "merge",
  "abortMerge",
  "push",
  "deleteLocalBranch",
  "deleteRemoteBranch",
]);

export interface FakeRepoState {
  insideWorkTree: boolean;
  currentBranch: string;
  remote: string;
  remoteUrl?: string;
  status: StatusEntry[];
  localBranches: string[];
  // Remote branch names without the remote prefix
  remoteBranches: string[];
  upstreams: Record<string, string>;
  // Commits on a local branch that its remote counterpart lacks
  unpushed: Record<string, string[]>;
  // Keyed by `${from}..${to}`
  diffs: Record<string, DiffSummary>;
  // Branches whose merge into the current branch conflicts
  conflicts: string[];
  mergeInProgress: boolean;
}

export interface GitCall {
  op: GitOperation;
  args: string[];
}

export interface FakeGit {
  git: GitFunctions;
  state: FakeRepoState;
  calls: GitCall[];
  mutations(): GitCall[];
  /** Make an operation fail; `when` narrows it to matching arguments */
  failOn(op: GitOperation, when?: (args: string[]) => boolean): void;
}

export const EMPTY_DIFF: DiffSummary = {
  filesChanged: 0,
  insertions: 0,
  deletions: 0,
  files: [],
};

export function diffOf(files: string[]): DiffSummary {
  return {
    filesChanged: files.length,
    insertions: files.length,
    deletions: 0,
    files: files.map((path) => ({ path, changes: 1, binary: false })),
  };
}

export function createFakeGit(initial: Partial<FakeRepoState> = {}): FakeGit {
  const state: FakeRepoState = {
    insideWorkTree: true,
    currentBranch: "main",
    remote: "origin",
    status: [],
    localBranches: ["main"],
    remoteBranches: ["main"],
    upstreams: {},
    unpushed: {},
    diffs: {},
    conflicts: [],
    mergeInProgress: false,
    ...initial,
  };
  const calls: GitCall[] = [];
  const failures: Array<{
    op: GitOperation;
    when?: (args: string[]) => boolean;
  }> = [];

  function record(op: GitOperation, ...args: string[]): void {
    calls.push({ op, args });
    const failure = failures.find(
      (f) => f.op === op && (f.when === undefined || f.when(args)),
    );
    if (failure) {
      throw new GitCommandError([op, ...args], 1, `simulated ${op} failure`);
    }
  }

  function fail(op: string, args: string[], stderr: string): never {
    throw new GitCommandError([op, ...args], 1, stderr);
  }

  const git: GitFunctions = {
    isInsideWorkTree: async () => {
      record("isInsideWorkTree");
      return state.insideWorkTree;
    },
    getCurrentBranch: async () => {
      record("getCurrentBranch");
      if (!state.insideWorkTree) fail("rev-parse", [], "not a git repository");
      return state.currentBranch;
    },
    getStatus: async () => {
      record("getStatus");
      return state.status;
    },
    refExists: async (ref) => {
      record("refExists", ref);
      const remotePrefix = `refs/remotes/${state.remote}/`;
      if (ref.startsWith(remotePrefix)) {
        return state.remoteBranches.includes(ref.slice(remotePrefix.length));
      }
      return state.localBranches.includes(ref.replace(/^refs\/heads\//, ""));
    },
    listCommitsBetween: async (from, to) => {
      record("listCommitsBetween", from, to);
      return state.unpushed[to] ?? [];
    },
    listLocalBranches: async () => {
      record("listLocalBranches");
      return [...state.localBranches];
    },
    listRemoteBranches: async (remote) => {
      record("listRemoteBranches", remote);
      return remote === state.remote ? [...state.remoteBranches] : [];
    },
    listAllBranches: async () => {
      record("listAllBranches");
      return [
        ...state.localBranches,
        ...state.remoteBranches.map((b) => `${state.remote}/${b}`),
      ];
    },
    getUpstream: async (branch) => {
      record("getUpstream", branch);
      return state.upstreams[branch];
    },
    getRemoteUrl: async (remote) => {
      record("getRemoteUrl", remote);
      return remote === state.remote ? state.remoteUrl : undefined;
    },
    checkout: async (branch) => {
      record("checkout", branch);
      if (state.mergeInProgress) {
        fail("checkout", [branch], "you need to resolve your current index first");
      }
      if (!state.localBranches.includes(branch)) {
        if (!state.remoteBranches.includes(branch)) {
          fail("checkout", [branch], `pathspec '${branch}' did not match`);
        }
        state.localBranches.push(branch);
      }
      state.currentBranch = branch;
    },
    createBranch: async (branch) => {
      record("createBranch", branch);
      if (state.localBranches.includes(branch)) {
        fail("checkout", ["-b", branch], `a branch named '${branch}' already exists`);
      }
      state.localBranches.push(branch);
      state.currentBranch = branch;
    },
    pull: async (remote, branch) => {
      record("pull", remote, branch);
    },
    merge: async (branch) => {
      record("merge", branch);
      if (state.conflicts.includes(branch)) {
        state.mergeInProgress = true;
        fail("merge", [branch], "CONFLICT (content): Merge conflict");
      }
    },
    abortMerge: async () => {
      record("abortMerge");
      if (!state.mergeInProgress) {
        fail("merge", ["--abort"], "There is no merge to abort");
      }
      state.mergeInProgress = false;
    },
    diffStat: async (from, to) => {
      record("diffStat", from, to);
      return state.diffs[`${from}..${to}`] ?? EMPTY_DIFF;
    },
    push: async (remote, branch, setUpstream) => {
      record("push", remote, branch, String(setUpstream));
      if (!state.remoteBranches.includes(branch)) {
        state.remoteBranches.push(branch);
      }
      if (setUpstream) {
        state.upstreams[branch] = `${remote}/${branch}`;
      }
      state.unpushed[branch] = [];
    },
    deleteLocalBranch: async (branch) => {
      record("deleteLocalBranch", branch);
      if (branch === state.currentBranch) {
        fail("branch", ["-D", branch], `cannot delete branch '${branch}' checked out`);
      }
      if (!state.localBranches.includes(branch)) {
        fail("branch", ["-D", branch], `branch '${branch}' not found`);
      }
      state.localBranches = state.localBranches.filter((b) => b !== branch);
    },
    deleteRemoteBranch: async (remote, branch) => {
      record("deleteRemoteBranch", remote, branch);
      if (!state.remoteBranches.includes(branch)) {
        fail("push", [remote, "--delete", branch], "remote ref does not exist");
      }
      state.remoteBranches = state.remoteBranches.filter((b) => b !== branch);
    },
  };

  return {
    git,
    state,
    calls,
    mutations: () => calls.filter((call) => MUTATING_OPERATIONS.has(call.op)),
    failOn: (op, when) => {
      failures.push({ op, when });
    },
  };
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export type FakeRoute = (request: RecordedRequest) => Response | undefined;

export function jsonResponse(status: number, body?: unknown): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

/**
 * A `fetch` replacement answering from `routes` in order; unmatched requests
 * get a 404. Every request is recorded with its parsed JSON body.
 */
export function createFakeFetch(routes: FakeRoute[]): {
  fetch: typeof fetch;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const fakeFetch = async (
    input: string | URL | Request,
    init?: RequestInit,
  ): Promise<Response> => {
    const request = new Request(input, init);
    const text = await request.text();
    const headers: Record<string, string> = {};
    request.headers.forEach((value, key) => {
      headers[key] = value;
    });
    const recorded: RecordedRequest = {
      method: request.method,
      url: request.url,
      headers,
      body: text === "" ? undefined : (JSON.parse(text) as unknown),
    };
    requests.push(recorded);

    for (const route of routes) {
      const response = route(recorded);
      if (response) return response;
    }
    return jsonResponse(404, { message: "Not Found" });
  };

  return { fetch: fakeFetch, requests };
}
