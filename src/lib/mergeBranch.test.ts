import assert from "assert/strict";
import { BranchflowError } from "./errors.js";
import type { MergeState } from "./gitTypes.js";
import { IssueTrackerClient } from "./issueTracker.js";
import {
  formatIssueNote,
  runMergeBranch,
  type MergeDependencies,
} from "./mergeBranch.js";
import { createGitHubConfig } from "./pullRequests.js";
import {
  createFakeFetch,
  createFakeGit,
  diffOf,
  jsonResponse,
  type FakeRepoState,
  type FakeRoute,
  type RecordedRequest,
} from "./testUtils.js";

const ORIGINAL = "HKBP-50/feature";
const NEW_BRANCH = "HKBP-50/merge_develop_20240101_120000";
const PR_URL = "https://github.com/acme/widgets/pull/7";
const ISSUE_URL = "https://tracker.example.com/rest/api/2/issue/HKBP-50";

const now = () => new Date(2024, 0, 1, 12, 0, 0);
const never = () => Promise.reject(new Error("confirm should not be called"));

function featureRepo(overrides: Partial<FakeRepoState> = {}) {
  return createFakeGit({
    currentBranch: ORIGINAL,
    localBranches: ["develop", ORIGINAL],
    remoteBranches: ["develop", ORIGINAL],
    diffs: { [`develop..${NEW_BRANCH}`]: diffOf(["src/app.ts"]) },
    ...overrides,
  });
}

function route(
  method: string,
  path: string,
  respond: (request: RecordedRequest) => Response,
): FakeRoute {
  return (request) =>
    request.method === method && new URL(request.url).pathname === path
      ? respond(request)
      : undefined;
}

const PULLS = "/repos/acme/widgets/pulls";
const githubRoutes: FakeRoute[] = [
  route("GET", PULLS, () => jsonResponse(200, [])),
  route("POST", PULLS, () => jsonResponse(201, { number: 7, html_url: PR_URL })),
  route("POST", `${PULLS}/7/requested_reviewers`, () => jsonResponse(201, { number: 7 })),
];
const issueRoutes: FakeRoute[] = [
  route("GET", "/rest/api/2/issue/HKBP-50", () =>
    jsonResponse(200, {
      key: "HKBP-50",
      fields: { summary: "Login", issuetype: { name: "Story" }, description: "Existing" },
    }),
  ),
  route("PUT", "/rest/api/2/issue/HKBP-50", () => new Response(null, { status: 204 })),
];

function services(
  fetch: typeof globalThis.fetch,
): Pick<MergeDependencies, "getGitHub" | "issueTracker" | "reviewers"> {
  return {
    getGitHub: () =>
      Promise.resolve(
        createGitHubConfig({
          owner: "acme",
          repo: "widgets",
          token: "test-token",
          timeoutMs: 5000,
          fetch,
          rateLimitHandling: false,
        }),
      ),
    issueTracker: new IssueTrackerClient(
      {
        baseUrl: "https://tracker.example.com",
        email: "dev@example.com",
        apiToken: "test-secret",
      },
      { timeoutMs: 5000, fetch },
    ),
    reviewers: { backend: ["alice"] },
  };
}

function isFailure(kind: BranchflowError["kind"], state: MergeState) {
  return (error: unknown) =>
    error instanceof BranchflowError && error.kind === kind && error.state === state;
}

suite("formatIssueNote", () => {
  test("renders the PR note block", () => {
    assert.strictEqual(
      formatIssueNote({
        date: new Date(2024, 2, 5, 9, 7, 30),
        sourceBranch: ORIGINAL,
        targetBranch: "develop",
        pullRequestUrl: PR_URL,
      }),
      [
        "Merge PR created 2024-03-05 09:07",
        "Source branch: HKBP-50/feature",
        "Target branch: develop",
        `Pull request: ${PR_URL}`,
      ].join("\n"),
    );
  });
});

suite("merge-branch validation", () => {
  test("outside a repository", async () => {
    const fake = featureRepo({ insideWorkTree: false });

    await assert.rejects(
      runMergeBranch(
        { targetBranch: "develop" },
        { git: fake.git, remote: "origin", confirm: never, now },
      ),
      isFailure("NotARepository", "Idle"),
    );
    assert.deepStrictEqual(fake.mutations(), []);
  });

  test("dirty working tree stops before any mutation", async () => {
    const fake = featureRepo({
      status: [{ index: " ", worktree: "M", path: "src/app.ts" }],
    });

    await assert.rejects(
      runMergeBranch(
        { targetBranch: "develop" },
        { git: fake.git, remote: "origin", confirm: never, now },
      ),
      isFailure("DirtyWorkingTree", "Idle"),
    );
    assert.deepStrictEqual(fake.mutations(), []);
    assert.strictEqual(fake.state.currentBranch, ORIGINAL);
  });

  test("declining to push unpushed commits aborts", async () => {
    const fake = featureRepo({ remoteBranches: ["develop"] });
    const prompts: string[] = [];

    await assert.rejects(
      runMergeBranch(
        { targetBranch: "develop" },
        {
          git: fake.git,
          remote: "origin",
          now,
          confirm: (prompt) => {
            prompts.push(prompt);
            return Promise.resolve(false);
          },
        },
      ),
      isFailure("UnpushedCommitsDeclined", "Idle"),
    );
    assert.deepStrictEqual(prompts, [
      "You have unpushed commits on HKBP-50/feature. Push them before proceeding?",
    ]);
    assert.deepStrictEqual(fake.mutations(), []);
  });

  test("accepting pushes the original branch first", async () => {
    const fake = featureRepo({ remoteBranches: ["develop"] });

    const result = await runMergeBranch(
      { targetBranch: "develop", createPullRequest: false },
      { git: fake.git, remote: "origin", now, confirm: () => Promise.resolve(true) },
    );

    assert.deepStrictEqual(fake.mutations()[0], {
      op: "push",
      args: ["origin", ORIGINAL, "true"],
    });
    assert.strictEqual(result.outcome, "pushed");
  });

  test("failed push of unpushed commits", async () => {
    const fake = featureRepo({ remoteBranches: ["develop"] });
    fake.failOn("push");

    await assert.rejects(
      runMergeBranch(
        { targetBranch: "develop" },
        { git: fake.git, remote: "origin", now, confirm: () => Promise.resolve(true) },
      ),
      isFailure("VcsOperationFailed", "Idle"),
    );
    assert.strictEqual(fake.state.currentBranch, ORIGINAL);
  });
});

suite("merge-branch git workflow", () => {
  test("dry run plans without mutating", async () => {
    const fake = featureRepo();

    const result = await runMergeBranch(
      { targetBranch: "develop", dryRun: true },
      { git: fake.git, remote: "origin", confirm: never, now },
    );

    assert.strictEqual(result.outcome, "dry-run");
    assert.strictEqual(result.newBranch, NEW_BRANCH);
    assert.strictEqual(result.issueKey, "HKBP-50");
    assert.deepStrictEqual(fake.mutations(), []);
  });

  test("dry run reports unpushed commits instead of prompting", async () => {
    const fake = featureRepo({ remoteBranches: ["develop"] });

    const result = await runMergeBranch(
      { targetBranch: "develop", dryRun: true },
      { git: fake.git, remote: "origin", confirm: never, now },
    );

    assert.deepStrictEqual(result.warnings, [
      "HKBP-50/feature has unpushed commits; a real run asks to push them first.",
    ]);
    assert.deepStrictEqual(fake.mutations(), []);
  });

  test("no difference deletes the new branch and skips the push", async () => {
    const fake = featureRepo({ diffs: {} });
    const states: MergeState[] = [];

    const result = await runMergeBranch(
      { targetBranch: "develop" },
      { git: fake.git, remote: "origin", confirm: never, now },
      { onStateChange: (state) => states.push(state) },
    );

    assert.strictEqual(result.outcome, "no-difference");
    assert.deepStrictEqual(states, [
      "Validated",
      "TargetSynced",
      "Branched",
      "Merged",
      "NoDifference",
      "Done",
    ]);
    assert.strictEqual(fake.state.currentBranch, ORIGINAL);
    assert.deepStrictEqual(fake.state.localBranches, ["develop", ORIGINAL]);
    assert.strictEqual(fake.calls.some((c) => c.op === "push"), false);
    assert.strictEqual(
      result.warnings[0],
      `No differences found between ${NEW_BRANCH} and develop. Deleted ${NEW_BRANCH}; any conflict resolution made on it was discarded.`,
    );
  });

  test("merge conflict aborts the merge and keeps the new branch", async () => {
    const fake = featureRepo({ conflicts: ["develop"] });

    await assert.rejects(
      runMergeBranch(
        { targetBranch: "develop" },
        { git: fake.git, remote: "origin", confirm: never, now },
      ),
      (error: unknown) =>
        isFailure("MergeConflict", "Branched")(error) &&
        error instanceof Error &&
        error.message.includes(NEW_BRANCH),
    );
    assert.strictEqual(fake.state.mergeInProgress, false);
    assert.strictEqual(fake.state.currentBranch, ORIGINAL);
    assert.ok(fake.state.localBranches.includes(NEW_BRANCH));
    assert.strictEqual(fake.calls.some((c) => c.op === "push"), false);
  });

  test("push failure still restores the original branch", async () => {
    const fake = featureRepo();
    fake.failOn("push");

    await assert.rejects(
      runMergeBranch(
        { targetBranch: "develop" },
        { git: fake.git, remote: "origin", confirm: never, now },
      ),
      (error: unknown) =>
        isFailure("VcsOperationFailed", "DifferenceFound")(error) &&
        error instanceof Error &&
        error.message.startsWith(`Failed to push new branch ${NEW_BRANCH}: `),
    );
    assert.strictEqual(fake.state.currentBranch, ORIGINAL);
  });

  test("missing target branch fails while syncing", async () => {
    const fake = featureRepo({ localBranches: [ORIGINAL], remoteBranches: [ORIGINAL] });

    await assert.rejects(
      runMergeBranch(
        { targetBranch: "develop" },
        { git: fake.git, remote: "origin", confirm: never, now },
      ),
      isFailure("VcsOperationFailed", "Validated"),
    );
    assert.strictEqual(fake.state.currentBranch, ORIGINAL);
  });
});

suite("merge-branch end to end", () => {
  test("pushes, opens the PR and notes it on the issue", async () => {
    const fake = featureRepo();
    const { fetch, requests } = createFakeFetch([...githubRoutes, ...issueRoutes]);
    const states: MergeState[] = [];

    const result = await runMergeBranch(
      { targetBranch: "develop", projectType: "backend" },
      { git: fake.git, remote: "origin", confirm: never, now, ...services(fetch) },
      { onStateChange: (state) => states.push(state) },
    );

    assert.strictEqual(result.outcome, "pushed");
    assert.deepStrictEqual(result.warnings, []);
    assert.strictEqual(result.pullRequest?.url, PR_URL);
    assert.deepStrictEqual(result.pullRequest?.requestedReviewers, ["alice"]);
    assert.strictEqual(result.issueUpdated, true);
    assert.deepStrictEqual(states, [
      "Validated",
      "TargetSynced",
      "Branched",
      "Merged",
      "DifferenceFound",
      "Pushed",
      "PrCreated",
      "IssueUpdated",
      "Done",
    ]);

    assert.deepStrictEqual(fake.mutations(), [
      { op: "checkout", args: ["develop"] },
      { op: "pull", args: ["origin", "develop"] },
      { op: "checkout", args: [ORIGINAL] },
      { op: "createBranch", args: [NEW_BRANCH] },
      { op: "merge", args: ["develop"] },
      { op: "push", args: ["origin", NEW_BRANCH, "true"] },
      { op: "checkout", args: [ORIGINAL] },
    ]);
    assert.strictEqual(fake.state.currentBranch, ORIGINAL);

    const create = requests.find(
      (r) => r.method === "POST" && new URL(r.url).pathname === PULLS,
    );
    assert.ok(create);
    assert.ok(typeof create.body === "object" && create.body !== null);
    assert.ok("title" in create.body && "head" in create.body && "base" in create.body);
    assert.strictEqual(create.body.title, "Merge HKBP-50/feature into develop");
    assert.strictEqual(create.body.head, NEW_BRANCH);
    assert.strictEqual(create.body.base, "develop");

    const update = requests.find((r) => r.method === "PUT");
    assert.ok(update);
    assert.strictEqual(update.url, ISSUE_URL);
    assert.deepStrictEqual(update.body, {
      fields: {
        description: [
          "Existing",
          "",
          "Merge PR created 2024-01-01 12:00",
          "Source branch: HKBP-50/feature",
          "Target branch: develop",
          `Pull request: ${PR_URL}`,
        ].join("\n"),
      },
    });
  });

  test("PR failure is a warning and skips the issue update", async () => {
    const fake = featureRepo();
    const { fetch, requests } = createFakeFetch([
      route("GET", PULLS, () => jsonResponse(200, [])),
      route("POST", PULLS, () => jsonResponse(422, { message: "Validation Failed" })),
      ...issueRoutes,
    ]);

    const result = await runMergeBranch(
      { targetBranch: "develop", projectType: "backend" },
      { git: fake.git, remote: "origin", confirm: never, now, ...services(fetch) },
    );

    assert.strictEqual(result.outcome, "pushed");
    assert.strictEqual(result.pullRequest, undefined);
    assert.strictEqual(result.issueUpdated, false);
    assert.strictEqual(result.warnings.length, 1);
    assert.ok(result.warnings[0].startsWith("Failed to create pull request: "));
    assert.strictEqual(requests.some((r) => r.url.startsWith(ISSUE_URL)), false);
    assert.strictEqual(fake.state.currentBranch, ORIGINAL);
  });

  test("issue tracker failure is a warning", async () => {
    const fake = featureRepo();
    const { fetch } = createFakeFetch([
      ...githubRoutes,
      route("GET", "/rest/api/2/issue/HKBP-50", () =>
        jsonResponse(500, { errorMessages: ["Internal error"] }),
      ),
    ]);

    const result = await runMergeBranch(
      { targetBranch: "develop", projectType: "backend" },
      { git: fake.git, remote: "origin", confirm: never, now, ...services(fetch) },
    );

    assert.strictEqual(result.outcome, "pushed");
    assert.strictEqual(result.pullRequest?.number, 7);
    assert.strictEqual(result.issueUpdated, false);
    assert.strictEqual(result.warnings.length, 1);
    assert.ok(result.warnings[0].startsWith("Failed to update HKBP-50: "));
  });

  test("unknown project type opens the PR without reviewers", async () => {
    const fake = featureRepo();
    const { fetch, requests } = createFakeFetch([...githubRoutes, ...issueRoutes]);

    const result = await runMergeBranch(
      { targetBranch: "develop", projectType: "desktop" },
      { git: fake.git, remote: "origin", confirm: never, now, ...services(fetch) },
    );

    assert.strictEqual(result.pullRequest?.number, 7);
    assert.deepStrictEqual(result.warnings, [
      "Unknown project type 'desktop' (expected one of: frontend, backend, mobile, infra); no reviewers will be requested",
    ]);
    assert.strictEqual(
      requests.some((r) => r.url.endsWith("/requested_reviewers")),
      false,
    );
  });

  test("--no-pr and --no-issue skip both services", async () => {
    const fake = featureRepo();
    const { fetch, requests } = createFakeFetch([...githubRoutes, ...issueRoutes]);

    const result = await runMergeBranch(
      { targetBranch: "develop", createPullRequest: false, updateIssue: false },
      { git: fake.git, remote: "origin", confirm: never, now, ...services(fetch) },
    );

    assert.strictEqual(result.outcome, "pushed");
    assert.deepStrictEqual(requests, []);
    assert.deepStrictEqual(result.warnings, []);
  });

  test("without a configured issue tracker the issue is skipped", async () => {
    const fake = featureRepo();
    const { fetch, requests } = createFakeFetch([...githubRoutes, ...issueRoutes]);

    const result = await runMergeBranch(
      { targetBranch: "develop", projectType: "backend" },
      {
        git: fake.git,
        remote: "origin",
        confirm: never,
        now,
        ...services(fetch),
        issueTracker: undefined,
      },
    );

    assert.strictEqual(result.pullRequest?.number, 7);
    assert.strictEqual(result.issueUpdated, false);
    assert.deepStrictEqual(result.warnings, [
      "Issue tracker is not available; HKBP-50 not updated.",
    ]);
    assert.strictEqual(requests.some((r) => r.url.startsWith(ISSUE_URL)), false);
  });

  test("branch without an issue key skips the issue", async () => {
    const fake = createFakeGit({
      currentBranch: "feature/login",
      localBranches: ["develop", "feature/login"],
      remoteBranches: ["develop", "feature/login"],
      diffs: { "develop..feature/merge_develop_20240101_120000": diffOf(["a.ts"]) },
    });
    const { fetch, requests } = createFakeFetch([...githubRoutes, ...issueRoutes]);

    const result = await runMergeBranch(
      { targetBranch: "develop", projectType: "backend" },
      { git: fake.git, remote: "origin", confirm: never, now, ...services(fetch) },
    );

    assert.strictEqual(result.newBranch, "feature/merge_develop_20240101_120000");
    assert.strictEqual(result.issueKey, undefined);
    assert.deepStrictEqual(result.warnings, [
      "No issue key found in feature/login; issue not updated.",
    ]);
    assert.strictEqual(requests.some((r) => r.url.startsWith(ISSUE_URL)), false);
  });
});
