import assert from "assert/strict";
import {
  deleteBranches,
  removeBranches,
  type BranchDeletion,
} from "./cleanupBranches.js";
import { BranchflowError } from "./errors.js";
import type { BranchSet } from "./gitTypes.js";
import { createFakeGit, type FakeRepoState } from "./testUtils.js";

const yes = () => Promise.resolve(true);

function repo(overrides: Partial<FakeRepoState> = {}) {
  return createFakeGit({
    currentBranch: "HKBP-7/login",
    localBranches: ["main", "HKBP-7/login", "HKBP-7/merge_develop_1", "HKBP-7/merge_develop_2"],
    remoteBranches: ["main", "HKBP-7/merge_develop_1", "HKBP-7/merge_develop_3"],
    upstreams: { "HKBP-7/merge_develop_1": "origin/HKBP-7/merge_develop_1" },
    ...overrides,
  });
}

function summary(deletions: BranchDeletion[]) {
  return deletions.map((d) => `${d.name}:${d.location}:${d.status}`);
}

suite("removeBranches", () => {
  test("deletes matches and the upstream of local branches", async () => {
    const fake = repo();

    const result = await removeBranches(
      { git: fake.git, remote: "origin", confirm: yes },
      "merge_develop",
    );

    assert.strictEqual(result.outcome, "completed");
    assert.deepStrictEqual(summary(result.deletions), [
      "HKBP-7/merge_develop_1:local:deleted",
      "HKBP-7/merge_develop_2:local:deleted",
    ]);
    assert.strictEqual(result.deletions[0].upstream, "origin/HKBP-7/merge_develop_1");
    assert.deepStrictEqual(fake.mutations(), [
      { op: "deleteRemoteBranch", args: ["origin", "HKBP-7/merge_develop_1"] },
      { op: "deleteLocalBranch", args: ["HKBP-7/merge_develop_1"] },
      { op: "deleteLocalBranch", args: ["HKBP-7/merge_develop_2"] },
    ]);
    assert.deepStrictEqual(fake.state.remoteBranches, ["main", "HKBP-7/merge_develop_3"]);
  });

  test("includes remote-only branches when asked", async () => {
    const fake = repo();

    const result = await removeBranches(
      { git: fake.git, remote: "origin", confirm: yes },
      "merge_develop",
      { includeRemote: true },
    );

    assert.deepStrictEqual(summary(result.deletions), [
      "HKBP-7/merge_develop_1:local:deleted",
      "HKBP-7/merge_develop_2:local:deleted",
      "HKBP-7/merge_develop_3:remote:deleted",
    ]);
    assert.deepStrictEqual(fake.state.remoteBranches, ["main"]);
  });

  test("skips only the current branch", async () => {
    const fake = repo();

    const result = await removeBranches(
      { git: fake.git, remote: "origin", confirm: yes },
      "HKBP-7/",
    );

    assert.deepStrictEqual(summary(result.deletions), [
      "HKBP-7/login:local:skipped",
      "HKBP-7/merge_develop_1:local:deleted",
      "HKBP-7/merge_develop_2:local:deleted",
    ]);
    assert.strictEqual(result.deletions[0].reason, "current branch");
    assert.deepStrictEqual(fake.state.localBranches, ["main", "HKBP-7/login"]);
  });

  test("one confirmation for the whole batch", async () => {
    const fake = repo();
    const prompts: string[] = [];

    await removeBranches(
      {
        git: fake.git,
        remote: "origin",
        confirm: (prompt) => {
          prompts.push(prompt);
          return Promise.resolve(true);
        },
      },
      "merge_develop",
      { includeRemote: true },
    );

    assert.deepStrictEqual(prompts, [
      "Delete 3 branches: HKBP-7/merge_develop_1, HKBP-7/merge_develop_2, HKBP-7/merge_develop_3 (remote only)?",
    ]);
  });

  test("the prompt marks the current branch as skipped", async () => {
    const fake = repo();
    const prompts: string[] = [];

    await removeBranches(
      {
        git: fake.git,
        remote: "origin",
        confirm: (prompt) => {
          prompts.push(prompt);
          return Promise.resolve(false);
        },
      },
      "HKBP-7/",
    );

    assert.deepStrictEqual(prompts, [
      "Delete 3 branches: HKBP-7/login (current branch, skipped), HKBP-7/merge_develop_1, HKBP-7/merge_develop_2?",
    ]);
  });

  test("declining deletes nothing", async () => {
    const fake = repo();

    const result = await removeBranches(
      { git: fake.git, remote: "origin", confirm: () => Promise.resolve(false) },
      "merge_develop",
    );

    assert.strictEqual(result.outcome, "aborted");
    assert.strictEqual(result.branches.length, 2);
    assert.deepStrictEqual(fake.mutations(), []);
  });

  test("no matches", async () => {
    const fake = repo();
    let asked = false;

    const result = await removeBranches(
      {
        git: fake.git,
        remote: "origin",
        confirm: () => {
          asked = true;
          return Promise.resolve(true);
        },
      },
      "nothing-like-this",
    );

    assert.strictEqual(result.outcome, "no-branches");
    assert.strictEqual(asked, false);
  });

  test("dry run lists without deleting", async () => {
    const fake = repo();

    const result = await removeBranches(
      { git: fake.git, remote: "origin", confirm: yes },
      "HKBP-7/",
      { dryRun: true },
    );

    assert.strictEqual(result.outcome, "dry-run");
    assert.deepStrictEqual(
      result.deletions.map((d) => d.reason),
      ["current branch", "dry run", "dry run"],
    );
    assert.deepStrictEqual(fake.mutations(), []);
  });

  test("outside a repository", async () => {
    const fake = repo({ insideWorkTree: false });

    await assert.rejects(
      removeBranches({ git: fake.git, remote: "origin", confirm: yes }, "x"),
      (error: unknown) =>
        error instanceof BranchflowError && error.kind === "NotARepository",
    );
  });
});

suite("deleteBranches", () => {
  test("a failure is isolated to its branch", async () => {
    const fake = repo();
    fake.failOn("deleteLocalBranch", (args) => args[0] === "HKBP-7/merge_develop_1");
    const branches: BranchSet = new Map([
      ["HKBP-7/merge_develop_1", { name: "HKBP-7/merge_develop_1", location: "local" }],
      ["HKBP-7/merge_develop_2", { name: "HKBP-7/merge_develop_2", location: "local" }],
    ]);

    const result = await deleteBranches(
      { git: fake.git, remote: "origin", confirm: yes },
      branches,
      "HKBP-7/login",
    );

    assert.strictEqual(result.outcome, "completed");
    assert.deepStrictEqual(summary(result.deletions), [
      "HKBP-7/merge_develop_1:local:failed",
      "HKBP-7/merge_develop_2:local:deleted",
    ]);
    assert.ok(result.deletions[0].error?.message.includes("simulated deleteLocalBranch failure"));
  });

  test("a failed upstream delete still deletes the local branch", async () => {
    const fake = repo({
      upstreams: { "HKBP-7/merge_develop_2": "origin/HKBP-7/merge_develop_2" },
    });
    const branches: BranchSet = new Map([
      ["HKBP-7/merge_develop_2", { name: "HKBP-7/merge_develop_2", location: "local" }],
    ]);

    const result = await deleteBranches(
      { git: fake.git, remote: "origin", confirm: yes },
      branches,
      "HKBP-7/login",
    );

    const [deletion] = result.deletions;
    assert.strictEqual(deletion.status, "deleted");
    assert.strictEqual(deletion.upstream, "origin/HKBP-7/merge_develop_2");
    assert.ok(deletion.upstreamError);
    assert.strictEqual(fake.state.localBranches.includes("HKBP-7/merge_develop_2"), false);
  });

  test("reports each deletion as it happens", async () => {
    const fake = repo();
    const seen: string[] = [];
    const branches: BranchSet = new Map([
      ["HKBP-7/merge_develop_3", { name: "HKBP-7/merge_develop_3", location: "remote" }],
    ]);

    await deleteBranches(
      { git: fake.git, remote: "origin", confirm: yes },
      branches,
      "HKBP-7/login",
      { onDeletion: (d) => seen.push(`${d.name}:${d.status}`) },
    );

    assert.deepStrictEqual(seen, ["HKBP-7/merge_develop_3:deleted"]);
    assert.deepStrictEqual(fake.mutations(), [
      { op: "deleteRemoteBranch", args: ["origin", "HKBP-7/merge_develop_3"] },
    ]);
  });
});
