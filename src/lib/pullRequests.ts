import { Octokit } from "octokit";
import {
  PROJECT_TYPES,
  type ProjectType,
  type ReviewerTable,
} from "./config.js";
import { BranchflowError } from "./errors.js";
import { logger } from "./logger.js";

type PullRequestItem = Awaited<
  ReturnType<Octokit["rest"]["pulls"]["create"]>
>["data"];

export interface GitHubConfig {
  owner: string;
  repo: string;
  octokit: Octokit;
  timeoutMs: number;
}

export interface GitHubConnection {
  owner?: string;
  repo?: string;
  token?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
  // Throttle and retry scheduling; off only for in-process fakes
  rateLimitHandling?: boolean;
}

export interface PullRequestInput {
  title: string;
  head: string;
  base: string;
  body: string;
  reviewers: string[];
}

export interface CreatedPullRequest {
  number: number;
  url: string;
  alreadyExisted: boolean;
  requestedReviewers: string[];
  // Reviewer assignment failed after the PR was created
  reviewerError?: Error;
}

export interface ReviewerLookup {
  reviewers: string[];
  diagnostic?: string;
}

function isProjectType(value: string): value is ProjectType {
  return (PROJECT_TYPES as readonly string[]).includes(value);
}

/**
 * Reviewers configured for a project type. Unknown or missing types yield no
 * reviewers and a diagnostic, never an error.
 */
export function reviewersForProject(
  projectType: string | undefined,
  table: ReviewerTable,
): ReviewerLookup {
  if (projectType === undefined) {
    return {
      reviewers: [],
      diagnostic: "No project type configured; no reviewers will be requested",
    };
  }
  if (!isProjectType(projectType)) {
    return {
      reviewers: [],
      diagnostic: `Unknown project type '${projectType}' (expected one of: ${PROJECT_TYPES.join(", ")}); no reviewers will be requested`,
    };
  }
  const reviewers = [...new Set(table[projectType] ?? [])];
  if (reviewers.length === 0) {
    return {
      reviewers,
      diagnostic: `No reviewers configured for project type '${projectType}'`,
    };
  }
  return { reviewers };
}

export function createGitHubConfig(connection: GitHubConnection): GitHubConfig {
  const { owner, repo, token } = connection;
  if (!owner || !repo || !token) {
    const missing = [
      !owner && "GITHUB_OWNER",
      !repo && "GITHUB_REPO",
      !token && "GITHUB_TOKEN",
    ].filter(Boolean);
    throw new BranchflowError(
      "NotConfigured",
      `Pull request service is not configured (missing ${missing.join(", ")})`,
    );
  }

  const octokit = new Octokit({
    auth: token,
    ...(connection.fetch ? { request: { fetch: connection.fetch } } : {}),
    ...(connection.rateLimitHandling === false
      ? ({ throttle: { enabled: false }, retry: { enabled: false } } as const)
      : {}),
  });
  return { owner, repo, octokit, timeoutMs: connection.timeoutMs };
}

function remoteError(context: string, error: unknown): BranchflowError {
  const status =
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
      ? error.status
      : undefined;
  const message = error instanceof Error ? error.message : String(error);
  return new BranchflowError(
    "RemoteError",
    `${context}${status === undefined ? "" : ` (${status})`}: ${message}`,
    { status, cause: error },
  );
}

function requestOptions(github: GitHubConfig) {
  return { signal: AbortSignal.timeout(github.timeoutMs) };
}

/**
 * Check if an open PR already exists for the given head branch
 */
export async function findExistingPullRequest(
  github: GitHubConfig,
  head: string,
): Promise<{ number: number; url: string } | undefined> {
  try {
    const result = await github.octokit.rest.pulls.list({
      owner: github.owner,
      repo: github.repo,
      head: `${github.owner}:${head}`,
      state: "open",
      request: requestOptions(github),
    });
    const pr = result.data[0];
    return pr ? { number: pr.number, url: pr.html_url } : undefined;
  } catch (error) {
    throw remoteError(`Failed to look up pull requests for ${head}`, error);
  }
}

/**
 * Ask for reviews on an existing PR
 */
export async function requestReviewers(
  github: GitHubConfig,
  pullNumber: number,
  reviewers: string[],
): Promise<void> {
  try {
    await github.octokit.rest.pulls.requestReviewers({
      owner: github.owner,
      repo: github.repo,
      pull_number: pullNumber,
      reviewers,
      request: requestOptions(github),
    });
  } catch (error) {
    throw remoteError(`Failed to request reviewers on #${pullNumber}`, error);
  }
}

/**
 * Open a PR, then request reviewers as a separate call. A reviewer failure is
 * reported on the result and leaves the PR in place.
 */
export async function createPullRequest(
  github: GitHubConfig,
  input: PullRequestInput,
): Promise<CreatedPullRequest> {
  const existing = await findExistingPullRequest(github, input.head);

  let pr: { number: number; url: string };
  if (existing) {
    logger.debug(`Reusing open PR #${existing.number} for ${input.head}`);
    pr = existing;
  } else {
    let created: PullRequestItem;
    try {
      const result = await github.octokit.rest.pulls.create({
        owner: github.owner,
        repo: github.repo,
        title: input.title,
        head: input.head,
        base: input.base,
        body: input.body,
        request: requestOptions(github),
      });
      created = result.data;
    } catch (error) {
      throw remoteError(
        `Failed to create pull request ${input.head} -> ${input.base}`,
        error,
      );
    }
    pr = { number: created.number, url: created.html_url };
  }

  const result: CreatedPullRequest = {
    ...pr,
    alreadyExisted: existing !== undefined,
    requestedReviewers: [],
  };

  if (input.reviewers.length > 0) {
    try {
      await requestReviewers(github, pr.number, input.reviewers);
      result.requestedReviewers = input.reviewers;
    } catch (error) {
      result.reviewerError = error instanceof Error ? error : new Error(String(error));
    }
  }

  return result;
}
