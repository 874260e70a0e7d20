// Token resolution is silent; the CLI decides what to tell the user.
// Tokens are never written to disk: they come from the environment or from
// an authenticated GitHub CLI.

import { execFile } from "child_process";
import { promisify } from "util";
import type { Octokit } from "octokit";
import type { AppConfig } from "./config.js";
import { parseGitHubRemote } from "./gitParsers.js";
import type { GitFunctions } from "./gitUtils.js";
import { logger } from "./logger.js";
import type { GitHubConnection } from "./pullRequests.js";

const execFileAsync = promisify(execFile);

export interface AuthConfig {
  token: string;
  source: "env-var" | "gh-cli";
}

export interface AuthSuccess {
  kind: "success";
  config: AuthConfig;
}

export interface AuthFailure {
  kind: "failure";
  reason: "no-auth-found";
}

export type TokenSource = () => Promise<string | null>;

/**
 * Token of an authenticated GitHub CLI, if there is one
 */
export async function getGitHubCLIToken(): Promise<string | null> {
  try {
    await execFileAsync("gh", ["auth", "status"]);
    const tokenResult = await execFileAsync("gh", ["auth", "token"]);
    const token = tokenResult.stdout.trim();
    if (token) {
      logger.debug("Found GitHub CLI authentication");
      return token;
    }
  } catch (error) {
    logger.debug(`GitHub CLI unavailable or not authenticated: ${String(error)}`);
  }
  return null;
}

/**
 * Get a GitHub token using the following priority:
 * 1. GITHUB_TOKEN / GH_TOKEN from the configuration
 * 2. GitHub CLI (if available and authenticated)
 */
export async function getGitHubAuth(
  config: AppConfig,
  cliToken: TokenSource = getGitHubCLIToken,
): Promise<AuthSuccess | AuthFailure> {
  if (config.github.token) {
    logger.debug("Using GitHub token from environment variable");
    return {
      kind: "success",
      config: { token: config.github.token, source: "env-var" },
    };
  }

  const ghCliToken = await cliToken();
  if (ghCliToken) {
    return {
      kind: "success",
      config: { token: ghCliToken, source: "gh-cli" },
    };
  }

  return { kind: "failure", reason: "no-auth-found" };
}

/**
 * Owner, repository and token for the PR service. Owner and repository fall
 * back to the configured remote's URL; missing pieces stay undefined so the
 * client can report them.
 */
export async function resolveGitHubConnection(
  config: AppConfig,
  git: GitFunctions,
  cliToken: TokenSource = getGitHubCLIToken,
): Promise<GitHubConnection> {
  let { owner, repo } = config.github;

  if (!owner || !repo) {
    const remoteUrl = await git.getRemoteUrl(config.git.remote);
    const repoInfo = remoteUrl ? parseGitHubRemote(remoteUrl) : undefined;
    if (repoInfo) {
      logger.debug(`Detected GitHub repository ${repoInfo.owner}/${repoInfo.repo}`);
      owner = owner ?? repoInfo.owner;
      repo = repo ?? repoInfo.repo;
    } else {
      logger.debug(`Could not detect a GitHub repository from ${config.git.remote}`);
    }
  }

  const auth = await getGitHubAuth(config, cliToken);

  return {
    owner,
    repo,
    token: auth.kind === "success" ? auth.config.token : undefined,
    timeoutMs: config.httpTimeoutMs,
  };
}

export async function getAuthDetails(octokit: Octokit, timeoutMs: number) {
  const user = await octokit.rest.users.getAuthenticated({
    request: { signal: AbortSignal.timeout(timeoutMs) },
  });
  const response = await octokit.request("GET /user", {
    request: { signal: AbortSignal.timeout(timeoutMs) },
  });
  const scopesHeader = response.headers["x-oauth-scopes"];
  const scopes =
    typeof scopesHeader === "string" && scopesHeader !== ""
      ? scopesHeader.split(", ")
      : [];
  return {
    username: user.data.login,
    name: user.data.name,
    email: user.data.email,
    scopes,
  };
}
