import { Octokit } from "octokit";
import { getAuthDetails, getGitHubAuth } from "../lib/auth.js";
import { BranchflowError } from "../lib/errors.js";
import type { CommandContext } from "./context.js";

function authHelp(ctx: CommandContext): void {
  const { reporter } = ctx;
  reporter.heading("🔐 GitHub authentication");
  reporter.info("branchflow looks for a token in this order:");
  reporter.info("  1. GITHUB_TOKEN or GH_TOKEN (environment or .env file)");
  reporter.info("  2. GitHub CLI: run `gh auth login`");
  reporter.info("The token needs the `repo` scope to open pull requests.");
}

/**
 * Check which GitHub token is in use and what it can do
 */
export async function authCommand(ctx: CommandContext): Promise<void> {
  const { reporter } = ctx;
  reporter.step("Testing GitHub authentication...");

  const auth = await getGitHubAuth(ctx.config);
  if (auth.kind === "failure") {
    authHelp(ctx);
    throw new BranchflowError("NotConfigured", "No GitHub authentication found");
  }
  reporter.success(`Authenticated via: ${auth.config.source}`);

  const octokit = new Octokit({ auth: auth.config.token });
  let details: Awaited<ReturnType<typeof getAuthDetails>>;
  try {
    details = await getAuthDetails(octokit, ctx.config.httpTimeoutMs);
  } catch (error) {
    throw new BranchflowError(
      "RemoteError",
      `GitHub rejected the token: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  reporter.info(`👤 Authenticated as: ${details.username} (${details.name ?? "No name set"})`);
  reporter.info(`📧 Email: ${details.email ?? "Not public"}`);
  reporter.info(
    `📋 Token scopes: ${details.scopes.length > 0 ? details.scopes.join(", ") : "None detected"}`,
  );
  if (details.scopes.includes("repo")) {
    reporter.success("Token has repo access (required for creating PRs)");
  } else {
    reporter.warn("Token may not have sufficient permissions for creating PRs");
  }
}
