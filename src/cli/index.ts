import { loadConfig } from "../lib/config.js";
import { isBranchflowError, toError } from "../lib/errors.js";
import { createGitFunctions } from "../lib/gitUtils.js";
import { enableDebugLogging } from "../lib/logger.js";
import { parseArgs, UsageError, type Command } from "./args.js";
import { authCommand } from "./authCommand.js";
import { cleanupBranchesCommand } from "./cleanupBranchesCommand.js";
import type { CommandContext } from "./context.js";
import {
  issueCommand,
  statusCommand,
  topicBranchesCommand,
} from "./inspectCommands.js";
import { mergeBranchCommand } from "./mergeBranchCommand.js";
import { createConfirm } from "./prompt.js";
import { createConsoleReporter, type Reporter } from "./reporter.js";

function showHelp() {
  console.log("🔧 branchflow - git merge branch and cleanup workflow");
  console.log("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━");
  console.log("");
  console.log("USAGE:");
  console.log("  branchflow <COMMAND> [OPTIONS]");
  console.log("");
  console.log("COMMANDS:");
  console.log("  merge-branch <target>         Merge <target> into a new branch cut from the");
  console.log("                                current one, push it, open a PR and note it on");
  console.log("                                the issue named by the branch");
  console.log("    --project <type>            frontend, backend, mobile or infra (picks reviewers)");
  console.log("    --dry-run                   Show what would be done without making changes");
  console.log("    --no-pr                     Push only; do not open a pull request");
  console.log("    --no-issue                  Do not update the issue");
  console.log("    --yes                       Push unpushed commits without asking");
  console.log("");
  console.log("  cleanup-branches <substring>  Delete branches whose name contains <substring>");
  console.log("    --include-remote            Also delete remote-only branches");
  console.log("    --dry-run                   List the branches without deleting them");
  console.log("    --yes                       Do not ask for confirmation");
  console.log("");
  console.log("  topic-branches [<branch>]     List branches sharing the prefix of <branch>");
  console.log("  status                        Show the repository status");
  console.log("  issue <key>                   Show an issue from the tracker");
  console.log("  auth                          Test GitHub authentication");
  console.log("  help, --help, -h              Show this help message");
  console.log("");
  console.log("EXAMPLES:");
  console.log("  branchflow merge-branch develop --project backend");
  console.log("  branchflow cleanup-branches merge_develop --include-remote --dry-run");
}

function reportFailure(reporter: Reporter, error: unknown): void {
  if (isBranchflowError(error)) {
    reporter.error(error.message);
    if (error.state && error.state !== "Idle") {
      reporter.info(`Stopped after step: ${error.state}`);
    }
    return;
  }
  reporter.error(toError(error).message);
}

async function dispatch(
  ctx: CommandContext,
  command: Exclude<Command, { kind: "help" }>,
): Promise<void> {
  switch (command.kind) {
    case "merge-branch":
      return mergeBranchCommand(ctx, {
        targetBranch: command.target,
        projectType: command.projectType,
        dryRun: command.dryRun,
        createPullRequest: command.createPullRequest,
        updateIssue: command.updateIssue,
      });
    case "cleanup-branches":
      return cleanupBranchesCommand(ctx, command.substring, {
        includeRemote: command.includeRemote,
        dryRun: command.dryRun,
      });
    case "topic-branches":
      return topicBranchesCommand(ctx, command.branch);
    case "status":
      return statusCommand(ctx);
    case "issue":
      return issueCommand(ctx, command.key);
    case "auth":
      return authCommand(ctx);
  }
}

/**
 * Run one command and resolve to the process exit code
 */
export async function run(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const reporter = createConsoleReporter();

  let command: Command;
  try {
    command = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      reporter.error(error.message);
      console.error("Run `branchflow help` for usage.");
      return 1;
    }
    throw error;
  }

  if (command.kind === "help") {
    showHelp();
    return 0;
  }

  try {
    const config = await loadConfig(env);
    enableDebugLogging(config.debug);

    const ctx: CommandContext = {
      config,
      git: createGitFunctions(config.git),
      reporter,
      confirm: createConfirm("yes" in command && command.yes),
    };
    await dispatch(ctx, command);
    return 0;
  } catch (error) {
    reportFailure(reporter, error);
    return 1;
  }
}
