import {
  removeBranches,
  type BranchDeletion,
  type RemoveBranchesOptions,
} from "../lib/cleanupBranches.js";
import type { CommandContext } from "./context.js";

function label(deletion: BranchDeletion): string {
  return deletion.location === "remote"
    ? `${deletion.name} (remote)`
    : deletion.name;
}

export async function cleanupBranchesCommand(
  ctx: CommandContext,
  substring: string,
  options: RemoveBranchesOptions,
): Promise<void> {
  const { config, git, reporter } = ctx;

  const result = await removeBranches(
    { git, remote: config.git.remote, confirm: ctx.confirm },
    substring,
    options,
    {
      onDeletion: (deletion) => {
        if (deletion.upstreamError) {
          reporter.warn(
            `Could not delete ${deletion.upstream ?? "upstream"} of ${deletion.name}: ${deletion.upstreamError.message}`,
          );
        }
        switch (deletion.status) {
          case "deleted":
            reporter.success(`Deleted ${label(deletion)}`);
            break;
          case "skipped":
            reporter.warn(`Skipped ${label(deletion)} (${deletion.reason ?? "skipped"})`);
            break;
          case "failed":
            reporter.error(
              `Failed to delete ${label(deletion)}: ${deletion.error?.message ?? "unknown error"}`,
            );
            break;
        }
      },
    },
  );

  switch (result.outcome) {
    case "no-branches":
      reporter.info(`No branches found containing '${substring}'`);
      return;
    case "aborted":
      reporter.info("Aborted; no branches were deleted");
      return;
    case "dry-run":
      reporter.heading(`Would delete ${result.branches.length} branch(es):`);
      for (const deletion of result.deletions) {
        reporter.info(
          `  ${label(deletion)}${deletion.reason === "current branch" ? " (current branch, skipped)" : ""}`,
        );
      }
      return;
    case "completed": {
      const failed = result.deletions.filter((d) => d.status === "failed").length;
      const deleted = result.deletions.filter((d) => d.status === "deleted").length;
      reporter.heading(
        `Deleted ${deleted} of ${result.deletions.length} branch(es)${failed > 0 ? `, ${failed} failed` : ""}`,
      );
      return;
    }
  }
}
