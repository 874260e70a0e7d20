export * from "./auth.js";
export * from "./branchNaming.js";
export * from "./cleanupBranches.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./gitParsers.js";
export * from "./gitTypes.js";
export * from "./gitUtils.js";
export * from "./issueTracker.js";
export * from "./logger.js";
export * from "./mergeBranch.js";
export * from "./pullRequests.js";
export * from "./repoInspector.js";
