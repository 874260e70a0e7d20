import type { AppConfig } from "../lib/config.js";
import type { GitFunctions } from "../lib/gitUtils.js";
import type { Confirm } from "../lib/mergeBranch.js";
import type { Reporter } from "./reporter.js";

export interface CommandContext {
  config: AppConfig;
  git: GitFunctions;
  reporter: Reporter;
  confirm: Confirm;
}
