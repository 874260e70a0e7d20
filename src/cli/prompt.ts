import { confirm } from "@inquirer/prompts";
import type { Confirm } from "../lib/mergeBranch.js";

/**
 * Interactive yes/no prompt; `assumeYes` (--yes) answers without a terminal
 */
export function createConfirm(assumeYes: boolean): Confirm {
  return async (message) => {
    if (assumeYes) {
      return true;
    }
    return confirm({ message, default: false });
  };
}
