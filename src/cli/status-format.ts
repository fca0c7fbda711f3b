import chalk from "chalk";

import type { ActionStatus, PlannedAction } from "../core/types.js";

const BADGE_WIDTH = 9;

function badge(text: string): string {
  return ` ${text} `.padEnd(BADGE_WIDTH);
}

/**
 * Formats an action status as a fixed-width colored badge, similar to Jest's
 * PASS/FAIL markers.
 */
export function formatStatus(status: ActionStatus): string {
  const label = badge(status.toUpperCase());
  switch (status) {
    case "applied":
      return chalk.bgGreen.black(label);
    case "skipped":
      return chalk.bgGray.white(label);
    case "failed":
      return chalk.bgRed.white(label);
    case "running":
      return chalk.bgYellow.black(label);
    case "pending":
      return chalk.dim(label);
  }
}

/**
 * Formats the precondition state shown by `--plan`.
 */
export function formatPlanState(state: PlannedAction["state"]): string {
  return state === "satisfied" ? chalk.gray(badge("OK")) : chalk.bgYellow.black(badge("TODO"));
}

/**
 * Format an action id with its kind in grey and its key in white,
 * e.g. "copy-file:" in grey + "/home/mg/.vimrc" in white.
 */
export function formatActionId(id: string): string {
  const colon = id.indexOf(":");
  if (colon === -1) return chalk.white(id);
  return chalk.grey(id.slice(0, colon + 1)) + chalk.white(id.slice(colon + 1));
}
