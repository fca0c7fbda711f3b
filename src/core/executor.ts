import { ActionFailure, errorMessage } from "./errors.js";
import type { Action, ActionStatus, ActionSummary, ExecutionResult, RunContext } from "./types.js";

export interface ExecutorHooks {
  onActionStatusChange?: (payload: { action: ActionSummary; status: ActionStatus }) => void;
}

export interface ExecutionRun {
  results: ExecutionResult[];
  aborted: boolean;
  /** Actions never started because the run aborted. */
  notRun: ActionSummary[];
}

/**
 * Converts anything an action threw into an ActionFailure. Command errors
 * already carry the tool's stderr as their message, which is kept verbatim.
 */
function toFailure(action: Action, error: unknown): ActionFailure {
  if (error instanceof ActionFailure) return error;
  return new ActionFailure(action.summary(), errorMessage(error));
}

/**
 * Runs one action: re-checks its precondition, applies it when needed and
 * verifies the postcondition. Never throws.
 */
export async function execute(action: Action, ctx: RunContext): Promise<ExecutionResult> {
  const summary = action.summary();
  const started = Date.now();
  const elapsed = () => Date.now() - started;

  try {
    if (await action.check(ctx)) {
      ctx.logger.debug({ action: action.id }, "Already satisfied");
      const skipped: ExecutionResult = { status: "skipped", action: summary, durationMs: elapsed() };
      const credential = await action.currentCredential?.(ctx);
      if (credential) skipped.credential = credential;
      return skipped;
    }

    const outcome = await action.apply(ctx);

    if (!(await action.check(ctx))) {
      throw new ActionFailure(summary, "postcondition not satisfied after apply");
    }

    const result: ExecutionResult = { status: "applied", action: summary, durationMs: elapsed() };
    if (outcome?.message) result.message = outcome.message;
    if (outcome?.credential) result.credential = outcome.credential;
    return result;
  } catch (error) {
    const failure = toFailure(action, error);
    ctx.logger.error(
      { action: action.id, kind: action.kind, fatal: failure.fatal, reason: failure.reason },
      "Action failed",
    );
    return {
      status: "failed",
      action: summary,
      reason: failure.reason,
      fatal: failure.fatal,
      durationMs: elapsed(),
    };
  }
}

/**
 * Executes actions strictly in order. Non-fatal failures are recorded and
 * execution continues; a fatal failure stops the run immediately.
 */
export async function executeAll(
  actions: readonly Action[],
  ctx: RunContext,
  hooks: ExecutorHooks = {},
): Promise<ExecutionRun> {
  const results: ExecutionResult[] = [];
  for (const action of actions) {
    hooks.onActionStatusChange?.({ action: action.summary(), status: "pending" });
  }

  for (let i = 0; i < actions.length; i++) {
    const action = actions[i];
    hooks.onActionStatusChange?.({ action: action.summary(), status: "running" });
    const result = await execute(action, ctx);
    results.push(result);
    hooks.onActionStatusChange?.({ action: result.action, status: result.status });
    ctx.logger.debug({ action: action.id, status: result.status, durationMs: result.durationMs }, "Action finished");

    if (result.status === "failed" && result.fatal) {
      const notRun = actions.slice(i + 1).map((a) => a.summary());
      ctx.logger.error({ action: action.id, remaining: notRun.length }, "Fatal failure, aborting run");
      return { results, aborted: true, notRun };
    }
  }

  return { results, aborted: false, notRun: [] };
}
