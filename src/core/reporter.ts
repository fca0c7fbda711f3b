import type { ExecutionResult, RunSummary } from "./types.js";

export interface ReportOptions {
  aborted?: boolean;
  notRun?: number;
}

/**
 * Aggregates execution results. Pure: no output, no side effects.
 */
export function report(results: readonly ExecutionResult[], options: ReportOptions = {}): RunSummary {
  const summary: RunSummary = {
    applied: 0,
    skipped: 0,
    failed: 0,
    notRun: options.notRun ?? 0,
    aborted: options.aborted ?? false,
    failures: [],
    credentials: [],
  };

  for (const result of results) {
    switch (result.status) {
      case "applied":
        summary.applied++;
        if (result.credential) summary.credentials.push({ ...result.credential });
        break;
      case "skipped":
        summary.skipped++;
        if (result.credential) summary.credentials.push({ ...result.credential });
        break;
      case "failed":
        summary.failed++;
        summary.failures.push({
          description: result.action.description,
          reason: result.reason,
          fatal: result.fatal,
        });
        break;
    }
  }

  return summary;
}

/**
 * Renders a summary as plain text lines: counts, failures, then credentials
 * in full so they can be copied.
 */
export function formatSummary(summary: RunSummary): string[] {
  const counts = [`applied ${summary.applied}`, `skipped ${summary.skipped}`, `failed ${summary.failed}`];
  if (summary.aborted) counts.push(`not run ${summary.notRun}`);

  const lines = [counts.join(", ")];
  if (summary.aborted) {
    lines.push("Run aborted after a fatal failure.");
  }
  for (const failure of summary.failures) {
    lines.push(`${failure.fatal ? "FATAL " : ""}${failure.description}: ${failure.reason}`);
  }
  for (const credential of summary.credentials) {
    lines.push("", `${credential.label}:`, credential.text);
  }
  return lines;
}
