import type { ActionSummary } from "./types.js";

export type GroundworkErrorCode =
  | "UNSUPPORTED_PLATFORM"
  | "INVALID_MANIFEST"
  | "ACTION_FAILED"
  | "COMMAND_FAILED";

/**
 * Base class for errors raised by the bootstrap pipeline.
 */
export class GroundworkError extends Error {
  readonly code: GroundworkErrorCode;

  constructor(code: GroundworkErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The host OS family cannot be bootstrapped. Fatal: raised before planning.
 */
export class UnsupportedPlatformError extends GroundworkError {
  readonly platform: string;

  constructor(platform: string, detail?: string) {
    super(
      "UNSUPPORTED_PLATFORM",
      detail ? `Unsupported platform ${platform}: ${detail}` : `Unsupported platform: ${platform}`,
    );
    this.platform = platform;
  }
}

/**
 * The manifest cannot be parsed, fails validation, or asks for something
 * the probed platform cannot provide. Fatal: raised before any action runs.
 */
export class InvalidManifestError extends GroundworkError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      "INVALID_MANIFEST",
      issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join("\n")}` : message,
    );
    this.issues = issues;
  }
}

/**
 * A single action could not reach its desired state. Non-fatal unless
 * flagged otherwise; the executor records it and moves on.
 */
export class ActionFailure extends GroundworkError {
  readonly action: ActionSummary;
  readonly reason: string;
  readonly fatal: boolean;

  constructor(action: ActionSummary, reason: string, options: { fatal?: boolean } = {}) {
    super("ACTION_FAILED", `${action.description}: ${reason}`);
    this.action = action;
    this.reason = reason;
    this.fatal = options.fatal ?? false;
  }
}

/**
 * Extracts a human readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
