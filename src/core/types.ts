import type { Logger } from "pino";

import type { CommandRunner } from "../lib/exec.js";

/**
 * Operating system families the tool knows how to bootstrap.
 * `unsupported` is only ever produced by detection; probing rejects it.
 */
export type OsFamily = "linux" | "macos" | "unsupported";

/**
 * Families a manifest entry may be restricted to.
 */
export type SupportedOsFamily = Exclude<OsFamily, "unsupported">;

/**
 * Package managers with an implementation under modules/packages.
 */
export type PackageManagerKind = "homebrew" | "yum" | "apt";

/**
 * Snapshot of the machine taken once per run, read-only afterwards.
 */
export interface ProbeResult {
  readonly osFamily: OsFamily;
  readonly distro?: string;
  readonly packageManager: PackageManagerKind | null;
  readonly existingUsers: ReadonlySet<string>;
  readonly userHomes: ReadonlyMap<string, string>;
  /** Directory that new users' home directories are created under. */
  readonly homeBase: string;
  /** Absolute paths of the current user's `~/.ssh/*.pub` files. */
  readonly sshPublicKeys: ReadonlySet<string>;
  readonly isRoot: boolean;
  readonly currentUser: string;
  readonly homeDir: string;
}

/**
 * Explicit context handed to every action, replacing ambient process state.
 */
export interface RunContext {
  osFamily: OsFamily;
  homeDir: string;
  currentUser: string;
  isRoot: boolean;
  env: Readonly<Record<string, string | undefined>>;
  logger: Logger;
  runner: CommandRunner;
}

export type ActionKind =
  | "bootstrap-package-manager"
  | "install-package"
  | "create-user"
  | "generate-ssh-key"
  | "copy-file"
  | "ensure-lines";

/**
 * Serializable description of an action, used in results and reports.
 */
export interface ActionSummary {
  id: string;
  kind: ActionKind;
  description: string;
  target: string;
  /** User the action is scoped to, when it touches another account's state. */
  user?: string;
}

/**
 * A secret or key the operator needs to copy elsewhere.
 */
export interface Credential {
  label: string;
  text: string;
}

export interface ActionOutcome {
  message?: string;
  credential?: Credential;
}

/**
 * A single idempotent step. `check` answers whether the desired state
 * already holds and is evaluated again at execution time.
 */
export interface Action extends Readonly<ActionSummary> {
  check(ctx: RunContext): Promise<boolean>;
  apply(ctx: RunContext): Promise<ActionOutcome | void>;
  /** Credential worth repeating when the action is skipped. */
  currentCredential?(ctx: RunContext): Promise<Credential | undefined>;
  summary(): ActionSummary;
}

/**
 * Lifecycle states reported through executor hooks.
 */
export type ActionStatus = "pending" | "running" | "applied" | "skipped" | "failed";

export type ExecutionStatus = Extract<ActionStatus, "applied" | "skipped" | "failed">;

interface ExecutionResultBase {
  action: ActionSummary;
  durationMs: number;
}

export type ExecutionResult =
  | (ExecutionResultBase & {
      status: "applied";
      message?: string;
      credential?: Credential;
    })
  | (ExecutionResultBase & { status: "skipped"; credential?: Credential })
  | (ExecutionResultBase & { status: "failed"; reason: string; fatal: boolean });

export interface FailureRecord {
  description: string;
  reason: string;
  fatal: boolean;
}

/**
 * Aggregated outcome of one run.
 */
export interface RunSummary {
  applied: number;
  skipped: number;
  failed: number;
  /** Actions left unexecuted because a fatal failure aborted the run. */
  notRun: number;
  aborted: boolean;
  failures: FailureRecord[];
  credentials: Credential[];
}

/**
 * A planned action paired with its current precondition state.
 */
export interface PlannedAction {
  action: ActionSummary;
  state: "satisfied" | "pending";
}
