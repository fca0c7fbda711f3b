import path from "node:path";

import { BootstrapPackageManagerAction } from "../modules/actions/bootstrap-package-manager.js";
import { CopyFileAction } from "../modules/actions/copy-file.js";
import { CreateUserAction } from "../modules/actions/create-user.js";
import { EnsureLinesAction } from "../modules/actions/ensure-lines.js";
import { GenerateSshKeyAction } from "../modules/actions/generate-ssh-key.js";
import { InstallPackageAction } from "../modules/actions/install-package.js";
import { getPackageManager, packageManagerPreference } from "../modules/packages/index.js";
import { expandHome } from "../lib/paths.js";
import { InvalidManifestError, UnsupportedPlatformError } from "./errors.js";
import { appliesTo, type Manifest, type ManifestEntry, type PackageEntry } from "./manifest.js";
import type { PackageManager } from "./package-manager.js";
import type { Action, ProbeResult, SupportedOsFamily } from "./types.js";

/**
 * Execution phases; lower runs first, manifest order breaks ties.
 */
const PHASE = {
  bootstrap: 0,
  packages: 1,
  users: 2,
  sshKeys: 3,
  files: 4,
} as const;

type Phase = (typeof PHASE)[keyof typeof PHASE];

interface PhasedAction {
  phase: Phase;
  index: number;
  action: Action;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}

/**
 * Narrows the probed family, rejecting `unsupported` exhaustively.
 */
function supportedFamily(probe: ProbeResult): SupportedOsFamily {
  switch (probe.osFamily) {
    case "linux":
    case "macos":
      return probe.osFamily;
    case "unsupported":
      throw new UnsupportedPlatformError(probe.osFamily);
    default:
      return assertNever(probe.osFamily);
  }
}

/**
 * Home directory of a user: known accounts from the probe, otherwise the
 * platform's home base.
 */
function homeOf(probe: ProbeResult, user: string | undefined): string {
  if (!user || user === probe.currentUser) return probe.homeDir;
  return probe.userHomes.get(user) ?? path.join(probe.homeBase, user);
}

function resolvePath(probe: ProbeResult, input: string, baseDir: string): { path: string; user?: string } {
  const expanded = expandHome(input, (user) => homeOf(probe, user));
  const user = expanded.user && expanded.user !== probe.currentUser ? expanded.user : undefined;
  return { path: path.resolve(baseDir, expanded.path), user };
}

/**
 * Picks the manager packages are installed with. Returns null when nothing
 * is available and nothing can be bootstrapped.
 */
function selectPackageManager(
  probe: ProbeResult,
  family: SupportedOsFamily,
): { manager: PackageManager; bootstrap: boolean } | null {
  if (probe.packageManager) {
    return { manager: getPackageManager(probe.packageManager), bootstrap: false };
  }
  switch (family) {
    case "macos": {
      const manager = getPackageManager(packageManagerPreference.macos[0]);
      return manager.canBootstrap ? { manager, bootstrap: true } : null;
    }
    case "linux":
      return null;
    default:
      return assertNever(family);
  }
}

function planPackages(
  entries: PackageEntry[],
  probe: ProbeResult,
  family: SupportedOsFamily,
  issues: string[],
): PhasedAction[] {
  if (entries.length === 0) return [];
  const selected = selectPackageManager(probe, family);
  if (!selected) {
    issues.push(`packages are declared but no supported package manager was found on ${family}`);
    return [];
  }

  const planned: PhasedAction[] = [];
  if (selected.bootstrap) {
    planned.push({
      phase: PHASE.bootstrap,
      index: -1,
      action: new BootstrapPackageManagerAction(selected.manager),
    });
  }
  entries.forEach((entry, index) => {
    if (entry.manager && entry.manager !== selected.manager.kind) {
      issues.push(
        `package ${entry.name} requires ${entry.manager}, but ${selected.manager.kind} is the package manager on ${family}`,
      );
      return;
    }
    planned.push({
      phase: PHASE.packages,
      index,
      action: new InstallPackageAction(selected.manager, { name: entry.name, version: entry.version }),
    });
  });
  return planned;
}

function planEntry(
  entry: Exclude<ManifestEntry, PackageEntry>,
  index: number,
  manifest: Manifest,
  probe: ProbeResult,
  family: SupportedOsFamily,
  issues: string[],
): PhasedAction | null {
  switch (entry.kind) {
    case "user": {
      if (family !== "linux") {
        issues.push(`user ${entry.name}: user accounts can only be provisioned on linux, not ${family}`);
        return null;
      }
      return {
        phase: PHASE.users,
        index,
        action: new CreateUserAction({
          name: entry.name,
          groups: entry.groups,
          setPassword: entry.setPassword,
          shell: entry.shell,
        }),
      };
    }
    case "ssh-key": {
      const keyInput = entry.path ?? `~${entry.user ?? ""}/.ssh/id_${entry.type}`;
      const resolved = resolvePath(probe, keyInput, manifest.baseDir);
      const user = entry.user && entry.user !== probe.currentUser ? entry.user : resolved.user;
      return {
        phase: PHASE.sshKeys,
        index,
        action: new GenerateSshKeyAction({
          type: entry.type,
          keyPath: resolved.path,
          comment: entry.comment,
          passphrase: entry.passphrase,
          onlyIfNoKeys: entry.onlyIfNoKeys,
          addToAgent: entry.addToAgent,
          user,
        }),
      };
    }
    case "file": {
      const destination = resolvePath(probe, entry.destination, manifest.baseDir);
      const owner = destination.user ?? probe.currentUser;
      return {
        phase: PHASE.files,
        index,
        action: new CopyFileAction({
          source: path.resolve(manifest.baseDir, entry.source),
          destination: destination.path,
          mode: entry.mode,
          template: entry.template
            ? { homeDir: homeOf(probe, owner), user: owner, osFamily: family }
            : undefined,
          user: destination.user,
        }),
      };
    }
    case "lines": {
      const target = resolvePath(probe, entry.path, manifest.baseDir);
      return {
        phase: PHASE.files,
        index,
        action: new EnsureLinesAction({ filePath: target.path, lines: entry.lines, user: target.user }),
      };
    }
    default:
      return assertNever(entry);
  }
}

/**
 * Every user an action is scoped to must exist already or be created by this plan.
 */
function checkUserScopes(actions: Action[], probe: ProbeResult, issues: string[]): void {
  const created = new Set(actions.filter((a) => a.kind === "create-user").map((a) => a.target));
  for (const action of actions) {
    if (!action.user || action.kind === "create-user") continue;
    if (created.has(action.user) || probe.existingUsers.has(action.user)) continue;
    issues.push(`${action.description}: user ${action.user} neither exists nor is declared in the manifest`);
  }
}

function checkDuplicates(actions: Action[], issues: string[]): void {
  const seen = new Set<string>();
  for (const action of actions) {
    if (seen.has(action.id)) {
      issues.push(`${action.description}: declared more than once`);
    }
    seen.add(action.id);
  }
}

/**
 * Turns a manifest into an ordered list of idempotent actions for the probed
 * machine. Pure and deterministic: the same inputs always yield the same sequence.
 * @throws UnsupportedPlatformError when the probe reports an unsupported family.
 * @throws InvalidManifestError when an entry cannot be satisfied on this platform.
 */
export function plan(manifest: Manifest, probe: ProbeResult): Action[] {
  const family = supportedFamily(probe);
  const issues: string[] = [];

  const applicable = manifest.entries.filter((entry) => appliesTo(entry, family));
  const packageEntries = applicable.filter((entry): entry is PackageEntry => entry.kind === "package");

  const phased: PhasedAction[] = [...planPackages(packageEntries, probe, family, issues)];
  applicable.forEach((entry, index) => {
    if (entry.kind === "package") return;
    const planned = planEntry(entry, index, manifest, probe, family, issues);
    if (planned) phased.push(planned);
  });

  const actions = phased
    .sort((a, b) => a.phase - b.phase || a.index - b.index)
    .map((p) => p.action);

  checkUserScopes(actions, probe, issues);
  checkDuplicates(actions, issues);

  if (issues.length > 0) {
    throw new InvalidManifestError(`Manifest cannot be planned on ${family}`, issues);
  }
  return actions;
}
