import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";

import { packageManagerPreference, getPackageManager } from "../modules/packages/index.js";
import type { CommandRunner } from "../lib/exec.js";
import { isNotFoundError, listFilesWithSuffix } from "../lib/fs.js";
import { UnsupportedPlatformError } from "./errors.js";
import { detectDistro, detectOsFamily } from "./platform.js";
import type { PackageManagerKind, ProbeResult, RunContext, SupportedOsFamily } from "./types.js";

/**
 * Everything the probe reads from the process, passed in explicitly.
 */
export interface ProbeOptions {
  platform: NodeJS.Platform;
  homeDir: string;
  username: string;
  /** Effective uid; undefined where the platform has none. */
  uid?: number;
  env: Readonly<Record<string, string | undefined>>;
  runner: CommandRunner;
  logger: Logger;
  passwdPath?: string;
  osReleasePath?: string;
  /** Where new accounts' home directories go; defaults per OS family. */
  homeBase?: string;
}

const HOME_BASE: Record<SupportedOsFamily, string> = {
  linux: "/home",
  macos: "/Users",
};

/**
 * Parses /etc/passwd into user → home directory.
 */
export function parsePasswd(content: string): Map<string, string> {
  const homes = new Map<string, string>();
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const fields = trimmed.split(":");
    if (fields.length < 6 || !fields[0]) continue;
    homes.set(fields[0], fields[5]);
  }
  return homes;
}

async function readLinuxUsers(passwdPath: string): Promise<Map<string, string>> {
  try {
    return parsePasswd(await readFile(passwdPath, "utf8"));
  } catch (error) {
    if (isNotFoundError(error)) return new Map();
    throw error;
  }
}

async function readMacUsers(runner: CommandRunner, homeBase: string): Promise<Map<string, string>> {
  const { stdout } = await runner.run("dscl . -list /Users");
  const homes = new Map<string, string>();
  for (const name of stdout.split("\n").map((l) => l.trim())) {
    // Underscore-prefixed accounts are system services
    if (!name || name.startsWith("_")) continue;
    homes.set(name, path.join(homeBase, name));
  }
  return homes;
}

async function detectPackageManager(
  family: SupportedOsFamily,
  ctx: RunContext,
): Promise<PackageManagerKind | null> {
  for (const kind of packageManagerPreference[family]) {
    const manager = getPackageManager(kind);
    if (manager.supports(family) && (await manager.isAvailable(ctx))) return kind;
  }
  return null;
}

/**
 * Takes a read-only snapshot of the machine.
 * @throws UnsupportedPlatformError when the OS family cannot be bootstrapped.
 */
export async function probe(options: ProbeOptions): Promise<ProbeResult> {
  const osFamily = detectOsFamily(options.platform);
  if (osFamily === "unsupported") {
    throw new UnsupportedPlatformError(options.platform);
  }

  const isRoot = options.uid === 0;
  const ctx: RunContext = {
    osFamily,
    homeDir: options.homeDir,
    currentUser: options.username,
    isRoot,
    env: options.env,
    logger: options.logger,
    runner: options.runner,
  };

  const userHomes =
    osFamily === "linux"
      ? await readLinuxUsers(options.passwdPath ?? "/etc/passwd")
      : await readMacUsers(options.runner, options.homeBase ?? HOME_BASE.macos);
  const sshKeys = await listFilesWithSuffix(path.join(options.homeDir, ".ssh"), ".pub");

  const result: ProbeResult = {
    osFamily,
    distro: osFamily === "linux" ? detectDistro(options.env, options.osReleasePath) : undefined,
    packageManager: await detectPackageManager(osFamily, ctx),
    existingUsers: new Set(userHomes.keys()),
    userHomes,
    homeBase: options.homeBase ?? HOME_BASE[osFamily],
    sshPublicKeys: new Set(sshKeys),
    isRoot,
    currentUser: options.username,
    homeDir: options.homeDir,
  };

  options.logger.info(
    {
      os: result.osFamily,
      distro: result.distro,
      packageManager: result.packageManager,
      users: result.existingUsers.size,
      sshKeys: result.sshPublicKeys.size,
      root: result.isRoot,
    },
    "Probed environment",
  );
  return result;
}
