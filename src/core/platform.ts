import os from "node:os";
import { readFileSync } from "node:fs";

import type { OsFamily } from "./types.js";

const OS_RELEASE_PATH = "/etc/os-release";

/**
 * Reads a value from /etc/os-release by key (e.g., ID, ID_LIKE).
 * Returns empty string if not found or file is missing.
 */
export function getOsReleaseField(key: string, osReleasePath: string = OS_RELEASE_PATH): string {
  let content: string;
  try {
    content = readFileSync(osReleasePath, "utf8");
  } catch {
    return "";
  }
  const match = content.match(new RegExp(`^${key}=(.*)$`, "m"));
  if (!match) return "";
  // Remove any surrounding quotes
  return match[1].replace(/^['"]|['"]$/g, "").toLowerCase();
}

/**
 * Maps a Node platform string onto the OS families the tool supports.
 * @param platform Defaults to the running process' platform.
 */
export function detectOsFamily(platform: NodeJS.Platform = os.platform()): OsFamily {
  switch (platform) {
    case "darwin":
      return "macos";
    case "linux":
      return "linux";
    default:
      return "unsupported";
  }
}

/**
 * Detects the Linux distribution id (ubuntu, amzn, fedora...), preferring
 * the ID environment hint over /etc/os-release.
 */
export function detectDistro(
  env: Readonly<Record<string, string | undefined>> = {},
  osReleasePath?: string,
): string | undefined {
  const fromEnv = env.ID?.toLowerCase();
  if (fromEnv) return fromEnv;
  return getOsReleaseField("ID", osReleasePath) || undefined;
}
