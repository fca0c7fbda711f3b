import type { PackageManager } from "../../core/package-manager.js";
import type { PackageManagerKind, SupportedOsFamily } from "../../core/types.js";
import { aptPackageManager } from "./apt.js";
import { homebrewPackageManager } from "./homebrew.js";
import { yumPackageManager } from "./yum.js";

export const packageManagers: Record<PackageManagerKind, PackageManager> = {
  homebrew: homebrewPackageManager,
  yum: yumPackageManager,
  apt: aptPackageManager,
};

/**
 * Probe order per OS family; the first available manager wins.
 */
export const packageManagerPreference: Record<SupportedOsFamily, PackageManagerKind[]> = {
  macos: ["homebrew"],
  linux: ["yum", "apt"],
};

export function getPackageManager(kind: PackageManagerKind): PackageManager {
  return packageManagers[kind];
}

export { aptPackageManager, homebrewPackageManager, yumPackageManager };
