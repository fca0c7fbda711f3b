import {
  PackageManager,
  type PackageManagerConfig,
  type PackageSpec,
} from "../../core/package-manager.js";
import { shellQuote } from "../../lib/exec.js";

/**
 * APT package manager implementation for Debian/Ubuntu.
 */
class AptPackageManager extends PackageManager {
  protected config: PackageManagerConfig = {
    kind: "apt",
    name: "APT",
    command: "apt-get",
    installCommand: "apt-get install",
    osFamilies: ["linux"],
    requiresSudo: true,
    installFlags: ["-y"],
    refreshCommand: "apt-get update",
    cleanupCommand: "apt-get clean",
    env: { DEBIAN_FRONTEND: "noninteractive" },
  };

  protected queryCommand(name: string): string {
    return `dpkg-query -W -f='\${db:Status-Abbrev} \${Version}' ${shellQuote(name)}`;
  }

  /**
   * dpkg keeps removed packages whose config files remain (`rc`), so only the
   * `ii` state counts as installed.
   */
  protected parseVersion(_name: string, stdout: string): string | null {
    const match = /^(\S+)\s+(\S*)/.exec(stdout.trim());
    if (!match || !match[1].startsWith("ii")) return null;
    // Strip the epoch ("1:9.0.1" -> "9.0.1") so prefix constraints line up
    const version = match[2].replace(/^\d+:/, "");
    return version === "" ? null : version;
  }

  protected formatTarget(spec: PackageSpec): string {
    return spec.version ? `${spec.name}=${spec.version}*` : spec.name;
  }
}

/**
 * The singleton instance of the AptPackageManager.
 */
export const aptPackageManager = new AptPackageManager();
