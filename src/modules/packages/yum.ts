import {
  PackageManager,
  type PackageManagerConfig,
  type PackageSpec,
} from "../../core/package-manager.js";
import { shellQuote } from "../../lib/exec.js";

/**
 * YUM package manager implementation for RHEL/Amazon Linux/Fedora.
 * Installed versions come from rpm, which yum shares its database with.
 */
class YumPackageManager extends PackageManager {
  protected config: PackageManagerConfig = {
    kind: "yum",
    name: "YUM",
    command: "yum",
    installCommand: "yum install",
    osFamilies: ["linux"],
    requiresSudo: true,
    installFlags: ["-y"],
    refreshCommand: "yum makecache",
    cleanupCommand: "yum clean all",
  };

  /**
   * `--whatprovides` also resolves virtual names yum installs by
   * (`vim` is provided by `vim-enhanced`) and still matches plain names.
   */
  protected queryCommand(name: string): string {
    return `rpm -q --whatprovides --queryformat '%{VERSION}\\n' ${shellQuote(name)}`;
  }

  // One line per providing package; several versions may be installed side by side
  protected parseVersion(_name: string, stdout: string): string | null {
    const first = stdout.split("\n").map((line) => line.trim()).find(Boolean);
    return first ?? null;
  }

  protected formatTarget(spec: PackageSpec): string {
    return spec.version ? `${spec.name}-${spec.version}*` : spec.name;
  }
}

/**
 * The singleton instance of the YumPackageManager.
 */
export const yumPackageManager = new YumPackageManager();
