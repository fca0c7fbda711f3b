import {
  PackageManager,
  type PackageManagerConfig,
  type PackageSpec,
} from "../../core/package-manager.js";
import { shellQuote, type CommandOutput } from "../../lib/exec.js";
import type { RunContext } from "../../core/types.js";

// Apple Silicon and Intel prefixes; the installer adds neither to PATH
const HOMEBREW_BIN_DIRS = ["/opt/homebrew/bin", "/usr/local/bin"];
const DEFAULT_PATH = "/usr/bin:/bin:/usr/sbin:/sbin";

const HOMEBREW_INSTALL_SCRIPT =
  '/bin/bash -c "$(curl -fsSL https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh)"';

/**
 * Homebrew package manager implementation for macOS.
 * Installs missing formulas and upgrades ones present at a non-matching version.
 */
class HomebrewPackageManager extends PackageManager {
  protected config: PackageManagerConfig = {
    kind: "homebrew",
    name: "Homebrew",
    command: "brew",
    installCommand: "brew install",
    osFamilies: ["macos"],
    requiresSudo: false,
    env: { HOMEBREW_NO_AUTO_UPDATE: "1" },
    refreshCommand: "brew update",
    cleanupCommand: "brew cleanup",
  };

  protected commandEnv(ctx: RunContext): Record<string, string> {
    const PATH = [...HOMEBREW_BIN_DIRS, ctx.env.PATH || DEFAULT_PATH].join(":");
    return { ...this.config.env, PATH };
  }

  get canBootstrap(): boolean {
    return true;
  }

  /**
   * Installs the Apple command line tools when missing, then Homebrew itself.
   * Both installers prompt, so they run attached to the terminal.
   */
  async bootstrap(ctx: RunContext): Promise<void> {
    const hasCommandLineTools = await ctx.runner
      .run("xcode-select -p")
      .then(() => true)
      .catch(() => false);
    if (!hasCommandLineTools) {
      ctx.logger.info({ packageManager: this.kind }, "Installing Apple command line tools...");
      await ctx.runner.run("xcode-select --install", { interactive: true });
    }
    ctx.logger.info({ packageManager: this.kind }, "Installing Homebrew...");
    await ctx.runner.run(HOMEBREW_INSTALL_SCRIPT, { interactive: true });
  }

  protected queryCommand(name: string): string {
    return `brew ls --versions ${shellQuote(name)}`;
  }

  /**
   * `brew ls --versions` prints "<name> <v1> <v2>..."; the newest is last.
   */
  protected parseVersion(_name: string, stdout: string): string | null {
    const fields = stdout.trim().split(/\s+/).filter(Boolean);
    if (fields.length < 2) return null;
    return fields[fields.length - 1];
  }

  /**
   * Homebrew cannot pin arbitrary versions, so an installed formula that misses
   * its constraint is upgraded. Versioned formulas are named directly (`go@1.21`).
   */
  async install(ctx: RunContext, spec: PackageSpec): Promise<CommandOutput> {
    if ((await this.installedVersion(ctx, spec.name)) !== null) {
      return this.runPrivileged(ctx, `brew upgrade ${shellQuote(spec.name)}`);
    }
    return super.install(ctx, spec);
  }
}

/**
 * The singleton instance of the HomebrewPackageManager.
 */
export const homebrewPackageManager = new HomebrewPackageManager();
