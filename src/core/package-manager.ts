import { shellQuote, type CommandOutput, type RunOptions } from '../lib/exec.js';
import type { PackageManagerKind, RunContext, SupportedOsFamily } from './types.js';

export interface PackageManagerConfig {
  kind: PackageManagerKind;
  name: string;
  /** Binary probed with `command -v`. */
  command: string;
  installCommand: string;
  osFamilies: SupportedOsFamily[];
  requiresSudo?: boolean;
  installFlags?: string[];
  env?: Record<string, string>;
  /** Refreshes package metadata (`brew update`, `apt-get update`). */
  refreshCommand?: string;
  /** Drops caches and stale downloads (`brew cleanup`). */
  cleanupCommand?: string;
}

export interface PackageSpec {
  name: string;
  version?: string;
}

/**
 * True when an installed version satisfies a prefix constraint
 * ("1.21" accepts "1.21.5" but not "1.2").
 */
export function versionSatisfies(installed: string, constraint: string | undefined): boolean {
  if (!constraint) return true;
  if (installed === constraint) return true;
  return installed.startsWith(constraint) && /^[.\-+_~]/.test(installed.slice(constraint.length));
}

/**
 * Generic package manager driven by a command configuration. Subclasses
 * supply how installed versions are queried and how versioned targets are named.
 */
export abstract class PackageManager {
  protected abstract config: PackageManagerConfig;

  get kind(): PackageManagerKind {
    return this.config.kind;
  }

  get name(): string {
    return this.config.name;
  }

  supports(osFamily: string): boolean {
    return this.config.osFamilies.some((family) => family === osFamily);
  }

  /**
   * Whether the manager can be installed by this tool when missing.
   */
  get canBootstrap(): boolean {
    return false;
  }

  async isAvailable(ctx: RunContext): Promise<boolean> {
    try {
      await ctx.runner.run(`command -v ${this.config.command}`, { env: this.commandEnv(ctx) });
      return true;
    } catch {
      return false;
    }
  }

  async refresh(ctx: RunContext): Promise<void> {
    if (this.config.refreshCommand) await this.runPrivileged(ctx, this.config.refreshCommand);
  }

  async cleanup(ctx: RunContext): Promise<void> {
    if (this.config.cleanupCommand) await this.runPrivileged(ctx, this.config.cleanupCommand);
  }

  async bootstrap(_ctx: RunContext): Promise<void> {
    throw new Error(`${this.config.name} cannot be installed automatically`);
  }

  /**
   * Returns the installed version of a package, or null when it is absent.
   */
  async installedVersion(ctx: RunContext, name: string): Promise<string | null> {
    try {
      const { stdout } = await ctx.runner.run(this.queryCommand(name), { env: this.commandEnv(ctx) });
      return this.parseVersion(name, stdout);
    } catch {
      return null;
    }
  }

  async isSatisfied(ctx: RunContext, spec: PackageSpec): Promise<boolean> {
    const installed = await this.installedVersion(ctx, spec.name);
    if (installed === null) return false;
    return versionSatisfies(installed, spec.version);
  }

  async install(ctx: RunContext, spec: PackageSpec): Promise<CommandOutput> {
    return this.runPrivileged(ctx, this.installCommandFor(spec));
  }

  protected abstract queryCommand(name: string): string;

  protected parseVersion(_name: string, stdout: string): string | null {
    const version = stdout.trim();
    return version === '' ? null : version;
  }

  protected formatTarget(spec: PackageSpec): string {
    return spec.name;
  }

  protected installCommandFor(spec: PackageSpec): string {
    const flags = this.config.installFlags?.join(' ') ?? '';
    return [this.config.installCommand, flags, shellQuote(this.formatTarget(spec))]
      .filter(Boolean)
      .join(' ');
  }

  /**
   * Environment for the manager's own commands, merged over the runner's.
   */
  protected commandEnv(_ctx: RunContext): Record<string, string> | undefined {
    return this.config.env;
  }

  protected runPrivileged(ctx: RunContext, command: string, options: RunOptions = {}): Promise<CommandOutput> {
    const full = this.config.requiresSudo && !ctx.isRoot ? `sudo ${command}` : command;
    return ctx.runner.run(full, { ...options, env: { ...this.commandEnv(ctx), ...options.env } });
  }
}
