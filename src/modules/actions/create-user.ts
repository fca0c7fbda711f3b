import { BaseAction } from "../../core/base-action.js";
import type { ActionOutcome, RunContext } from "../../core/types.js";
import { shellQuote } from "../../lib/exec.js";

export interface CreateUserOptions {
  name: string;
  groups: string[];
  setPassword: boolean;
  shell?: string;
}

/**
 * Ensures a local account exists and belongs to the requested groups.
 * The password is only prompted for when the account is first created.
 */
export class CreateUserAction extends BaseAction {
  private readonly options: CreateUserOptions;

  constructor(options: CreateUserOptions) {
    const groups = options.groups.length > 0 ? ` (groups: ${options.groups.join(", ")})` : "";
    super({
      kind: "create-user",
      key: options.name,
      description: `Create user ${options.name}${groups}`,
      target: options.name,
      user: options.name,
    });
    this.options = { ...options, groups: [...options.groups] };
  }

  private async exists(ctx: RunContext): Promise<boolean> {
    try {
      await ctx.runner.run(`id -u ${shellQuote(this.options.name)}`);
      return true;
    } catch {
      return false;
    }
  }

  private async missingGroups(ctx: RunContext): Promise<string[]> {
    if (this.options.groups.length === 0) return [];
    const { stdout } = await ctx.runner.run(`id -nG ${shellQuote(this.options.name)}`);
    const current = new Set(stdout.split(/\s+/).filter(Boolean));
    return this.options.groups.filter((group) => !current.has(group));
  }

  async check(ctx: RunContext): Promise<boolean> {
    if (!(await this.exists(ctx))) return false;
    return (await this.missingGroups(ctx)).length === 0;
  }

  async apply(ctx: RunContext): Promise<ActionOutcome> {
    const { name, shell, setPassword } = this.options;
    const created = !(await this.exists(ctx));

    if (created) {
      if (!ctx.isRoot) {
        this.fail(`creating user ${name} requires root; re-run as root`);
      }
      this.logProgress(ctx, `Creating user ${name}`);
      const shellFlag = shell ? ` -s ${shellQuote(shell)}` : "";
      await ctx.runner.run(`useradd -m${shellFlag} ${shellQuote(name)}`);
      if (setPassword) {
        await ctx.runner.run(`passwd ${shellQuote(name)}`, { interactive: true });
      }
    }

    const missing = await this.missingGroups(ctx);
    if (missing.length > 0) {
      if (!ctx.isRoot) {
        this.fail(`adding ${name} to ${missing.join(", ")} requires root; re-run as root`);
      }
      this.logProgress(ctx, `Adding ${name} to ${missing.join(", ")}`);
      await ctx.runner.run(`usermod -aG ${shellQuote(missing.join(","))} ${shellQuote(name)}`);
    }

    return this.createOutcome(created ? `created ${name}` : `updated groups of ${name}`);
  }
}
