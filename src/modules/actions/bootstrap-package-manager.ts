import { BaseAction } from "../../core/base-action.js";
import type { PackageManager } from "../../core/package-manager.js";
import type { ActionOutcome, RunContext } from "../../core/types.js";

/**
 * Installs the package manager itself when the probe found none.
 */
export class BootstrapPackageManagerAction extends BaseAction {
  private readonly manager: PackageManager;

  constructor(manager: PackageManager) {
    super({
      kind: "bootstrap-package-manager",
      key: manager.kind,
      description: `Install ${manager.name} package manager`,
      target: manager.kind,
    });
    this.manager = manager;
  }

  check(ctx: RunContext): Promise<boolean> {
    return this.manager.isAvailable(ctx);
  }

  async apply(ctx: RunContext): Promise<ActionOutcome> {
    this.logProgress(ctx, `Installing ${this.manager.name}...`);
    await this.manager.bootstrap(ctx);
    return this.createOutcome(`${this.manager.name} installed`);
  }
}
