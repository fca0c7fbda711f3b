import { BaseAction } from "../../core/base-action.js";
import type { PackageManager, PackageSpec } from "../../core/package-manager.js";
import type { ActionOutcome, RunContext } from "../../core/types.js";

export class InstallPackageAction extends BaseAction {
  private readonly manager: PackageManager;
  private readonly spec: PackageSpec;

  constructor(manager: PackageManager, spec: PackageSpec) {
    const label = spec.version ? `${spec.name} ${spec.version}` : spec.name;
    super({
      kind: "install-package",
      key: spec.name,
      description: `Install package ${label} (${manager.name})`,
      target: spec.name,
    });
    this.manager = manager;
    this.spec = { ...spec };
  }

  check(ctx: RunContext): Promise<boolean> {
    return this.manager.isSatisfied(ctx, this.spec);
  }

  async apply(ctx: RunContext): Promise<ActionOutcome> {
    this.logProgress(ctx, `Installing ${this.spec.name} with ${this.manager.name}`);
    await this.manager.install(ctx, this.spec);
    const version = await this.manager.installedVersion(ctx, this.spec.name);
    return this.createOutcome(version ? `${this.spec.name} ${version}` : undefined);
  }
}
