import { shellQuote } from '../lib/exec.js';
import { ActionFailure, errorMessage } from './errors.js';
import type {
  Action,
  ActionKind,
  ActionOutcome,
  ActionSummary,
  Credential,
  RunContext,
} from './types.js';

export interface BaseActionOptions {
  kind: ActionKind;
  /** Unique within a plan; combined with the kind to form the action id. */
  key: string;
  description: string;
  target: string;
  user?: string;
}

export abstract class BaseAction implements Action {
  public readonly id: string;
  public readonly kind: ActionKind;
  public readonly description: string;
  public readonly target: string;
  public readonly user?: string;

  constructor(options: BaseActionOptions) {
    this.id = `${options.kind}:${options.key}`;
    this.kind = options.kind;
    this.description = options.description;
    this.target = options.target;
    this.user = options.user;
  }

  abstract check(ctx: RunContext): Promise<boolean>;
  abstract apply(ctx: RunContext): Promise<ActionOutcome | void>;

  summary(): ActionSummary {
    const summary: ActionSummary = {
      id: this.id,
      kind: this.kind,
      description: this.description,
      target: this.target,
    };
    if (this.user) summary.user = this.user;
    return summary;
  }

  // Helper methods for common patterns
  protected logProgress(ctx: RunContext, message: string): void {
    ctx.logger.info({ action: this.id }, message);
  }

  protected logWarning(ctx: RunContext, error: unknown, message: string): void {
    ctx.logger.warn({ action: this.id, error: errorMessage(error) }, message);
  }

  protected fail(reason: string, options: { fatal?: boolean } = {}): never {
    throw new ActionFailure(this.summary(), reason, options);
  }

  protected createOutcome(message?: string, credential?: Credential): ActionOutcome {
    const outcome: ActionOutcome = {};
    if (message) outcome.message = message;
    if (credential) outcome.credential = credential;
    return outcome;
  }

  /**
   * Changes ownership of freshly written paths when root writes into another
   * account's home directory.
   */
  protected async chownForUser(ctx: RunContext, paths: string[], recursive = false): Promise<void> {
    if (!this.user || !ctx.isRoot || this.user === ctx.currentUser || paths.length === 0) return;
    const flag = recursive ? ' -R' : '';
    await ctx.runner.run(`chown${flag} ${shellQuote(`${this.user}:`)} ${paths.map(shellQuote).join(' ')}`);
  }
}
