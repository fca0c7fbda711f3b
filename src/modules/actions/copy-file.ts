import { readFile } from "node:fs/promises";
import path from "node:path";
import Handlebars from "handlebars";

import { BaseAction } from "../../core/base-action.js";
import { errorMessage } from "../../core/errors.js";
import type { ActionOutcome, RunContext } from "../../core/types.js";
import {
  ensureDir,
  fileMode,
  isNotFoundError,
  isPermissionError,
  readFileIfExists,
  writeFileAtomic,
} from "../../lib/fs.js";
import { isWithin } from "../../lib/paths.js";

export interface TemplateVariables {
  homeDir: string;
  user: string;
  osFamily: string;
}

export interface CopyFileOptions {
  /** Absolute path of the bundled source file. */
  source: string;
  /** Absolute destination path. */
  destination: string;
  mode?: number;
  /** Render the source as a Handlebars template before writing. */
  template?: TemplateVariables;
  user?: string;
}

/**
 * Places a dotfile at its destination. Satisfied when the destination
 * already holds the exact desired bytes (and mode, when one is declared).
 */
export class CopyFileAction extends BaseAction {
  private readonly options: CopyFileOptions;

  constructor(options: CopyFileOptions) {
    super({
      kind: "copy-file",
      key: options.destination,
      description: `Copy ${path.basename(options.source)} to ${options.destination}`,
      target: options.destination,
      user: options.user,
    });
    this.options = { ...options };
  }

  /**
   * Bytes the destination should contain, read fresh on every call.
   */
  private async desiredContent(): Promise<Buffer> {
    let raw: Buffer;
    try {
      raw = await readFile(this.options.source);
    } catch (error) {
      if (isNotFoundError(error)) this.fail(`source file not found: ${this.options.source}`);
      throw error;
    }
    if (!this.options.template) return raw;
    const render = Handlebars.compile(raw.toString("utf8"), { noEscape: true, strict: true });
    return Buffer.from(render(this.options.template), "utf8");
  }

  async check(_ctx: RunContext): Promise<boolean> {
    const current = await readFileIfExists(this.options.destination);
    if (current === null) return false;
    if (!current.equals(await this.desiredContent())) return false;
    if (this.options.mode === undefined) return true;
    return (await fileMode(this.options.destination)) === this.options.mode;
  }

  async apply(ctx: RunContext): Promise<ActionOutcome> {
    const { destination, mode } = this.options;
    const content = await this.desiredContent();
    let createdDir: string | undefined;
    try {
      createdDir = await ensureDir(path.dirname(destination));
      // Without a declared mode an existing file keeps its permissions
      await writeFileAtomic(destination, content, mode ?? (await fileMode(destination)) ?? undefined);
    } catch (error) {
      if (isPermissionError(error) && isWithin(destination, ctx.homeDir)) {
        this.fail(`no write permission in home directory: ${errorMessage(error)}`, { fatal: true });
      }
      throw error;
    }

    if (createdDir) {
      await this.chownForUser(ctx, [createdDir], true);
    } else {
      await this.chownForUser(ctx, [destination]);
    }
    this.logProgress(ctx, `Wrote ${destination}`);
    return this.createOutcome(`wrote ${content.length} bytes`);
  }
}
