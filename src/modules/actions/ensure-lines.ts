import { appendFile } from "node:fs/promises";
import path from "node:path";

import { BaseAction } from "../../core/base-action.js";
import { errorMessage } from "../../core/errors.js";
import type { ActionOutcome, RunContext } from "../../core/types.js";
import { ensureDir, isPermissionError, readFileIfExists } from "../../lib/fs.js";
import { isWithin } from "../../lib/paths.js";

export interface EnsureLinesOptions {
  filePath: string;
  lines: string[];
  user?: string;
}

/**
 * Appends lines to a profile file unless each is already present as a whole line.
 */
export class EnsureLinesAction extends BaseAction {
  private readonly options: EnsureLinesOptions;

  constructor(options: EnsureLinesOptions) {
    const count = options.lines.length;
    super({
      kind: "ensure-lines",
      key: options.filePath,
      description: `Ensure ${count} line${count === 1 ? "" : "s"} in ${options.filePath}`,
      target: options.filePath,
      user: options.user,
    });
    this.options = { ...options, lines: [...options.lines] };
  }

  private async readCurrent(): Promise<string | null> {
    const buffer = await readFileIfExists(this.options.filePath);
    return buffer === null ? null : buffer.toString("utf8");
  }

  private missingLines(content: string | null): string[] {
    const present = new Set((content ?? "").split("\n").map((line) => line.trimEnd()));
    return this.options.lines.filter((line) => !present.has(line.trimEnd()));
  }

  async check(_ctx: RunContext): Promise<boolean> {
    return this.missingLines(await this.readCurrent()).length === 0;
  }

  async apply(ctx: RunContext): Promise<ActionOutcome> {
    const { filePath } = this.options;
    const content = await this.readCurrent();
    const missing = this.missingLines(content);
    const separator = content && !content.endsWith("\n") ? "\n" : "";
    let createdDir: string | undefined;
    try {
      createdDir = await ensureDir(path.dirname(filePath));
      await appendFile(filePath, `${separator}${missing.join("\n")}\n`, "utf8");
    } catch (error) {
      if (isPermissionError(error) && isWithin(filePath, ctx.homeDir)) {
        this.fail(`no write permission in home directory: ${errorMessage(error)}`, { fatal: true });
      }
      throw error;
    }

    if (createdDir) {
      await this.chownForUser(ctx, [createdDir], true);
    } else if (content === null) {
      await this.chownForUser(ctx, [filePath]);
    }
    this.logProgress(ctx, `Appended ${missing.length} line(s) to ${filePath}`);
    return this.createOutcome(`appended ${missing.length} line(s)`);
  }
}
