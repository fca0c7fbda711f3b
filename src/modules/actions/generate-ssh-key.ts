import { rename, rm } from "node:fs/promises";
import path from "node:path";

import { BaseAction } from "../../core/base-action.js";
import type { ActionOutcome, Credential, RunContext } from "../../core/types.js";
import { shellQuote } from "../../lib/exec.js";
import { ensureDir, listFilesWithSuffix, pathExists, readFileIfExists, tmpPathForTarget } from "../../lib/fs.js";

export type SshKeyType = "ed25519" | "rsa" | "ecdsa";

const PUBLIC_KEY_LINE = /^(?:ssh-[a-z0-9-]+|ecdsa-sha2-[a-z0-9-]+|sk-[a-z0-9@.-]+) [A-Za-z0-9+/]+={0,2}(?: .*)?$/;

/**
 * Reads an OpenSSH public key file. Empty or malformed files count as absent.
 */
export async function readPublicKey(file: string): Promise<string | null> {
  const content = await readFileIfExists(file);
  const line = content?.toString("utf8").trim().split("\n")[0]?.trim();
  return line && PUBLIC_KEY_LINE.test(line) ? line : null;
}

export interface GenerateSshKeyOptions {
  type: SshKeyType;
  /** Absolute path of the private key; the public key sits beside it with `.pub`. */
  keyPath: string;
  comment?: string;
  /** When undefined ssh-keygen prompts the operator for one. */
  passphrase?: string;
  /** Treat any existing public key in the same directory as satisfying the action. */
  onlyIfNoKeys: boolean;
  addToAgent: boolean;
  user?: string;
}

/**
 * Generates an SSH key pair and hands the public half back as a credential
 * so it can be registered with remote services.
 */
export class GenerateSshKeyAction extends BaseAction {
  private readonly options: GenerateSshKeyOptions;

  constructor(options: GenerateSshKeyOptions) {
    super({
      kind: "generate-ssh-key",
      key: options.keyPath,
      description: `Generate ${options.type} SSH key ${options.keyPath}`,
      target: options.keyPath,
      user: options.user,
    });
    this.options = { ...options };
  }

  private get publicKeyPath(): string {
    return `${this.options.keyPath}.pub`;
  }

  async check(_ctx: RunContext): Promise<boolean> {
    return (await this.existingPublicKey()) !== null;
  }

  /**
   * The public key already on disk, so it is reported on every run.
   */
  async currentCredential(_ctx: RunContext): Promise<Credential | undefined> {
    const existing = await this.existingPublicKey();
    return existing ? this.credentialFor(existing.path, existing.text) : undefined;
  }

  async apply(ctx: RunContext): Promise<ActionOutcome> {
    const { keyPath, type, comment, passphrase } = this.options;
    const sshDir = path.dirname(keyPath);
    const createdDir = await ensureDir(sshDir, 0o700);

    if (await pathExists(keyPath)) {
      // Private key without a usable public half: derive it instead of overwriting
      this.logProgress(ctx, `Deriving public key for ${keyPath}`);
      await this.derivePublicKey(ctx);
    } else {
      this.logProgress(ctx, `Generating ${type} key ${keyPath}`);
      const args = ["ssh-keygen", "-t", type];
      if (type === "rsa") args.push("-b", "4096");
      if (comment !== undefined) args.push("-C", shellQuote(comment));
      args.push("-f", shellQuote(keyPath));
      if (passphrase !== undefined) args.push("-N", shellQuote(passphrase));
      await ctx.runner.run(args.join(" "), { interactive: passphrase === undefined });
    }

    if (createdDir) {
      await this.chownForUser(ctx, [createdDir], true);
    } else {
      await this.chownForUser(ctx, [keyPath, this.publicKeyPath]);
    }

    await this.addToAgent(ctx);

    const text = await readPublicKey(this.publicKeyPath);
    if (text === null) this.fail(`ssh-keygen left no valid public key at ${this.publicKeyPath}`);
    return this.createOutcome(`generated ${this.publicKeyPath}`, this.credentialFor(this.publicKeyPath, text));
  }

  private async existingPublicKey(): Promise<{ path: string; text: string } | null> {
    const own = await readPublicKey(this.publicKeyPath);
    if (own !== null) return { path: this.publicKeyPath, text: own };
    if (!this.options.onlyIfNoKeys) return null;
    for (const file of await listFilesWithSuffix(path.dirname(this.options.keyPath), ".pub")) {
      const text = await readPublicKey(file);
      if (text !== null) return { path: file, text };
    }
    return null;
  }

  private credentialFor(file: string, text: string): Credential {
    return { label: `SSH public key ${file}`, text };
  }

  /**
   * Writes the derived key beside its target and renames it into place only
   * once ssh-keygen succeeded, so a failed derivation leaves nothing behind.
   */
  private async derivePublicKey(ctx: RunContext): Promise<void> {
    const { keyPath, passphrase } = this.options;
    const tmp = tmpPathForTarget(this.publicKeyPath);
    const args = ["ssh-keygen", "-y"];
    if (passphrase !== undefined) args.push("-P", shellQuote(passphrase));
    args.push("-f", shellQuote(keyPath));
    try {
      await ctx.runner.run(`${args.join(" ")} > ${shellQuote(tmp)}`, { interactive: passphrase === undefined });
      if ((await readPublicKey(tmp)) === null) this.fail(`ssh-keygen derived no public key from ${keyPath}`);
      await rename(tmp, this.publicKeyPath);
    } finally {
      await rm(tmp, { force: true });
    }
  }

  /**
   * Loads the key into an already running agent. The agent is optional, so
   * failures are logged rather than failing the action.
   */
  private async addToAgent(ctx: RunContext): Promise<void> {
    if (!this.options.addToAgent || !ctx.env.SSH_AUTH_SOCK) return;
    if (this.user && this.user !== ctx.currentUser) return;
    try {
      await ctx.runner.run(`ssh-add ${shellQuote(this.options.keyPath)}`, {
        interactive: this.options.passphrase === undefined,
      });
    } catch (error) {
      this.logWarning(ctx, error, "Could not add key to ssh-agent");
    }
  }
}
