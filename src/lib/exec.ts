import { exec as nodeExec, spawn } from 'node:child_process';
import { promisify } from 'node:util';

import { GroundworkError } from '../core/errors.js';

const execAsync = promisify(nodeExec);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** Extra environment merged over the runner's base environment. */
  env?: Record<string, string>;
  /**
   * Attach the command to the terminal so it can prompt the operator
   * (passwords, passphrases). Output is not captured.
   */
  interactive?: boolean;
}

/**
 * Executes shell commands on behalf of probes and actions.
 * Rejects with a CommandError when the command exits non-zero.
 */
export interface CommandRunner {
  run(command: string, options?: RunOptions): Promise<CommandOutput>;
}

/**
 * A shell command exited non-zero. The message is the tool's own error
 * text so it can be surfaced verbatim.
 */
export class CommandError extends GroundworkError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stdout: string, stderr: string) {
    super('COMMAND_FAILED', stderr || stdout || `Command failed with exit code ${exitCode ?? 'unknown'}: ${command}`);
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export interface ShellCommandRunnerOptions {
  shell?: string;
  /** Stream captured output to the terminal while it is being collected. */
  verbose?: boolean;
  env?: Record<string, string | undefined>;
}

interface ExecFailure {
  code?: number | string;
  stdout?: string;
  stderr?: string;
  message?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null && ('stderr' in error || 'code' in error);
}

export class ShellCommandRunner implements CommandRunner {
  private readonly shell: string;
  private readonly verbose: boolean;
  private readonly env: Record<string, string | undefined>;

  constructor(options: ShellCommandRunnerOptions = {}) {
    this.shell = options.shell ?? '/bin/sh';
    this.verbose = options.verbose ?? false;
    this.env = options.env ?? process.env;
  }

  async run(command: string, options: RunOptions = {}): Promise<CommandOutput> {
    const env = { ...this.env, ...options.env };

    if (options.interactive || this.verbose) {
      return this.spawnCommand(command, env, options);
    }

    try {
      const { stdout, stderr } = await execAsync(command, {
        cwd: options.cwd,
        env,
        shell: this.shell,
        maxBuffer: 10 * 1024 * 1024,
      });
      return { stdout: String(stdout).trim(), stderr: String(stderr).trim() };
    } catch (error) {
      if (isExecFailure(error)) {
        const exitCode = typeof error.code === 'number' ? error.code : null;
        throw new CommandError(
          command,
          exitCode,
          (error.stdout ?? '').trim(),
          (error.stderr ?? '').trim() || (exitCode === null ? error.message ?? '' : ''),
        );
      }
      throw error;
    }
  }

  private spawnCommand(
    command: string,
    env: Record<string, string | undefined>,
    options: RunOptions,
  ): Promise<CommandOutput> {
    return new Promise<CommandOutput>((resolve, reject) => {
      const child = spawn(this.shell, ['-c', command], {
        cwd: options.cwd,
        env,
        stdio: options.interactive ? 'inherit' : 'pipe',
      });
      let stdoutBuf = '';
      let stderrBuf = '';
      child.stdout?.on('data', (data: Buffer) => {
        const text = data.toString();
        stdoutBuf += text;
        process.stdout.write(text);
      });
      child.stderr?.on('data', (data: Buffer) => {
        const text = data.toString();
        stderrBuf += text;
        process.stderr.write(text);
      });
      child.on('error', (err) => reject(err));
      child.on('close', (code) => {
        const stdout = stdoutBuf.trim();
        const stderr = stderrBuf.trim();
        if (code === 0) {
          resolve({ stdout, stderr });
        } else {
          reject(new CommandError(command, code, stdout, stderr));
        }
      });
    });
  }
}

const SAFE_SHELL_WORD = /^[\w@%+=:,./-]+$/;

/**
 * Quotes a value for interpolation into a POSIX shell command.
 */
export function shellQuote(value: string): string {
  if (value !== '' && SAFE_SHELL_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
