import os from 'node:os';
import type { Logger } from 'pino';

import { BUNDLED_MANIFEST_PATH } from '../lib/paths.js';
import { ShellCommandRunner, type CommandRunner } from '../lib/exec.js';
import { getPackageManager } from '../modules/packages/index.js';
import { errorMessage } from './errors.js';
import { executeAll, type ExecutorHooks } from './executor.js';
import { createLogger } from './logger.js';
import { loadManifest, type Manifest } from './manifest.js';
import { plan } from './planner.js';
import { probe, type ProbeOptions } from './probe.js';
import { report } from './reporter.js';
import type { Action, PlannedAction, ProbeResult, RunContext, RunSummary } from './types.js';

export interface EngineOptions {
  manifestPath?: string;
  verbose?: boolean;
  prettyLogs?: boolean;
  logger?: Logger;
  runner?: CommandRunner;
  /** Overrides for values otherwise read from the running process. */
  probe?: Partial<Omit<ProbeOptions, 'runner' | 'logger'>>;
  hooks?: ExecutorHooks;
  /** Refresh package metadata before installing anything. */
  refresh?: boolean;
  /** Clean package caches after a run that did not abort. */
  cleanup?: boolean;
}

type Maintenance = 'refresh' | 'cleanup';

export interface RunReport {
  probe: ProbeResult;
  actions: Action[];
  summary: RunSummary;
}

/**
 * Wires probe → plan → execute → report. All process state is captured once,
 * in the constructor, and handed down explicitly.
 */
export class Engine {
  private readonly manifestPath: string;
  private readonly logger: Logger;
  private readonly runner: CommandRunner;
  private readonly probeOptions: ProbeOptions;
  private readonly hooks?: ExecutorHooks;
  private readonly maintenance: ReadonlySet<Maintenance>;

  constructor(options: EngineOptions = {}) {
    this.manifestPath = options.manifestPath ?? BUNDLED_MANIFEST_PATH;
    this.logger =
      options.logger ?? createLogger({ pretty: options.prettyLogs ?? true, verbose: options.verbose ?? false });
    const env = options.probe?.env ?? process.env;
    this.runner = options.runner ?? new ShellCommandRunner({ verbose: options.verbose ?? false, env });
    this.probeOptions = {
      platform: options.probe?.platform ?? os.platform(),
      homeDir: options.probe?.homeDir ?? os.homedir(),
      username: options.probe?.username ?? os.userInfo().username,
      uid: options.probe && 'uid' in options.probe ? options.probe.uid : process.getuid?.(),
      env,
      passwdPath: options.probe?.passwdPath,
      osReleasePath: options.probe?.osReleasePath,
      homeBase: options.probe?.homeBase,
      runner: this.runner,
      logger: this.logger,
    };
    this.hooks = options.hooks;
    const maintenance = new Set<Maintenance>();
    if (options.refresh) maintenance.add('refresh');
    if (options.cleanup) maintenance.add('cleanup');
    this.maintenance = maintenance;
  }

  buildContext(probeResult: ProbeResult): RunContext {
    return {
      osFamily: probeResult.osFamily,
      homeDir: probeResult.homeDir,
      currentUser: probeResult.currentUser,
      isRoot: probeResult.isRoot,
      env: this.probeOptions.env,
      logger: this.logger,
      runner: this.runner,
    };
  }

  probe(): Promise<ProbeResult> {
    return probe(this.probeOptions);
  }

  async loadManifest(): Promise<Manifest> {
    const manifest = await loadManifest(this.manifestPath);
    this.logger.debug({ manifest: this.manifestPath, entries: manifest.entries.length }, 'Loaded manifest');
    return manifest;
  }

  async plan(): Promise<{ probe: ProbeResult; actions: Action[] }> {
    const probeResult = await this.probe();
    const manifest = await this.loadManifest();
    const actions = plan(manifest, probeResult);
    this.logger.info({ actions: actions.length }, 'Planned actions');
    return { probe: probeResult, actions };
  }

  /**
   * Plans and evaluates every precondition without applying anything.
   */
  async preview(): Promise<{ probe: ProbeResult; planned: PlannedAction[] }> {
    const { probe: probeResult, actions } = await this.plan();
    const ctx = this.buildContext(probeResult);
    const planned: PlannedAction[] = [];
    for (const action of actions) {
      const satisfied = await action.check(ctx);
      planned.push({ action: action.summary(), state: satisfied ? 'satisfied' : 'pending' });
    }
    return { probe: probeResult, planned };
  }

  /**
   * Runs the whole pipeline. Platform and manifest errors are thrown before any
   * action executes; action failures end up in the summary.
   */
  async run(): Promise<RunReport> {
    const { probe: probeResult, actions } = await this.plan();
    const ctx = this.buildContext(probeResult);
    if (actions.some((action) => action.kind === 'install-package')) {
      await this.maintain('refresh', probeResult, ctx);
    }
    const execution = await executeAll(actions, ctx, this.hooks);
    if (!execution.aborted) {
      await this.maintain('cleanup', probeResult, ctx);
    }
    const summary = report(execution.results, {
      aborted: execution.aborted,
      notRun: execution.notRun.length,
    });
    this.logger.info(
      { applied: summary.applied, skipped: summary.skipped, failed: summary.failed, aborted: summary.aborted },
      'Run finished',
    );
    return { probe: probeResult, actions, summary };
  }

  /**
   * Runs an opted-in maintenance step on the probed package manager. These
   * steps change no declared state, so a failure is only logged.
   */
  private async maintain(step: Maintenance, probeResult: ProbeResult, ctx: RunContext): Promise<void> {
    if (!this.maintenance.has(step) || !probeResult.packageManager) return;
    const manager = getPackageManager(probeResult.packageManager);
    try {
      await manager[step](ctx);
      this.logger.info({ packageManager: manager.kind }, `Package manager ${step} finished`);
    } catch (error) {
      this.logger.warn({ packageManager: manager.kind, error: errorMessage(error) }, `Package manager ${step} failed`);
    }
  }
}
