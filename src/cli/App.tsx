import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import Spinner from 'ink-spinner';
import chalk from 'chalk';

import { Engine } from '../core/engine.js';
import { createLogger } from '../core/logger.js';
import { formatSummary } from '../core/reporter.js';
import type { ProbeResult } from '../core/types.js';
import type { CliConfig } from './config.js';
import { formatActionId, formatPlanState, formatStatus } from './status-format.js';

export interface AppProps {
  config: CliConfig;
  /** Receives the process exit code, and the fatal error when there is one. */
  onExit: (code: number, error?: unknown) => void;
}

function describeProbe(probe: ProbeResult): string {
  const distro = probe.distro ? ` (${probe.distro})` : '';
  const manager = probe.packageManager ?? 'none';
  const root = probe.isRoot ? ', running as root' : '';
  return `Detected ${probe.osFamily}${distro}, package manager: ${manager}${root}`;
}

export default function App({ config, onExit }: AppProps) {
  const { exit } = useApp();
  const [lines, setLines] = useState<string[]>([]);
  const [current, setCurrent] = useState<string | null>(null);
  const [done, setDone] = useState(false);

  useEffect(() => {
    const logger = createLogger({
      pretty: config.prettyLogs,
      verbose: config.verbose,
      level: config.verbose ? 'debug' : 'warn',
    });
    const engine = new Engine({
      manifestPath: config.manifestPath,
      verbose: config.verbose,
      refresh: config.refresh,
      cleanup: config.cleanup,
      logger,
      hooks: {
        onActionStatusChange: ({ action, status }) => {
          if (status === 'running') {
            setCurrent(action.description);
          } else if (status !== 'pending') {
            setLines((l) => [...l, `${formatStatus(status)} ${action.description}`]);
          }
        },
      },
    });

    async function run() {
      let code = 0;
      let fatal: unknown;
      try {
        if (config.planOnly) {
          const { probe, planned } = await engine.preview();
          setLines((l) => [...l, chalk.gray(describeProbe(probe)), chalk.gray(`Manifest: ${config.manifestPath}`)]);
          if (planned.length === 0) {
            setLines((l) => [...l, 'Nothing to do']);
          }
          for (const item of planned) {
            setLines((l) => [
              ...l,
              `${formatPlanState(item.state)} ${formatActionId(item.action.id)} ${chalk.gray(item.action.description)}`,
            ]);
          }
        } else {
          const report = await engine.run();
          setLines((l) => [...l, chalk.gray(describeProbe(report.probe)), '', ...formatSummary(report.summary)]);
          code = report.summary.aborted ? 1 : 0;
        }
      } catch (error) {
        fatal = error;
        code = 1;
      } finally {
        setCurrent(null);
        setDone(true);
      }
      onExit(code, fatal);
      exit();
    }
    void run();
  }, [config]);

  return (
    <Box flexDirection="column">
      {lines.map((line, idx) => (
        <Text key={idx}>{line}</Text>
      ))}
      {!done && (
        <Text color="yellow">
          <Spinner type="dots" />{' '}{current ?? 'Probing...'}
        </Text>
      )}
    </Box>
  );
}
