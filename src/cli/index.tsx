#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { errorMessage } from '../core/errors.js';
import App from './App.js';
import { resolveCliConfig } from './config.js';

const argv = yargs(hideBin(process.argv))
  .scriptName('groundwork')
  .usage('$0 [options]\n\nProbe the machine, plan, apply and report.')
  .option('manifest', {
    alias: 'm',
    type: 'string',
    describe: 'Manifest file (default: $GROUNDWORK_MANIFEST or the bundled manifest)',
  })
  .option('plan', { type: 'boolean', default: false, describe: 'Show the plan without applying it' })
  .option('verbose', { type: 'boolean', default: false, describe: 'Debug logs and live tool output' })
  .option('refresh', { type: 'boolean', default: false, describe: 'Refresh package metadata before installing' })
  .option('cleanup', { type: 'boolean', default: false, describe: 'Clean package caches after the run' })
  .option('pretty-logs', { type: 'boolean', describe: 'Human readable logs (default: on outside CI)' })
  .example('$0', 'Bootstrap with the bundled manifest')
  .example('$0 --plan -m ./workstation.yaml', 'Preview a custom manifest')
  .strict()
  .help()
  .parseSync();

const config = resolveCliConfig(
  {
    manifest: argv.manifest,
    plan: argv.plan,
    verbose: argv.verbose,
    prettyLogs: argv.prettyLogs,
    refresh: argv.refresh,
    cleanup: argv.cleanup,
  },
  process.env,
  process.cwd(),
);

let exitCode = 0;
let fatalError: unknown;

async function main(): Promise<void> {
  const { waitUntilExit } = render(
    <App
      config={config}
      onExit={(code, error) => {
        exitCode = code;
        fatalError = error;
      }}
    />,
  );
  await waitUntilExit();
  if (fatalError !== undefined) {
    process.stderr.write(`${errorMessage(fatalError)}\n`);
  }
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exitCode = 1;
});
