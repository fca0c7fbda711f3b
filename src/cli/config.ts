import path from 'node:path';

import { BUNDLED_MANIFEST_PATH } from '../lib/paths.js';

export interface CliFlags {
  manifest?: string;
  plan?: boolean;
  verbose?: boolean;
  prettyLogs?: boolean;
  refresh?: boolean;
  cleanup?: boolean;
}

export interface CliConfig {
  manifestPath: string;
  planOnly: boolean;
  verbose: boolean;
  prettyLogs: boolean;
  refresh: boolean;
  cleanup: boolean;
  isCI: boolean;
}

function envFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

/**
 * Resolves CLI configuration once: flags win over environment variables,
 * which win over built-in defaults.
 */
export function resolveCliConfig(
  flags: CliFlags,
  env: Readonly<Record<string, string | undefined>>,
  cwd: string,
): CliConfig {
  const isCI = envFlag(env.CI);
  const manifest = flags.manifest || env.GROUNDWORK_MANIFEST;
  return {
    manifestPath: manifest ? path.resolve(cwd, manifest) : BUNDLED_MANIFEST_PATH,
    planOnly: flags.plan ?? false,
    verbose: (flags.verbose ?? false) || envFlag(env.GROUNDWORK_VERBOSE),
    prettyLogs: flags.prettyLogs ?? !isCI,
    refresh: flags.refresh ?? false,
    cleanup: flags.cleanup ?? false,
    isCI,
  };
}
