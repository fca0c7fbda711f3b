import fs from 'node:fs';
import path from 'node:path';

let cachedProjectRoot: string | null = null;

function findProjectRoot(): string {
  if (cachedProjectRoot) return cachedProjectRoot;
  // Walk up from this file until package.json is found (src/lib or dist/src/lib)
  let current = __dirname;
  for (let i = 0; i < 6; i++) {
    if (fs.existsSync(path.join(current, 'package.json'))) {
      cachedProjectRoot = current;
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  cachedProjectRoot = process.cwd();
  return cachedProjectRoot;
}

export const PROJECT_ROOT = findProjectRoot();
export const BUNDLED_MANIFEST_PATH = path.join(PROJECT_ROOT, 'manifests', 'default.yaml');

/**
 * Expands a leading `~` or `~name` against the given home directories.
 * Returns the user the path is scoped to when it names one explicitly.
 */
export function expandHome(
  input: string,
  resolveHome: (user: string | undefined) => string,
): { path: string; user?: string } {
  const match = /^~([^/]*)(?:\/(.*))?$/.exec(input);
  if (!match) return { path: input };
  const user = match[1] || undefined;
  const rest = match[2] ?? '';
  const home = resolveHome(user);
  return { path: rest ? path.join(home, rest) : home, user };
}

/**
 * True when `child` is `parent` or lies beneath it.
 */
export function isWithin(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}
