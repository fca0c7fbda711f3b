import { promises as fs } from 'node:fs';
import path from 'node:path';

function errnoCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return errnoCode(error) === 'ENOENT';
}

export function isPermissionError(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'EACCES' || code === 'EPERM' || code === 'EROFS';
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads a file, returning null when it does not exist. Other errors propagate.
 */
export async function readFileIfExists(p: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(p);
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
}

/**
 * Creates a directory and its parents. Returns the first directory that had
 * to be created, or undefined when it already existed.
 */
export async function ensureDir(dir: string, mode?: number): Promise<string | undefined> {
  return fs.mkdir(dir, { recursive: true, mode });
}

function rand(): string {
  return Math.random().toString(16).slice(2);
}

export function tmpPathForTarget(targetAbs: string): string {
  return `${targetAbs}.tmp.${rand()}`;
}

/**
 * Writes a file through a temp sibling and a rename so readers never see a
 * partial file.
 */
export async function writeFileAtomic(target: string, content: Buffer | string, mode?: number): Promise<void> {
  const tmp = tmpPathForTarget(target);
  try {
    await fs.writeFile(tmp, content);
    if (mode !== undefined) await fs.chmod(tmp, mode);
    await fs.rename(tmp, target);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

/**
 * Lists files in a directory whose names end with the given suffix,
 * as absolute sorted paths. A missing directory yields an empty list.
 */
export async function listFilesWithSuffix(dir: string, suffix: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    if (isNotFoundError(error)) return [];
    throw error;
  }
  return names
    .filter((name) => name.endsWith(suffix))
    .sort()
    .map((name) => path.join(dir, name));
}

/**
 * Permission bits of a path, or null when it does not exist.
 */
export async function fileMode(p: string): Promise<number | null> {
  try {
    const st = await fs.stat(p);
    return st.mode & 0o7777;
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
}
