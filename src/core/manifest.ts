import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { errorMessage, InvalidManifestError } from "./errors.js";
import type { SupportedOsFamily } from "./types.js";

const platformsSchema = z.array(z.enum(["linux", "macos"])).min(1).optional();

const nameSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9._@+/-]+$/, "must contain only letters, digits and . _ @ + / -");

const userNameSchema = z
  .string()
  .regex(/^[a-z_][a-z0-9_-]*\$?$/, "must be a valid POSIX user name")
  .max(32);

const modeSchema = z
  .union([
    z.number().int().min(0).max(0o7777),
    z.string().regex(/^0?[0-7]{3,4}$/, "must be an octal mode such as 0600"),
  ])
  .transform((value) => (typeof value === "number" ? value : parseInt(value, 8)));

const packageEntrySchema = z.object({
  kind: z.literal("package"),
  name: nameSchema,
  version: z.string().min(1).optional(),
  manager: z.enum(["homebrew", "yum", "apt"]).optional(),
  platforms: platformsSchema,
});

const userEntrySchema = z.object({
  kind: z.literal("user"),
  name: userNameSchema,
  groups: z.array(userNameSchema).default([]),
  setPassword: z.boolean().default(true),
  shell: z.string().startsWith("/").optional(),
  platforms: platformsSchema,
});

const sshKeyEntrySchema = z.object({
  kind: z.literal("ssh-key"),
  type: z.enum(["ed25519", "rsa", "ecdsa"]).default("ed25519"),
  comment: z.string().optional(),
  path: z.string().min(1).optional(),
  user: userNameSchema.optional(),
  passphrase: z.string().optional(),
  onlyIfNoKeys: z.boolean().default(true),
  addToAgent: z.boolean().default(true),
  platforms: platformsSchema,
});

const fileEntrySchema = z.object({
  kind: z.literal("file"),
  source: z.string().min(1),
  destination: z.string().min(1),
  mode: modeSchema.optional(),
  template: z.boolean().default(false),
  platforms: platformsSchema,
});

const linesEntrySchema = z.object({
  kind: z.literal("lines"),
  path: z.string().min(1),
  lines: z.array(z.string().min(1).refine((line) => !line.includes("\n"), "must be a single line")).min(1),
  platforms: platformsSchema,
});

const entrySchema = z.discriminatedUnion("kind", [
  packageEntrySchema,
  userEntrySchema,
  sshKeyEntrySchema,
  fileEntrySchema,
  linesEntrySchema,
]);

export const manifestSchema = z.object({
  version: z.literal(1),
  entries: z.array(entrySchema).default([]),
});

export type ManifestEntry = z.infer<typeof entrySchema>;
export type PackageEntry = z.infer<typeof packageEntrySchema>;
export type UserEntry = z.infer<typeof userEntrySchema>;
export type SshKeyEntry = z.infer<typeof sshKeyEntrySchema>;
export type FileEntry = z.infer<typeof fileEntrySchema>;
export type LinesEntry = z.infer<typeof linesEntrySchema>;

/**
 * Validated desired-state declarations. `baseDir` anchors relative file sources.
 */
export interface Manifest {
  readonly baseDir: string;
  readonly entries: readonly ManifestEntry[];
}

/**
 * True when an entry applies to the given OS family.
 */
export function appliesTo(entry: { platforms?: SupportedOsFamily[] }, osFamily: string): boolean {
  return !entry.platforms || entry.platforms.some((platform) => platform === osFamily);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validates an already-parsed document.
 * @param baseDir Directory relative `source` paths are resolved against.
 */
export function parseManifest(document: unknown, baseDir: string): Manifest {
  const result = manifestSchema.safeParse(document);
  if (!result.success) {
    throw new InvalidManifestError("Manifest failed validation", formatIssues(result.error));
  }
  return Object.freeze({
    baseDir,
    entries: Object.freeze(result.data.entries.map((entry) => Object.freeze(entry))),
  });
}

/**
 * Reads, parses and validates a YAML manifest file.
 */
export async function loadManifest(manifestPath: string): Promise<Manifest> {
  const absolute = path.resolve(manifestPath);
  let raw: string;
  try {
    raw = await readFile(absolute, "utf8");
  } catch (error) {
    throw new InvalidManifestError(`Cannot read manifest ${absolute}: ${errorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    throw new InvalidManifestError(`Cannot parse manifest ${absolute}: ${errorMessage(error)}`);
  }

  return parseManifest(document, path.dirname(absolute));
}
