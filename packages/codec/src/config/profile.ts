/**
 * Layered JSON config for codec runs.
 *
 * `base.json` is a full CodecProfile; named profiles under `profiles/`
 * extend the base (or another profile) with partial overrides that
 * deep-merge on top. Every file is validated with zod.
 */

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import type { ReadOptions } from "../reader/index.js";
import type { WriteOptions } from "../writer/index.js";
import { WORKAROUND_NAMES, resolveWorkarounds } from "../workarounds.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const CodecProfileSchema = z
  .object({
    /** Workaround flag names, e.g. `workaround-sumo` */
    workarounds: z.array(z.enum(WORKAROUND_NAMES)),
    input: z
      .object({
        validate: z.boolean(),
        verbose: z.boolean(),
      })
      .strict(),
    output: z
      .object({
        indent: z.string().regex(/^[ \t]*$/, "indent may only contain spaces and tabs"),
        verbose: z.boolean(),
      })
      .strict(),
  })
  .strict();

const PROFILE_NAME = /^[a-z0-9][a-z0-9-]*$/;

export const ProfileFileSchema = z
  .object({
    name: z.string().regex(PROFILE_NAME, "profile names are lowercase kebab-case"),
    description: z.string(),
    /** "base" or the name of another profile */
    extends: z.string().regex(PROFILE_NAME),
    overrides: CodecProfileSchema.deepPartial(),
  })
  .strict();

export type CodecProfile = z.infer<typeof CodecProfileSchema>;
export type ProfileFile = z.infer<typeof ProfileFileSchema>;

export interface ProfileInfo {
  name: string;
  description: string;
  extends: string;
}

export type LoadedProfile = CodecProfile & { _profile: ProfileInfo };

export class ConfigError extends Error {
  /** File (or other source) the bad config came from */
  readonly source: string;

  constructor(message: string, source: string) {
    super(message);
    this.name = "ConfigError";
    this.source = source;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, source: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${source}: ${details}`, source);
  }
  return result.data;
}

export function parseBaseProfile(value: unknown, source: string): CodecProfile {
  return validate(CodecProfileSchema, value, source);
}

export function parseProfileFile(value: unknown, source: string): ProfileFile {
  return validate(ProfileFileSchema, value, source);
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Leaf-level deep merge: source values override target values, arrays replace. */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    const tgtVal = target[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const moduleDir = dirname(fileURLToPath(import.meta.url));

/**
 * Walk up directories to find `configs/codec/`.
 * Works from both source (packages/codec/src/config/) and compiled paths.
 */
export function findConfigsRoot(): string {
  let dir = moduleDir;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "codec");
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return join(resolve(moduleDir, "..", "..", "..", ".."), "configs", "codec");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

function readJson(filePath: string): unknown {
  if (!existsSync(filePath)) throw new ConfigError(`Config file not found: ${filePath}`, filePath);
  const raw = readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Malformed JSON in ${filePath}: ${reason}`, filePath);
  }
}

export function loadBaseProfile(configsRoot: string = findConfigsRoot()): CodecProfile {
  const filePath = join(configsRoot, "base.json");
  return parseBaseProfile(readJson(filePath), filePath);
}

/** Load a profile, merging its overrides on top of whatever it extends. */
export function loadProfile(name: string, configsRoot: string = findConfigsRoot()): LoadedProfile {
  const chain: ProfileFile[] = [];
  let current = name;
  while (current !== "base") {
    if (!PROFILE_NAME.test(current)) {
      throw new ConfigError(`Invalid profile name "${current}"`, configsRoot);
    }
    if (chain.some((profile) => profile.name === current)) {
      throw new ConfigError(`Profile "${name}" extends itself through "${current}"`, configsRoot);
    }
    const filePath = join(configsRoot, "profiles", `${current}.json`);
    const profile = parseProfileFile(readJson(filePath), filePath);
    if (profile.name !== current) {
      throw new ConfigError(`Profile file declares name "${profile.name}", expected "${current}"`, filePath);
    }
    chain.push(profile);
    current = profile.extends;
  }

  let merged: Record<string, unknown> = loadBaseProfile(configsRoot);
  for (const profile of [...chain].reverse()) {
    merged = deepMerge(merged, profile.overrides);
  }
  const resolved = parseBaseProfile(merged, join(configsRoot, "profiles", `${name}.json`));

  const own = chain[0];
  const info: ProfileInfo = own
    ? { name: own.name, description: own.description, extends: own.extends }
    : { name: "base", description: "Base profile", extends: "base" };
  return { ...resolved, _profile: info };
}

/** List available profiles; malformed files are reported and skipped. */
export function listProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const profiles: ProfileInfo[] = [];
  for (const file of readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort()) {
    try {
      const parsed = parseProfileFile(readJson(join(profilesDir, file)), file);
      profiles.push({ name: parsed.name, description: parsed.description, extends: parsed.extends });
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      console.warn(`[config] Skipping ${file}: ${err.message}`);
    }
  }
  return profiles;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export function profileToOptions(profile: CodecProfile): { read: ReadOptions; write: WriteOptions } {
  const workarounds = resolveWorkarounds(profile.workarounds);
  return {
    read: { workarounds, validate: profile.input.validate, verbose: profile.input.verbose },
    write: { indent: profile.output.indent, verbose: profile.output.verbose },
  };
}
