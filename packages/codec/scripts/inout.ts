/**
 * Read an OpenDRIVE file, report what the reader skipped, and write it back.
 * Usage: npx tsx scripts/inout.ts <input.xodr> <output.xodr> [--profile strict|sumo] [--workarounds name,name]
 */
import { readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  CodecError,
  ConfigError,
  describeError,
  enabledWorkarounds,
  isWorkaroundName,
  listProfiles,
  loadProfile,
  profileToOptions,
  readOpenDrive,
  resolveWorkarounds,
  writeOpenDrive,
} from "../src/index.js";
import type { WorkaroundName } from "../src/index.js";

const args = process.argv.slice(2);

function getArgValue(flag: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith(`--${flag}=`)) {
      return arg.slice(flag.length + 3);
    }
    const next = args[i + 1];
    if (arg === `--${flag}` && next !== undefined && !next.startsWith("--")) {
      return next;
    }
  }
  return undefined;
}

/** Positional arguments, skipping flags and their values */
function getPositional(): string[] {
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith("--")) {
      if (!arg.includes("=")) i++;
      continue;
    }
    positional.push(arg);
  }
  return positional;
}

function parseWorkarounds(value: string): WorkaroundName[] {
  const names: WorkaroundName[] = [];
  for (const name of value.split(",").filter((n) => n !== "")) {
    if (!isWorkaroundName(name)) throw new Error(`Unknown workaround "${name}"`);
    names.push(name);
  }
  return names;
}

async function main() {
  const [input, output] = getPositional();
  if (input === undefined || output === undefined) {
    const names = listProfiles().map((p) => p.name);
    console.error("Usage: inout <input.xodr> <output.xodr> [--profile <name>] [--workarounds <names>]");
    console.error(`Profiles: ${names.join(", ")}`);
    process.exit(2);
  }

  const profileName = getArgValue("profile") ?? "strict";
  const profile = loadProfile(profileName);
  const extra = getArgValue("workarounds");
  if (extra !== undefined) {
    profile.workarounds = [...profile.workarounds, ...parseWorkarounds(extra)];
  }
  const { read, write } = profileToOptions(profile);
  const enabled = enabledWorkarounds(resolveWorkarounds(profile.workarounds));

  console.log("=== Profile ===");
  console.log(`[inout] ${profile._profile.name}: ${profile._profile.description}`);
  console.log(`[inout] Workarounds: ${enabled.length > 0 ? enabled.join(", ") : "none"}`);

  console.log("\n=== Read ===");
  const inputPath = resolve(input);
  const bytes = readFileSync(inputPath);
  console.log(`[inout] ${inputPath} (${(bytes.byteLength / 1024).toFixed(1)} KB)`);
  const startRead = performance.now();
  const { document, diagnostics } = readOpenDrive(bytes, read);
  console.log(
    `[inout] ${document.roads.length} roads, ${document.junctions.length} junctions, ` +
      `${document.controllers.length} controllers in ${(performance.now() - startRead).toFixed(0)}ms`,
  );

  console.log("\n=== Diagnostics ===");
  if (diagnostics.length === 0) {
    console.log("[inout] None");
  } else {
    const byKind = new Map<string, number>();
    for (const diagnostic of diagnostics) {
      byKind.set(diagnostic.kind, (byKind.get(diagnostic.kind) ?? 0) + 1);
      console.log(`  ${diagnostic.kind.padEnd(18)} ${diagnostic.path}  ${diagnostic.message}`);
    }
    for (const [kind, count] of byKind) {
      console.log(`[inout] ${kind}: ${count}`);
    }
  }

  console.log("\n=== Write ===");
  const startWrite = performance.now();
  const xml = writeOpenDrive(document, write);
  const outputPath = resolve(output);
  writeFileSync(outputPath, xml);
  console.log(
    `[inout] Wrote ${outputPath} (${(Buffer.byteLength(xml) / 1024).toFixed(1)} KB) ` +
      `in ${(performance.now() - startWrite).toFixed(0)}ms`,
  );
}

main().catch((err) => {
  if (err instanceof CodecError) {
    console.error(`[inout] ${describeError(err)}`);
  } else if (err instanceof ConfigError) {
    console.error(`[inout] ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
