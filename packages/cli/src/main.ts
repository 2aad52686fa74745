#!/usr/bin/env node
import path from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";
import { defineCommand, runCommand, runMain } from "citty";
import { errorHint } from "@outpostctl/core/lib/runtime/errors";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { baseCommands } from "./commands/registry.js";
import { readCliVersion } from "./lib/version.js";

export const main = defineCommand({
  meta: {
    name: "outpostctl",
    version: readCliVersion(),
    description: "Provision an EC2 instance (optionally on an Outpost) with the Cockpit web console, and manage it.",
  },
  subCommands: baseCommands,
});

const USAGE_FLAGS = new Set(["--help", "-h", "--version", "-v"]);

/** Help and version go through citty's usage renderer; everything else propagates errors to the caller. */
export function wantsUsage(rawArgs: readonly string[]): boolean {
  return rawArgs.length === 0 || rawArgs.some((arg) => USAGE_FLAGS.has(arg));
}

export async function mainEntry(rawArgs: string[] = process.argv.slice(2)): Promise<void> {
  const normalized = rawArgs.filter((arg) => arg !== "--");
  if (normalized.includes("--version") || normalized.includes("-v")) {
    console.log(readCliVersion());
    return;
  }
  if (wantsUsage(normalized)) {
    await runMain(main, { rawArgs: normalized });
    return;
  }
  await runCommand(main, { rawArgs: normalized });
}

function shouldRunMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  const entryUrl = pathToFileURL(path.resolve(entry)).href;
  return entryUrl === import.meta.url;
}

export function reportError(err: unknown, env: NodeJS.ProcessEnv = process.env, print: (line: string) => void = console.error): void {
  print(formatUnknown(err, "unknown error"));
  const hint = errorHint(err);
  if (hint) print(`hint: ${hint}`);
  if (env.OUTPOSTCTL_DEBUG === "1" && err instanceof Error && err.stack) print(err.stack);
}

if (shouldRunMain()) {
  void mainEntry().catch((err: unknown) => {
    reportError(err);
    process.exitCode = 1;
  });
}
