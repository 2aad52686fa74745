import fs from "node:fs";
import path from "node:path";

export type RuntimeLayout = {
  rootDir: string;

  // Local runtime dir (gitignored). Defaults to <rootDir>/.outpostctl.
  runtimeDir: string;

  // Operator settings (dotenv). Defaults to <runtimeDir>/env.
  envFilePath: string;

  // Run lookup table keyed by run id.
  runsFilePath: string;

  // Two-line "Instance ID / Public IP" record kept for older tooling.
  legacyRecordPath: string;

  logsDir: string;
};

export function getRuntimeLayout(rootDir: string, runtimeDir?: string): RuntimeLayout {
  const resolvedRuntimeDir = runtimeDir ? path.resolve(rootDir, runtimeDir) : path.join(rootDir, ".outpostctl");
  return {
    rootDir,
    runtimeDir: resolvedRuntimeDir,
    envFilePath: path.join(resolvedRuntimeDir, "env"),
    runsFilePath: path.join(resolvedRuntimeDir, "runs.json"),
    legacyRecordPath: path.join(rootDir, ".last-instance-id"),
    logsDir: path.join(resolvedRuntimeDir, "logs"),
  };
}

export function ensurePrivateRuntimeDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  fs.chmodSync(dir, 0o700);
}
