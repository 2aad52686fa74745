import path from "node:path";
import process from "node:process";
import { loadSettings, type LoadedSettings } from "@outpostctl/core/lib/config/settings";
import { createAwsFleetProvider } from "@outpostctl/core/lib/fleet/aws/index";
import type { FleetProvider } from "@outpostctl/core/lib/fleet/types";
import { createLogger, parseLogLevel, type Logger, type LogLevel } from "@outpostctl/core/lib/logging/logger";
import { PreconditionError } from "@outpostctl/core/lib/runtime/errors";
import { resolveRunRecord, type RunRecord } from "@outpostctl/core/lib/storage/run-records";
import { sshTarget } from "@outpostctl/core/lib/provision/remote";
import type { SshConnectOptions } from "@outpostctl/core/lib/security/ssh-remote";

export const commonArgs = {
  runtimeDir: { type: "string", description: "Runtime directory (default: .outpostctl)." },
  envFile: { type: "string", description: "Settings file (default: <runtimeDir>/env)." },
} as const;

export const runArg = {
  run: { type: "string", description: "Run id (default: most recent run)." },
} as const;

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return parseLogLevel(env.OUTPOSTCTL_LOG_LEVEL, "info");
}

export function createCliLogger(params: { logFilePath?: string } = {}): Logger {
  return createLogger({ name: "outpostctl", level: resolveLogLevel(), console: 2, logFilePath: params.logFilePath });
}

export function loadCliSettings(args: { runtimeDir?: string; envFile?: string }): LoadedSettings {
  return loadSettings({ cwd: process.cwd(), runtimeDir: args.runtimeDir, envFile: args.envFile });
}

export function providerFor(loaded: LoadedSettings, region?: string): FleetProvider {
  const { settings } = loaded;
  return createAwsFleetProvider({
    region: region ?? settings.region,
    credentials: {
      accessKeyId: settings.aws.accessKeyId,
      secretAccessKey: settings.aws.secretAccessKey,
      sessionToken: settings.aws.sessionToken,
    },
  });
}

export function resolveKeyFile(loaded: LoadedSettings): string | undefined {
  const keyFile = loaded.settings.keyFile;
  return keyFile ? path.resolve(loaded.layout.rootDir, keyFile) : undefined;
}

export type RunContext = {
  loaded: LoadedSettings;
  record: RunRecord;
};

export async function loadRunContext(args: { runtimeDir?: string; envFile?: string; run?: string }): Promise<RunContext> {
  const loaded = loadCliSettings(args);
  const record = await resolveRunRecord(loaded.layout.runsFilePath, args.run);
  return { loaded, record };
}

export function requirePublicIp(record: RunRecord): string {
  if (!record.publicIp) {
    throw new PreconditionError(`run ${record.runId} has no public address recorded`, {
      hint: `check the instance with: outpostctl status --run ${record.runId}`,
    });
  }
  return record.publicIp;
}

export function sshAccess(ctx: RunContext): { target: string; options: SshConnectOptions } {
  const user = ctx.record.sshUser ?? ctx.loaded.settings.sshUser;
  return {
    target: sshTarget(user, requirePublicIp(ctx.record)),
    options: { identityFile: resolveKeyFile(ctx.loaded), acceptNewHostKeys: true, connectTimeoutSec: 10 },
  };
}
