import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { capture, CommandError, run } from "../runtime/run.js";
import { pathExists } from "../storage/fs-safe.js";

export const DNF_COMMAND_TIMEOUT_MS = 30 * 60_000;
export const HOST_COMMAND_TIMEOUT_MS = 10 * 60_000;

export interface HostSystem {
  /** Runs a command; rejects with `CommandError` on a non-zero exit. */
  exec(cmd: string, args: string[], opts?: { input?: string; timeoutMs?: number }): Promise<string>;
  /** Exit status 0 → true, any other exit status → false. Spawn failures reject. */
  succeeds(cmd: string, args: string[]): Promise<boolean>;
  isActive(unit: string): Promise<boolean>;
  userExists(name: string): Promise<boolean>;
  writeFile(filePath: string, contents: string, mode?: number): Promise<void>;
  pathExists(filePath: string): Promise<boolean>;
}

export interface PackageInstaller {
  isInstalled(name: string): Promise<boolean>;
  install(specs: string[]): Promise<void>;
  update(): Promise<void>;
}

export function createLocalHost(params: { logger: Logger; env?: NodeJS.ProcessEnv }): HostSystem {
  const host: HostSystem = {
    async exec(cmd, args, opts = {}) {
      params.logger.debug({ cmd, args }, "exec");
      if (opts.input !== undefined) {
        await run(cmd, args, { env: params.env, input: opts.input, timeoutMs: opts.timeoutMs ?? HOST_COMMAND_TIMEOUT_MS });
        return "";
      }
      try {
        const output = await capture(cmd, args, {
          env: params.env,
          stderr: "pipe",
          timeoutMs: opts.timeoutMs ?? HOST_COMMAND_TIMEOUT_MS,
        });
        if (output) params.logger.debug({ cmd, args, output }, `${cmd} output`);
        return output;
      } catch (err) {
        // stderr arrives capped by capture()
        if (err instanceof CommandError && err.stderr) {
          params.logger.error({ cmd, args, exitCode: err.exitCode, stderr: err.stderr }, `${cmd} failed`);
        }
        throw err;
      }
    },
    async succeeds(cmd, args) {
      try {
        await capture(cmd, args, { env: params.env, stderr: "ignore", timeoutMs: HOST_COMMAND_TIMEOUT_MS });
        return true;
      } catch (err) {
        if (err instanceof CommandError && err.exitCode !== null) return false;
        throw err;
      }
    },
    async isActive(unit) {
      return await host.succeeds("systemctl", ["is-active", "--quiet", unit]);
    },
    async userExists(name) {
      return await host.succeeds("id", ["-u", name]);
    },
    async writeFile(filePath, contents, mode = 0o644) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, contents, { encoding: "utf8", mode });
      await fs.chmod(filePath, mode);
    },
    async pathExists(filePath) {
      return await pathExists(filePath);
    },
  };
  return host;
}

/** dnf with a clean cache and fresh metadata before every operation. */
export function createDnfInstaller(host: HostSystem): PackageInstaller {
  const prepare = async () => {
    await host.exec("dnf", ["clean", "all"]);
    await host.exec("dnf", ["makecache"], { timeoutMs: DNF_COMMAND_TIMEOUT_MS });
  };
  return {
    async isInstalled(name) {
      return await host.succeeds("rpm", ["-q", name]);
    },
    async install(specs) {
      if (specs.length === 0) return;
      await prepare();
      await host.exec("dnf", ["install", "-y", ...specs], { timeoutMs: DNF_COMMAND_TIMEOUT_MS });
    },
    async update() {
      await prepare();
      await host.exec("dnf", ["update", "-y"], { timeoutMs: DNF_COMMAND_TIMEOUT_MS });
    },
  };
}
