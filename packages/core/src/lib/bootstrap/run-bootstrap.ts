import process from "node:process";
import type { Logger } from "pino";
import type { Sleep } from "../runtime/retry.js";
import { createSnsNotifier } from "../notify/sns.js";
import type { Notifier, ResourceSnapshot } from "../notify/types.js";
import type { BootstrapConfig } from "./config.js";
import { createDnfInstaller, createLocalHost, type HostSystem, type PackageInstaller } from "./host.js";
import { fetchInstanceSnapshot } from "./metadata.js";
import { memoizeAsync, runPipeline, withFailureTrap, type PipelineRun } from "./pipeline.js";
import { buildCockpitPlan } from "./plan.js";
import { COMPLETION_MARKER, createStatusFileWriter, type StatusWriter } from "./status.js";

export type BootstrapRunDeps = {
  logger: Logger;
  notifier?: Notifier;
  host?: HostSystem;
  installer?: PackageInstaller;
  snapshot?: () => Promise<ResourceSnapshot>;
  status?: StatusWriter;
  sleep?: Sleep;
  now?: () => Date;
};

export async function runBootstrap(config: BootstrapConfig, deps: BootstrapRunDeps): Promise<PipelineRun> {
  const { logger } = deps;
  const host = deps.host ?? createLocalHost({ logger });
  const installer = deps.installer ?? createDnfInstaller(host);
  // instance type is fixed for the run; the rest of the snapshot is re-read per event
  const snapshot = deps.snapshot ?? (async () => await fetchInstanceSnapshot({ logger }));
  const instanceType = memoizeAsync(async () => (await snapshot()).instanceType);
  const status = deps.status ?? createStatusFileWriter({ filePath: config.statusPath, logger, now: deps.now });
  const notifier =
    deps.notifier ??
    createSnsNotifier({
      topicArn: config.topicArn,
      region: config.region,
      logger,
      sshUser: config.sshUser,
      logPath: config.logPath,
      keyFileHint: config.keyFileHint,
    });

  logger.info({ statusPath: config.statusPath }, "Starting Cockpit installation");
  await status.write({ state: "running", step: null });

  const plan = buildCockpitPlan({
    config,
    host,
    installer,
    instanceType,
    publicIp: async () => (await snapshot()).publicIp,
    cpuArch: process.arch === "arm64" ? "aarch64" : "x86_64",
  });

  const pipelineDeps = { logger, notifier, snapshot, status, sleep: deps.sleep, now: deps.now };
  return await withFailureTrap(
    async () => await runPipeline(plan, pipelineDeps, { completionMessage: COMPLETION_MARKER }),
    pipelineDeps,
  );
}
