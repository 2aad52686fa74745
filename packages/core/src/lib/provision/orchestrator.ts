import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { SecurityGroupIdSchema, SubnetIdSchema } from "@outpostctl/shared/lib/identifiers";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { ensurePrivateRuntimeDir, type RuntimeLayout } from "../config/layout.js";
import { requireTopicArn, type OutpostSettings } from "../config/settings.js";
import { buildProvisioningRequest, manualTerminateCommand, type FleetProvider, type ProvisionedResource } from "../fleet/types.js";
import { renderBootstrapPayload } from "../bootstrap/payload.js";
import { DEFAULT_BOOTSTRAP_LOG_PATH, DEFAULT_STATUS_PATH } from "../bootstrap/status.js";
import { CRITICAL_SERVICE } from "../bootstrap/plan.js";
import { cockpitUrl } from "../notify/format.js";
import { capture } from "../runtime/run.js";
import { LaunchAbortedError, PreconditionError, ProviderError } from "../runtime/errors.js";
import { sleep as defaultSleep, type Sleep } from "../runtime/retry.js";
import {
  appendLegacyPublicIp,
  newRunId,
  saveRunRecord,
  updateRunRecord,
  writeLegacyInstanceRecord,
} from "../storage/run-records.js";
import type { InstallMonitor, MonitorOutcome } from "./monitor.js";

export const IAM_PROPAGATION_DELAY_MS = 30_000;
export const RUNNING_WAIT_TIMEOUT_MS = 10 * 60_000;
export const PURPOSE_TAG = "Cockpit-WebConsole";
export const RUN_ID_TAG = "outpostctl:run-id";

export type LaunchStage = "preconditions" | "image" | "identity" | "launch" | "running" | "address" | "monitor" | "summary";

export type OrchestratorDeps = {
  provider: FleetProvider;
  logger: Logger;
  layout: RuntimeLayout;
  sleep?: Sleep;
  now?: () => Date;
  runId?: string;
  checkCloudCli?: () => Promise<void>;
  createMonitor?: (publicIp: string) => InstallMonitor;
  openViewer?: (url: string) => Promise<void>;
  onStage?: (stage: LaunchStage) => void;
  onInstanceCreated?: (instanceId: string) => void;
};

export type LaunchOptions = {
  monitor: boolean;
};

export type LaunchResult = {
  runId: string;
  instanceId: string;
  region: string;
  publicIp: string;
  privateIp: string;
  availabilityZone: string;
  url: string;
  sshCommand: string;
  monitor: MonitorOutcome | null;
  serviceReady: boolean | null;
};

export async function checkAwsCli(): Promise<void> {
  try {
    await capture("aws", ["--version"], { stderr: "pipe", timeoutMs: 30_000 });
  } catch (err) {
    throw new PreconditionError(`AWS CLI not available: ${formatUnknown(err)}`, {
      hint: "install the AWS CLI v2 and make sure `aws` is on PATH",
      cause: err,
    });
  }
}

function requireSetting(value: string, key: string, example: string): string {
  if (!value) {
    throw new PreconditionError(`${key} is required`, { hint: `set it with: export ${key}="${example}"` });
  }
  return value;
}

async function tightenKeyFile(rootDir: string, keyFile: string, logger: Logger): Promise<string> {
  const resolved = path.resolve(rootDir, keyFile);
  let stat: Stats;
  try {
    stat = await fs.stat(resolved);
  } catch (err) {
    throw new PreconditionError(`key file not found: ${resolved}`, { hint: "set KEY_FILE to the private key of KEY_NAME", cause: err });
  }
  if (!stat.isFile()) throw new PreconditionError(`key file is not a regular file: ${resolved}`);
  if ((stat.mode & 0o777) !== 0o400) {
    await fs.chmod(resolved, 0o400);
    logger.info({ keyFile: resolved }, "key file permissions set to 0400");
  }
  return resolved;
}

export type PreconditionSummary = {
  topicArn: string;
  subnetId: string;
  securityGroupId: string;
  keyFile: string;
};

/** Validates every input before any cloud call; raises `PreconditionError` with no side effects beyond the key file mode. */
export async function checkPreconditions(
  settings: OutpostSettings,
  deps: Pick<OrchestratorDeps, "layout" | "logger" | "checkCloudCli">,
): Promise<PreconditionSummary> {
  const topicArn = requireTopicArn(settings);
  const subnetId = requireSetting(settings.subnetId, "SUBNET_ID", "subnet-0123456789abcdef0");
  if (!SubnetIdSchema.safeParse(subnetId).success) throw new PreconditionError(`invalid SUBNET_ID: ${subnetId}`);
  const securityGroupId = requireSetting(settings.securityGroupId, "SECURITY_GROUP_ID", "sg-0123456789abcdef0");
  if (!SecurityGroupIdSchema.safeParse(securityGroupId).success) {
    throw new PreconditionError(`invalid SECURITY_GROUP_ID: ${securityGroupId}`);
  }
  const keyFile = settings.keyFile ? await tightenKeyFile(deps.layout.rootDir, settings.keyFile, deps.logger) : "";
  await (deps.checkCloudCli ?? checkAwsCli)();
  return { topicArn, subnetId, securityGroupId, keyFile };
}

async function resolvePublicAddress(
  provider: FleetProvider,
  instanceId: string,
  logger: Logger,
): Promise<ProvisionedResource & { publicIp: string }> {
  const current = await provider.describeInstance(instanceId);
  if (current.publicIp) return { ...current, publicIp: current.publicIp };

  logger.info("no public address assigned; looking for an unassociated address");
  const allocationId = await provider.findUnassociatedAddress();
  if (!allocationId) {
    throw new ProviderError("resolve public address", "no public address assigned and no unassociated address available", {
      code: "NoCapacity",
      hint: "allocate an address in the region (aws ec2 allocate-address) and rerun, or associate one manually",
    });
  }
  await provider.associateAddress(instanceId, allocationId);
  logger.info({ allocationId }, "address associated");
  const updated = await provider.describeInstance(instanceId);
  if (!updated.publicIp) {
    throw new ProviderError("resolve public address", `address ${allocationId} associated but the instance reports no public IP`, {
      code: "Unknown",
    });
  }
  return { ...updated, publicIp: updated.publicIp };
}

export async function launchOutpost(
  settings: OutpostSettings,
  opts: LaunchOptions,
  deps: OrchestratorDeps,
): Promise<LaunchResult> {
  const { provider, logger, layout } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());
  const stage = (name: LaunchStage) => {
    deps.onStage?.(name);
    logger.debug({ stage: name }, "stage");
  };

  stage("preconditions");
  const pre = await checkPreconditions(settings, deps);
  const runId = deps.runId ?? newRunId(now());

  stage("image");
  const imageSelector = {
    ownerId: settings.imageOwner,
    namePattern: settings.imageNamePattern,
    architecture: settings.imageArchitecture,
    virtualizationType: "hvm" as const,
  };
  const imageId = await provider.findImage(imageSelector);
  logger.info({ imageId }, `using image ${imageId}`);

  stage("identity");
  const identity = await provider.ensureInstanceProfile({
    profileName: settings.instanceProfileName,
    roleName: settings.instanceRoleName,
    topicArn: pre.topicArn,
  });
  if (identity.created) {
    logger.info(`instance profile created; waiting ${IAM_PROPAGATION_DELAY_MS / 1000}s for propagation`);
    await sleep(IAM_PROPAGATION_DELAY_MS);
  } else {
    logger.info(`instance profile ${settings.instanceProfileName} already exists`);
  }

  stage("launch");
  const request = buildProvisioningRequest({
    image: imageSelector,
    instanceType: settings.instanceType,
    subnetId: pre.subnetId,
    outpostId: settings.outpostId || undefined,
    securityGroupId: pre.securityGroupId,
    keyName: settings.keyName,
    instanceProfileName: settings.instanceProfileName,
    tags: { Name: settings.instanceName, Purpose: PURPOSE_TAG, [RUN_ID_TAG]: runId },
  });
  const userData = renderBootstrapPayload({
    topicArn: pre.topicArn,
    bootstrapPackage: settings.bootstrapPackage,
    sshUser: settings.sshUser,
    adminPassword: settings.adminPassword || undefined,
    keyFileHint: pre.keyFile || undefined,
  });
  const availabilityZone = await provider.resolveAvailabilityZone(pre.subnetId);
  const instanceId = await provider.launchInstance({ request, imageId, availabilityZone, userData });
  logger.info({ instanceId, runId }, `instance launched: ${instanceId}`);
  deps.onInstanceCreated?.(instanceId);

  try {
    ensurePrivateRuntimeDir(layout.runtimeDir);
    const createdAt = now().toISOString();
    await saveRunRecord(layout.runsFilePath, {
      runId,
      instanceId,
      region: provider.region,
      sshUser: settings.sshUser,
      createdAt,
      updatedAt: createdAt,
    });
    await writeLegacyInstanceRecord(layout.legacyRecordPath, instanceId);

    stage("running");
    await provider.waitRunning(instanceId, RUNNING_WAIT_TIMEOUT_MS);
    logger.info("instance is running");

    stage("address");
    const resource = await resolvePublicAddress(provider, instanceId, logger);
    await appendLegacyPublicIp(layout.legacyRecordPath, resource.publicIp);
    await updateRunRecord(layout.runsFilePath, runId, { publicIp: resource.publicIp }, now());
    logger.info({ publicIp: resource.publicIp }, `public address: ${resource.publicIp}`);

    const url = cockpitUrl(resource.publicIp);
    let outcome: MonitorOutcome | null = null;
    let serviceReady: boolean | null = null;
    if (opts.monitor && deps.createMonitor) {
      stage("monitor");
      const monitor = deps.createMonitor(resource.publicIp);
      outcome = await monitor.watch({
        publicIp: resource.publicIp,
        statusPath: DEFAULT_STATUS_PATH,
        logPath: DEFAULT_BOOTSTRAP_LOG_PATH,
      });
      if (outcome.kind === "completed") {
        serviceReady = await monitor.waitForService(CRITICAL_SERVICE);
        if (!serviceReady) logger.warn(`${CRITICAL_SERVICE} did not report active; the console may need a moment longer`);
      }
      if ((outcome.kind === "completed" || outcome.kind === "degraded") && deps.openViewer) {
        try {
          await deps.openViewer(url);
        } catch (err) {
          logger.warn({ err }, `could not open a browser: ${formatUnknown(err)}`);
        }
      }
    }

    stage("summary");
    return {
      runId,
      instanceId,
      region: provider.region,
      publicIp: resource.publicIp,
      privateIp: resource.privateIp,
      availabilityZone: resource.availabilityZone,
      url,
      sshCommand: `ssh ${pre.keyFile ? `-i ${pre.keyFile} ` : ""}${settings.sshUser}@${resource.publicIp}`,
      monitor: outcome,
      serviceReady,
    };
  } catch (err) {
    throw new LaunchAbortedError({
      instanceId,
      region: provider.region,
      cause: err,
      hint: `terminate it with: ${manualTerminateCommand(provider.region, instanceId)}`,
    });
  }
}
