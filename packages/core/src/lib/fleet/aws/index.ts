import type { FleetProvider } from "../types.js";
import { buildAwsCliContext, type AwsCredentials } from "./aws-cli.js";
import * as ec2 from "./ec2.js";
import { ensureInstanceProfile } from "./iam.js";

export type AwsFleetProviderOptions = {
  region: string;
  credentials?: AwsCredentials;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
};

export function createAwsFleetProvider(opts: AwsFleetProviderOptions): FleetProvider {
  const ctx = buildAwsCliContext({
    region: opts.region,
    credentials: opts.credentials,
    baseEnv: opts.env,
    timeoutMs: opts.timeoutMs,
  });
  return {
    region: opts.region,
    findImage: async (selector) => await ec2.findImage(ctx, selector),
    resolveAvailabilityZone: async (subnetId) => await ec2.resolveAvailabilityZone(ctx, subnetId),
    launchInstance: async (params) => await ec2.launchInstance(ctx, params),
    waitRunning: async (instanceId, timeoutMs) => await ec2.waitRunning(ctx, instanceId, timeoutMs),
    describeInstance: async (instanceId) => await ec2.describeInstance(ctx, instanceId),
    findUnassociatedAddress: async () => await ec2.findUnassociatedAddress(ctx),
    associateAddress: async (instanceId, allocationId) => await ec2.associateAddress(ctx, instanceId, allocationId),
    ensureInstanceProfile: async (params) => await ensureInstanceProfile(ctx, params),
    terminateInstance: async (instanceId) => await ec2.terminateInstance(ctx, instanceId),
  };
}

export { buildAwsCliContext, classifyAwsError, type AwsCliContext, type AwsCredentials } from "./aws-cli.js";
