export const INSTANCE_STATES = ["pending", "running", "stopping", "stopped", "shutting-down", "terminated"] as const;
export type InstanceState = (typeof INSTANCE_STATES)[number];

export type ImageSelector = {
  ownerId: string;
  namePattern: string;
  architecture: "x86_64" | "arm64";
  virtualizationType: "hvm";
};

export type ProvisioningRequest = Readonly<{
  image: Readonly<ImageSelector>;
  instanceType: string;
  placement: Readonly<{
    subnetId: string;
    outpostId?: string;
  }>;
  securityGroupId: string;
  keyName: string;
  instanceProfileName: string;
  tags: Readonly<Record<string, string>>;
}>;

export type ProvisionedResource = {
  instanceId: string;
  state: InstanceState;
  instanceType: string;
  privateIp: string;
  publicIp?: string;
  availabilityZone: string;
};

export type LaunchParams = {
  request: ProvisioningRequest;
  imageId: string;
  availabilityZone: string;
  userData: string;
};

export type EnsureInstanceProfileParams = {
  profileName: string;
  roleName: string;
  topicArn: string;
};

/**
 * Cloud compute/network/identity surface. Implementations throw `ProviderError` with a classified
 * code; callers never retry a failed call on their own.
 */
export interface FleetProvider {
  readonly region: string;
  findImage(selector: ImageSelector): Promise<string>;
  resolveAvailabilityZone(subnetId: string): Promise<string>;
  launchInstance(params: LaunchParams): Promise<string>;
  waitRunning(instanceId: string, timeoutMs: number): Promise<void>;
  describeInstance(instanceId: string): Promise<ProvisionedResource>;
  findUnassociatedAddress(): Promise<string | null>;
  associateAddress(instanceId: string, allocationId: string): Promise<void>;
  ensureInstanceProfile(params: EnsureInstanceProfileParams): Promise<{ created: boolean }>;
  terminateInstance(instanceId: string): Promise<void>;
}

export function buildProvisioningRequest(params: {
  image: ImageSelector;
  instanceType: string;
  subnetId: string;
  outpostId?: string;
  securityGroupId: string;
  keyName: string;
  instanceProfileName: string;
  tags: Record<string, string>;
}): ProvisioningRequest {
  const placement = params.outpostId
    ? Object.freeze({ subnetId: params.subnetId, outpostId: params.outpostId })
    : Object.freeze({ subnetId: params.subnetId });
  return Object.freeze({
    image: Object.freeze({ ...params.image }),
    instanceType: params.instanceType,
    placement,
    securityGroupId: params.securityGroupId,
    keyName: params.keyName,
    instanceProfileName: params.instanceProfileName,
    tags: Object.freeze({ ...params.tags }),
  });
}

export function manualTerminateCommand(region: string, instanceId: string): string {
  return `aws ec2 terminate-instances --region ${region} --instance-ids ${instanceId}`;
}
