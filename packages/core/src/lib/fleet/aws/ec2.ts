import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { assertInstanceId, InstanceIdSchema } from "@outpostctl/shared/lib/identifiers";
import { ProviderError } from "../../runtime/errors.js";
import { INSTANCE_STATES, type ImageSelector, type LaunchParams, type ProvisionedResource } from "../types.js";
import { awsJson, awsText, type AwsCliContext } from "./aws-cli.js";

const ImageSchema = z.object({
  ImageId: z.string().min(1),
  CreationDate: z.string().default(""),
  Name: z.string().optional(),
});
export type ImageSummary = z.infer<typeof ImageSchema>;

const DescribeImagesSchema = z.object({ Images: z.array(ImageSchema).default([]) });
const DescribeSubnetsSchema = z.object({
  Subnets: z.array(z.object({ SubnetId: z.string().optional(), AvailabilityZone: z.string().min(1) })).default([]),
});
const RunInstancesSchema = z.object({
  Instances: z.array(z.object({ InstanceId: InstanceIdSchema })).min(1),
});
const InstanceSchema = z.object({
  InstanceId: z.string().min(1),
  InstanceType: z.string().min(1),
  State: z.object({ Name: z.enum(INSTANCE_STATES) }),
  PrivateIpAddress: z.string().optional(),
  PublicIpAddress: z.string().optional(),
  Placement: z.object({ AvailabilityZone: z.string().default("") }).default({}),
});
const DescribeInstancesSchema = z.object({
  Reservations: z.array(z.object({ Instances: z.array(InstanceSchema).default([]) })).default([]),
});
const AddressSchema = z.object({
  AllocationId: z.string().optional(),
  AssociationId: z.string().optional(),
  InstanceId: z.string().optional(),
  PublicIp: z.string().optional(),
});
export type AddressSummary = z.infer<typeof AddressSchema>;
const DescribeAddressesSchema = z.object({ Addresses: z.array(AddressSchema).default([]) });
const AssociateAddressSchema = z.object({ AssociationId: z.string().optional() });

function creationTime(image: ImageSummary): number {
  const t = Date.parse(image.CreationDate);
  return Number.isFinite(t) ? t : Number.NEGATIVE_INFINITY;
}

/** Newest image by creation date; ties keep the first listed. */
export function selectLatestImage(images: readonly ImageSummary[]): ImageSummary | null {
  let best: ImageSummary | null = null;
  for (const image of images) {
    if (!best || creationTime(image) > creationTime(best)) best = image;
  }
  return best;
}

export function pickUnassociatedAddress(addresses: readonly AddressSummary[]): string | null {
  for (const address of addresses) {
    if (address.AssociationId || address.InstanceId) continue;
    if (address.AllocationId) return address.AllocationId;
  }
  return null;
}

export async function findImage(ctx: AwsCliContext, selector: ImageSelector): Promise<string> {
  const res = await awsJson(
    ctx,
    [
      "ec2",
      "describe-images",
      "--owners",
      selector.ownerId,
      "--filters",
      `Name=name,Values=${selector.namePattern}`,
      `Name=architecture,Values=${selector.architecture}`,
      `Name=virtualization-type,Values=${selector.virtualizationType}`,
      "Name=state,Values=available",
    ],
    DescribeImagesSchema,
  );
  const latest = selectLatestImage(res.Images);
  if (!latest) {
    throw new ProviderError("aws ec2 describe-images", `no image matches ${selector.namePattern} (owner ${selector.ownerId})`, {
      code: "NotFound",
      hint: "check IMAGE_OWNER / IMAGE_NAME_PATTERN and the region",
    });
  }
  return latest.ImageId;
}

export async function resolveAvailabilityZone(ctx: AwsCliContext, subnetId: string): Promise<string> {
  const res = await awsJson(ctx, ["ec2", "describe-subnets", "--subnet-ids", subnetId], DescribeSubnetsSchema);
  const zone = res.Subnets[0]?.AvailabilityZone;
  if (!zone) {
    throw new ProviderError("aws ec2 describe-subnets", `subnet not found: ${subnetId}`, { code: "NotFound" });
  }
  return zone;
}

export function buildRunInstancesArgs(params: LaunchParams, userDataFile: string): string[] {
  const { request } = params;
  const tags = Object.entries(request.tags).map(([Key, Value]) => ({ Key, Value }));
  return [
    "ec2",
    "run-instances",
    "--image-id",
    params.imageId,
    "--instance-type",
    request.instanceType,
    "--key-name",
    request.keyName,
    "--subnet-id",
    request.placement.subnetId,
    "--security-group-ids",
    request.securityGroupId,
    "--iam-instance-profile",
    `Name=${request.instanceProfileName}`,
    "--placement",
    `AvailabilityZone=${params.availabilityZone}`,
    "--metadata-options",
    "HttpTokens=required,HttpEndpoint=enabled",
    "--count",
    "1",
    "--user-data",
    `file://${userDataFile}`,
    "--tag-specifications",
    JSON.stringify([{ ResourceType: "instance", Tags: tags }]),
  ];
}

export async function launchInstance(ctx: AwsCliContext, params: LaunchParams): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "outpostctl-userdata-"));
  const userDataFile = path.join(dir, "user-data.yaml");
  try {
    await fs.writeFile(userDataFile, params.userData, { encoding: "utf8", mode: 0o600 });
    const res = await awsJson(ctx, buildRunInstancesArgs(params, userDataFile), RunInstancesSchema);
    const first = res.Instances[0];
    if (!first) throw new ProviderError("aws ec2 run-instances", "no instance returned", { code: "Unknown" });
    return first.InstanceId;
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export async function waitRunning(ctx: AwsCliContext, instanceId: string, timeoutMs: number): Promise<void> {
  await awsText(ctx, ["ec2", "wait", "instance-running", "--instance-ids", instanceId], { timeoutMs });
}

export async function describeInstance(ctx: AwsCliContext, instanceId: string): Promise<ProvisionedResource> {
  const res = await awsJson(ctx, ["ec2", "describe-instances", "--instance-ids", instanceId], DescribeInstancesSchema);
  const instance = res.Reservations.flatMap((r) => r.Instances).find((i) => i.InstanceId === instanceId);
  if (!instance) {
    throw new ProviderError("aws ec2 describe-instances", `instance not found: ${instanceId}`, { code: "NotFound" });
  }
  return {
    instanceId: instance.InstanceId,
    state: instance.State.Name,
    instanceType: instance.InstanceType,
    privateIp: instance.PrivateIpAddress ?? "",
    ...(instance.PublicIpAddress ? { publicIp: instance.PublicIpAddress } : {}),
    availabilityZone: instance.Placement.AvailabilityZone,
  };
}

export async function findUnassociatedAddress(ctx: AwsCliContext): Promise<string | null> {
  const res = await awsJson(ctx, ["ec2", "describe-addresses"], DescribeAddressesSchema);
  return pickUnassociatedAddress(res.Addresses);
}

export async function associateAddress(ctx: AwsCliContext, instanceId: string, allocationId: string): Promise<void> {
  await awsJson(
    ctx,
    ["ec2", "associate-address", "--instance-id", instanceId, "--allocation-id", allocationId],
    AssociateAddressSchema,
  );
}

export async function terminateInstance(ctx: AwsCliContext, instanceId: string): Promise<void> {
  await awsText(ctx, ["ec2", "terminate-instances", "--instance-ids", assertInstanceId(instanceId), "--output", "json"]);
}
