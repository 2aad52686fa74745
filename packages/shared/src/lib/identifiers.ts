import { z } from "zod";

const TOPIC_ARN_RE = /^arn:aws:sns:[^:]+:[^:]+:[^:]+$/;
const INSTANCE_ID_RE = /^i-[0-9a-f]{8,17}$/;
const SUBNET_ID_RE = /^subnet-[0-9a-f]{8,17}$/;
const SECURITY_GROUP_ID_RE = /^sg-[0-9a-f]{8,17}$/;
const REGION_RE = /^[a-z]{2}(-[a-z]+)+-\d$/;
const RUN_ID_RE = /^[a-z0-9][a-z0-9-]{2,63}$/;
const SAFE_RESOURCE_NAME_RE = /^[A-Za-z0-9+=,.@_-]{1,128}$/;

export const TopicArnSchema = z
  .string()
  .trim()
  .min(1, { message: "notification topic ARN is required" })
  .refine((v) => TOPIC_ARN_RE.test(v), {
    message: "invalid notification topic ARN (expected arn:aws:sns:<region>:<account-id>:<topic-name>)",
  });

export const InstanceIdSchema = z
  .string()
  .trim()
  .refine((v) => INSTANCE_ID_RE.test(v), { message: "invalid instance id (expected i-<hex>)" });

export const SubnetIdSchema = z
  .string()
  .trim()
  .refine((v) => SUBNET_ID_RE.test(v), { message: "invalid subnet id (expected subnet-<hex>)" });

export const SecurityGroupIdSchema = z
  .string()
  .trim()
  .refine((v) => SECURITY_GROUP_ID_RE.test(v), { message: "invalid security group id (expected sg-<hex>)" });

export const RegionSchema = z
  .string()
  .trim()
  .refine((v) => REGION_RE.test(v), { message: "invalid region (expected e.g. us-east-1)" });

export const RunIdSchema = z
  .string()
  .trim()
  .refine((v) => RUN_ID_RE.test(v), { message: "invalid run id (use [a-z0-9][a-z0-9-]{2,63})" });

export const ResourceNameSchema = z
  .string()
  .trim()
  .refine((v) => SAFE_RESOURCE_NAME_RE.test(v), { message: "invalid resource name (use [A-Za-z0-9+=,.@_-], max 128)" });

export function isValidTopicArn(value: string): boolean {
  return TopicArnSchema.safeParse(value).success;
}

export function regionFromTopicArn(topicArn: string): string {
  const parts = TopicArnSchema.parse(topicArn).split(":");
  return parts[3] ?? "";
}

export function assertInstanceId(instanceId: string): string {
  return InstanceIdSchema.parse(instanceId);
}
