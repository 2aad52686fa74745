import { ProviderError } from "../../runtime/errors.js";
import type { EnsureInstanceProfileParams } from "../types.js";
import { awsText, type AwsCliContext } from "./aws-cli.js";

export const SSM_MANAGED_POLICY_ARN = "arn:aws:iam::aws:policy/AmazonSSMManagedInstanceCore";
export const NOTIFY_INLINE_POLICY_NAME = "CockpitSNSNotifications";

export const EC2_ASSUME_ROLE_POLICY = {
  Version: "2012-10-17",
  Statement: [{ Effect: "Allow", Principal: { Service: "ec2.amazonaws.com" }, Action: "sts:AssumeRole" }],
} as const;

export function buildPublishPolicy(topicArn: string) {
  return {
    Version: "2012-10-17",
    Statement: [{ Effect: "Allow", Action: "sns:Publish", Resource: topicArn }],
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof ProviderError && err.code === "NotFound";
}

async function instanceProfileExists(ctx: AwsCliContext, profileName: string): Promise<boolean> {
  try {
    await awsText(ctx, ["iam", "get-instance-profile", "--instance-profile-name", profileName, "--output", "json"]);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

async function addRoleToProfile(ctx: AwsCliContext, params: EnsureInstanceProfileParams): Promise<void> {
  await awsText(ctx, [
    "iam",
    "add-role-to-instance-profile",
    "--instance-profile-name",
    params.profileName,
    "--role-name",
    params.roleName,
  ]);
}

async function createRole(ctx: AwsCliContext, params: EnsureInstanceProfileParams): Promise<void> {
  await awsText(ctx, [
    "iam",
    "create-role",
    "--role-name",
    params.roleName,
    "--assume-role-policy-document",
    JSON.stringify(EC2_ASSUME_ROLE_POLICY),
    "--output",
    "json",
  ]);
  await awsText(ctx, ["iam", "attach-role-policy", "--role-name", params.roleName, "--policy-arn", SSM_MANAGED_POLICY_ARN]);
  await awsText(ctx, [
    "iam",
    "put-role-policy",
    "--role-name",
    params.roleName,
    "--policy-name",
    NOTIFY_INLINE_POLICY_NAME,
    "--policy-document",
    JSON.stringify(buildPublishPolicy(params.topicArn)),
  ]);
}

/**
 * Existing profiles are left untouched. A new profile gets the role attached; a missing role is
 * created with the session-manager policy and a publish grant scoped to the topic.
 */
export async function ensureInstanceProfile(
  ctx: AwsCliContext,
  params: EnsureInstanceProfileParams,
): Promise<{ created: boolean }> {
  if (await instanceProfileExists(ctx, params.profileName)) return { created: false };

  await awsText(ctx, [
    "iam",
    "create-instance-profile",
    "--instance-profile-name",
    params.profileName,
    "--path",
    "/",
    "--output",
    "json",
  ]);
  try {
    await addRoleToProfile(ctx, params);
  } catch (err) {
    if (!isNotFound(err)) throw err;
    await createRole(ctx, params);
    await addRoleToProfile(ctx, params);
  }
  return { created: true };
}
