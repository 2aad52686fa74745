import process from "node:process";
import type { z } from "zod";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { capture, CommandError } from "../../runtime/run.js";
import { ProviderError, type ProviderErrorCode } from "../../runtime/errors.js";

export type AwsCredentials = {
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
};

export type AwsCliContext = {
  region: string;
  env: NodeJS.ProcessEnv;
  redact: string[];
  timeoutMs?: number;
};

export const AWS_CLI_DEFAULT_TIMEOUT_MS = 120_000;

export function buildAwsCliContext(params: {
  region: string;
  credentials?: AwsCredentials;
  baseEnv?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}): AwsCliContext {
  const env: NodeJS.ProcessEnv = {
    ...(params.baseEnv ?? process.env),
    AWS_REGION: params.region,
    AWS_DEFAULT_REGION: params.region,
    AWS_PAGER: "",
  };
  const creds = params.credentials ?? {};
  if (creds.accessKeyId && creds.secretAccessKey) {
    env.AWS_ACCESS_KEY_ID = creds.accessKeyId;
    env.AWS_SECRET_ACCESS_KEY = creds.secretAccessKey;
  }
  if (creds.sessionToken) env.AWS_SESSION_TOKEN = creds.sessionToken;

  const redact = [creds.secretAccessKey, creds.sessionToken].filter((v): v is string => Boolean(v));
  return { region: params.region, env, redact, timeoutMs: params.timeoutMs };
}

const ERROR_CODE_PATTERNS: Array<{ code: ProviderErrorCode; re: RegExp }> = [
  { code: "QuotaExceeded", re: /\b(InstanceLimitExceeded|VcpuLimitExceeded|AddressLimitExceeded|LimitExceeded)\b/ },
  { code: "NoCapacity", re: /\b(InsufficientInstanceCapacity|InsufficientAddressCapacity|InsufficientCapacityOnOutpost)\b/ },
  { code: "PermissionDenied", re: /\b(UnauthorizedOperation|AccessDenied(Exception)?)\b|not authorized to perform/i },
  { code: "NotFound", re: /\b(NoSuchEntity|InvalidInstanceID\.NotFound|InvalidAllocationID\.NotFound)\b/ },
  { code: "InvalidParameter", re: /\b(InvalidParameter\w*|InvalidAMIID\.\w+|InvalidSubnetID\.\w+|InvalidGroup\.\w+|InvalidKeyPair\.\w+|MissingParameter|ValidationError)\b/ },
  { code: "Timeout", re: /Waiter \w+ failed|Max attempts exceeded/ },
];

export function classifyAwsError(stderr: string): ProviderErrorCode {
  for (const { code, re } of ERROR_CODE_PATTERNS) {
    if (re.test(stderr)) return code;
  }
  return "Unknown";
}

export function toProviderError(operation: string, err: unknown, hint?: string): ProviderError {
  if (err instanceof ProviderError) return err;
  if (err instanceof CommandError) {
    const code = err.timedOut ? "Timeout" : classifyAwsError(err.stderr);
    const detail = err.stderr.split("\n").find((line) => line.trim().length > 0) || err.message;
    return new ProviderError(operation, detail.trim(), { code, hint, cause: err });
  }
  const code = err instanceof Error && "code" in err && err.code === "ENOENT" ? "NotFound" : "Unknown";
  return new ProviderError(operation, formatUnknown(err, "unknown error"), {
    code,
    hint: code === "NotFound" ? "install the AWS CLI v2 and make sure `aws` is on PATH" : hint,
    cause: err,
  });
}

export async function awsText(ctx: AwsCliContext, args: string[], opts: { timeoutMs?: number } = {}): Promise<string> {
  const operation = `aws ${args.slice(0, 2).join(" ")}`;
  try {
    return await capture("aws", [...args, "--region", ctx.region], {
      env: ctx.env,
      redact: ctx.redact,
      stderr: "pipe",
      timeoutMs: opts.timeoutMs ?? ctx.timeoutMs ?? AWS_CLI_DEFAULT_TIMEOUT_MS,
    });
  } catch (err) {
    throw toProviderError(operation, err);
  }
}

export async function awsJson<S extends z.ZodTypeAny>(
  ctx: AwsCliContext,
  args: string[],
  schema: S,
  opts: { timeoutMs?: number } = {},
): Promise<z.output<S>> {
  const operation = `aws ${args.slice(0, 2).join(" ")}`;
  const out = await awsText(ctx, [...args, "--output", "json"], opts);
  let raw: unknown;
  try {
    raw = out ? JSON.parse(out) : {};
  } catch (err) {
    throw new ProviderError(operation, `returned invalid JSON (${formatUnknown(err)})`, { cause: err });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ProviderError(operation, `unexpected response shape at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}
