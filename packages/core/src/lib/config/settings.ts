import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { coerceTrimmedString } from "@outpostctl/shared/lib/strings";
import { ResourceNameSchema, TopicArnSchema } from "@outpostctl/shared/lib/identifiers";
import { getRuntimeLayout, type RuntimeLayout } from "./layout.js";
import { PreconditionError } from "../runtime/errors.js";

export type SettingsKeySpec = {
  key: string;
  defaultValue: string;
};

// Network identifiers are account-specific and have no default.
export const SETTINGS_KEY_SPECS = [
  { key: "REGION", defaultValue: "us-east-1" },
  { key: "OUTPOST_ID", defaultValue: "" },
  { key: "SUBNET_ID", defaultValue: "" },
  { key: "SECURITY_GROUP_ID", defaultValue: "" },
  { key: "KEY_NAME", defaultValue: "outpost" },
  { key: "KEY_FILE", defaultValue: "" },
  { key: "INSTANCE_TYPE", defaultValue: "c6id.metal" },
  { key: "SNS_TOPIC_ARN", defaultValue: "" },
  { key: "SSH_USER", defaultValue: "rocky" },
  { key: "IMAGE_OWNER", defaultValue: "679593333241" },
  { key: "IMAGE_NAME_PATTERN", defaultValue: "Rocky-9-EC2-LVM-*" },
  { key: "IMAGE_ARCHITECTURE", defaultValue: "x86_64" },
  { key: "INSTANCE_PROFILE_NAME", defaultValue: "CockpitSSMInstanceProfile" },
  { key: "INSTANCE_ROLE_NAME", defaultValue: "AmazonSSMManagedInstanceCore" },
  { key: "INSTANCE_NAME", defaultValue: "Cockpit-Outpost-Server" },
  { key: "BOOTSTRAP_PACKAGE", defaultValue: "@outpostctl/cli@latest" },
  { key: "COCKPIT_ADMIN_PASSWORD", defaultValue: "" },
  { key: "AWS_ACCESS_KEY_ID", defaultValue: "" },
  { key: "AWS_SECRET_ACCESS_KEY", defaultValue: "" },
  { key: "AWS_SESSION_TOKEN", defaultValue: "" },
] as const satisfies readonly SettingsKeySpec[];

export type SettingsKey = (typeof SETTINGS_KEY_SPECS)[number]["key"];

export type SettingsSource = "env" | "file" | "default" | "unset";

export type SettingsFileInfo = {
  origin: "default" | "explicit";
  status: "ok" | "missing" | "invalid";
  path: string;
  error?: string;
};

const OutpostSettingsSchema = z.object({
  region: z.string().trim().min(1),
  outpostId: z.string().trim(),
  subnetId: z.string().trim(),
  securityGroupId: z.string().trim(),
  keyName: ResourceNameSchema,
  keyFile: z.string().trim(),
  instanceType: z.string().trim().min(1),
  topicArn: z.string().trim(),
  sshUser: z.string().trim().min(1),
  imageOwner: z.string().trim().min(1),
  imageNamePattern: z.string().trim().min(1),
  imageArchitecture: z.enum(["x86_64", "arm64"]),
  instanceProfileName: ResourceNameSchema,
  instanceRoleName: ResourceNameSchema,
  instanceName: z.string().trim().min(1),
  bootstrapPackage: z.string().trim().min(1),
  adminPassword: z.string(),
  aws: z.object({
    accessKeyId: z.string(),
    secretAccessKey: z.string(),
    sessionToken: z.string(),
  }),
});

export type OutpostSettings = z.infer<typeof OutpostSettingsSchema>;

export type LoadedSettings = {
  layout: RuntimeLayout;
  settings: OutpostSettings;
  sources: Partial<Record<SettingsKey, SettingsSource>>;
  envFile?: SettingsFileInfo;
};

export function validateSettingsFileSecurity(
  filePath: string,
  options: { expectedUid?: number } = {},
): { ok: true } | { ok: false; error: string } {
  let st: fs.Stats;
  try {
    st = fs.lstatSync(filePath);
  } catch (e) {
    return { ok: false, error: `cannot stat: ${e instanceof Error ? e.message : String(e)}` };
  }

  if (st.isSymbolicLink()) return { ok: false, error: "refusing to load: is a symlink" };
  if (!st.isFile()) return { ok: false, error: "refusing to load: not a regular file" };

  if ((st.mode & 0o077) !== 0) {
    return { ok: false, error: `refusing to load: insecure permissions (mode ${(st.mode & 0o777).toString(8)}; expected 600)` };
  }

  const expectedUid = options.expectedUid ?? (typeof process.getuid === "function" ? process.getuid() : undefined);
  if (typeof expectedUid === "number" && st.uid !== expectedUid) {
    return { ok: false, error: `refusing to load: wrong owner (uid ${st.uid}; expected ${expectedUid})` };
  }

  return { ok: true };
}

function readSettingsFile(params: { cwd: string; layout: RuntimeLayout; envFile?: string }): {
  info?: SettingsFileInfo;
  values: Record<string, string>;
} {
  const explicit = coerceTrimmedString(params.envFile);
  const origin = explicit ? "explicit" : "default";
  const filePath = explicit ? path.resolve(params.cwd, explicit) : params.layout.envFilePath;

  if (!fs.existsSync(filePath)) {
    if (origin === "explicit") {
      return { info: { origin, status: "missing", path: filePath, error: "file not found" }, values: {} };
    }
    return { values: {} };
  }

  const check = validateSettingsFileSecurity(filePath);
  if (!check.ok) return { info: { origin, status: "invalid", path: filePath, error: check.error }, values: {} };

  try {
    return { info: { origin, status: "ok", path: filePath }, values: dotenv.parse(fs.readFileSync(filePath, "utf8")) };
  } catch (e) {
    const error = `cannot read/parse: ${e instanceof Error ? e.message : String(e)}`;
    return { info: { origin, status: "invalid", path: filePath, error }, values: {} };
  }
}

export function loadSettings(params: {
  cwd: string;
  runtimeDir?: string;
  envFile?: string;
  env?: NodeJS.ProcessEnv;
}): LoadedSettings {
  const env = params.env ?? process.env;
  const layout = getRuntimeLayout(params.cwd, params.runtimeDir);
  const file = readSettingsFile({ cwd: params.cwd, layout, envFile: params.envFile });

  if (file.info?.status === "invalid") {
    throw new PreconditionError(`settings file rejected: ${file.info.path} (${file.info.error ?? "invalid"})`, {
      hint: `fix it with: chmod 600 ${file.info.path}`,
    });
  }
  if (file.info?.status === "missing") {
    throw new PreconditionError(`missing settings file: ${file.info.path}`, {
      hint: "pass an existing --env-file or drop the flag to use environment variables",
    });
  }

  const values = new Map<SettingsKey, string>();
  const sources: Partial<Record<SettingsKey, SettingsSource>> = {};
  for (const spec of SETTINGS_KEY_SPECS) {
    const fromEnv = coerceTrimmedString(env[spec.key]);
    const fromFile = coerceTrimmedString(file.values[spec.key]);
    if (fromEnv) {
      values.set(spec.key, fromEnv);
      sources[spec.key] = "env";
    } else if (fromFile) {
      values.set(spec.key, fromFile);
      sources[spec.key] = "file";
    } else if (spec.defaultValue) {
      values.set(spec.key, spec.defaultValue);
      sources[spec.key] = "default";
    } else {
      sources[spec.key] = "unset";
    }
  }
  const get = (key: SettingsKey): string => values.get(key) ?? "";

  const parsed = OutpostSettingsSchema.safeParse({
    region: get("REGION"),
    outpostId: get("OUTPOST_ID"),
    subnetId: get("SUBNET_ID"),
    securityGroupId: get("SECURITY_GROUP_ID"),
    keyName: get("KEY_NAME"),
    keyFile: get("KEY_FILE"),
    instanceType: get("INSTANCE_TYPE"),
    topicArn: get("SNS_TOPIC_ARN"),
    sshUser: get("SSH_USER"),
    imageOwner: get("IMAGE_OWNER"),
    imageNamePattern: get("IMAGE_NAME_PATTERN"),
    imageArchitecture: get("IMAGE_ARCHITECTURE"),
    instanceProfileName: get("INSTANCE_PROFILE_NAME"),
    instanceRoleName: get("INSTANCE_ROLE_NAME"),
    instanceName: get("INSTANCE_NAME"),
    bootstrapPackage: get("BOOTSTRAP_PACKAGE"),
    adminPassword: get("COCKPIT_ADMIN_PASSWORD"),
    aws: {
      accessKeyId: get("AWS_ACCESS_KEY_ID"),
      secretAccessKey: get("AWS_SECRET_ACCESS_KEY"),
      sessionToken: get("AWS_SESSION_TOKEN"),
    },
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "settings";
    throw new PreconditionError(`invalid setting ${where}: ${issue?.message ?? "invalid value"}`, {
      hint: "check the environment variables and the settings file",
    });
  }

  const settings = parsed.data;
  if ((settings.aws.accessKeyId && !settings.aws.secretAccessKey) || (!settings.aws.accessKeyId && settings.aws.secretAccessKey)) {
    throw new PreconditionError("AWS credentials must include both AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY");
  }

  return { layout, settings, sources, envFile: file.info };
}

/** Validate the notification channel first; it is the one input with no default. */
export function requireTopicArn(settings: OutpostSettings): string {
  if (!settings.topicArn) {
    throw new PreconditionError("SNS_TOPIC_ARN is required for notifications", {
      hint: 'set it with: export SNS_TOPIC_ARN="arn:aws:sns:<region>:<account-id>:<topic-name>"',
    });
  }
  const parsed = TopicArnSchema.safeParse(settings.topicArn);
  if (!parsed.success) {
    throw new PreconditionError(`invalid SNS topic ARN format: ${settings.topicArn}`, {
      hint: "expected format: arn:aws:sns:<region>:<account-id>:<topic-name>",
    });
  }
  return parsed.data;
}
