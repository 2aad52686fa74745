import YAML from "yaml";
import { isValidTopicArn, regionFromTopicArn } from "@outpostctl/shared/lib/identifiers";
import { PreconditionError } from "../runtime/errors.js";
import { BootstrapConfigSchema, DEFAULT_BOOTSTRAP_CONFIG_PATH, type BootstrapConfig } from "./config.js";
import { DEFAULT_BOOTSTRAP_LOG_PATH, DEFAULT_STATUS_PATH } from "./status.js";

export const EC2_USER_DATA_MAX_BYTES = 16 * 1024;
export const NODE_MODULE_STREAM = "nodejs:20";

// npm package spec: optional @scope, name, optional @version/tag.
const PACKAGE_SPEC_RE = /^(@[a-z0-9][a-z0-9._-]*\/)?[a-z0-9][a-z0-9._-]*(@[A-Za-z0-9._^~<>=*+-]+)?$/;

export type BootstrapPayloadParams = {
  topicArn: string;
  bootstrapPackage: string;
  sshUser?: string;
  adminPassword?: string;
  keyFileHint?: string;
  logPath?: string;
  statusPath?: string;
  configPath?: string;
};

type WriteFile = {
  path: string;
  permissions: string;
  owner: string;
  content: string;
};

export function buildBootstrapConfig(params: BootstrapPayloadParams): BootstrapConfig {
  const parsed = BootstrapConfigSchema.safeParse({
    schemaVersion: 1,
    topicArn: params.topicArn,
    region: regionFromTopicArn(params.topicArn),
    sshUser: params.sshUser,
    ...(params.adminPassword ? { adminPassword: params.adminPassword } : {}),
    ...(params.keyFileHint ? { keyFileHint: params.keyFileHint } : {}),
    logPath: params.logPath ?? DEFAULT_BOOTSTRAP_LOG_PATH,
    statusPath: params.statusPath ?? DEFAULT_STATUS_PATH,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PreconditionError(`invalid bootstrap payload: ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

/**
 * Renders `#cloud-config` user data: the bootstrap config as a root-only JSON file, a Node.js
 * runtime from the distribution module stream, and one bootstrapper invocation.
 */
export function renderBootstrapPayload(params: BootstrapPayloadParams): string {
  const topicArn = params.topicArn.trim();
  if (!isValidTopicArn(topicArn)) {
    throw new PreconditionError(`invalid SNS topic ARN format: ${topicArn}`);
  }
  const bootstrapPackage = params.bootstrapPackage.trim();
  if (!PACKAGE_SPEC_RE.test(bootstrapPackage)) {
    throw new PreconditionError(`invalid bootstrap package spec: ${bootstrapPackage}`, {
      hint: "set BOOTSTRAP_PACKAGE to an npm package spec such as @outpostctl/cli@latest",
    });
  }

  const config = buildBootstrapConfig({ ...params, topicArn });
  const configPath = params.configPath ?? DEFAULT_BOOTSTRAP_CONFIG_PATH;
  const writeFiles: WriteFile[] = [
    {
      path: configPath,
      permissions: "0600",
      owner: "root:root",
      content: `${JSON.stringify(config, null, 2)}\n`,
    },
  ];

  const doc = {
    write_files: writeFiles,
    runcmd: [
      ["dnf", "module", "enable", "-y", NODE_MODULE_STREAM],
      ["dnf", "install", "-y", "nodejs", "npm"],
      ["npx", "--yes", bootstrapPackage, "bootstrap", "run", "--config", configPath],
    ],
  };

  const yaml = YAML.stringify(doc, { lineWidth: 0 });
  const out = `#cloud-config\n${yaml}`;
  const bytes = Buffer.byteLength(out, "utf8");
  if (bytes > EC2_USER_DATA_MAX_BYTES) {
    throw new PreconditionError(
      `cloud-init user data too large: ${bytes} bytes (EC2 limit ${EC2_USER_DATA_MAX_BYTES})`,
    );
  }
  return out;
}
