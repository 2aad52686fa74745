import fs from "node:fs/promises";
import { z } from "zod";
import { RegionSchema, TopicArnSchema } from "@outpostctl/shared/lib/identifiers";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { PreconditionError } from "../runtime/errors.js";
import { DEFAULT_BOOTSTRAP_LOG_PATH, DEFAULT_STATUS_PATH } from "./status.js";

export const DEFAULT_BOOTSTRAP_CONFIG_PATH = "/etc/outpostctl/bootstrap.json";

export const BootstrapConfigSchema = z.object({
  schemaVersion: z.literal(1),
  topicArn: TopicArnSchema,
  // Region of the notification topic.
  region: RegionSchema,
  sshUser: z.string().trim().min(1).default("rocky"),
  adminUser: z.string().trim().min(1).default("admin"),
  adminPassword: z.string().min(1).optional(),
  keyFileHint: z.string().trim().optional(),
  loginTitle: z.string().trim().min(1).default("EC2 Cockpit Interface"),
  logPath: z.string().trim().min(1).default(DEFAULT_BOOTSTRAP_LOG_PATH),
  statusPath: z.string().trim().min(1).default(DEFAULT_STATUS_PATH),
});

export type BootstrapConfig = z.infer<typeof BootstrapConfigSchema>;

export function parseBootstrapConfig(raw: unknown, source = "bootstrap config"): BootstrapConfig {
  const parsed = BootstrapConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PreconditionError(
      `invalid ${source}: ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid value"}`,
    );
  }
  return parsed.data;
}

export async function loadBootstrapConfig(filePath: string): Promise<BootstrapConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new PreconditionError(`cannot read bootstrap config: ${filePath} (${formatUnknown(err)})`, {
      hint: "check the cloud-init write_files output in /var/log/cloud-init-output.log",
    });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new PreconditionError(`invalid bootstrap config JSON: ${filePath} (${formatUnknown(err)})`);
  }
  return parseBootstrapConfig(raw, `bootstrap config ${filePath}`);
}
