import type { Logger } from "pino";
import { z } from "zod";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { writeFileAtomic } from "../storage/fs-safe.js";

export const DEFAULT_STATUS_PATH = "/var/lib/outpostctl/status.json";
export const DEFAULT_BOOTSTRAP_LOG_PATH = "/var/log/outpostctl-bootstrap.log";
export const COMPLETION_MARKER = "Cockpit installation completed successfully";

export const BootstrapStatusSchema = z.object({
  state: z.enum(["running", "succeeded", "failed"]),
  step: z.string().nullable(),
  position: z.string().optional(),
  detail: z.string().optional(),
  updatedAt: z.string(),
});
export type BootstrapStatus = z.infer<typeof BootstrapStatusSchema>;

export interface StatusWriter {
  write(status: Omit<BootstrapStatus, "updatedAt">): Promise<void>;
}

export function parseBootstrapStatus(text: string): BootstrapStatus | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = BootstrapStatusSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/** World-readable so the login user can poll it over ssh without sudo. */
export function createStatusFileWriter(params: {
  filePath: string;
  logger: Logger;
  now?: () => Date;
}): StatusWriter {
  const now = params.now ?? (() => new Date());
  return {
    async write(status) {
      const body: BootstrapStatus = { ...status, updatedAt: now().toISOString() };
      try {
        await writeFileAtomic(params.filePath, `${JSON.stringify(body)}\n`, { mode: 0o644 });
      } catch (err) {
        params.logger.warn({ err, path: params.filePath }, `failed to write status file: ${formatUnknown(err)}`);
      }
    },
  };
}
