import fs from "node:fs/promises";
import { z } from "zod";
import { RunIdSchema } from "@outpostctl/shared/lib/identifiers";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { PreconditionError } from "../runtime/errors.js";
import { readTextIfExists, writeFileAtomic } from "./fs-safe.js";

export const RunRecordSchema = z.object({
  runId: RunIdSchema,
  instanceId: z.string().trim().min(1),
  publicIp: z.string().trim().min(1).optional(),
  region: z.string().trim().min(1),
  sshUser: z.string().trim().min(1).optional(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});
export type RunRecord = z.infer<typeof RunRecordSchema>;

const RunTableSchema = z.object({
  schemaVersion: z.literal(1),
  latest: RunIdSchema.nullable(),
  runs: z.record(z.string(), RunRecordSchema),
});
export type RunTable = z.infer<typeof RunTableSchema>;

export function emptyRunTable(): RunTable {
  return { schemaVersion: 1, latest: null, runs: {} };
}

export function newRunId(now: Date = new Date(), random: () => number = Math.random): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\..*$/, "").replace("T", "-").toLowerCase();
  const suffix = Math.floor(random() * 0x10000)
    .toString(16)
    .padStart(4, "0");
  return `${stamp}-${suffix}`;
}

export async function readRunTable(filePath: string): Promise<RunTable> {
  const raw = await readTextIfExists(filePath);
  if (raw === null) return emptyRunTable();
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new PreconditionError(`invalid run records file: ${filePath} (${formatUnknown(err)})`, {
      hint: `inspect or remove ${filePath}`,
    });
  }
  const parsed = RunTableSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PreconditionError(
      `invalid run records file: ${filePath} (${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid"})`,
      { hint: `inspect or remove ${filePath}` },
    );
  }
  return parsed.data;
}

async function writeRunTable(filePath: string, table: RunTable): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(table, null, 2)}\n`);
}

export async function saveRunRecord(filePath: string, record: RunRecord): Promise<RunTable> {
  const table = await readRunTable(filePath);
  const next: RunTable = {
    schemaVersion: 1,
    latest: record.runId,
    runs: { ...table.runs, [record.runId]: RunRecordSchema.parse(record) },
  };
  await writeRunTable(filePath, next);
  return next;
}

export async function updateRunRecord(
  filePath: string,
  runId: string,
  patch: Partial<Pick<RunRecord, "publicIp" | "sshUser">>,
  now: Date = new Date(),
): Promise<RunRecord> {
  const table = await readRunTable(filePath);
  const existing = table.runs[runId];
  if (!existing) throw new PreconditionError(`unknown run: ${runId}`, { hint: "list runs with: outpostctl runs" });
  const updated = RunRecordSchema.parse({ ...existing, ...patch, updatedAt: now.toISOString() });
  await writeRunTable(filePath, { ...table, runs: { ...table.runs, [runId]: updated } });
  return updated;
}

/** `runId` omitted means the most recent run. */
export async function resolveRunRecord(filePath: string, runId?: string): Promise<RunRecord> {
  const table = await readRunTable(filePath);
  const id = runId?.trim() || table.latest;
  if (!id) {
    throw new PreconditionError("no runs recorded yet", { hint: "launch one with: outpostctl launch" });
  }
  const record = table.runs[id];
  if (!record) throw new PreconditionError(`unknown run: ${id}`, { hint: "list runs with: outpostctl runs" });
  return record;
}

export function listRunRecords(table: RunTable): RunRecord[] {
  return Object.values(table.runs).sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

export async function writeLegacyInstanceRecord(filePath: string, instanceId: string): Promise<void> {
  await writeFileAtomic(filePath, `Instance ID: ${instanceId}\n`, { mode: 0o644 });
}

export async function appendLegacyPublicIp(filePath: string, publicIp: string): Promise<void> {
  await fs.appendFile(filePath, `Public IP: ${publicIp}\n`, "utf8");
}
