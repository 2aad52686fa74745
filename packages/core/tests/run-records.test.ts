import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import {
  appendLegacyPublicIp,
  listRunRecords,
  newRunId,
  readRunTable,
  resolveRunRecord,
  saveRunRecord,
  updateRunRecord,
  writeLegacyInstanceRecord,
  type RunRecord,
} from "../src/lib/storage/run-records.js";

let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "outpostctl-runs-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function record(runId: string, createdAt: string, instanceId = "i-0123456789abcdef0"): RunRecord {
  return { runId, instanceId, region: "us-east-1", createdAt, updatedAt: createdAt };
}

describe("run ids", () => {
  it("combines a UTC timestamp with a random suffix", () => {
    expect(newRunId(new Date("2026-10-18T12:34:56.789Z"), () => 0.5)).toBe("20261018-123456-8000");
  });
});

describe("run table", () => {
  it("tracks the latest run and resolves by id", async () => {
    const file = path.join(dir, "runs.json");
    await saveRunRecord(file, record("20261018-100000-0001", "2026-10-18T10:00:00.000Z"));
    await saveRunRecord(file, record("20261018-110000-0002", "2026-10-18T11:00:00.000Z", "i-0fedcba9876543210"));

    expect((await resolveRunRecord(file)).runId).toBe("20261018-110000-0002");
    expect((await resolveRunRecord(file, "20261018-100000-0001")).instanceId).toBe("i-0123456789abcdef0");
    await expect(resolveRunRecord(file, "20261018-090000-0000")).rejects.toThrow("unknown run: 20261018-090000-0000");

    const table = await readRunTable(file);
    expect(listRunRecords(table).map((r) => r.runId)).toEqual(["20261018-110000-0002", "20261018-100000-0001"]);
    expect((await fs.stat(file)).mode & 0o777).toBe(0o600);
  });

  it("patches a record with its public address", async () => {
    const file = path.join(dir, "runs.json");
    await saveRunRecord(file, record("20261018-100000-0001", "2026-10-18T10:00:00.000Z"));
    await updateRunRecord(file, "20261018-100000-0001", { publicIp: "203.0.113.10" }, new Date("2026-10-18T10:05:00.000Z"));
    expect(await resolveRunRecord(file)).toMatchObject({
      publicIp: "203.0.113.10",
      createdAt: "2026-10-18T10:00:00.000Z",
      updatedAt: "2026-10-18T10:05:00.000Z",
    });
  });

  it("reports an empty table when nothing was launched", async () => {
    await expect(resolveRunRecord(path.join(dir, "runs.json"))).rejects.toThrow("no runs recorded yet");
  });

  it("refuses a corrupted table", async () => {
    const file = path.join(dir, "runs.json");
    await fs.writeFile(file, "{not json", "utf8");
    await expect(readRunTable(file)).rejects.toThrow(/runs.json/);
  });
});

describe("legacy record", () => {
  it("overwrites the instance line and appends the address", async () => {
    const file = path.join(dir, ".last-instance-id");
    await writeLegacyInstanceRecord(file, "i-0aaaaaaaaaaaaaaaa");
    await appendLegacyPublicIp(file, "198.51.100.7");
    await writeLegacyInstanceRecord(file, "i-0123456789abcdef0");
    await appendLegacyPublicIp(file, "203.0.113.10");
    expect(await fs.readFile(file, "utf8")).toBe("Instance ID: i-0123456789abcdef0\nPublic IP: 203.0.113.10\n");
  });
});
