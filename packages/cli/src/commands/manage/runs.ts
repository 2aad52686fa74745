import { defineCommand } from "citty";
import { listRunRecords, readRunTable, type RunTable } from "@outpostctl/core/lib/storage/run-records";
import { commonArgs, loadCliSettings } from "../../lib/context.js";
import { formatTable } from "../../lib/table.js";

export function runRows(table: RunTable): string[][] {
  return listRunRecords(table).map((record) => [
    record.runId === table.latest ? `${record.runId} *` : record.runId,
    record.instanceId,
    record.region,
    record.publicIp ?? "-",
    record.createdAt,
  ]);
}

export const runs = defineCommand({
  meta: {
    name: "runs",
    description: "List recorded runs (* marks the most recent).",
  },
  args: {
    ...commonArgs,
    json: { type: "boolean", description: "Output JSON.", default: false },
  },
  async run({ args }) {
    const table = await readRunTable(loadCliSettings(args).layout.runsFilePath);
    if (args.json) {
      console.log(JSON.stringify(table, null, 2));
      return;
    }
    if (Object.keys(table.runs).length === 0) {
      console.log("no runs recorded yet");
      return;
    }
    console.log(formatTable([["RUN", "INSTANCE", "REGION", "PUBLIC IP", "CREATED"], ...runRows(table)]));
  },
});
