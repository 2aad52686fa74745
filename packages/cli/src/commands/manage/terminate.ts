import process from "node:process";
import { defineCommand } from "citty";
import * as p from "@clack/prompts";
import { PreconditionError } from "@outpostctl/core/lib/runtime/errors";
import { commonArgs, loadRunContext, providerFor, runArg } from "../../lib/context.js";

export const terminate = defineCommand({
  meta: {
    name: "terminate",
    description: "Terminate the instance of a run (DANGEROUS).",
  },
  args: {
    ...commonArgs,
    ...runArg,
    yes: { type: "boolean", description: "Skip the confirmation prompt (non-interactive).", default: false },
  },
  async run({ args }) {
    const ctx = await loadRunContext(args);
    const { record } = ctx;
    if (!args.yes) {
      const interactive = process.stdin.isTTY && process.stdout.isTTY;
      if (!interactive) {
        throw new PreconditionError("refusing to terminate without --yes (no TTY)", {
          hint: `rerun with: outpostctl terminate --run ${record.runId} --yes`,
        });
      }
      const ok = await p.confirm({
        message: `Terminate instance ${record.instanceId} (run ${record.runId}) in ${record.region}?`,
        initialValue: false,
      });
      if (p.isCancel(ok) || !ok) {
        p.cancel("canceled");
        return;
      }
    }
    await providerFor(ctx.loaded, record.region).terminateInstance(record.instanceId);
    console.log(`ok: termination requested for ${record.instanceId}`);
    console.log("hint: the run record is kept; addresses associated with the instance are not released");
  },
});
