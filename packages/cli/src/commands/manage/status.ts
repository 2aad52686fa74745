import { defineCommand } from "citty";
import { parseBootstrapStatus, DEFAULT_STATUS_PATH } from "@outpostctl/core/lib/bootstrap/status";
import { shellQuote, sshCapture } from "@outpostctl/core/lib/security/ssh-remote";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { commonArgs, loadRunContext, providerFor, runArg, sshAccess } from "../../lib/context.js";

export const status = defineCommand({
  meta: {
    name: "status",
    description: "Show instance state and bootstrap progress for a run.",
  },
  args: {
    ...commonArgs,
    ...runArg,
    json: { type: "boolean", description: "Output JSON.", default: false },
  },
  async run({ args }) {
    const ctx = await loadRunContext(args);
    const { record } = ctx;
    const instance = await providerFor(ctx.loaded, record.region).describeInstance(record.instanceId);

    let bootstrap: string | null = null;
    if (instance.state === "running" && record.publicIp) {
      const { target, options } = sshAccess(ctx);
      try {
        const raw = await sshCapture(target, `cat ${shellQuote(DEFAULT_STATUS_PATH)} 2>/dev/null || true`, {
          ...options,
          batchMode: true,
          stderr: "pipe",
          timeoutMs: 30_000,
        });
        const parsed = parseBootstrapStatus(raw);
        bootstrap = parsed ? `${parsed.state}${parsed.step ? ` (${parsed.step}${parsed.position ? `, ${parsed.position}` : ""})` : ""}` : null;
      } catch (err) {
        bootstrap = `unreachable: ${formatUnknown(err)}`;
      }
    }

    if (args.json) {
      console.log(JSON.stringify({ run: record.runId, ...instance, bootstrap }, null, 2));
      return;
    }
    console.log(`run: ${record.runId}`);
    console.log(`instance: ${instance.instanceId} (${instance.state})`);
    console.log(`type: ${instance.instanceType}`);
    console.log(`availability zone: ${instance.availabilityZone}`);
    console.log(`public ip: ${instance.publicIp ?? "none"}`);
    console.log(`private ip: ${instance.privateIp || "unknown"}`);
    console.log(`bootstrap: ${bootstrap ?? "unknown"}`);
  },
});
