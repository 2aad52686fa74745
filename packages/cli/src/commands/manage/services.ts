import { defineCommand } from "citty";
import { CRITICAL_SERVICE, OPTIONAL_SERVICES } from "@outpostctl/core/lib/bootstrap/plan";
import { DEFAULT_MONITOR_POLICIES, InstallMonitor } from "@outpostctl/core/lib/provision/monitor";
import { createHttpsProbe } from "@outpostctl/core/lib/provision/probe";
import { createSshRemote } from "@outpostctl/core/lib/provision/remote";
import { VerificationTimeout } from "@outpostctl/core/lib/runtime/errors";
import { shellQuote, sshCapture } from "@outpostctl/core/lib/security/ssh-remote";
import { splitLines } from "@outpostctl/shared/lib/strings";
import { commonArgs, createCliLogger, loadRunContext, requirePublicIp, resolveKeyFile, runArg, sshAccess } from "../../lib/context.js";
import { formatTable } from "../../lib/table.js";

export const SERVICE_UNITS: readonly string[] = [CRITICAL_SERVICE, ...OPTIONAL_SERVICES];

export function serviceRows(units: readonly string[], output: string): string[][] {
  const states = splitLines(output).map((line) => line.trim());
  return units.map((unit, idx) => [unit, unit === CRITICAL_SERVICE ? "critical" : "optional", states[idx] ?? "unknown"]);
}

export const services = defineCommand({
  meta: {
    name: "services",
    description: "Show the state of the Cockpit-related services on the instance.",
  },
  args: {
    ...commonArgs,
    ...runArg,
    wait: { type: "boolean", description: `Wait for ${CRITICAL_SERVICE} to become active first.`, default: false },
  },
  async run({ args }) {
    const ctx = await loadRunContext(args);
    const { target, options } = sshAccess(ctx);

    if (args.wait) {
      const monitor = new InstallMonitor({
        remote: createSshRemote({
          host: requirePublicIp(ctx.record),
          user: ctx.record.sshUser ?? ctx.loaded.settings.sshUser,
          identityFile: resolveKeyFile(ctx.loaded),
        }),
        probe: createHttpsProbe(),
        logger: createCliLogger(),
      });
      if (!(await monitor.waitForService(CRITICAL_SERVICE))) {
        throw new VerificationTimeout(`${CRITICAL_SERVICE} readiness`, DEFAULT_MONITOR_POLICIES.service.maxAttempts, {
          hint: `inspect it with: outpostctl ssh --run ${ctx.record.runId}, then: sudo systemctl status ${CRITICAL_SERVICE}`,
        });
      }
    }

    const output = await sshCapture(target, `systemctl is-active ${SERVICE_UNITS.map(shellQuote).join(" ")} || true`, {
      ...options,
      batchMode: true,
      stderr: "pipe",
      timeoutMs: 30_000,
    });
    console.log(formatTable([["UNIT", "CRITICALITY", "STATE"], ...serviceRows(SERVICE_UNITS, output)]));
  },
});
