import process from "node:process";
import { defineCommand } from "citty";
import * as p from "@clack/prompts";
import { resolveLaunchLogFile } from "@outpostctl/core/lib/logging/logger";
import { createSshRemote } from "@outpostctl/core/lib/provision/remote";
import { createHttpsProbe } from "@outpostctl/core/lib/provision/probe";
import { InstallMonitor } from "@outpostctl/core/lib/provision/monitor";
import { launchOutpost, type LaunchResult } from "@outpostctl/core/lib/provision/orchestrator";
import { newRunId } from "@outpostctl/core/lib/storage/run-records";
import { commonArgs, createCliLogger, loadCliSettings, providerFor, resolveKeyFile } from "../../lib/context.js";
import { installInterruptHandler } from "../../lib/interrupt.js";
import { openViewer } from "../../lib/viewer.js";

const MONITOR_FLAGS = new Set(["--monitor", "--no-monitor", "--monitor=true", "--monitor=false"]);

export function monitorFlagGiven(rawArgs: readonly string[]): boolean {
  return rawArgs.some((arg) => MONITOR_FLAGS.has(arg));
}

async function resolveMonitorChoice(rawArgs: readonly string[], flag: boolean | undefined): Promise<boolean> {
  if (monitorFlagGiven(rawArgs)) return Boolean(flag);
  if (!process.stdin.isTTY) return false;
  const answer = await p.confirm({
    message: "Monitor the installation until Cockpit is ready? (takes 10-20 minutes)",
    initialValue: true,
  });
  if (p.isCancel(answer)) return false;
  return answer;
}

export function summaryLines(result: LaunchResult): string[] {
  const lines = [
    `ok: instance ${result.instanceId} launched (run ${result.runId})`,
    `region: ${result.region}`,
    `availability zone: ${result.availabilityZone}`,
    `public ip: ${result.publicIp}`,
    `private ip: ${result.privateIp || "unknown"}`,
    `cockpit: ${result.url}`,
    `ssh: ${result.sshCommand}`,
  ];
  const outcome = result.monitor;
  if (!outcome) {
    lines.push("hint: installation continues on the instance (10-20 minutes); a notification is sent when it finishes");
    lines.push(`hint: follow it with: outpostctl logs --run ${result.runId} --follow`);
    return lines;
  }
  switch (outcome.kind) {
    case "completed":
      lines.push(`ok: Cockpit installation completed (${outcome.via === "status" ? "status file" : "installation log"})`);
      if (result.serviceReady === false) lines.push("warn: cockpit.socket not active yet; retry the URL in a minute");
      break;
    case "degraded":
      lines.push("warn: installation status could not be read, but the Cockpit endpoint answers");
      if (!outcome.remoteOk) lines.push(`warn: remote access may have issues; check it with: outpostctl ssh --run ${result.runId}`);
      break;
    case "install_failed":
      lines.push(`warn: installation failed${outcome.step ? ` at ${outcome.step}` : ""}: ${outcome.detail || "see the installation log"}`);
      lines.push(`hint: inspect it with: outpostctl logs --run ${result.runId}`);
      break;
    case "unknown":
      lines.push("warn: installation status unknown and the Cockpit endpoint does not answer");
      lines.push("hint: check the notification channel for the final report");
      break;
  }
  return lines;
}

export const launch = defineCommand({
  meta: {
    name: "launch",
    description: "Launch an instance and install the Cockpit web console on it.",
  },
  args: {
    ...commonArgs,
    monitor: { type: "boolean", description: "Follow the installation until Cockpit answers (prompted on a TTY when omitted)." },
  },
  async run({ args, rawArgs }) {
    const loaded = loadCliSettings(args);
    const { settings, layout } = loaded;
    const runId = newRunId();
    const logFile = resolveLaunchLogFile({ logsDir: layout.logsDir, runId });
    const logger = createCliLogger({ logFilePath: logFile });
    const provider = providerFor(loaded);
    const monitor = await resolveMonitorChoice(rawArgs, args.monitor);

    let instanceId: string | null = null;
    const dispose = installInterruptHandler({ region: provider.region, currentInstanceId: () => instanceId });
    try {
      const identityFile = resolveKeyFile(loaded);
      const result = await launchOutpost(
        settings,
        { monitor },
        {
          provider,
          logger,
          layout,
          runId,
          onInstanceCreated: (id) => {
            instanceId = id;
          },
          createMonitor: (publicIp) =>
            new InstallMonitor({
              remote: createSshRemote({ host: publicIp, user: settings.sshUser, identityFile }),
              probe: createHttpsProbe(),
              logger,
            }),
          openViewer,
        },
      );
      for (const line of summaryLines(result)) console.log(line);
      console.log(`hint: launch log in ${logFile}`);
    } finally {
      dispose();
    }
  },
});
