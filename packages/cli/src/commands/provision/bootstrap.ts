import { defineCommand } from "citty";
import { DEFAULT_BOOTSTRAP_CONFIG_PATH, loadBootstrapConfig } from "@outpostctl/core/lib/bootstrap/config";
import { runBootstrap } from "@outpostctl/core/lib/bootstrap/run-bootstrap";
import { createLogger } from "@outpostctl/core/lib/logging/logger";
import { resolveLogLevel } from "../../lib/context.js";

const bootstrapRun = defineCommand({
  meta: {
    name: "run",
    description: "Install and configure Cockpit on this machine (runs on the instance via cloud-init, as root).",
  },
  args: {
    config: { type: "string", description: "Bootstrap config file.", default: DEFAULT_BOOTSTRAP_CONFIG_PATH },
  },
  async run({ args }) {
    const config = await loadBootstrapConfig(args.config);
    const logger = createLogger({
      name: "outpostctl-bootstrap",
      level: resolveLogLevel(),
      console: 1,
      logFilePath: config.logPath,
      logFileMode: 0o644,
      syncFile: true,
    });
    const result = await runBootstrap(config, { logger });
    const skipped = result.steps.filter((step) => step.state === "skipped").length;
    console.log(`ok: ${result.steps.length - skipped} step(s) run, ${skipped} skipped`);
    if (result.absent.length > 0) console.log(`warn: unavailable components: ${result.absent.join(", ")}`);
  },
});

export const bootstrap = defineCommand({
  meta: {
    name: "bootstrap",
    description: "Bootstrapper that runs on the provisioned instance.",
  },
  subCommands: {
    run: bootstrapRun,
  },
});
