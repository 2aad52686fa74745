import { defineCommand } from "citty";
import { DEFAULT_BOOTSTRAP_LOG_PATH } from "@outpostctl/core/lib/bootstrap/status";
import { shellQuote, sshRun } from "@outpostctl/core/lib/security/ssh-remote";
import { commonArgs, loadRunContext, runArg, sshAccess } from "../../lib/context.js";

export const LOG_LINES = 50;

export function logTailCommand(params: { follow: boolean; lines: number; logPath: string }): string {
  const mode = params.follow ? "-f" : `-n ${Math.max(1, Math.trunc(params.lines))}`;
  return `sudo tail ${mode} ${shellQuote(params.logPath)}`;
}

export const logs = defineCommand({
  meta: {
    name: "logs",
    description: "Show the bootstrap log on the instance.",
  },
  args: {
    ...commonArgs,
    ...runArg,
    follow: { type: "boolean", description: "Follow the log.", default: false },
    lines: { type: "string", description: "Number of lines (default: 50).", default: String(LOG_LINES) },
  },
  async run({ args }) {
    const lines = Number.parseInt(args.lines, 10);
    if (!Number.isFinite(lines) || lines <= 0) throw new Error(`invalid --lines: ${args.lines}`);
    const { target, options } = sshAccess(await loadRunContext(args));
    await sshRun(target, logTailCommand({ follow: args.follow, lines, logPath: DEFAULT_BOOTSTRAP_LOG_PATH }), {
      ...options,
      tty: args.follow,
    });
  },
});
