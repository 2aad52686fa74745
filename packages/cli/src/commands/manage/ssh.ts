import { defineCommand } from "citty";
import { sshInteractive } from "@outpostctl/core/lib/security/ssh-remote";
import { commonArgs, loadRunContext, runArg, sshAccess } from "../../lib/context.js";

export const ssh = defineCommand({
  meta: {
    name: "ssh",
    description: "Open an interactive SSH session on the instance.",
  },
  args: {
    ...commonArgs,
    ...runArg,
  },
  async run({ args }) {
    const { target, options } = sshAccess(await loadRunContext(args));
    await sshInteractive(target, { ...options, tty: true });
  },
});
