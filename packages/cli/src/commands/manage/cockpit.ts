import { defineCommand } from "citty";
import { cockpitUrl } from "@outpostctl/core/lib/notify/format";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { commonArgs, loadRunContext, requirePublicIp, runArg } from "../../lib/context.js";
import { openViewer } from "../../lib/viewer.js";

export const cockpit = defineCommand({
  meta: {
    name: "cockpit",
    description: "Print the Cockpit URL and open it in a browser.",
  },
  args: {
    ...commonArgs,
    ...runArg,
    open: { type: "boolean", description: "Open a browser.", default: true },
  },
  async run({ args }) {
    const { record } = await loadRunContext(args);
    const url = cockpitUrl(requirePublicIp(record));
    console.log(url);
    if (!args.open) return;
    try {
      await openViewer(url);
    } catch (err) {
      console.error(`warn: could not open a browser: ${formatUnknown(err)}`);
    }
  },
});
