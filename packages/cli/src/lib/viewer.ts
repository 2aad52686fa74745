import process from "node:process";
import { run } from "@outpostctl/core/lib/runtime/run";

export function viewerCommand(url: string, platform: NodeJS.Platform = process.platform): { cmd: string; args: string[] } {
  if (platform === "darwin") return { cmd: "open", args: [url] };
  if (platform === "win32") return { cmd: "cmd", args: ["/c", "start", "", url] };
  return { cmd: "xdg-open", args: [url] };
}

export async function openViewer(url: string): Promise<void> {
  const { cmd, args } = viewerCommand(url);
  await run(cmd, args, { stdin: "ignore", timeoutMs: 15_000 });
}
