import process from "node:process";
import { manualTerminateCommand } from "@outpostctl/core/lib/fleet/types";

const SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export type SignalSource = {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
};

export function interruptMessage(region: string, instanceId: string | null): string[] {
  if (!instanceId) return ["interrupted before any instance was launched; nothing to clean up"];
  return [
    `interrupted; instance ${instanceId} may still be running`,
    `terminate it with: ${manualTerminateCommand(region, instanceId)}`,
  ];
}

/**
 * On SIGINT/SIGTERM print the teardown command for the current instance and exit 1.
 * Returns a disposer that removes the handlers.
 */
export function installInterruptHandler(params: {
  region: string;
  currentInstanceId: () => string | null;
  source?: SignalSource;
  print?: (line: string) => void;
  exit?: (code: number) => void;
}): () => void {
  const source = params.source ?? process;
  const print = params.print ?? ((line: string) => console.error(line));
  const exit = params.exit ?? ((code: number) => process.exit(code));

  const onSignal = () => {
    for (const line of interruptMessage(params.region, params.currentInstanceId())) print(line);
    exit(1);
  };
  for (const signal of SIGNALS) source.once(signal, onSignal);
  return () => {
    for (const signal of SIGNALS) source.removeListener(signal, onSignal);
  };
}
