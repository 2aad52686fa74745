import { sshCapture } from "../security/ssh-remote.js";

export const SSH_CONNECT_TIMEOUT_SEC = 10;
export const SSH_COMMAND_TIMEOUT_MS = 60_000;

/** A command channel to the provisioned machine. */
export interface RemoteChannel {
  readonly target: string;
  run(command: string): Promise<string>;
}

export type SshRemoteOptions = {
  host: string;
  user: string;
  identityFile?: string;
  connectTimeoutSec?: number;
  commandTimeoutMs?: number;
};

export function sshTarget(user: string, host: string): string {
  return `${user}@${host}`;
}

export function createSshRemote(opts: SshRemoteOptions): RemoteChannel {
  const target = sshTarget(opts.user, opts.host);
  return {
    target,
    async run(command) {
      return await sshCapture(target, command, {
        identityFile: opts.identityFile || undefined,
        connectTimeoutSec: opts.connectTimeoutSec ?? SSH_CONNECT_TIMEOUT_SEC,
        acceptNewHostKeys: true,
        batchMode: true,
        stderr: "pipe",
        timeoutMs: opts.commandTimeoutMs ?? SSH_COMMAND_TIMEOUT_MS,
      });
    },
  };
}
