import { capture, run, type RunOpts } from "../runtime/run.js";

const SSH_TARGET_HOST_RE =
  /^(?:[A-Za-z0-9._-]+@)?(?:[A-Za-z0-9._-]+|\[[0-9a-fA-F:]+\])$/;
const WHITESPACE_RE = /\s/u;

function hasControlOrWhitespace(value: string): boolean {
  for (const character of value) {
    if (WHITESPACE_RE.test(character)) return true;
    const codePoint = character.codePointAt(0);
    if (codePoint !== undefined && (codePoint <= 0x1f || codePoint === 0x7f)) {
      return true;
    }
  }
  return false;
}

export function shellQuote(value: string): string {
  if (value.length === 0) return "''";
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function isValidTargetHost(targetHost: string): boolean {
  const v = targetHost.trim();
  if (!v) return false;
  if (v.startsWith("-")) return false;
  if (hasControlOrWhitespace(v)) return false;
  return SSH_TARGET_HOST_RE.test(v);
}

export function validateTargetHost(targetHost: string): string {
  const v = targetHost.trim();
  if (!isValidTargetHost(v)) {
    throw new Error(
      "invalid target host: expected user@host (no whitespace/control chars; no leading '-')",
    );
  }
  return v;
}

export type SshConnectOptions = {
  identityFile?: string;
  connectTimeoutSec?: number;
  // Fresh instances present unknown host keys; callers opt in explicitly.
  acceptNewHostKeys?: boolean;
  batchMode?: boolean;
  tty?: boolean;
};

export function buildSshArgs(targetHost: string, opts: SshConnectOptions = {}): string[] {
  const safeHost = validateTargetHost(targetHost);
  const args: string[] = [];
  if (opts.tty) args.push("-t");
  if (opts.identityFile) {
    if (opts.identityFile.startsWith("-") || hasControlOrWhitespace(opts.identityFile)) {
      throw new Error("invalid identity file path");
    }
    args.push("-i", opts.identityFile);
  }
  if (opts.connectTimeoutSec !== undefined) {
    args.push("-o", `ConnectTimeout=${Math.max(1, Math.trunc(opts.connectTimeoutSec))}`);
  }
  if (opts.acceptNewHostKeys) {
    args.push("-o", "StrictHostKeyChecking=no", "-o", "UserKnownHostsFile=/dev/null", "-o", "LogLevel=ERROR");
  }
  if (opts.batchMode) args.push("-o", "BatchMode=yes");
  args.push("--", safeHost);
  return args;
}

export async function sshRun(
  targetHost: string,
  remoteCmd: string,
  opts: RunOpts & SshConnectOptions = {},
): Promise<void> {
  const sshArgs = [...buildSshArgs(targetHost, opts), remoteCmd];
  await run("ssh", sshArgs, opts);
}

export async function sshCapture(
  targetHost: string,
  remoteCmd: string,
  opts: RunOpts & SshConnectOptions = {},
): Promise<string> {
  const sshArgs = [...buildSshArgs(targetHost, opts), remoteCmd];
  return await capture("ssh", sshArgs, opts);
}

/** Interactive session with the terminal attached. */
export async function sshInteractive(targetHost: string, opts: RunOpts & SshConnectOptions = {}): Promise<void> {
  await run("ssh", buildSshArgs(targetHost, opts), opts);
}
