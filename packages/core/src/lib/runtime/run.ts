import { spawn } from "node:child_process";

export type RunOpts = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  dryRun?: boolean;
  redact?: string[];
  stdin?: "inherit" | "ignore";
  // Written to the child's stdin, which is then closed. Never echoed in dry-run output.
  input?: string;
  timeoutMs?: number;
  maxOutputBytes?: number;
  redactOutput?: boolean;
  // "pipe" keeps stderr for error classification instead of echoing it.
  stderr?: "inherit" | "pipe" | "ignore";
};

const STDERR_LIMIT_BYTES = 16 * 1024;

export class CommandError extends Error {
  readonly cmd: string;
  readonly exitCode: number | null;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(message: string, params: { cmd: string; exitCode: number | null; stderr?: string; timedOut?: boolean }) {
    super(message);
    this.name = "CommandError";
    this.cmd = params.cmd;
    this.exitCode = params.exitCode;
    this.stderr = params.stderr ?? "";
    this.timedOut = params.timedOut ?? false;
  }
}

export function redactLine(line: string, values?: string[]): string {
  if (!values || values.length === 0) return line;
  let redacted = line;
  for (const value of values) {
    const trimmed = value?.trim();
    if (!trimmed) continue;
    redacted = redacted.split(trimmed).join("<redacted>");
  }
  return redacted;
}

export async function run(
  cmd: string,
  args: string[],
  opts: RunOpts = {},
): Promise<void> {
  if (opts.dryRun) {
    const line = [cmd, ...args].join(" ");
    console.log(redactLine(line, opts.redact));
    return;
  }

  await new Promise<void>((resolve, reject) => {
    let settled = false;
    const finish = (err?: Error) => {
      if (settled) return;
      settled = true;
      if (err) reject(err);
      else resolve();
    };
    const stdinMode = opts.input !== undefined ? "pipe" : (opts.stdin ?? "inherit");
    const child = spawn(cmd, args, {
      cwd: opts.cwd,
      env: opts.env,
      stdio: [stdinMode, "inherit", "inherit"],
    });
    if (opts.input !== undefined) child.stdin?.end(opts.input);
    const timeout = opts.timeoutMs
      ? setTimeout(() => {
          child.kill("SIGTERM");
          finish(new CommandError(`${cmd} timed out after ${opts.timeoutMs}ms`, { cmd, exitCode: null, timedOut: true }));
        }, opts.timeoutMs)
      : null;
    child.on("error", (err) => finish(err));
    child.on("exit", (code) => {
      if (timeout) clearTimeout(timeout);
      if (code === 0) finish();
      else finish(new CommandError(`${cmd} exited with code ${code ?? "null"}`, { cmd, exitCode: code }));
    });
  });
}

export async function capture(
  cmd: string,
  args: string[],
  opts: RunOpts = {},
): Promise<string> {
  if (opts.dryRun) return "";

  return await new Promise<string>((resolve, reject) => {
    let settled = false;
    const finish = (err?: Error, value?: string) => {
      if (settled) return;
      settled = true;
      if (err) reject(err);
      else resolve(value ?? "");
    };
    const chunks: Buffer[] = [];
    const errChunks: Buffer[] = [];
    let totalBytes = 0;
    let errBytes = 0;
    const stdinMode = opts.stdin ?? "ignore";
    const stderrMode = opts.stderr ?? "inherit";
    const child = spawn(cmd, args, {
      cwd: opts.cwd,
      env: opts.env,
      stdio: [stdinMode, "pipe", stderrMode],
    });
    const stderrText = () => {
      const text = Buffer.concat(errChunks).toString("utf8").trim();
      return redactLine(text, opts.redact);
    };
    const timeout = opts.timeoutMs
      ? setTimeout(() => {
          child.kill("SIGTERM");
          finish(
            new CommandError(`${cmd} timed out after ${opts.timeoutMs}ms`, {
              cmd,
              exitCode: null,
              stderr: stderrText(),
              timedOut: true,
            }),
          );
        }, opts.timeoutMs)
      : null;
    child.stdout?.on("data", (buf: Buffer) => {
      if (opts.maxOutputBytes) {
        totalBytes += buf.length;
        if (totalBytes > opts.maxOutputBytes) {
          child.kill("SIGTERM");
          finish(new CommandError(`${cmd} output exceeded ${opts.maxOutputBytes} bytes`, { cmd, exitCode: null }));
          return;
        }
      }
      chunks.push(Buffer.from(buf));
    });
    child.stderr?.on("data", (buf: Buffer) => {
      if (errBytes >= STDERR_LIMIT_BYTES) return;
      errBytes += buf.length;
      errChunks.push(Buffer.from(buf));
    });
    child.on("error", (err) => finish(err));
    child.on("close", (code) => {
      if (timeout) clearTimeout(timeout);
      if (code === 0) {
        const output = Buffer.concat(chunks).toString("utf8").trim();
        const finalOutput = opts.redactOutput ? redactLine(output, opts.redact) : output;
        finish(undefined, finalOutput);
      } else {
        const stderr = stderrText();
        const suffix = stderr ? `: ${stderr.split("\n")[0]}` : "";
        finish(new CommandError(`${cmd} exited with code ${code ?? "null"}${suffix}`, { cmd, exitCode: code, stderr }));
      }
    });
  });
}
