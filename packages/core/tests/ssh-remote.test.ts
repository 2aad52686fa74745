import { describe, it, expect, vi, beforeEach } from "vitest";
import { buildSshArgs, shellQuote, sshCapture, validateTargetHost } from "../src/lib/security/ssh-remote.js";
import { createSshRemote } from "../src/lib/provision/remote.js";

const { captured } = vi.hoisted(() => {
  const calls: Array<{ cmd: string; args: string[] }> = [];
  return { captured: calls };
});

vi.mock("../src/lib/runtime/run.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/lib/runtime/run.js")>();
  return {
    ...actual,
    capture: vi.fn(async (cmd: string, args: string[]) => {
      captured.push({ cmd, args });
      return "active\n";
    }),
  };
});

beforeEach(() => {
  captured.length = 0;
});

describe("ssh target validation", () => {
  it("accepts user@host and rejects option injection", () => {
    expect(validateTargetHost("rocky@203.0.113.10")).toBe("rocky@203.0.113.10");
    expect(() => validateTargetHost("-oProxyCommand=bad")).toThrow(/invalid target host/i);
  });
});

describe("ssh argv", () => {
  it("orders options before the destination", () => {
    expect(
      buildSshArgs("rocky@203.0.113.10", {
        tty: true,
        identityFile: "/keys/lab.pem",
        connectTimeoutSec: 10,
        acceptNewHostKeys: true,
        batchMode: true,
      }),
    ).toEqual([
      "-t",
      "-i",
      "/keys/lab.pem",
      "-o",
      "ConnectTimeout=10",
      "-o",
      "StrictHostKeyChecking=no",
      "-o",
      "UserKnownHostsFile=/dev/null",
      "-o",
      "LogLevel=ERROR",
      "-o",
      "BatchMode=yes",
      "--",
      "rocky@203.0.113.10",
    ]);
  });

  it("rejects identity files that look like options", () => {
    expect(() => buildSshArgs("host", { identityFile: "-oBad" })).toThrow("invalid identity file path");
  });

  it("quotes single quotes for the remote shell", () => {
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
    expect(shellQuote("")).toBe("''");
  });
});

describe("ssh command channel", () => {
  it("runs non-interactive commands with host key acceptance", async () => {
    const remote = createSshRemote({ host: "203.0.113.10", user: "rocky", identityFile: "/keys/lab.pem" });
    expect(remote.target).toBe("rocky@203.0.113.10");
    await expect(remote.run("systemctl is-active cockpit.socket")).resolves.toBe("active\n");
    expect(captured).toEqual([
      {
        cmd: "ssh",
        args: [
          "-i",
          "/keys/lab.pem",
          "-o",
          "ConnectTimeout=10",
          "-o",
          "StrictHostKeyChecking=no",
          "-o",
          "UserKnownHostsFile=/dev/null",
          "-o",
          "LogLevel=ERROR",
          "-o",
          "BatchMode=yes",
          "--",
          "rocky@203.0.113.10",
          "systemctl is-active cockpit.socket",
        ],
      },
    ]);
  });

  it("passes the remote command as a single argument", async () => {
    await sshCapture("rocky@203.0.113.10", "cat '/var/lib/outpostctl/status.json'");
    expect(captured[0]?.args.at(-1)).toBe("cat '/var/lib/outpostctl/status.json'");
  });
});
