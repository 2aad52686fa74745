import { describe, it, expect, vi, beforeEach } from "vitest";
import pino from "pino";
import { createLocalHost } from "../src/lib/bootstrap/host.js";
import { CommandError } from "../src/lib/runtime/run.js";

const { captureMock } = vi.hoisted(() => ({ captureMock: vi.fn() }));

vi.mock("../src/lib/runtime/run.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/lib/runtime/run.js")>();
  return { ...actual, capture: captureMock };
});

function recordingHost() {
  const lines: unknown[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { host: createLocalHost({ logger }), lines };
}

beforeEach(() => {
  captureMock.mockReset();
});

describe("local host exec", () => {
  it("keeps command output in the debug log", async () => {
    captureMock.mockResolvedValueOnce("Metadata cache created.");
    const { host, lines } = recordingHost();

    await expect(host.exec("dnf", ["makecache"])).resolves.toBe("Metadata cache created.");

    expect(lines).toContainEqual(
      expect.objectContaining({ level: 20, msg: "dnf output", cmd: "dnf", args: ["makecache"], output: "Metadata cache created." }),
    );
  });

  it("logs the full stderr of a failed command and rethrows", async () => {
    const failure = new CommandError("dnf exited with code 1: Error: nothing provides libfoo", {
      cmd: "dnf",
      exitCode: 1,
      stderr: "Error: nothing provides libfoo\n(try to add '--skip-broken')",
    });
    captureMock.mockRejectedValueOnce(failure);
    const { host, lines } = recordingHost();

    await expect(host.exec("dnf", ["install", "-y", "cockpit"])).rejects.toBe(failure);

    expect(lines).toContainEqual(
      expect.objectContaining({
        level: 50,
        msg: "dnf failed",
        exitCode: 1,
        stderr: "Error: nothing provides libfoo\n(try to add '--skip-broken')",
      }),
    );
  });

  it("does not log empty output", async () => {
    captureMock.mockResolvedValueOnce("");
    const { host, lines } = recordingHost();

    await host.exec("systemctl", ["enable", "--now", "cockpit.socket"]);

    expect(lines).toEqual([
      expect.objectContaining({ level: 20, msg: "exec", cmd: "systemctl", args: ["enable", "--now", "cockpit.socket"] }),
    ]);
  });
});
