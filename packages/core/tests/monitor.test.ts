import { describe, it, expect } from "vitest";
import { createSilentLogger } from "../src/lib/logging/logger.js";
import { InstallMonitor, logLineMessage, summarizeLogTail, type MonitorPolicies } from "../src/lib/provision/monitor.js";
import type { RemoteChannel } from "../src/lib/provision/remote.js";
import { fixedPolicy } from "../src/lib/runtime/retry.js";

const TARGET = {
  publicIp: "203.0.113.10",
  statusPath: "/var/lib/outpostctl/status.json",
  logPath: "/var/log/outpostctl-bootstrap.log",
};

type FakeRemote = RemoteChannel & { commands: string[] };

function fakeRemote(handler: (command: string) => string): FakeRemote {
  const commands: string[] = [];
  return {
    target: "rocky@203.0.113.10",
    commands,
    async run(command) {
      commands.push(command);
      return handler(command);
    },
  };
}

function status(state: "running" | "succeeded" | "failed", extra: Record<string, string> = {}): string {
  return JSON.stringify({ state, step: null, updatedAt: "2026-10-18T12:00:00.000Z", ...extra });
}

const QUICK: MonitorPolicies = {
  readiness: fixedPolicy(2, 5),
  installation: fixedPolicy(3, 7),
  endpoint: fixedPolicy(2, 11),
  service: fixedPolicy(2, 13),
};

function monitorFor(remote: RemoteChannel, reachable: boolean) {
  const sleeps: number[] = [];
  const probed: string[] = [];
  const monitor = new InstallMonitor({
    remote,
    probe: async (url) => {
      probed.push(url);
      return reachable;
    },
    logger: createSilentLogger(),
    policies: QUICK,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { monitor, sleeps, probed };
}

describe("log tail parsing", () => {
  it("reads the msg field of JSON lines", () => {
    expect(logLineMessage('{"level":30,"msg":"Installing cockpit"}')).toBe("Installing cockpit");
    expect(logLineMessage("  plain line ")).toBe("plain line");
    expect(logLineMessage("{not json")).toBe("{not json");
  });

  it("summarizes progress and errors", () => {
    const text = ["Installing cockpit", '{"level":50,"msg":"dnf failed"}', "Configuring firewall", ""].join("\n");
    expect(summarizeLogTail(text)).toEqual({ completed: false, errors: ["dnf failed"], progress: "Configuring firewall" });
  });

  it("detects the completion marker", () => {
    expect(summarizeLogTail('{"msg":"Cockpit installation completed successfully"}\n').completed).toBe(true);
  });
});

describe("InstallMonitor.watch", () => {
  it("completes from the status file", async () => {
    let reads = 0;
    const remote = fakeRemote((command) => {
      if (command === "echo ready") return "ready\n";
      if (command.startsWith("cat ")) {
        reads += 1;
        return reads === 1 ? status("running", { step: "Installing cockpit" }) : status("succeeded");
      }
      throw new Error(`unexpected command: ${command}`);
    });
    const { monitor, sleeps } = monitorFor(remote, false);

    await expect(monitor.watch(TARGET)).resolves.toEqual({ kind: "completed", via: "status", attempts: 2 });
    expect(sleeps).toEqual([7]);
    expect(remote.commands).toEqual([
      "echo ready",
      "cat '/var/lib/outpostctl/status.json' 2>/dev/null || true",
      "cat '/var/lib/outpostctl/status.json' 2>/dev/null || true",
    ]);
  });

  it("reports a failed installation with its step", async () => {
    const remote = fakeRemote((command) => {
      if (command === "echo ready") return "ready\n";
      return status("failed", { step: "Installing cockpit", detail: "dnf exited with code 1" });
    });
    const { monitor } = monitorFor(remote, true);

    await expect(monitor.watch(TARGET)).resolves.toEqual({
      kind: "install_failed",
      step: "Installing cockpit",
      detail: "dnf exited with code 1",
    });
  });

  it("falls back to the log marker without a status file", async () => {
    const remote = fakeRemote((command) => {
      if (command === "echo ready") return "ready\n";
      if (command.startsWith("cat ")) return "";
      return '{"level":30,"msg":"Cockpit installation completed successfully"}\n';
    });
    const { monitor } = monitorFor(remote, false);

    await expect(monitor.watch(TARGET)).resolves.toEqual({ kind: "completed", via: "log", attempts: 1 });
    expect(remote.commands[2]).toBe("sudo -n tail -n 10 '/var/log/outpostctl-bootstrap.log' 2>/dev/null || true");
  });

  it("degrades to endpoint verification when remote access never comes up", async () => {
    const remote = fakeRemote(() => {
      throw new Error("Connection refused");
    });
    const { monitor, sleeps, probed } = monitorFor(remote, true);

    await expect(monitor.watch(TARGET)).resolves.toEqual({
      kind: "degraded",
      reason: "readiness_exhausted",
      remoteOk: false,
    });
    expect(sleeps).toEqual([5]);
    expect(probed).toEqual(["https://203.0.113.10:9090/"]);
  });

  it("reports unknown when neither remote nor endpoint answer", async () => {
    const remote = fakeRemote(() => {
      throw new Error("Connection refused");
    });
    const { monitor, sleeps, probed } = monitorFor(remote, false);

    await expect(monitor.watch(TARGET)).resolves.toEqual({ kind: "unknown", reason: "readiness_exhausted" });
    expect(sleeps).toEqual([5, 11]);
    expect(probed).toHaveLength(2);
  });

  it("degrades after polling is exhausted", async () => {
    const remote = fakeRemote((command) => (command === "echo ready" ? "ready\n" : status("running")));
    const { monitor, sleeps } = monitorFor(remote, true);

    await expect(monitor.watch(TARGET)).resolves.toEqual({ kind: "degraded", reason: "polling_exhausted", remoteOk: true });
    expect(sleeps).toEqual([7, 7]);
    expect(remote.commands.at(-1)).toBe("echo ready");
  });

  it("flags remote access when it drops after polling while the endpoint answers", async () => {
    let readyChecks = 0;
    const remote = fakeRemote((command) => {
      if (command !== "echo ready") return status("running");
      readyChecks += 1;
      if (readyChecks > 1) throw new Error("Connection reset by peer");
      return "ready\n";
    });
    const { monitor, probed } = monitorFor(remote, true);

    await expect(monitor.watch(TARGET)).resolves.toEqual({ kind: "degraded", reason: "polling_exhausted", remoteOk: false });
    expect(readyChecks).toBe(2);
    expect(probed).toEqual(["https://203.0.113.10:9090/"]);
  });
});

describe("InstallMonitor.waitForService", () => {
  it("polls until the unit is active", async () => {
    let checks = 0;
    const remote = fakeRemote(() => {
      checks += 1;
      return checks === 1 ? "activating\n" : "active\n";
    });
    const { monitor, sleeps } = monitorFor(remote, false);

    await expect(monitor.waitForService("cockpit.socket")).resolves.toBe(true);
    expect(remote.commands).toEqual(["systemctl is-active 'cockpit.socket'", "systemctl is-active 'cockpit.socket'"]);
    expect(sleeps).toEqual([13]);
  });

  it("gives up after the service policy", async () => {
    const remote = fakeRemote(() => {
      throw new Error("inactive");
    });
    const { monitor } = monitorFor(remote, false);
    await expect(monitor.waitForService("cockpit.socket")).resolves.toBe(false);
  });
});
