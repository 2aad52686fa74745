import { describe, it, expect } from "vitest";
import { parseBootstrapConfig } from "../src/lib/bootstrap/config.js";
import type { HostSystem, PackageInstaller } from "../src/lib/bootstrap/host.js";
import { countSteps } from "../src/lib/bootstrap/pipeline.js";
import {
  buildCockpitPlan,
  isBareMetalInstanceType,
  MOTD_PATH,
  renderCockpitConf,
  SSM_AGENT_RPM_URL,
} from "../src/lib/bootstrap/plan.js";
import { runBootstrap } from "../src/lib/bootstrap/run-bootstrap.js";
import type { StatusWriter } from "../src/lib/bootstrap/status.js";
import { createSilentLogger } from "../src/lib/logging/logger.js";
import type { NotificationEvent, ResourceSnapshot } from "../src/lib/notify/types.js";
import { InstallStepError } from "../src/lib/runtime/errors.js";

const TOPIC = "arn:aws:sns:us-east-1:123456789012:cockpit-alerts";

function fakeHost(params: { users?: string[]; active?: string[]; paths?: string[] } = {}) {
  const commands: string[] = [];
  const inputs: string[] = [];
  const files = new Map<string, string>();
  const users = new Set(params.users ?? ["rocky"]);
  const active = new Set(params.active ?? []);
  const paths = new Set(params.paths ?? []);
  const host: HostSystem = {
    async exec(cmd, args, opts = {}) {
      commands.push([cmd, ...args].join(" "));
      if (opts.input !== undefined) inputs.push(opts.input);
      return cmd === "sensors" ? "coretemp-isa-0000" : "";
    },
    async succeeds() {
      return true;
    },
    async isActive(unit) {
      return active.has(unit);
    },
    async userExists(name) {
      return users.has(name);
    },
    async writeFile(filePath, contents) {
      files.set(filePath, contents);
    },
    async pathExists(filePath) {
      return paths.has(filePath);
    },
  };
  return { host, commands, inputs, files };
}

function fakeInstaller(params: { installed?: string[]; failOn?: string } = {}) {
  const calls: string[] = [];
  const installed = new Set(params.installed ?? []);
  const installer: PackageInstaller = {
    async isInstalled(name) {
      return installed.has(name);
    },
    async install(specs) {
      calls.push(specs.join(" "));
      if (params.failOn && specs.includes(params.failOn)) throw new Error(`dnf install failed for ${params.failOn}`);
    },
    async update() {
      calls.push("update");
    },
  };
  return { installer, calls };
}

function harness(
  instanceType: string,
  opts: { password?: string; installer?: ReturnType<typeof fakeInstaller>; snapshot?: () => Promise<ResourceSnapshot> } = {},
) {
  const config = parseBootstrapConfig({
    schemaVersion: 1,
    topicArn: TOPIC,
    region: "us-east-1",
    ...(opts.password ? { adminPassword: opts.password } : {}),
  });
  const hostFake = fakeHost({ active: ["firewalld"] });
  const installerFake = opts.installer ?? fakeInstaller();
  const events: NotificationEvent[] = [];
  const statuses: Array<Parameters<StatusWriter["write"]>[0]> = [];
  const delays: number[] = [];
  const run = () =>
    runBootstrap(config, {
      logger: createSilentLogger(),
      host: hostFake.host,
      installer: installerFake.installer,
      notifier: { publish: async (event) => void events.push(event) },
      status: { write: async (s) => void statuses.push(s) },
      snapshot:
        opts.snapshot ??
        (async () => ({
          instanceId: "i-0123456789abcdef0",
          instanceType,
          publicIp: "203.0.113.10",
          privateIp: "10.0.0.5",
          availabilityZone: "us-east-1a",
        })),
      sleep: async (ms) => void delays.push(ms),
      now: () => new Date("2026-10-18T12:00:00.000Z"),
    });
  return { run, config, hostFake, installerFake, events, statuses, delays };
}

describe("cockpit plan", () => {
  it("treats only .metal instance types as bare metal", () => {
    expect(isBareMetalInstanceType("m5.metal")).toBe(true);
    expect(isBareMetalInstanceType(" c6i.metal ")).toBe(true);
    expect(isBareMetalInstanceType("m5.large")).toBe(false);
    expect(isBareMetalInstanceType("metal.large")).toBe(false);
  });

  it("lays out every step in execution order", () => {
    const { config, hostFake, installerFake } = harness("m5.large");
    const plan = buildCockpitPlan({
      config,
      host: hostFake.host,
      installer: installerFake.installer,
      instanceType: async () => "m5.large",
      publicIp: async () => "203.0.113.10",
    });
    expect(plan).toHaveLength(32);
    expect(countSteps(plan)).toBe(34);
    expect(plan.slice(0, 6).map((entry) => entry.id)).toEqual([
      "system-update",
      "base-tools",
      "epel",
      "aws-cli",
      "ssm-agent",
      "cockpit-core",
    ]);
    expect(plan.map((entry) => entry.id).slice(-6)).toEqual([
      "enable-pmlogger",
      "firewall",
      "startup-unit",
      "cockpit-conf",
      "motd",
      "ec2-user",
    ]);
  });

  it("renders the console settings", () => {
    expect(renderCockpitConf("Lab Console")).toBe(
      "[WebService]\nAllowUnencrypted=false\nLoginTitle=Lab Console\n\n[Session]\nIdleTimeout=15\n",
    );
  });
});

describe("runBootstrap", () => {
  it("installs everything on a bare-metal instance and reports success once", async () => {
    const h = harness("m5.metal", { password: "test-secret" });
    const result = await h.run();

    expect(result.state).toBe("succeeded");
    expect(result.steps).toHaveLength(34);
    expect(result.steps.every((s) => s.state === "succeeded")).toBe(true);
    expect(result.branches).toEqual({ "bare-metal-sensors": true });
    expect(result.absent).toEqual([]);
    expect(h.installerFake.calls.slice(0, 4)).toEqual(["update", "curl unzip", "epel-release", SSM_AGENT_RPM_URL]);
    expect(h.installerFake.calls).toContain("lm_sensors");
    expect(h.hostFake.commands).toContain("useradd -m -G wheel,libvirt admin");
    expect(h.hostFake.commands).toContain("usermod -aG wheel,libvirt rocky");
    expect(h.hostFake.inputs).toEqual(["admin:test-secret\nrocky:test-secret\n"]);
    expect(h.hostFake.commands).toContain("firewall-cmd --permanent --add-service=cockpit");
    expect(h.hostFake.commands).toContain("systemctl enable --now cockpit.socket");
    expect(h.hostFake.files.get(MOTD_PATH)).toContain("Access: https://203.0.113.10:9090");

    expect(h.statuses[0]).toEqual({ state: "running", step: null });
    expect(h.events).toHaveLength(1);
    expect(h.events[0]).toMatchObject({ status: "SUCCESS", source: "pipeline" });
    expect(h.events[0]?.installed).toContain("cockpit-sensors");
  });

  it("skips the sensor branch on virtualized instances and leaves passwords alone", async () => {
    const h = harness("m5.large");
    const result = await h.run();

    expect(result.branches).toEqual({ "bare-metal-sensors": false });
    expect(result.steps.filter((s) => s.state === "skipped").map((s) => s.id)).toEqual([
      "lm-sensors",
      "cockpit-sensors",
      "sensors-detect",
    ]);
    expect(h.installerFake.calls).not.toContain("lm_sensors");
    expect(h.hostFake.inputs).toEqual([]);
  });

  it("picks up a public IP that appears after the instance type was read", async () => {
    let reads = 0;
    const h = harness("m5.large", {
      snapshot: async () => {
        reads += 1;
        return {
          instanceId: "i-0123456789abcdef0",
          instanceType: "m5.large",
          publicIp: reads === 1 ? "unknown" : "203.0.113.10",
          privateIp: "10.0.0.5",
          availabilityZone: "us-east-1a",
        };
      },
    });

    await h.run();

    expect(reads).toBe(3);
    expect(h.hostFake.files.get(MOTD_PATH)).toContain("Access: https://203.0.113.10:9090");
    expect(h.events).toHaveLength(1);
    expect(h.events[0]?.snapshot.publicIp).toBe("203.0.113.10");
  });

  it("skips packages that are already installed", async () => {
    const h = harness("m5.large", { installer: fakeInstaller({ installed: ["amazon-ssm-agent"] }) });
    const result = await h.run();
    expect(result.steps.find((s) => s.id === "ssm-agent")?.state).toBe("skipped");
    expect(h.installerFake.calls).not.toContain(SSM_AGENT_RPM_URL);
  });

  it("stops at a critical failure after the dnf retry budget", async () => {
    const h = harness("m5.large", { installer: fakeInstaller({ failOn: "epel-release" }) });

    await expect(h.run()).rejects.toBeInstanceOf(InstallStepError);

    expect(h.delays).toEqual([30_000, 30_000]);
    expect(h.installerFake.calls).toEqual(["update", "curl unzip", "epel-release", "epel-release", "epel-release"]);
    expect(h.events.map((e) => [e.status, e.source, e.location])).toEqual([
      ["FAILED", "step", "step 3/34"],
      ["FAILED", "trap", "step 3/34"],
    ]);
  });
});
