import type { Logger } from "pino";
import { formatUnknown, lastLines } from "@outpostctl/shared/lib/strings";
import { fixedPolicy, pollUntil, type PollOutcome, type RetryPolicy, type Sleep } from "../runtime/retry.js";
import { shellQuote } from "../security/ssh-remote.js";
import { cockpitUrl } from "../notify/format.js";
import { COMPLETION_MARKER, parseBootstrapStatus, type BootstrapStatus } from "../bootstrap/status.js";
import type { EndpointProbe } from "./probe.js";
import type { RemoteChannel } from "./remote.js";

export const LOG_TAIL_LINES = 10;

export type MonitorPolicies = {
  readiness: RetryPolicy;
  installation: RetryPolicy;
  endpoint: RetryPolicy;
  service: RetryPolicy;
};

export const DEFAULT_MONITOR_POLICIES: MonitorPolicies = {
  readiness: fixedPolicy(30, 10_000),
  installation: fixedPolicy(60, 30_000),
  endpoint: fixedPolicy(12, 30_000),
  service: fixedPolicy(20, 15_000),
};

export type MonitorTarget = {
  publicIp: string;
  statusPath: string;
  logPath: string;
};

export type MonitorOutcome =
  | { kind: "completed"; via: "status" | "log"; attempts: number }
  | { kind: "install_failed"; step: string | null; detail: string }
  | { kind: "degraded"; reason: "readiness_exhausted" | "polling_exhausted"; remoteOk: boolean }
  | { kind: "unknown"; reason: "readiness_exhausted" | "polling_exhausted" };

export type LogTailSummary = {
  completed: boolean;
  errors: string[];
  progress: string | null;
};

const ERROR_KEYWORD_RE = /error|failed/i;
const PROGRESS_RE = /^(Installing|Configuring|Setting up)\b/;

/** Bootstrapper log lines are JSON; the marker protocol matches on `msg`. Plain lines pass through. */
export function logLineMessage(line: string): string {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) return trimmed;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (parsed && typeof parsed === "object" && "msg" in parsed && typeof parsed.msg === "string") return parsed.msg;
    return trimmed;
  } catch {
    return trimmed;
  }
}

export function summarizeLogTail(text: string): LogTailSummary {
  const messages = lastLines(text, LOG_TAIL_LINES).map(logLineMessage);
  let progress: string | null = null;
  for (const msg of messages) {
    if (PROGRESS_RE.test(msg)) progress = msg;
  }
  return {
    completed: messages.some((msg) => msg.includes(COMPLETION_MARKER)),
    errors: messages.filter((msg) => ERROR_KEYWORD_RE.test(msg)),
    progress,
  };
}

type InstallResult = { kind: "completed"; via: "status" | "log" } | { kind: "install_failed"; status: BootstrapStatus };

export type InstallMonitorDeps = {
  remote: RemoteChannel;
  probe: EndpointProbe;
  logger: Logger;
  sleep?: Sleep;
  policies?: Partial<MonitorPolicies>;
};

export class InstallMonitor {
  private readonly policies: MonitorPolicies;

  constructor(private readonly deps: InstallMonitorDeps) {
    this.policies = { ...DEFAULT_MONITOR_POLICIES, ...deps.policies };
  }

  async waitForRemote(): Promise<boolean> {
    const { logger, remote } = this.deps;
    logger.info({ target: remote.target }, "waiting for remote command access");
    const res = await pollUntil<boolean>(
      async () => {
        try {
          await remote.run("echo ready");
          return { done: true, value: true };
        } catch (err) {
          logger.debug({ err: formatUnknown(err) }, "remote not ready");
          return { done: false };
        }
      },
      this.policies.readiness,
      {
        sleep: this.deps.sleep,
        onPending: ({ attempt, maxAttempts }) => logger.info(`remote not ready yet (${attempt}/${maxAttempts})`),
      },
    );
    return res.ok;
  }

  private async checkInstallation(target: MonitorTarget): Promise<PollOutcome<InstallResult>> {
    const { logger, remote } = this.deps;
    let statusText = "";
    try {
      statusText = await remote.run(`cat ${shellQuote(target.statusPath)} 2>/dev/null || true`);
    } catch (err) {
      logger.debug({ err: formatUnknown(err) }, "status read failed");
    }
    const status = statusText ? parseBootstrapStatus(statusText) : null;
    if (status) {
      if (status.state === "succeeded") return { done: true, value: { kind: "completed", via: "status" } };
      if (status.state === "failed") return { done: true, value: { kind: "install_failed", status } };
      logger.info({ step: status.step, position: status.position }, `installation running: ${status.step ?? "starting"}`);
      return { done: false };
    }

    let tail = "";
    try {
      tail = await remote.run(`sudo -n tail -n ${LOG_TAIL_LINES} ${shellQuote(target.logPath)} 2>/dev/null || true`);
    } catch (err) {
      logger.debug({ err: formatUnknown(err) }, "log tail failed");
      return { done: false };
    }
    const summary = summarizeLogTail(tail);
    if (summary.completed) return { done: true, value: { kind: "completed", via: "log" } };
    for (const line of summary.errors) logger.warn(`installation log reports: ${line}`);
    if (summary.progress) logger.info(`installation progress: ${summary.progress}`);
    return { done: false };
  }

  async verifyEndpoint(publicIp: string): Promise<boolean> {
    const { logger, probe } = this.deps;
    const url = `${cockpitUrl(publicIp)}/`;
    logger.info({ url }, "verifying Cockpit endpoint");
    const res = await pollUntil<boolean>(
      async () => ((await probe(url)) ? { done: true, value: true } : { done: false }),
      this.policies.endpoint,
      {
        sleep: this.deps.sleep,
        onPending: ({ attempt, maxAttempts }) => logger.info(`endpoint not reachable yet (${attempt}/${maxAttempts})`),
      },
    );
    return res.ok;
  }

  private async checkRemote(): Promise<boolean> {
    const { logger, remote } = this.deps;
    try {
      await remote.run("echo ready");
      logger.info("remote command access verified");
      return true;
    } catch (err) {
      logger.warn({ err: formatUnknown(err) }, "Cockpit accessible but remote access may have issues");
      return false;
    }
  }

  private async fallback(publicIp: string, reason: "readiness_exhausted" | "polling_exhausted"): Promise<MonitorOutcome> {
    const reachable = await this.verifyEndpoint(publicIp);
    if (reachable) {
      this.deps.logger.warn("remote checks inconclusive but the Cockpit endpoint answers; treating installation as complete");
      const remoteOk = await this.checkRemote();
      return { kind: "degraded", reason, remoteOk };
    }
    this.deps.logger.warn("installation status unknown; check the notification channel for the final report");
    return { kind: "unknown", reason };
  }

  /** Never throws for a slow or failed installation; the outcome says what is known. */
  async watch(target: MonitorTarget): Promise<MonitorOutcome> {
    if (!(await this.waitForRemote())) {
      this.deps.logger.warn("remote command access never became available");
      return await this.fallback(target.publicIp, "readiness_exhausted");
    }

    const { logger } = this.deps;
    logger.info("monitoring Cockpit installation");
    const res = await pollUntil<InstallResult>(async () => await this.checkInstallation(target), this.policies.installation, {
      sleep: this.deps.sleep,
      onPending: ({ attempt, maxAttempts }) => logger.debug(`installation poll ${attempt}/${maxAttempts}`),
    });
    if (!res.ok) {
      logger.warn(`installation did not report completion after ${res.attempts} checks`);
      return await this.fallback(target.publicIp, "polling_exhausted");
    }
    if (res.value.kind === "install_failed") {
      const { status } = res.value;
      return { kind: "install_failed", step: status.step, detail: status.detail ?? "" };
    }
    return { kind: "completed", via: res.value.via, attempts: res.attempts };
  }

  async waitForService(unit: string): Promise<boolean> {
    const { logger, remote } = this.deps;
    const res = await pollUntil<boolean>(
      async () => {
        try {
          const out = await remote.run(`systemctl is-active ${shellQuote(unit)}`);
          return out.trim() === "active" ? { done: true, value: true } : { done: false };
        } catch (err) {
          logger.debug({ err: formatUnknown(err) }, `${unit} not active`);
          return { done: false };
        }
      },
      this.policies.service,
      {
        sleep: this.deps.sleep,
        onPending: ({ attempt, maxAttempts }) => logger.info(`waiting for ${unit} (${attempt}/${maxAttempts})`),
      },
    );
    return res.ok;
  }
}
