import type { Logger } from "pino";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { InstallStepError, type StepCriticality } from "../runtime/errors.js";
import { retry, RetryExhaustedError, sleep as defaultSleep, type RetryPolicy, type Sleep } from "../runtime/retry.js";
import type { NotificationEvent, Notifier, ResourceSnapshot } from "../notify/types.js";
import type { StatusWriter } from "./status.js";
import { StepTracker, type StepState } from "./step-state.js";

export type StepContext = {
  logger: Logger;
  attempt: number;
};

export type InstallStep = {
  kind: "step";
  id: string;
  // Logged before the step runs; progress lines start with "Installing", "Configuring" or "Setting up".
  title: string;
  criticality: StepCriticality;
  retry: RetryPolicy;
  // Component name recorded as installed/absent in the final report.
  component?: string;
  alreadyDone?: (ctx: { logger: Logger }) => Promise<boolean>;
  run: (ctx: StepContext) => Promise<void>;
};

export type InstallBranch = {
  kind: "branch";
  id: string;
  title: string;
  predicate: () => boolean | Promise<boolean>;
  steps: InstallStep[];
};

export type PipelineEntry = InstallStep | InstallBranch;

export type StepRecord = {
  id: string;
  position: number;
  criticality: StepCriticality;
  state: StepState;
  history: readonly StepState[];
  attempts: number;
  error?: string;
};

export type PipelineRun = {
  state: "succeeded" | "failed";
  steps: StepRecord[];
  installed: string[];
  absent: string[];
  branches: Record<string, boolean>;
};

export type PipelineDeps = {
  logger: Logger;
  notifier: Notifier;
  snapshot: () => Promise<ResourceSnapshot>;
  status?: StatusWriter;
  sleep?: Sleep;
  now?: () => Date;
};

export type PipelineOptions = {
  completionMessage: string;
};

export function countSteps(entries: readonly PipelineEntry[]): number {
  return entries.reduce((n, entry) => n + (entry.kind === "branch" ? entry.steps.length : 1), 0);
}

export function stepLocation(position: number, total: number): string {
  return `step ${position}/${total}`;
}

export function memoizeAsync<T>(fn: () => Promise<T>): () => Promise<T> {
  let cached: Promise<T> | null = null;
  return async () => {
    cached ??= fn();
    return await cached;
  };
}

function lastErrorOf(err: unknown): unknown {
  return err instanceof RetryExhaustedError ? err.lastError : err;
}

class PipelineExecution {
  private readonly records: StepRecord[] = [];
  private readonly installed: string[] = [];
  private readonly absent: string[] = [];
  private readonly branches: Record<string, boolean> = {};
  private readonly total: number;
  private position = 0;

  constructor(
    private readonly entries: readonly PipelineEntry[],
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions,
  ) {
    this.total = countSteps(entries);
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  async execute(): Promise<PipelineRun> {
    for (const entry of this.entries) {
      if (entry.kind === "branch") await this.runBranch(entry);
      else await this.runStep(entry);
    }

    const { logger } = this.deps;
    logger.info(this.options.completionMessage);
    await this.deps.status?.write({ state: "succeeded", step: null });
    const run = this.result("succeeded");
    await this.deps.notifier.publish(
      await this.event({
        status: "SUCCESS",
        source: "pipeline",
        detail: this.options.completionMessage,
        installed: run.installed,
        absent: run.absent,
      }),
    );
    return run;
  }

  result(state: PipelineRun["state"]): PipelineRun {
    return {
      state,
      steps: [...this.records],
      installed: [...this.installed],
      absent: [...this.absent],
      branches: { ...this.branches },
    };
  }

  async event(params: Omit<NotificationEvent, "snapshot" | "timestamp">): Promise<NotificationEvent> {
    return { ...params, snapshot: await this.deps.snapshot(), timestamp: this.now().toISOString() };
  }

  private async runBranch(branch: InstallBranch): Promise<void> {
    const active = await branch.predicate();
    this.branches[branch.id] = active;
    this.deps.logger.info({ branch: branch.id, active }, `${branch.title}: ${active ? "enabled" : "not applicable"}`);
    for (const step of branch.steps) {
      if (active) {
        await this.runStep(step);
      } else {
        this.position += 1;
        const tracker = new StepTracker();
        tracker.moveTo("skipped");
        this.record(step, tracker, 0);
      }
    }
  }

  private record(step: InstallStep, tracker: StepTracker, attempts: number, error?: string): StepRecord {
    const rec: StepRecord = {
      id: step.id,
      position: this.position,
      criticality: step.criticality,
      state: tracker.state,
      history: [...tracker.history],
      attempts,
      ...(error ? { error } : {}),
    };
    this.records.push(rec);
    return rec;
  }

  private async runStep(step: InstallStep): Promise<void> {
    this.position += 1;
    const location = stepLocation(this.position, this.total);
    const logger = this.deps.logger.child({ step: step.id, location });
    const tracker = new StepTracker();
    await this.deps.status?.write({ state: "running", step: step.id, position: location });

    if (step.alreadyDone && (await step.alreadyDone({ logger }))) {
      tracker.moveTo("skipped");
      logger.info(`${step.title}: already present, skipping`);
      if (step.component) this.installed.push(step.component);
      this.record(step, tracker, 0);
      return;
    }

    logger.info(`${step.title}...`);
    let attempts = 0;
    try {
      await retry(
        async (attempt) => {
          attempts = attempt;
          tracker.moveTo("running");
          await step.run({ logger, attempt });
        },
        step.retry,
        {
          sleep: this.deps.sleep ?? defaultSleep,
          onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
            tracker.moveTo("retrying");
            logger.warn(
              { attempt, maxAttempts, delayMs },
              `attempt ${attempt}/${maxAttempts} failed (${formatUnknown(error)}); retrying in ${Math.round(delayMs / 1000)}s`,
            );
          },
        },
      );
    } catch (err) {
      const cause = lastErrorOf(err);
      const reason = formatUnknown(cause, "unknown error");
      if (step.criticality === "optional") {
        tracker.moveTo("failed_optional");
        logger.warn({ attempts }, `Warning: ${step.title} failed, continuing without it: ${reason}`);
        if (step.component) this.absent.push(step.component);
        this.record(step, tracker, attempts, reason);
        return;
      }

      tracker.moveTo("failed_critical");
      this.record(step, tracker, attempts, reason);
      const failure = new InstallStepError({ stepId: step.id, criticality: "critical", attempts, location, cause });
      logger.error({ err: failure }, `Critical operation failed: ${step.title}`);
      await this.deps.status?.write({ state: "failed", step: step.id, position: location, detail: reason });
      await this.deps.notifier.publish(
        await this.event({
          status: "FAILED",
          source: "step",
          stepId: step.id,
          location,
          detail: `Critical operation failed: ${step.title}\n${reason}`,
          absent: [...this.absent],
        }),
      );
      throw failure;
    }

    tracker.moveTo("succeeded");
    logger.info({ attempts }, `${step.title}: done`);
    if (step.component) this.installed.push(step.component);
    this.record(step, tracker, attempts);
  }
}

/**
 * Runs entries strictly in order. A failed optional step is logged and recorded as absent; a failed
 * critical step publishes one FAILED event and rejects with `InstallStepError`. On success, one
 * SUCCESS event is published after the completion message is logged.
 */
export async function runPipeline(
  entries: readonly PipelineEntry[],
  deps: PipelineDeps,
  options: PipelineOptions,
): Promise<PipelineRun> {
  return await new PipelineExecution(entries, deps, options).execute();
}

/**
 * Global failure handler: any rejection from `body` (the critical abort included) publishes a
 * FAILED event with source "trap" and is rethrown for the process to exit non-zero.
 */
export async function withFailureTrap<T>(
  body: () => Promise<T>,
  deps: Pick<PipelineDeps, "logger" | "notifier" | "snapshot" | "status" | "now">,
): Promise<T> {
  try {
    return await body();
  } catch (err) {
    const location = err instanceof InstallStepError ? err.location : undefined;
    const stepId = err instanceof InstallStepError ? err.stepId : undefined;
    const detail = `Bootstrap failed unexpectedly: ${formatUnknown(err, "unknown error")}`;
    deps.logger.error({ err }, detail);
    if (!(err instanceof InstallStepError)) {
      await deps.status?.write({ state: "failed", step: null, detail });
    }
    await deps.notifier.publish({
      status: "FAILED",
      source: "trap",
      snapshot: await deps.snapshot(),
      timestamp: (deps.now ? deps.now() : new Date()).toISOString(),
      detail,
      ...(stepId ? { stepId } : {}),
      ...(location ? { location } : {}),
    });
    throw err;
  }
}
