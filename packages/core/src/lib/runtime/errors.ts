export type ProviderErrorCode =
  | "NotFound"
  | "QuotaExceeded"
  | "InvalidParameter"
  | "Timeout"
  | "NoCapacity"
  | "PermissionDenied"
  | "Unknown";

/**
 * Base class for failures the CLI reports to the operator. `hint` is the concrete next action
 * (a command to run, a log to inspect, a channel to check) printed under the message.
 */
export class OutpostError extends Error {
  readonly hint: string;

  constructor(message: string, params: { hint?: string; cause?: unknown } = {}) {
    super(message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "OutpostError";
    this.hint = params.hint ?? "";
  }
}

/** Bad or missing input; raised before any cloud resource exists. */
export class PreconditionError extends OutpostError {
  constructor(message: string, params: { hint?: string; cause?: unknown } = {}) {
    super(message, params);
    this.name = "PreconditionError";
  }
}

export class ProviderError extends OutpostError {
  readonly code: ProviderErrorCode;
  readonly operation: string;

  constructor(
    operation: string,
    message: string,
    params: { code?: ProviderErrorCode; hint?: string; cause?: unknown } = {},
  ) {
    super(`${operation} failed: ${message}`, params);
    this.name = "ProviderError";
    this.code = params.code ?? "Unknown";
    this.operation = operation;
  }
}

export type StepCriticality = "critical" | "optional";

export class InstallStepError extends OutpostError {
  readonly stepId: string;
  readonly criticality: StepCriticality;
  readonly attempts: number;
  readonly location: string;

  constructor(params: {
    stepId: string;
    criticality: StepCriticality;
    attempts: number;
    location: string;
    cause?: unknown;
    hint?: string;
  }) {
    const reason = params.cause instanceof Error ? params.cause.message : String(params.cause ?? "unknown error");
    super(`${params.criticality} step ${params.stepId} failed after ${params.attempts} attempt(s): ${reason}`, {
      cause: params.cause,
      hint: params.hint,
    });
    this.name = "InstallStepError";
    this.stepId = params.stepId;
    this.criticality = params.criticality;
    this.attempts = params.attempts;
    this.location = params.location;
  }
}

export class VerificationTimeout extends OutpostError {
  readonly phase: string;
  readonly attempts: number;

  constructor(phase: string, attempts: number, params: { hint?: string; cause?: unknown } = {}) {
    super(`${phase} timed out after ${attempts} attempt(s)`, params);
    this.name = "VerificationTimeout";
    this.phase = phase;
    this.attempts = attempts;
  }
}

/** A failure after the instance exists. The instance is left running for the operator to inspect. */
export class LaunchAbortedError extends OutpostError {
  readonly instanceId: string;
  readonly region: string;

  constructor(params: { instanceId: string; region: string; cause: unknown; hint: string }) {
    const reason = params.cause instanceof Error ? params.cause.message : String(params.cause);
    super(`launch aborted after instance ${params.instanceId} was created: ${reason}`, {
      cause: params.cause,
      hint: params.hint,
    });
    this.name = "LaunchAbortedError";
    this.instanceId = params.instanceId;
    this.region = params.region;
  }
}

export function errorHint(err: unknown): string {
  return err instanceof OutpostError ? err.hint : "";
}
