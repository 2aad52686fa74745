export const STEP_STATES = [
  "not_started",
  "running",
  "retrying",
  "succeeded",
  "skipped",
  "failed_critical",
  "failed_optional",
] as const;
export type StepState = (typeof STEP_STATES)[number];

const TRANSITIONS: Record<StepState, readonly StepState[]> = {
  not_started: ["running", "skipped"],
  running: ["succeeded", "retrying", "failed_critical", "failed_optional"],
  retrying: ["running"],
  succeeded: [],
  skipped: [],
  failed_critical: [],
  failed_optional: [],
};

export class IllegalTransitionError extends Error {
  readonly from: StepState;
  readonly to: StepState;

  constructor(from: StepState, to: StepState) {
    super(`illegal step transition: ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function canTransition(from: StepState, to: StepState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(from: StepState, to: StepState): StepState {
  if (!canTransition(from, to)) throw new IllegalTransitionError(from, to);
  return to;
}

export function isTerminal(state: StepState): boolean {
  return TRANSITIONS[state].length === 0;
}

/** Tracks one step's state and the path it took through the machine. */
export class StepTracker {
  private current: StepState = "not_started";
  private readonly path: StepState[] = ["not_started"];

  get state(): StepState {
    return this.current;
  }

  get history(): readonly StepState[] {
    return this.path;
  }

  moveTo(next: StepState): void {
    this.current = transition(this.current, next);
    this.path.push(next);
  }
}
