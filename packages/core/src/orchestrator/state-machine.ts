// ============================================
// Run State Machine
// ============================================

import { InvalidTransitionError } from "../errors/workflow-errors.js";

export type RunStatus = "Pending" | "Running" | "Succeeded" | "PartiallyFailed" | "Failed";

export type TerminalRunStatus = Exclude<RunStatus, "Pending" | "Running">;

/**
 * Valid run transitions.
 *
 * Pending → Running → one of the terminal statuses. Terminal statuses
 * have no way out.
 */
export const RUN_TRANSITIONS: Readonly<Record<RunStatus, readonly RunStatus[]>> = {
  Pending: ["Running"],
  Running: ["Succeeded", "PartiallyFailed", "Failed"],
  Succeeded: [],
  PartiallyFailed: [],
  Failed: [],
} as const;

export function isTerminalStatus(status: RunStatus): status is TerminalRunStatus {
  return RUN_TRANSITIONS[status].length === 0;
}

/**
 * Tracks the status of one run and rejects transitions the table does not allow.
 *
 * @example
 * ```typescript
 * const machine = new RunStateMachine();
 * machine.transition("Running");
 * machine.canTransition("Pending"); // false
 * machine.transition("Succeeded");
 * machine.isTerminal(); // true
 * ```
 */
export class RunStateMachine {
  private current: RunStatus;
  private readonly history: RunStatus[];

  constructor(initial: RunStatus = "Pending") {
    this.current = initial;
    this.history = [initial];
  }

  get status(): RunStatus {
    return this.current;
  }

  /** Every status the run has been in, oldest first */
  get transitions(): readonly RunStatus[] {
    return this.history;
  }

  canTransition(to: RunStatus): boolean {
    return RUN_TRANSITIONS[this.current].includes(to);
  }

  /**
   * @throws InvalidTransitionError when `to` is not reachable from the current status
   */
  transition(to: RunStatus): void {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.current = to;
    this.history.push(to);
  }

  isTerminal(): boolean {
    return isTerminalStatus(this.current);
  }
}
