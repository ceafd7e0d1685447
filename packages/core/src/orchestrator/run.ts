// ============================================
// Workflow Run State
// ============================================

import { createId, type EventKind, type TriggerMode } from "@phaseflow/shared";

import { ContextBus } from "../bus/context-bus.js";
import type { PhaseflowError } from "../errors/types.js";
import type { AggregatedDiagnostics } from "../workers/diagnostics.js";
import type { WorkerOutcome } from "../workers/types.js";
import type { WorkflowDefinition } from "../workflows/definition.js";
import { type RunStatus, RunStateMachine } from "./state-machine.js";

export type PhaseStatus = "Succeeded" | "PartiallyFailed" | "Failed" | "Skipped";

export type WorkerRecordStatus = WorkerOutcome["status"] | "Skipped";

export type AbortReason = "cancelled" | "approval-denied" | "phase-failed" | "fatal-error";

/**
 * One worker's part in one phase iteration.
 */
export interface WorkerRecord {
  workerId: string;
  advisory: boolean;
  status: WorkerRecordStatus;
  /** Absent for skipped workers */
  outcome?: WorkerOutcome;
  durationMs: number;
  /** Invocations made, retries included */
  attempts: number;
  /** Context bus violation that makes the run fail */
  fatalError?: PhaseflowError;
}

export interface IterationRecord {
  iteration: number;
  /** Phase-iteration key the workers wrote under */
  key: string;
  /** In declaration order */
  workers: WorkerRecord[];
  diagnostics: AggregatedDiagnostics;
  /** Loop predicate result; absent for phases that do not loop */
  loopSatisfied?: boolean;
}

export interface PhaseState {
  id: string;
  /** Unset until the phase finishes */
  status?: PhaseStatus;
  iterations: IterationRecord[];
  /** Why the phase was skipped or degraded */
  reason?: string;
  startedAt?: Date;
  endedAt?: Date;
}

/**
 * A worker selected by a `WorkerCompleted` event during the run. Recorded,
 * not dispatched.
 */
export interface FollowUp {
  workerId: string;
  mode: TriggerMode;
  eventKind: EventKind;
  triggeredBy: {
    workerId: string;
    phaseId: string;
    iteration: number;
    status: WorkerOutcome["status"];
  };
}

/**
 * Mutable state of a single execution of a workflow. Owned by the
 * orchestrator; read it once `isTerminal()` holds.
 */
export class WorkflowRun {
  readonly id: string;
  readonly definition: WorkflowDefinition;
  readonly contextBus: ContextBus;
  /** Phase states in declaration order */
  readonly phases: Map<string, PhaseState>;
  readonly followUps: FollowUp[] = [];

  /** Ids of the phases ready to run at the last scheduling step */
  phaseCursor: string[] = [];
  fatalError?: PhaseflowError;
  abortReason?: AbortReason;
  startedAt?: Date;
  endedAt?: Date;

  private readonly machine = new RunStateMachine();

  constructor(definition: WorkflowDefinition, options: { id?: string; contextBus?: ContextBus } = {}) {
    this.id = options.id ?? createId("run");
    this.definition = definition;
    this.contextBus = options.contextBus ?? new ContextBus();
    this.phases = new Map(
      definition.phases.map((phase): [string, PhaseState] => [phase.id, { id: phase.id, iterations: [] }])
    );
  }

  get status(): RunStatus {
    return this.machine.status;
  }

  /**
   * @throws InvalidTransitionError for a transition the run state machine rejects
   */
  transition(to: RunStatus): void {
    this.machine.transition(to);
    if (to === "Running") {
      this.startedAt = new Date();
    } else if (this.machine.isTerminal()) {
      this.endedAt = new Date();
    }
  }

  isTerminal(): boolean {
    return this.machine.isTerminal();
  }

  /**
   * State of a declared phase.
   *
   * @throws Error if the workflow declares no such phase
   */
  phase(id: string): PhaseState {
    const state = this.phases.get(id);
    if (!state) {
      throw new Error(`Phase "${id}" is not part of workflow "${this.definition.name}"`);
    }
    return state;
  }

  get durationMs(): number {
    if (!this.startedAt) return 0;
    return (this.endedAt ?? new Date()).getTime() - this.startedAt.getTime();
  }
}
