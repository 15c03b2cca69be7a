import type { QueryState, StateTransition } from "./types.js";

const ALLOWED_TRANSITIONS: Record<QueryState, readonly QueryState[]> = {
  START: ["EXTRACTING", "ERRORED"],
  EXTRACTING: ["ROUTING", "ERRORED"],
  ROUTING: ["EXECUTING", "ERRORED"],
  EXECUTING: ["AGGREGATING", "ERRORED"],
  AGGREGATING: ["DONE", "ERRORED"],
  DONE: [],
  ERRORED: []
};

export class InvalidStateTransitionError extends Error {
  constructor(
    readonly from: QueryState,
    readonly to: QueryState
  ) {
    super(`Invalid query state transition ${from} -> ${to}.`);
    this.name = "InvalidStateTransitionError";
  }
}

/** Tracks one run's lifecycle and the time spent in each state. */
export class QueryStateMachine {
  private current: QueryState = "START";
  private enteredAt: number;
  private readonly history: StateTransition[] = [];
  private readonly durations: Partial<Record<QueryState, number>> = {};

  constructor(
    private readonly startedAt: number,
    private readonly now: () => number
  ) {
    this.enteredAt = startedAt;
  }

  get state(): QueryState {
    return this.current;
  }

  get transitions(): readonly StateTransition[] {
    return [...this.history];
  }

  get stateDurationsMs(): Readonly<Partial<Record<QueryState, number>>> {
    return { ...this.durations };
  }

  isTerminal(): boolean {
    return this.current === "DONE" || this.current === "ERRORED";
  }

  transition(to: QueryState): StateTransition {
    if (!ALLOWED_TRANSITIONS[this.current].includes(to)) {
      throw new InvalidStateTransitionError(this.current, to);
    }
    const at = this.now();
    this.durations[this.current] = (this.durations[this.current] ?? 0) + (at - this.enteredAt);
    const record: StateTransition = { from: this.current, to, atMs: at - this.startedAt };
    this.history.push(record);
    this.current = to;
    this.enteredAt = at;
    return record;
  }
}
