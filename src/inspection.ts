import { Clock, Context, Effect, Option } from "effect";

import type { State } from "./state.js";

// ============================================================================
// Inspection Events
// ============================================================================

/**
 * Event emitted when a run starts at the initial state
 */
export interface StartEvent {
  readonly type: "@dfa.start";
  readonly state: State;
  readonly inputLength: number;
  readonly timestamp: number;
}

/**
 * Event emitted for every transition taken
 */
export interface StepEvent {
  readonly type: "@dfa.step";
  readonly fromState: State;
  readonly symbol: string;
  readonly toState: State;
  readonly timestamp: number;
}

/**
 * Event emitted when a symbol outside the alphabet halts the run
 */
export interface RejectSymbolEvent {
  readonly type: "@dfa.reject-symbol";
  readonly state: State;
  readonly symbol: string;
  readonly timestamp: number;
}

/**
 * Event emitted once the input is exhausted
 */
export interface DecideEvent {
  readonly type: "@dfa.decide";
  readonly finalState: State;
  readonly accepted: boolean;
  readonly timestamp: number;
}

/**
 * Union of all inspection events
 */
export type InspectionEvent = StartEvent | StepEvent | RejectSymbolEvent | DecideEvent;

/** Distributive Omit so each variant keeps its own fields */
type WithoutTimestamp<T> = T extends unknown ? Omit<T, "timestamp"> : never;

// ============================================================================
// Inspector Service
// ============================================================================

/**
 * Inspector interface for observing machine runs
 */
export interface Inspector {
  readonly onInspect: (event: InspectionEvent) => void;
}

/**
 * Inspector service tag - optional service for run introspection
 */
export const Inspector = Context.GenericTag<Inspector>("effect-dfa/Inspector");

/**
 * Create an inspector from a callback function.
 */
export const makeInspector = (onInspect: (event: InspectionEvent) => void): Inspector => ({
  onInspect,
});

/**
 * Stamp and deliver an event to the current inspector, if one is provided.
 * @internal
 */
export const emit = (event: WithoutTimestamp<InspectionEvent>): Effect.Effect<void> =>
  Effect.gen(function* () {
    const inspector = yield* Effect.serviceOption(Inspector);
    if (Option.isNone(inspector)) {
      return;
    }
    const timestamp = yield* Clock.currentTimeMillis;
    inspector.value.onInspect({ ...event, timestamp });
  });

// ============================================================================
// Built-in Inspectors
// ============================================================================

/**
 * Console inspector that logs events in a readable format
 */
export const consoleInspector = (prefix = "[dfa]"): Inspector =>
  makeInspector((event) => {
    switch (event.type) {
      case "@dfa.start":
        console.log(prefix, "start in", String(event.state), `(${event.inputLength} symbols)`);
        break;
      case "@dfa.step":
        console.log(prefix, `${event.fromState.name} --[${event.symbol}]--> ${event.toState.name}`);
        break;
      case "@dfa.reject-symbol":
        console.log(prefix, "invalid symbol", `'${event.symbol}'`, "in", event.state.name);
        break;
      case "@dfa.decide":
        console.log(prefix, event.accepted ? "ACCEPT" : "REJECT", "in", String(event.finalState));
        break;
    }
  });

/**
 * Collecting inspector that stores events in an array for testing
 */
export const collectingInspector = (events: InspectionEvent[]): Inspector =>
  makeInspector((event) => events.push(event));
