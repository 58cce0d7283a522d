/**
 * Immutable deterministic finite automaton.
 *
 * A `Machine` is produced by `MachineBuilder.build()` and holds a frozen
 * snapshot of the builder's states, alphabet and transitions. Runs never
 * mutate that snapshot; the only moving part is the committed cursor exposed
 * through `currentState`, `step` and `reset`.
 *
 * @example
 * ```ts
 * import { Effect } from "effect"
 * import { Dfa } from "effect-dfa"
 *
 * const evenOnes = Dfa.builder()
 *   .withAlphabet(["0", "1"])
 *   .addState("Even", true)
 *   .addState("Odd")
 *   .setInitialState("Even")
 *   .addTransition("Even", "0", "Even")
 *   .addTransition("Even", "1", "Odd")
 *   .addTransition("Odd", "0", "Odd")
 *   .addTransition("Odd", "1", "Even")
 *   .build()
 *
 * Effect.runSync(evenOnes.process("1100")) // true
 * evenOnes.accepts("111")                  // false
 * ```
 *
 * @module
 */
import { Cause, Effect, Exit, Option } from "effect";

import { StateError, type TransitionError } from "./errors.js";
import { emit } from "./inspection.js";
import type { ExecutionTable } from "./internal/execute.js";
import { resolveStep, run, toSymbols } from "./internal/execute.js";
import type { TransitionIndex } from "./internal/transition-index.js";
import type { State } from "./state.js";
import type { Transition } from "./transition.js";

// ============================================================================
// Core types
// ============================================================================

/**
 * Input accepted by execution operations: a string split per character, or
 * an iterable of whole symbols.
 */
export type Input = string | Iterable<string>;

/**
 * Everything a Machine is built from. Produced by the builder once
 * validation has passed.
 * @internal
 */
export interface MachineSnapshot {
  readonly states: ReadonlyArray<State>;
  readonly alphabet: ReadonlyArray<string>;
  readonly transitions: ReadonlyArray<Transition>;
  readonly index: TransitionIndex;
  readonly initialState: State;
}

// ============================================================================
// Machine class
// ============================================================================

export class Machine {
  readonly states: ReadonlyArray<State>;
  readonly alphabet: ReadonlyArray<string>;
  readonly transitions: ReadonlyArray<Transition>;
  readonly initialState: State;
  readonly acceptingStates: ReadonlyArray<State>;
  /** @internal */ readonly _table: ExecutionTable;
  /** @internal */ readonly _stateMap: ReadonlyMap<string, State>;
  /** @internal */ readonly _acceptingNames: ReadonlySet<string>;
  /** @internal */ _current: State;

  /** @internal */
  constructor(snapshot: MachineSnapshot) {
    this.states = Object.freeze([...snapshot.states]);
    this.alphabet = Object.freeze([...snapshot.alphabet]);
    this.transitions = Object.freeze([...snapshot.transitions]);
    this.initialState = snapshot.initialState;
    this.acceptingStates = Object.freeze(this.states.filter((s) => s.isAccepting));
    this._stateMap = new Map(this.states.map((s) => [s.name, s]));
    this._acceptingNames = new Set(this.acceptingStates.map((s) => s.name));
    this._table = {
      alphabet: this.alphabet,
      symbols: new Set(this.alphabet),
      index: new Map(
        [...snapshot.index].map(([name, symbols]) => [name, new Map(symbols)] as const),
      ),
    };
    this._current = this.initialState;
  }

  // ---- accessors ----

  /** Cursor left by the last `process`, `step` or `reset` */
  get currentState(): State {
    return this._current;
  }

  /**
   * Look up a registered state by name.
   * @throws StateError when no state has that name
   */
  getState(name: string): State {
    const state = this._stateMap.get(name);
    if (state === undefined) {
      throw StateError.undefinedState(name);
    }
    return state;
  }

  /** Membership in the accepting set, by name */
  isAccepting(state: State): boolean {
    return this._acceptingNames.has(state.name);
  }

  // ---- execution ----

  /**
   * Run `input` from the initial state and decide acceptance.
   *
   * Each call starts from a fresh cursor. On success the final state becomes
   * `currentState`; on failure `currentState` is left at the initial state.
   */
  process(input: Input): Effect.Effect<boolean, TransitionError> {
    return processImpl(this, input);
  }

  /**
   * Synchronous `process`. Throws the `TransitionError` itself.
   */
  accepts(input: Input): boolean {
    return runSyncOrThrow(this.process(input));
  }

  /** States visited while running `input`, initial state first */
  trace(input: Input): Effect.Effect<ReadonlyArray<State>, TransitionError> {
    return traceImpl(this, input);
  }

  /** Pure lookup of the destination of `state` on `symbol` */
  nextState(state: State, symbol: string): Effect.Effect<State, TransitionError> {
    return resolveStep(this._table, state, symbol);
  }

  /**
   * Advance the committed cursor by one symbol.
   * The cursor does not move when the symbol is rejected.
   */
  step(symbol: string): Effect.Effect<State, TransitionError> {
    return stepImpl(this, symbol);
  }

  /** Return the committed cursor to the initial state */
  reset(): void {
    this._current = this.initialState;
  }

  toString(): string {
    return `Machine(${this.states.length} states, alphabet: [${this.alphabet.join(", ")}], initial: ${this.initialState.name})`;
  }
}

// ============================================================================
// Execution
// ============================================================================

const processImpl = Effect.fn("effect-dfa.machine.process")(function* (
  machine: Machine,
  input: Input,
) {
  const symbols = toSymbols(input);
  machine.reset();

  yield* Effect.annotateCurrentSpan("effect_dfa.initial_state", machine.initialState.name);
  yield* Effect.annotateCurrentSpan("effect_dfa.input.length", symbols.length);
  yield* emit({ type: "@dfa.start", state: machine.initialState, inputLength: symbols.length });

  const finalState = yield* run(machine._table, machine.initialState, symbols, {
    onStep: (fromState, symbol, toState) => emit({ type: "@dfa.step", fromState, symbol, toState }),
    onRejectSymbol: (state, symbol) => emit({ type: "@dfa.reject-symbol", state, symbol }),
  });

  const accepted = machine.isAccepting(finalState);
  machine._current = finalState;

  yield* Effect.annotateCurrentSpan("effect_dfa.final_state", finalState.name);
  yield* Effect.annotateCurrentSpan("effect_dfa.accepted", accepted);
  yield* emit({ type: "@dfa.decide", finalState, accepted });
  yield* Effect.logDebug(accepted ? "input accepted" : "input rejected").pipe(
    Effect.annotateLogs({ finalState: finalState.name, symbols: symbols.length }),
  );

  return accepted;
});

const traceImpl = Effect.fn("effect-dfa.machine.trace")(function* (machine: Machine, input: Input) {
  const visited: State[] = [machine.initialState];
  yield* run(machine._table, machine.initialState, toSymbols(input), {
    onStep: (_from, _symbol, to) =>
      Effect.sync(() => {
        visited.push(to);
      }),
  });
  return visited;
});

const stepImpl = Effect.fn("effect-dfa.machine.step")(function* (machine: Machine, symbol: string) {
  const from = machine._current;
  const to = yield* resolveStep(machine._table, from, symbol);
  yield* emit({ type: "@dfa.step", fromState: from, symbol, toState: to });
  machine._current = to;
  return to;
});

/**
 * Run a synchronous effect, rethrowing its typed failure unwrapped.
 * Defects are rethrown as their squashed cause.
 * @internal
 */
export const runSyncOrThrow = <A, E>(effect: Effect.Effect<A, E>): A => {
  const exit = Effect.runSyncExit(effect);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  const failure = Cause.failureOption(exit.cause);
  if (Option.isSome(failure)) {
    throw failure.value;
  }
  throw Cause.squash(exit.cause);
};

export const isMachine = (u: unknown): u is Machine => u instanceof Machine;
