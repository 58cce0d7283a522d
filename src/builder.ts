/**
 * MachineBuilder - fluent, single-use configuration for deterministic
 * finite automata.
 *
 * Configuration calls fail fast by throwing tagged errors; `build()` runs the
 * full validation, consumes the builder, and hands back an immutable
 * {@link Machine}. After a successful build every call on the builder fails
 * with `ConfigurationError` (reason `"AlreadyBuilt"`).
 *
 * @example
 * ```ts
 * import { MachineBuilder } from "effect-dfa"
 *
 * const machine = MachineBuilder.create()
 *   .withAlphabet(["0", "1"])
 *   .addState("S0", true)
 *   .addState("S1")
 *   .setInitialState("S0")
 *   .addTransition("S0", "0", "S0")
 *   .addTransition("S0", "1", "S1")
 *   .addTransition("S1", "0", "S1")
 *   .addTransition("S1", "1", "S0")
 *   .build()
 * ```
 *
 * @module
 */
import { Effect } from "effect";

import { ConfigurationError, StateError, TransitionError } from "./errors.js";
import type { MutableTransitionIndex } from "./internal/transition-index.js";
import { insertTransition, missingSymbols } from "./internal/transition-index.js";
import { Machine } from "./machine.js";
import { State } from "./state.js";
import { Transition } from "./transition.js";

export class MachineBuilder {
  /** @internal */ readonly _states: Map<string, State>;
  /** @internal */ _alphabet: ReadonlyArray<string>;
  /** @internal */ readonly _transitions: Array<Transition>;
  /** @internal */ readonly _index: MutableTransitionIndex;
  /** @internal */ _initialState: State | undefined;
  /** @internal */ _consumed: boolean;

  private constructor() {
    this._states = new Map();
    this._alphabet = [];
    this._transitions = [];
    this._index = new Map();
    this._initialState = undefined;
    this._consumed = false;
  }

  static create(): MachineBuilder {
    return new MachineBuilder();
  }

  /** True once `build()` has succeeded */
  get isConsumed(): boolean {
    return this._consumed;
  }

  // ---- alphabet ----

  /**
   * Replace the alphabet. Symbols are opaque tokens matched by exact
   * equality; the order given is kept.
   */
  withAlphabet(symbols: Iterable<string>): this {
    this.ensureNotConsumed();
    this._alphabet = Array.from(symbols);
    return this;
  }

  /** Alias of {@link withAlphabet} */
  setAlphabet(symbols: Iterable<string>): this {
    return this.withAlphabet(symbols);
  }

  // ---- states ----

  addState(name: string, isAccepting = false): this {
    this.ensureNotConsumed();
    if (this._states.has(name)) {
      throw StateError.duplicate(name);
    }
    this._states.set(name, new State(name, isAccepting));
    return this;
  }

  setInitialState(name: string): this {
    this.ensureNotConsumed();
    this._initialState = this.getStateOrThrow(name);
    return this;
  }

  // ---- transitions ----

  /**
   * Register `from --[symbol]--> to`. A second transition for the same
   * (from, symbol) pair is rejected here rather than at build time.
   */
  addTransition(from: string, symbol: string, to: string): this {
    this.ensureNotConsumed();
    const transition = new Transition(this.getStateOrThrow(from), symbol, this.getStateOrThrow(to));
    if (!insertTransition(this._index, transition)) {
      throw TransitionError.duplicate(from, symbol);
    }
    this._transitions.push(transition);
    return this;
  }

  // ---- build ----

  /**
   * Validate, consume the builder and return the machine.
   * A failed validation leaves the builder usable.
   */
  build(): Machine {
    this.ensureNotConsumed();
    const initialState = this.validate();
    this._consumed = true;
    return new Machine({
      states: [...this._states.values()],
      alphabet: this._alphabet,
      transitions: this._transitions,
      index: this._index,
      initialState,
    });
  }

  /** `build()` as an Effect failing with `ConfigurationError` */
  buildEffect(): Effect.Effect<Machine, ConfigurationError> {
    return Effect.suspend(() => {
      try {
        return Effect.succeed(this.build());
      } catch (error) {
        return error instanceof ConfigurationError ? Effect.fail(error) : Effect.die(error);
      }
    });
  }

  // ---- internals ----

  /**
   * Checks run in a fixed order so the same invalid configuration always
   * reports the same error.
   */
  private validate(): State {
    if (this._states.size === 0) {
      throw ConfigurationError.noStates();
    }
    if (this._alphabet.length === 0) {
      throw ConfigurationError.emptyAlphabet();
    }
    if (this._initialState === undefined) {
      throw ConfigurationError.noInitialState();
    }
    for (const state of this._states.values()) {
      const missing = missingSymbols(this._index, state.name, this._alphabet);
      if (missing.length > 0) {
        throw ConfigurationError.incompleteTransitions(state.name, missing);
      }
    }
    return this._initialState;
  }

  private getStateOrThrow(name: string): State {
    const state = this._states.get(name);
    if (state === undefined) {
      throw StateError.undefinedState(name);
    }
    return state;
  }

  private ensureNotConsumed(): void {
    if (this._consumed) {
      throw ConfigurationError.alreadyBuilt();
    }
  }
}
