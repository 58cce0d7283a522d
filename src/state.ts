/**
 * States of a deterministic finite automaton.
 *
 * A state is identified by its name alone: two `State` values sharing a name
 * are `Equal.equals` even when their accepting flags differ, which lets the
 * builder key its registry purely by name.
 *
 * @example
 * ```ts
 * import { Equal } from "effect"
 * import { State } from "effect-dfa"
 *
 * const s0 = State.make("S0", true)
 * String(s0)                                    // "S0 (accepting)"
 * Equal.equals(s0, State.make("S0"))            // true
 * ```
 *
 * @module
 */
import { Equal, Hash } from "effect";

import { StateError } from "./errors.js";

export class State implements Equal.Equal {
  readonly name: string;
  readonly isAccepting: boolean;

  /** @throws StateError when the name is empty or whitespace-only */
  constructor(name: string, isAccepting = false) {
    if (name.trim().length === 0) {
      throw StateError.emptyName(name);
    }
    this.name = name;
    this.isAccepting = isAccepting;
    Object.freeze(this);
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof State && that.name === this.name;
  }

  [Hash.symbol](): number {
    return Hash.string(this.name);
  }

  toString(): string {
    return this.isAccepting ? `${this.name} (accepting)` : this.name;
  }

  toJSON(): { readonly name: string; readonly isAccepting: boolean } {
    return { name: this.name, isAccepting: this.isAccepting };
  }
}

export const make = (name: string, isAccepting = false): State => new State(name, isAccepting);

export const isState = (u: unknown): u is State => u instanceof State;
