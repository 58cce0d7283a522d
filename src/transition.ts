/**
 * Directed edges of a deterministic finite automaton.
 *
 * A transition performs no validation of its own: any state/symbol
 * combination is structurally valid. Determinism and completeness are the
 * builder's business.
 *
 * @module
 */
import { Equal, Hash } from "effect";

import type { State } from "./state.js";

export class Transition implements Equal.Equal {
  readonly fromState: State;
  readonly symbol: string;
  readonly toState: State;

  constructor(fromState: State, symbol: string, toState: State) {
    this.fromState = fromState;
    this.symbol = symbol;
    this.toState = toState;
    Object.freeze(this);
  }

  /** True when this edge leaves `state` on `symbol` */
  matches(state: State, symbol: string): boolean {
    return Equal.equals(this.fromState, state) && this.symbol === symbol;
  }

  get isSelfLoop(): boolean {
    return Equal.equals(this.fromState, this.toState);
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return (
      that instanceof Transition &&
      this.symbol === that.symbol &&
      Equal.equals(this.fromState, that.fromState) &&
      Equal.equals(this.toState, that.toState)
    );
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.hash(this.fromState))(
      Hash.combine(Hash.string(this.symbol))(Hash.hash(this.toState)),
    );
  }

  toString(): string {
    return `${this.fromState.name} --[${this.symbol}]--> ${this.toState.name}`;
  }

  toJSON(): { readonly from: string; readonly symbol: string; readonly to: string } {
    return { from: this.fromState.name, symbol: this.symbol, to: this.toState.name };
  }
}

export const make = (fromState: State, symbol: string, toState: State): Transition =>
  new Transition(fromState, symbol, toState);

export const isTransition = (u: unknown): u is Transition => u instanceof Transition;
