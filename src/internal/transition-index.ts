/**
 * Transition index for O(1) lookup by state name/symbol.
 *
 * @internal
 */
import type { State } from "../state.js";
import type { Transition } from "../transition.js";

/**
 * Index structure: fromState name -> symbol -> destination.
 * A DFA has at most one destination per pair.
 */
export type TransitionIndex = ReadonlyMap<string, ReadonlyMap<string, State>>;

/**
 * Mutable variant used while a builder is still accumulating transitions.
 */
export type MutableTransitionIndex = Map<string, Map<string, State>>;

/**
 * Register a transition. Returns false, leaving the index untouched, when the
 * (fromState, symbol) pair is already taken.
 */
export const insertTransition = (index: MutableTransitionIndex, t: Transition): boolean => {
  let symbolMap = index.get(t.fromState.name);
  if (symbolMap === undefined) {
    symbolMap = new Map();
    index.set(t.fromState.name, symbolMap);
  }
  if (symbolMap.has(t.symbol)) {
    return false;
  }
  symbolMap.set(t.symbol, t.toState);
  return true;
};

/**
 * Find the destination for a state/symbol pair.
 * Returns undefined if no transition is registered.
 */
export const findDestination = (
  index: TransitionIndex,
  stateName: string,
  symbol: string,
): State | undefined => index.get(stateName)?.get(symbol);

/**
 * Alphabet symbols with no outgoing transition from `stateName`, in alphabet order.
 */
export const missingSymbols = (
  index: TransitionIndex,
  stateName: string,
  alphabet: ReadonlyArray<string>,
): ReadonlyArray<string> => {
  const defined = index.get(stateName);
  return alphabet.filter((symbol) => defined === undefined || !defined.has(symbol));
};
