/**
 * Divisibility by three of a binary number, read most significant bit first.
 *
 * Reading bit `b` with running remainder `r` moves to `(r * 2 + b) mod 3`,
 * so one state per remainder is enough:
 *
 * | State | `0` | `1` |
 * |-------|-----|-----|
 * | S0 *  | S0  | S1  |
 * | S1    | S2  | S0  |
 * | S2    | S1  | S2  |
 *
 * The empty string reads as zero and is accepted. Leading zeros are allowed.
 *
 * @module
 */
import type { Effect } from "effect";

import { MachineBuilder } from "../builder.js";
import type { TransitionError } from "../errors.js";
import type { Machine } from "../machine.js";

export const mod3 = (): Machine =>
  MachineBuilder.create()
    .withAlphabet(["0", "1"])
    .addState("S0", true)
    .addState("S1")
    .addState("S2")
    .setInitialState("S0")
    .addTransition("S0", "0", "S0")
    .addTransition("S0", "1", "S1")
    .addTransition("S1", "0", "S2")
    .addTransition("S1", "1", "S0")
    .addTransition("S2", "0", "S1")
    .addTransition("S2", "1", "S2")
    .build();

const divisibility = mod3();

/**
 * Check whether a binary string is divisible by three.
 * Fails with `TransitionError` on characters other than `0` and `1`.
 */
export const isDivisibleByThree = (binary: string): Effect.Effect<boolean, TransitionError> =>
  divisibility.process(binary);
