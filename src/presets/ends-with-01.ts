import { MachineBuilder } from "../builder.js";
import type { Machine } from "../machine.js";

/**
 * Binary strings ending in `01`.
 * `Saw0` tracks a trailing `0`, `Saw01` a trailing `01`.
 */
export const endsWith01 = (): Machine =>
  MachineBuilder.create()
    .withAlphabet(["0", "1"])
    .addState("Start")
    .addState("Saw0")
    .addState("Saw01", true)
    .setInitialState("Start")
    .addTransition("Start", "0", "Saw0")
    .addTransition("Start", "1", "Start")
    .addTransition("Saw0", "0", "Saw0")
    .addTransition("Saw0", "1", "Saw01")
    .addTransition("Saw01", "0", "Saw0")
    .addTransition("Saw01", "1", "Start")
    .build();
