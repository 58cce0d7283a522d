import { MachineBuilder } from "../builder.js";
import type { Machine } from "../machine.js";

/** Binary strings containing an even number of `1`s */
export const evenOnes = (): Machine =>
  MachineBuilder.create()
    .withAlphabet(["0", "1"])
    .addState("Even", true)
    .addState("Odd")
    .setInitialState("Even")
    .addTransition("Even", "0", "Even")
    .addTransition("Even", "1", "Odd")
    .addTransition("Odd", "0", "Odd")
    .addTransition("Odd", "1", "Even")
    .build();
