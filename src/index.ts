// Dfa namespace (Effect-style)
export * as Dfa from "./namespace.js";

// Value types
export * as State from "./state.js";
export * as Transition from "./transition.js";

// Builder and machine
export { MachineBuilder } from "./builder.js";
export { Machine, isMachine } from "./machine.js";
export type { Input } from "./machine.js";

// Errors
export { AssertionError, ConfigurationError, StateError, TransitionError } from "./errors.js";

// Testing utilities
export { assertAccepts, assertPath, assertRejects, simulate } from "./testing.js";
export type { SimulationResult } from "./testing.js";

// Inspection / introspection
export type {
  DecideEvent,
  InspectionEvent,
  Inspector,
  RejectSymbolEvent,
  StartEvent,
  StepEvent,
} from "./inspection.js";
export {
  collectingInspector,
  consoleInspector,
  Inspector as InspectorService,
  makeInspector,
} from "./inspection.js";

// Presets
export * as Presets from "./presets/index.js";
