// ============================================
// Events - Barrel Export
// ============================================

export {
  type AnyEventListener,
  defineEvent,
  EventBus,
  type EventBusOptions,
  type EventDefinition,
} from "./bus.js";

export {
  approvalRequested,
  type EventPayload,
  Events,
  errorEvent,
  phaseEnd,
  phaseStart,
  runEnd,
  runStart,
  triggerMatched,
  workerEnd,
  workerStart,
} from "./definitions.js";
