export {
  ContextBus,
  type ContextEntry,
  INVOCATION_PHASE,
  ORCHESTRATOR_WRITER,
  phaseIterationKey,
  type ReadOptions,
} from "./context-bus.js";
