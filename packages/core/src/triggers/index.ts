export {
  type ExternalMatcher,
  type TriggeredWorker,
  TriggerEvaluator,
  type TriggerEvaluatorOptions,
  type WorkflowEvent,
} from "./evaluator.js";
