/**
 * Workflow module
 */

export { runWorkflow, validateUploaderName } from "./orchestrator.js";
export type { WorkflowDeps } from "./orchestrator.js";

export type {
  Prompter,
  WorkflowState,
  WorkflowOutcome,
  WorkflowEvent,
  WorkflowResult,
} from "../../types/workflow.js";
