export {
  DocumentLoadError,
  FileAccessError,
  StructuralError,
  SemanticValidationError,
  type FileAccessReason,
} from './errors.js';

export { classifyAccessFailure } from './document.js';

export { loadFlow, loadFlowFromString, serializeFlow } from './flow.js';

export {
  loadWorkflow,
  loadWorkflowFromString,
  serializeWorkflow,
} from './workflow.js';
