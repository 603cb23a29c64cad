export { VERBOSE, setVerbose } from './verbose.js';

// Loaders
export {
  loadFlow,
  loadFlowFromString,
  serializeFlow,
  loadWorkflow,
  loadWorkflowFromString,
  serializeWorkflow,
  classifyAccessFailure,
  DocumentLoadError,
  FileAccessError,
  StructuralError,
  SemanticValidationError,
  type FileAccessReason,
} from './loader/index.js';

// Reexport the entity model so consumers only need this package
export {
  type FlowConfig,
  type FlowStep,
  type FlowAction,
  type ToolCall,
  type ToolParameter,
  type ToolOutput,
  type WorkflowConfig,
  type WorkflowStep,
  type AgentConfig,
  type Violation,
  hasToolCall,
} from 'flowdoc-schemas';
