// Declare all schemas, types, constructors and errors

// Validation helpers
export {
  type Violation,
  describeKind,
  fieldErrorMap,
  formatPath,
  formatViolations,
  mapping,
  toViolations,
} from './validation.js';

export { SchemaValidationError } from './errors.js';

export { type DeepReadonly, freezeDeep } from './readonly.js';

// Tool library
export type { ToolParameter, ToolOutput, ToolCall } from './tool/types.js';

export {
  ToolParameterSchema,
  ToolOutputSchema,
  ToolCallSchema,
} from './tool/schema.js';

// Flow library
export {
  type FlowAction,
  type FlowStep,
  type FlowConfig,
  hasToolCall,
} from './flow/types.js';

export {
  FlowActionSchema,
  FlowStepSchema,
  FlowConfigSchema,
} from './flow/schema.js';

export {
  findFlowReferenceIssues,
  type ReferenceIssue,
} from './flow/integrity.js';

// Workflow library
export type {
  AgentConfig,
  WorkflowStep,
  WorkflowConfig,
} from './workflow/types.js';

export {
  DEFAULT_AGENT_TEMPERATURE,
  AgentConfigSchema,
  WorkflowStepSchema,
  WorkflowConfigSchema,
} from './workflow/schema.js';

export {
  findAgentReferenceIssues,
  type AgentReferenceIssue,
} from './workflow/integrity.js';

// Constructors
export {
  createToolParameter,
  createToolOutput,
  createToolCall,
  createFlowAction,
  createFlowStep,
  createFlowConfig,
  createAgentConfig,
  createWorkflowStep,
  createWorkflowConfig,
} from './entities.js';

// Re-export some Zod utilities so consumers do not need to depend on Zod
export { ZodError } from 'zod';
