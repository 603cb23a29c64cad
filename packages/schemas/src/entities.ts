/**
 * Entity constructors. Each one validates raw document data against its
 * schema and returns a frozen entity, or throws SchemaValidationError
 * listing every violation found.
 */

import type { z } from 'zod';
import { SchemaValidationError } from './errors.js';
import { freezeDeep } from './readonly.js';
import { fieldErrorMap, toViolations } from './validation.js';
import {
  ToolCallSchema,
  ToolOutputSchema,
  ToolParameterSchema,
} from './tool/schema.js';
import type { ToolCall, ToolOutput, ToolParameter } from './tool/types.js';
import {
  FlowActionSchema,
  FlowConfigSchema,
  FlowStepSchema,
} from './flow/schema.js';
import type { FlowAction, FlowConfig, FlowStep } from './flow/types.js';
import {
  AgentConfigSchema,
  WorkflowConfigSchema,
  WorkflowStepSchema,
} from './workflow/schema.js';
import type {
  AgentConfig,
  WorkflowConfig,
  WorkflowStep,
} from './workflow/types.js';

function parseEntity<T extends z.ZodType>(
  entity: string,
  schema: T,
  data: unknown
): z.output<T> {
  const result = schema.safeParse(data, { error: fieldErrorMap });
  if (!result.success) {
    throw new SchemaValidationError(
      entity,
      toViolations(result.error),
      result.error
    );
  }
  return freezeDeep(result.data);
}

export function createToolParameter(data: unknown): ToolParameter {
  return parseEntity('ToolParameter', ToolParameterSchema, data);
}

export function createToolOutput(data: unknown): ToolOutput {
  return parseEntity('ToolOutput', ToolOutputSchema, data);
}

export function createToolCall(data: unknown): ToolCall {
  return parseEntity('ToolCall', ToolCallSchema, data);
}

export function createFlowAction(data: unknown): FlowAction {
  return parseEntity('FlowAction', FlowActionSchema, data);
}

export function createFlowStep(data: unknown): FlowStep {
  return parseEntity('FlowStep', FlowStepSchema, data);
}

export function createFlowConfig(data: unknown): FlowConfig {
  return parseEntity('FlowConfig', FlowConfigSchema, data);
}

export function createAgentConfig(data: unknown): AgentConfig {
  return parseEntity('AgentConfig', AgentConfigSchema, data);
}

export function createWorkflowStep(data: unknown): WorkflowStep {
  return parseEntity('WorkflowStep', WorkflowStepSchema, data);
}

export function createWorkflowConfig(data: unknown): WorkflowConfig {
  return parseEntity('WorkflowConfig', WorkflowConfigSchema, data);
}
