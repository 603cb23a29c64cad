/**
 * TypeScript types for flow documents.
 * All types are inferred from Zod schemas and exposed read-only.
 */

import type { z } from 'zod';
import type { DeepReadonly } from '../readonly.js';
import type {
  FlowActionSchema,
  FlowConfigSchema,
  FlowStepSchema,
} from './schema.js';

export type FlowAction = DeepReadonly<z.infer<typeof FlowActionSchema>>;
export type FlowStep = DeepReadonly<z.infer<typeof FlowStepSchema>>;
export type FlowConfig = DeepReadonly<z.infer<typeof FlowConfigSchema>>;

/**
 * Steps that declare a tool call
 */
export function hasToolCall(
  step: FlowStep
): step is FlowStep & { tool_call: NonNullable<FlowStep['tool_call']> } {
  return step.tool_call !== undefined;
}
