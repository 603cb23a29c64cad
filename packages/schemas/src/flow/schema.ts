/**
 * Zod schemas for runtime validation of flow documents
 */

import { z } from 'zod';
import { ToolCallSchema } from '../tool/schema.js';
import { optional, requiredText } from '../validation.js';
import { findFlowReferenceIssues } from './integrity.js';

/**
 * Conditional branch of a step. Actions are kept in document order since
 * the first matching condition wins.
 */
export const FlowActionSchema = z.object({
  /** Opaque predicate, never interpreted here */
  condition: requiredText(),
  /** Absent means the flow terminates on this branch */
  next_step: optional(requiredText()),
});

export const FlowStepSchema = z.object({
  id: requiredText(),
  prompt: optional(z.string()),
  tool_call: optional(ToolCallSchema),
  /** Response template */
  response: optional(z.string()),
  actions: optional(z.array(FlowActionSchema)),
  /** Default successor when no action matches */
  next_step: optional(requiredText()),
});

// Main flow schema
export const FlowConfigSchema = z
  .object({
    flow: z
      .array(FlowStepSchema)
      .min(1, { error: 'must contain at least one step' }),
  })
  .superRefine((config, ctx) => {
    if (ctx.issues.length > 0) {
      return;
    }
    for (const issue of findFlowReferenceIssues(config.flow)) {
      ctx.addIssue({ code: 'custom', ...issue });
    }
  });
