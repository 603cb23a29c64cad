/**
 * Zod schemas for runtime validation of workflow documents
 */

import { z } from 'zod';
import { mapping, optional, requiredText } from '../validation.js';
import { findAgentReferenceIssues } from './integrity.js';

export const DEFAULT_AGENT_TEMPERATURE = 0.7;

export const AgentConfigSchema = z.object({
  instructions: requiredText(),
  /** Sampling temperature, passed through to the agent untouched */
  temperature: z
    .number()
    .min(0, { error: 'must be greater than or equal to 0' })
    .max(2, { error: 'must be less than or equal to 2' })
    .default(DEFAULT_AGENT_TEMPERATURE),
});

export const WorkflowStepSchema = z.object({
  name: requiredText(),
  /** Key into the workflow `agents` mapping */
  agent: requiredText(),
  /** Prompt template. Placeholders such as `{name}` are left as-is */
  ask: requiredText(),
});

// Main workflow schema
export const WorkflowConfigSchema = z
  .object({
    name: requiredText(),
    description: optional(z.string()),
    agents: mapping(AgentConfigSchema),
    steps: z.array(WorkflowStepSchema),
  })
  .superRefine((workflow, ctx) => {
    // References are only meaningful once every field is valid
    if (ctx.issues.length > 0) {
      return;
    }
    for (const issue of findAgentReferenceIssues(workflow)) {
      ctx.addIssue({ code: 'custom', ...issue });
    }
  });
