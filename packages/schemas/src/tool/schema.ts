/**
 * Zod schemas for tool call declarations inside flow steps
 */

import { z } from 'zod';
import { mapping, optional, requiredText } from '../validation.js';

/**
 * One named input a tool accepts
 */
export const ToolParameterSchema = z.object({
  /** Parameter type, e.g. "string" */
  type: requiredText(),
  description: requiredText(),
  required: z.boolean().default(false),
});

/**
 * One named result a tool produces
 */
export const ToolOutputSchema = z.object({
  type: requiredText(),
  description: requiredText(),
});

export const ToolCallSchema = z.object({
  /** Identifies the tool to invoke */
  name: requiredText(),
  description: requiredText(),
  parameters: mapping(ToolParameterSchema),
  /** Absent when the tool output is undocumented */
  output: optional(mapping(ToolOutputSchema)),
});
