import type { z } from 'zod';
import type { DeepReadonly } from '../readonly.js';
import type {
  ToolCallSchema,
  ToolOutputSchema,
  ToolParameterSchema,
} from './schema.js';

export type ToolParameter = DeepReadonly<z.infer<typeof ToolParameterSchema>>;
export type ToolOutput = DeepReadonly<z.infer<typeof ToolOutputSchema>>;
export type ToolCall = DeepReadonly<z.infer<typeof ToolCallSchema>>;
