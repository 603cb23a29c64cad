/**
 * TypeScript types for workflow documents.
 * All types are inferred from Zod schemas and exposed read-only.
 */

import type { z } from 'zod';
import type { DeepReadonly } from '../readonly.js';
import type {
  AgentConfigSchema,
  WorkflowConfigSchema,
  WorkflowStepSchema,
} from './schema.js';

export type AgentConfig = DeepReadonly<z.infer<typeof AgentConfigSchema>>;
export type WorkflowStep = DeepReadonly<z.infer<typeof WorkflowStepSchema>>;
export type WorkflowConfig = DeepReadonly<
  z.infer<typeof WorkflowConfigSchema>
>;
