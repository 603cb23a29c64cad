export interface AgentReferenceIssue {
  path: (string | number)[];
  message: string;
}

/**
 * Report workflow steps whose `agent` is not declared under `agents`.
 * Paths are relative to the workflow record.
 */
export function findAgentReferenceIssues(workflow: {
  agents: Readonly<Record<string, unknown>>;
  steps: ReadonlyArray<{ agent: string }>;
}): AgentReferenceIssue[] {
  const issues: AgentReferenceIssue[] = [];

  workflow.steps.forEach((step, index) => {
    if (!Object.hasOwn(workflow.agents, step.agent)) {
      issues.push({
        path: ['steps', index, 'agent'],
        message: `unknown agent "${step.agent}"`,
      });
    }
  });

  return issues;
}
