/**
 * Cross-step reference checks for flow documents. These need a well-formed
 * step list, so they only run once every field-level check has passed.
 */

export interface ReferenceIssue {
  path: (string | number)[];
  message: string;
}

interface StepReferences {
  id: string;
  next_step?: string;
  actions?: ReadonlyArray<{ next_step?: string }>;
}

/**
 * Report duplicate step ids and `next_step` values that name no step.
 * Paths are relative to the flow document root.
 */
export function findFlowReferenceIssues(
  steps: ReadonlyArray<StepReferences>
): ReferenceIssue[] {
  const issues: ReferenceIssue[] = [];
  const ids = new Set<string>();

  steps.forEach((step, index) => {
    if (ids.has(step.id)) {
      issues.push({
        path: ['flow', index, 'id'],
        message: `duplicate step id "${step.id}"`,
      });
    }
    ids.add(step.id);
  });

  steps.forEach((step, index) => {
    if (step.next_step !== undefined && !ids.has(step.next_step)) {
      issues.push({
        path: ['flow', index, 'next_step'],
        message: `unknown step "${step.next_step}"`,
      });
    }

    step.actions?.forEach((action, actionIndex) => {
      if (action.next_step !== undefined && !ids.has(action.next_step)) {
        issues.push({
          path: ['flow', index, 'actions', actionIndex, 'next_step'],
          message: `unknown step "${action.next_step}"`,
        });
      }
    });
  });

  return issues;
}
