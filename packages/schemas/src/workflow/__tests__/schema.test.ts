import { describe, it, expect } from 'vitest';
import { createWorkflowConfig } from '../../entities.js';
import { SchemaValidationError } from '../../errors.js';
import { findAgentReferenceIssues } from '../integrity.js';

function violationsOf(data: unknown) {
  try {
    createWorkflowConfig(data);
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      return error.violations;
    }
    throw error;
  }
  throw new Error('Expected a SchemaValidationError');
}

describe('WorkflowConfigSchema', () => {
  it('should build a workflow with agents and steps', () => {
    const workflow = createWorkflowConfig({
      name: 'demo',
      agents: {
        greeter: { instructions: 'Be nice.', temperature: 0.5 },
      },
      steps: [{ name: 'welcome', agent: 'greeter', ask: 'Say hi to {name}' }],
    });

    expect(workflow.name).toBe('demo');
    expect(workflow.description).toBeUndefined();
    expect(workflow.agents['greeter'].temperature).toBe(0.5);
    expect(workflow.steps[0].ask).toBe('Say hi to {name}');
  });

  it('should apply the default temperature to agents', () => {
    const workflow = createWorkflowConfig({
      name: 'review',
      description: 'Two-agent review',
      agents: {
        writer: { instructions: 'Draft the text.' },
        critic: { instructions: 'Point out problems.', temperature: 0.2 },
      },
      steps: [
        { name: 'draft', agent: 'writer', ask: 'Write about {topic}' },
        { name: 'review', agent: 'critic', ask: 'Review the draft' },
      ],
    });

    expect(workflow.agents['writer'].temperature).toBe(0.7);
    expect(workflow.steps.map(step => step.agent)).toEqual([
      'writer',
      'critic',
    ]);
  });

  it('should report nested agent and step violations together', () => {
    expect(
      violationsOf({
        name: 'demo',
        agents: { greeter: { temperature: 3 } },
        steps: [{ name: 'welcome', agent: 'greeter' }],
      })
    ).toEqual([
      { path: 'agents.greeter.instructions', message: 'field required' },
      {
        path: 'agents.greeter.temperature',
        message: 'must be less than or equal to 2',
      },
      { path: 'steps.0.ask', message: 'field required' },
    ]);
  });

  it('should reject agents given as a sequence', () => {
    expect(
      violationsOf({ name: 'demo', agents: ['greeter'], steps: [] })
    ).toEqual([{ path: 'agents', message: 'expected mapping, received sequence' }]);
  });

  it('should reject steps that name an unknown agent', () => {
    expect(
      violationsOf({
        name: 'demo',
        agents: { greeter: { instructions: 'Be nice.' } },
        steps: [
          { name: 'welcome', agent: 'greeter', ask: 'Hi' },
          { name: 'farewell', agent: 'closer', ask: 'Bye' },
        ],
      })
    ).toEqual([{ path: 'steps.1.agent', message: 'unknown agent "closer"' }]);
  });

  it('should skip agent references while other fields are invalid', () => {
    expect(
      violationsOf({
        name: 'demo',
        agents: { greeter: { instructions: 'Be nice.', temperature: 3 } },
        steps: [{ name: 'farewell', agent: 'closer', ask: 'Bye' }],
      })
    ).toEqual([
      {
        path: 'agents.greeter.temperature',
        message: 'must be less than or equal to 2',
      },
    ]);
  });

  it('should reject an agent named __proto__', () => {
    const data: unknown = JSON.parse(`{
      "name": "demo",
      "agents": { "__proto__": { "instructions": "Be nice." } },
      "steps": [{ "name": "welcome", "agent": "__proto__", "ask": "Hi" }]
    }`);

    expect(violationsOf(data)).toEqual([
      { path: 'agents.__proto__', message: 'reserved key "__proto__"' },
    ]);
  });
});

describe('findAgentReferenceIssues', () => {
  it('should not treat inherited properties as agents', () => {
    expect(
      findAgentReferenceIssues({
        agents: {},
        steps: [{ agent: 'toString' }],
      })
    ).toEqual([{ path: ['steps', 0, 'agent'], message: 'unknown agent "toString"' }]);
  });
});
