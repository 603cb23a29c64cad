/**
 * Workflow subcommands: validate and inspect a workflow document.
 */
import colors from 'ansi-colors';
import type { Command } from 'commander';
import { loadWorkflow } from 'flowdoc-core';
import {
  preview,
  showNumberedList,
  showProperties,
  showTitle,
} from '../utils/display.js';
import { reportLoadError } from '../utils/errors.js';

export interface WorkflowCommandOptions {
  json: boolean;
}

export const validateWorkflowCommand = (
  filePath: string,
  options: WorkflowCommandOptions
): boolean => {
  try {
    const workflow = loadWorkflow(filePath);

    if (options.json) {
      console.log(
        JSON.stringify(
          { success: true, name: workflow.name, steps: workflow.steps.length },
          null,
          2
        )
      );
    } else {
      console.log(
        colors.green(
          `✓ Workflow "${workflow.name}" is valid (${workflow.steps.length} steps)`
        )
      );
    }
    return true;
  } catch (error) {
    reportLoadError(error, options);
    return false;
  }
};

export const inspectWorkflowCommand = (
  filePath: string,
  options: WorkflowCommandOptions
): boolean => {
  try {
    const workflow = loadWorkflow(filePath);

    if (options.json) {
      console.log(JSON.stringify({ success: true, workflow }, null, 2));
      return true;
    }

    const agents = Object.entries(workflow.agents);

    showTitle('Workflow Details');
    showProperties({
      Name: workflow.name,
      Description: workflow.description || colors.gray('No description'),
      Agents: String(agents.length),
      Steps: String(workflow.steps.length),
    });

    showTitle('Agents');
    showNumberedList(
      agents.map(
        ([name, agent]) =>
          `${colors.cyan(name)} ${colors.gray(`(temperature ${agent.temperature})`)}: ${preview(agent.instructions)}`
      )
    );

    showTitle('Steps');
    showNumberedList(
      workflow.steps.map(
        step =>
          `${colors.cyan(step.name)} → ${step.agent}: ${preview(step.ask)}`
      )
    );
    return true;
  } catch (error) {
    reportLoadError(error, options);
    return false;
  }
};

export const addWorkflowCommands = (
  program: Command,
  onResult: (success: boolean) => void
) => {
  const command = program
    .command('workflow')
    .description('Validate and inspect workflow documents');

  command
    .command('validate <file>')
    .description('Check a workflow document against the schema')
    .option('--json', 'Output the result in JSON format', false)
    .action((file: string, options: WorkflowCommandOptions) =>
      onResult(validateWorkflowCommand(file, options))
    );

  command
    .command('inspect <file>')
    .description('Display the agents and steps of a workflow document')
    .option('--json', 'Output the workflow in JSON format', false)
    .action((file: string, options: WorkflowCommandOptions) =>
      onResult(inspectWorkflowCommand(file, options))
    );
};
