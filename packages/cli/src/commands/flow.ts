/**
 * Flow subcommands: validate and inspect a flow document.
 */
import colors from 'ansi-colors';
import type { Command } from 'commander';
import { hasToolCall, loadFlow, type FlowStep } from 'flowdoc-core';
import {
  preview,
  showNumberedList,
  showProperties,
  showTitle,
} from '../utils/display.js';
import { reportLoadError } from '../utils/errors.js';

export interface FlowCommandOptions {
  json: boolean;
}

const describeStep = (step: FlowStep): string => {
  let line = colors.cyan(step.id);
  if (step.prompt) {
    line += `: ${preview(step.prompt)}`;
  }
  if (step.tool_call) {
    line += colors.gray(` [Tool: ${step.tool_call.name}]`);
  }
  if (step.actions && step.actions.length > 0) {
    line += colors.gray(` [Actions: ${step.actions.length}]`);
  }
  if (step.next_step) {
    line += colors.gray(` → ${step.next_step}`);
  }
  return line;
};

/**
 * Validate a flow document.
 *
 * @returns Whether the document is valid
 */
export const validateFlowCommand = (
  filePath: string,
  options: FlowCommandOptions
): boolean => {
  try {
    const config = loadFlow(filePath);

    if (options.json) {
      console.log(
        JSON.stringify({ success: true, steps: config.flow.length }, null, 2)
      );
    } else {
      console.log(
        colors.green(`✓ Flow is valid (${config.flow.length} steps)`)
      );
    }
    return true;
  } catch (error) {
    reportLoadError(error, options);
    return false;
  }
};

/**
 * Show the steps of a flow document.
 *
 * @returns Whether the document could be loaded
 */
export const inspectFlowCommand = (
  filePath: string,
  options: FlowCommandOptions
): boolean => {
  try {
    const config = loadFlow(filePath);

    if (options.json) {
      console.log(JSON.stringify({ success: true, flow: config }, null, 2));
      return true;
    }

    showTitle('Flow Details');
    showProperties({
      File: filePath,
      Steps: String(config.flow.length),
      'Tool Calls': String(config.flow.filter(hasToolCall).length),
    });

    showTitle('Steps');
    showNumberedList(config.flow.map(describeStep));
    return true;
  } catch (error) {
    reportLoadError(error, options);
    return false;
  }
};

export const addFlowCommands = (
  program: Command,
  onResult: (success: boolean) => void
) => {
  const command = program
    .command('flow')
    .description('Validate and inspect flow documents');

  command
    .command('validate <file>')
    .description('Check a flow document against the schema')
    .option('--json', 'Output the result in JSON format', false)
    .action((file: string, options: FlowCommandOptions) =>
      onResult(validateFlowCommand(file, options))
    );

  command
    .command('inspect <file>')
    .description('Display the steps of a flow document')
    .option('--json', 'Output the flow in JSON format', false)
    .action((file: string, options: FlowCommandOptions) =>
      onResult(inspectFlowCommand(file, options))
    );
};
