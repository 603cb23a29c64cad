import { Command } from 'commander';
import { setVerbose } from 'flowdoc-core';
import { addFlowCommands } from './commands/flow.js';
import { addWorkflowCommands } from './commands/workflow.js';
import { getVersion } from './version.js';

/**
 * Build the command line program. Failed commands set a non-zero exit
 * code instead of exiting.
 */
export function createProgram(): Command {
  const program = new Command();

  const onResult = (success: boolean) => {
    if (!success) {
      process.exitCode = 1;
    }
  };

  program
    .name('flowdoc')
    .description('Validate and inspect flow and workflow documents')
    .version(getVersion())
    .option('-v, --verbose', 'Log loader activity to stderr', false)
    .hook('preAction', command => {
      setVerbose(command.opts<{ verbose: boolean }>().verbose);
    });

  addFlowCommands(program, onResult);
  addWorkflowCommands(program, onResult);

  return program;
}
