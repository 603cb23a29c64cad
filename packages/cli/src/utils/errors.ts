import colors from 'ansi-colors';
import { DocumentLoadError, SemanticValidationError } from 'flowdoc-core';

interface ReportOptions {
  json: boolean;
}

/**
 * Print a loader failure. Anything that is not a DocumentLoadError is a
 * bug and propagates.
 */
export function reportLoadError(error: unknown, options: ReportOptions): void {
  if (!(error instanceof DocumentLoadError)) {
    throw error;
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          success: false,
          kind: error.name,
          error: error.message,
          ...(error instanceof SemanticValidationError
            ? { violations: error.violations }
            : {}),
        },
        null,
        2
      )
    );
    return;
  }

  const [headline, ...details] = error.message.split('\n');
  console.error(colors.red(`✗ ${headline}`));
  for (const line of details) {
    console.error(colors.gray(line));
  }
}
