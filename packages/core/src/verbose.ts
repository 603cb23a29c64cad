import colors from 'ansi-colors';

export let VERBOSE = false;

export const setVerbose = (verbose: boolean) => {
  VERBOSE = verbose;
};

/**
 * Print a gray diagnostic line to stderr when verbose mode is on
 */
export const debug = (message: string) => {
  if (VERBOSE) {
    console.error(colors.gray(message));
  }
};
