let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/**
 * Console logger. Progress lines are only printed in verbose mode,
 * warnings and errors always are.
 */
export const logger = {
  /** Always printed, used for summaries and captured sandbox output */
  log(message: string): void {
    console.log(message);
  },
  info(message: string): void {
    if (verbose) console.log(message);
  },
  debug(message: string): void {
    if (verbose) console.log(`[debug] ${message}`);
  },
  warn(message: string): void {
    console.warn(message);
  },
  error(message: string, error?: unknown): void {
    if (error === undefined) {
      console.error(message);
    } else {
      console.error(message, error);
    }
  },
};
