/**
 * Diagnostic sink handed to every scanner component
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Send every level to stderr so stdout stays machine-readable */
  stderrOnly?: boolean;
  colors?: boolean;
}

// ANSI color codes
export const colors = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  reset: '\x1b[0m',
  bold: '\x1b[1m',
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { verbose = false, stderrOnly = false, colors: useColors = true } = options;

  const tag = (label: string, color: string): string =>
    useColors ? `${color}[${label}]${colors.reset}` : `[${label}]`;

  const out = (line: string): void => {
    if (stderrOnly) {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug(message) {
      if (verbose) out(`${tag('DBG', colors.magenta)} ${message}`);
    },
    info(message) {
      out(`${tag('INF', colors.blue)} ${message}`);
    },
    warn(message) {
      out(`${tag('WRN', colors.yellow)} ${message}`);
    },
    error(message) {
      console.error(`${tag('ERR', colors.red)} ${message}`);
    },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
