export interface Logger {
  debug: (...args: unknown[]) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
}

function format(args: unknown[]): string {
  return args
    .map((arg) => (arg instanceof Error ? (arg.stack ?? arg.message) : String(arg)))
    .join(" ") + "\n";
}

export function debug(debugMode: boolean, ...args: unknown[]): void {
  if (debugMode) {
    process.stdout.write(format(args));
  }
}

export function error(...args: unknown[]): void {
  process.stderr.write(format(args));
}

export function warn(...args: unknown[]): void {
  process.stderr.write(format(args));
}

export function info(...args: unknown[]): void {
  process.stdout.write(format(args));
}

export function createLogger(debugMode: boolean | string = false): Logger {
  const isDebugEnabled = typeof debugMode === "string" ? debugMode === "true" : debugMode;

  return {
    debug: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    log: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    error,
    warn,
    info,
  };
}
