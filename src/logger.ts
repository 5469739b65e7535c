// Console logging shared by every component.
// Lines read `[LEVEL] [Component] message`; callers pass extra context as trailing args.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(component: string): Logger {
  return {
    debug: (msg, ...args) => console.debug(`[DEBUG] [${component}] ${msg}`, ...args),
    info: (msg, ...args) => console.log(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
  };
}
