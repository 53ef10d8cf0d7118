/**
 * Logger
 *
 * Console output with a `[tessel]` prefix. info/warn/error always print;
 * debug lines are gated by the `debugLogs` config flag.
 */

const PREFIX = '[tessel]';

let debugEnabled = false;

export const logger = {
  setDebug(enabled: boolean): void {
    debugEnabled = enabled;
  },

  isDebug(): boolean {
    return debugEnabled;
  },

  debug(message: string): void {
    if (!debugEnabled) return;
    console.log(`${PREFIX} ${message}`);
  },

  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  },

  warn(message: string): void {
    console.warn(`${PREFIX} ${message}`);
  },

  error(message: string, err?: unknown): void {
    if (err !== undefined) {
      console.error(`${PREFIX} ${message}`, err);
    } else {
      console.error(`${PREFIX} ${message}`);
    }
  },

  /** One line per request: path, status, duration. */
  request(path: string, status: number, ms: number): void {
    console.log(`${path} ${status} ${ms}ms`);
  },
};
