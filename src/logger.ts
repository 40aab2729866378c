/**
 * Logging sinks
 *
 * Components take a `Logger` and default to `console`. Messages carry a
 * `[Component]` prefix so interleaved output stays attributable.
 */

import type { Logger } from "./types";

/**
 * Discards everything; used for `--quiet`
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
};

/**
 * Pick the logger for a run
 */
export function createLogger(options: { quiet?: boolean } = {}): Logger {
  return options.quiet === true ? silentLogger : console;
}
