/**
 * Logger - conditional console logging for the analysis hot path.
 *
 * Buffers arrive every ~90ms; console output is synchronous, so debug and
 * warning output stay off unless IMPACT_ANALYZER_DEBUG=1.
 * logger.error is always active.
 */

const DEBUG = typeof process !== "undefined" && process.env.IMPACT_ANALYZER_DEBUG === "1";

const noop = (..._args: unknown[]): void => {};

export const logger = {
  debugEnabled: DEBUG,
  debug: DEBUG ? console.debug.bind(console) : noop,
  warn: DEBUG ? console.warn.bind(console) : noop,
  error: console.error.bind(console),
};

export default logger;
