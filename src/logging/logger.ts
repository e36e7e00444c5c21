/**
 * @fileoverview Logging for the bridge, routed through the debug adapter
 * library's logger so levels and output formatting match a DAP host.
 */

import { Logger, logger as adapterLogger } from '@vscode/debugadapter';

/**
 * Logger surface the bridge modules depend on.
 */
export interface BridgeLogger {
  verbose(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type DebugLevel = 0 | 1 | 2;

const PREFIX = '[vpi]';

/**
 * Maps the bridge debug level onto the adapter logger's minimum level:
 * 0 shows warnings and errors, 1 adds informational lines, 2 is verbose.
 */
export function logLevelFor(debugLevel: DebugLevel): Logger.LogLevel {
  switch (debugLevel) {
    case 2:
      return Logger.LogLevel.Verbose;
    case 1:
      return Logger.LogLevel.Log;
    case 0:
      return Logger.LogLevel.Warn;
  }
}

/**
 * Initialises the shared adapter logger and returns a bridge logger on top of
 * it. Each formatted line is handed to `write` (stderr by default).
 */
export function createLogger(
  debugLevel: DebugLevel,
  write: (text: string) => void = (text) => {
    process.stderr.write(text);
  }
): BridgeLogger {
  adapterLogger.init((event) => write(event.body.output), undefined, false);
  adapterLogger.setup(logLevelFor(debugLevel), false, false);
  return {
    verbose: (message) => adapterLogger.verbose(`${PREFIX} ${message}`),
    info: (message) => adapterLogger.log(`${PREFIX} ${message}`),
    warn: (message) => adapterLogger.warn(`${PREFIX} ${message}`),
    error: (message) => adapterLogger.error(`${PREFIX} ${message}`),
  };
}

/**
 * Logger that drops everything; the default for library use.
 */
export const silentLogger: BridgeLogger = {
  verbose: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
