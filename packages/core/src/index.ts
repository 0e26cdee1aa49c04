/**
 * Shared utilities for the DAX LSP packages: layered errors and logging.
 */

export { LSPError, BridgeError, EngineError, EngineUnresponsiveError } from './errors.js';
export type { ErrorLayer } from './errors.js';
export { Logger, LogLevel, parseLogLevel, errorMessage } from './logging.js';
