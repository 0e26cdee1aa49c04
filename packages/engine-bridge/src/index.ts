/**
 * Engine Bridge - TypeScript <-> DAX engine subprocess communication layer
 *
 * This module manages the engine subprocess lifecycle and the one-line JSON
 * request/reply protocol spoken over its stdin and stdout.
 */

export * from './types.js';
export * from './bridge.js';
export * from './constants.js';
export * from './process.js';
export { BridgeResponseError, objectResponse, type ResponseValidator } from './response-validator.js';

// Export error types for consumers who need to catch engine failures
export { BridgeError, EngineError, EngineUnresponsiveError, LSPError } from '@dax-lsp/core';
export type { ErrorLayer } from '@dax-lsp/core';

// Export Logger for consumers who need logging
export { Logger, LogLevel } from '@dax-lsp/core';
