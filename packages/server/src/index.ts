/**
 * DAX LSP Server - library entry point.
 *
 * The runnable server lives in server.ts; this module exposes the handler
 * providers and services for embedding and testing.
 */

export * from './features/index.js';
export * from './services/index.js';
export * from './core/index.js';
export { cursorContext } from './features/utils/cursor.js';
export * as converters from './features/converters.js';
export { COMMANDS, CONFIGURATION_SECTION, DIAGNOSTIC_SOURCE } from './constants/index.js';
