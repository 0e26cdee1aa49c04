/**
 * Core module exports for the DAX LSP server.
 *
 * Re-exports shared utilities from @dax-lsp/core and server-specific types.
 */

export { LSPError, BridgeError, EngineError } from '@dax-lsp/core';
export type { ErrorLayer } from '@dax-lsp/core';
export { Logger, LogLevel } from '@dax-lsp/core';

export type { ServerSettings, LogLevelName } from './types.js';
export { defaultSettings } from './types.js';
export { parseSettings, settingsFromEnvironment, resolveSettings, applyConfigurationChange, toLogLevel } from './settings.js';
