/**
 * Services Bundle
 *
 * Provides a single Services interface that feature handlers
 * receive for accessing all server dependencies.
 */

import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { TextDocuments } from 'vscode-languageserver/node.js';
import type { Logger } from '@dax-lsp/core';
import type { BridgeManager } from './bridge-manager.js';
import type { ServerSettings } from '../core/types.js';

/**
 * Services interface bundles all service dependencies.
 */
export interface Services {
    /** Bridge manager for engine subprocess communication (null until initialized) */
    bridge: BridgeManager | null;
    /** Logger for diagnostic output */
    logger: Logger;
    /** Global LSP settings (mutable, updated by configuration changes) */
    globalSettings: ServerSettings;
}

/**
 * Where handlers look up open documents.
 */
export type DocumentSource = Pick<TextDocuments<TextDocument>, 'get'>;

// Re-export for convenience
export { BridgeManager, formatHealth, type EngineClient, type HealthStatus } from './bridge-manager.js';
