/**
 * Editing Feature Handlers
 *
 * Handlers for code editing operations:
 * - Completion: code completion suggestions
 * - Signature help: function parameter hints
 */

import type { Connection } from 'vscode-languageserver/node.js';
import type { DocumentSource, Services } from '../../services/index.js';
import { registerCompletionHandler } from './completion.js';
import { registerSignatureHelpHandler } from './signature-help.js';

export { provideCompletion, registerCompletionHandler } from './completion.js';
export { provideSignatureHelp, registerSignatureHelpHandler } from './signature-help.js';

/**
 * Register all editing handlers with the LSP connection.
 *
 * @param connection - The LSP connection
 * @param services - The services bundle
 * @param documents - The text documents manager
 */
export function registerEditingHandlers(
    connection: Connection,
    services: Services,
    documents: DocumentSource
): void {
    registerCompletionHandler(connection, services, documents);
    registerSignatureHelpHandler(connection, services, documents);
}
