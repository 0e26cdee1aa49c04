/**
 * Navigation Feature Handlers
 */

import type { Connection } from 'vscode-languageserver/node.js';
import type { DocumentSource, Services } from '../../services/index.js';
import { registerHoverHandler } from './hover.js';

export { provideHover, registerHoverHandler } from './hover.js';

export function registerNavigationHandlers(
    connection: Connection,
    services: Services,
    documents: DocumentSource
): void {
    registerHoverHandler(connection, services, documents);
}
