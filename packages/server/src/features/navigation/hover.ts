/**
 * Hover Handler
 *
 * Shows the engine's Markdown description of the symbol under the cursor.
 */

import type { Connection, Hover, TextDocumentPositionParams } from 'vscode-languageserver/node.js';
import { Logger, errorMessage } from '@dax-lsp/core';
import type { DocumentSource, Services } from '../../services/index.js';
import { toHover } from '../converters.js';
import { cursorContext } from '../utils/cursor.js';
import { throwIfEngineError } from '../utils/engine-response.js';

const log = new Logger('Navigation');

export async function provideHover(
    params: TextDocumentPositionParams,
    services: Services,
    documents: DocumentSource
): Promise<Hover | null> {
    const uri = params.textDocument.uri;
    log.debug('Hover request', { uri });
    try {
        const document = documents.get(uri);
        const bridge = services.bridge;
        if (!document || !bridge) {
            return null;
        }
        const cursor = cursorContext(document, params.position);
        if (!cursor) {
            return null;
        }

        const response = await bridge.hover(cursor);
        throwIfEngineError('hover', response);
        return toHover(response);
    } catch (err) {
        log.warn('Hover failed', { uri, error: errorMessage(err) });
        return null;
    }
}

/**
 * Register hover handler.
 */
export function registerHoverHandler(
    connection: Connection,
    services: Services,
    documents: DocumentSource
): void {
    connection.onHover((params) => provideHover(params, services, documents));
}
