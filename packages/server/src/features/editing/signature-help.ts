/**
 * Signature Help Handler
 *
 * Provides DAX function parameter hints.
 */

import type { Connection, SignatureHelp, TextDocumentPositionParams } from 'vscode-languageserver/node.js';
import { Logger, errorMessage } from '@dax-lsp/core';
import type { DocumentSource, Services } from '../../services/index.js';
import { toSignatureHelp } from '../converters.js';
import { cursorContext } from '../utils/cursor.js';
import { throwIfEngineError } from '../utils/engine-response.js';

const log = new Logger('SignatureHelp');

export async function provideSignatureHelp(
    params: TextDocumentPositionParams,
    services: Services,
    documents: DocumentSource
): Promise<SignatureHelp | null> {
    const uri = params.textDocument.uri;
    const document = documents.get(uri);
    const bridge = services.bridge;
    if (!document || !bridge) {
        return null;
    }
    const cursor = cursorContext(document, params.position);
    if (!cursor) {
        return null;
    }

    try {
        const response = await bridge.signatureHelp({
            line: cursor.line,
            column: cursor.column,
            fullText: cursor.fullText,
        });
        throwIfEngineError('signatureHelp', response);
        return toSignatureHelp(response);
    } catch (err) {
        log.warn('Signature help failed', { uri, error: errorMessage(err) });
        return null;
    }
}

/**
 * Register signature help handler.
 */
export function registerSignatureHelpHandler(
    connection: Connection,
    services: Services,
    documents: DocumentSource
): void {
    connection.onSignatureHelp((params) => provideSignatureHelp(params, services, documents));
}
