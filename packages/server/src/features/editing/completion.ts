/**
 * Completion Handler
 *
 * Asks the engine for completions at the cursor: table and column
 * references, measures, functions and keywords.
 */

import type { CompletionList, Connection, TextDocumentPositionParams } from 'vscode-languageserver/node.js';
import { Logger, errorMessage } from '@dax-lsp/core';
import type { DocumentSource, Services } from '../../services/index.js';
import { emptyCompletionList, toCompletionList } from '../converters.js';
import { cursorContext } from '../utils/cursor.js';
import { throwIfEngineError } from '../utils/engine-response.js';

const log = new Logger('Completion');

/**
 * Completion list for a cursor position. Never rejects: any failure
 * yields an empty, complete list.
 */
export async function provideCompletion(
    params: TextDocumentPositionParams,
    services: Services,
    documents: DocumentSource
): Promise<CompletionList> {
    const uri = params.textDocument.uri;
    log.debug('Completion request', { uri, line: params.position.line, character: params.position.character });

    const document = documents.get(uri);
    const bridge = services.bridge;
    if (!document || !bridge) {
        return emptyCompletionList();
    }
    const cursor = cursorContext(document, params.position);
    if (!cursor) {
        return emptyCompletionList();
    }

    try {
        const response = await bridge.completion(cursor);
        throwIfEngineError('completion', response);
        const list = toCompletionList(response);
        log.debug('Completion result', { uri, count: list.items.length });
        return list;
    } catch (err) {
        log.warn('Completion failed', { uri, error: errorMessage(err) });
        return emptyCompletionList();
    }
}

/**
 * Register completion handler.
 */
export function registerCompletionHandler(
    connection: Connection,
    services: Services,
    documents: DocumentSource
): void {
    connection.onCompletion((params) => provideCompletion(params, services, documents));
}
