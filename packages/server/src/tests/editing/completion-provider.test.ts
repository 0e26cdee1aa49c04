/**
 * Completion Provider Tests
 *
 * Exercises provideCompletion against a scripted engine client.
 */

import { describe, it, before } from 'node:test';
import assert from 'node:assert/strict';
import { CompletionItemKind } from 'vscode-languageserver/node.js';
import { EngineBridge } from '@dax-lsp/engine-bridge';
import { Logger, LogLevel } from '@dax-lsp/core';
import { provideCompletion } from '../../features/editing/completion.js';
import { BridgeManager } from '../../services/index.js';
import {
    FakeEngineClient,
    TEST_URI,
    createMockDocuments,
    createMockServices,
} from '../helpers/mock-services.js';

const TEXT = 'EVALUATE\r\nROW("Total", SU)';

function request(line: number, character: number, uri = TEST_URI) {
    return { textDocument: { uri }, position: { line, character } };
}

describe('Completion Provider', () => {
    before(() => Logger.setLevel(LogLevel.OFF));

    const documents = createMockDocuments({ [TEST_URI]: TEXT });

    it('should send the cursor line, column, line offset and full text', async () => {
        const client = new FakeEngineClient();
        await provideCompletion(request(1, 15), createMockServices({ client }), documents);

        assert.deepEqual(client.calls, [{
            method: 'completion',
            params: { line: 'ROW("Total", SU)', column: 15, lineOffset: 10, fullText: TEXT },
        }]);
    });

    it('should convert engine items', async () => {
        const client = new FakeEngineClient({
            completion: () => ({
                isIncomplete: true,
                items: [
                    {
                        label: 'SUM',
                        kind: 3,
                        detail: 'SUM(<column>)',
                        documentation: 'Adds all the numbers in a column.',
                        sortText: '0001',
                        insertText: null,
                    },
                    { label: "'Sales'", kind: 99, insertText: "'Sales'[" },
                ],
            }),
        });

        const result = await provideCompletion(request(1, 15), createMockServices({ client }), documents);

        assert.deepEqual(result, {
            isIncomplete: true,
            items: [
                {
                    label: 'SUM',
                    kind: CompletionItemKind.Function,
                    insertText: 'SUM',
                    detail: 'SUM(<column>)',
                    documentation: 'Adds all the numbers in a column.',
                    sortText: '0001',
                },
                { label: "'Sales'", kind: CompletionItemKind.Text, insertText: "'Sales'[" },
            ],
        });
    });

    it('should return an empty list when the engine reports an error', async () => {
        const client = new FakeEngineClient({
            completion: () => ({ error: 'Object reference not set', items: [{ label: 'stale' }] }),
        });

        const result = await provideCompletion(request(1, 15), createMockServices({ client }), documents);

        assert.deepEqual(result, { isIncomplete: false, items: [] });
    });

    it('should return an empty list when the bridge call fails', async () => {
        const client = new FakeEngineClient({
            completion: () => {
                throw new Error('No response from engine: process exited with code 1');
            },
        });

        const result = await provideCompletion(request(1, 15), createMockServices({ client }), documents);

        assert.deepEqual(result, { isIncomplete: false, items: [] });
    });

    it('should degrade when the engine was never started', async () => {
        const services = createMockServices({ client: null });
        services.bridge = new BridgeManager(new EngineBridge({ enginePath: './missing.exe' }), services.logger);

        const result = await provideCompletion(request(0, 3), services, documents);

        assert.deepEqual(result, { isIncomplete: false, items: [] });
    });

    it('should not call the engine for an unknown document', async () => {
        const client = new FakeEngineClient();
        const result = await provideCompletion(
            request(0, 0, 'file:///workspace/other.dax'),
            createMockServices({ client }),
            documents
        );

        assert.deepEqual(result, { isIncomplete: false, items: [] });
        assert.deepEqual(client.calls, []);
    });

    it('should not call the engine for a line past the end of the document', async () => {
        const client = new FakeEngineClient();
        const result = await provideCompletion(request(5, 0), createMockServices({ client }), documents);

        assert.deepEqual(result, { isIncomplete: false, items: [] });
        assert.deepEqual(client.calls, []);
    });

    it('should not call anything before the bridge is initialized', async () => {
        const result = await provideCompletion(request(1, 15), createMockServices({ client: null }), documents);
        assert.deepEqual(result, { isIncomplete: false, items: [] });
    });
});
