/**
 * Diagnostics Tests
 */

import { describe, it, before } from 'node:test';
import assert from 'node:assert/strict';
import { DiagnosticSeverity, DocumentDiagnosticReportKind } from 'vscode-languageserver/node.js';
import type { Diagnostic } from 'vscode-languageserver/node.js';
import { Logger, LogLevel } from '@dax-lsp/core';
import {
    DiagnosticsPublisher,
    provideDiagnostics,
    provideDocumentDiagnosticReport,
} from '../../features/diagnostics.js';
import {
    FakeEngineClient,
    TEST_URI,
    createMockDocuments,
    createMockServices,
} from '../helpers/mock-services.js';

const TEXT = "Margin :=\n    DIVIDE([Profit], [Revenu])";

function problem(line: number, message: string) {
    return {
        range: { start: { line, character: 0 }, end: { line, character: 4 } },
        severity: 1,
        message,
        source: 'DAX',
        code: null,
    };
}

async function waitFor(condition: () => boolean): Promise<void> {
    for (let i = 0; i < 200; i++) {
        if (condition()) {
            return;
        }
        await new Promise<void>((resolve) => setTimeout(resolve, 5));
    }
    throw new Error('condition not reached');
}

describe('provideDiagnostics', () => {
    before(() => Logger.setLevel(LogLevel.OFF));

    const documents = createMockDocuments({ [TEST_URI]: TEXT });

    it('should send the full text and uri, and convert the reply', async () => {
        const client = new FakeEngineClient({
            diagnostics: () => ({
                diagnostics: [{
                    range: { start: { line: 1, character: 22 }, end: { line: 1, character: 30 } },
                    severity: 2,
                    message: "Measure 'Revenu' not found",
                    source: null,
                    code: 'DAX1001',
                }],
            }),
        });

        const result = await provideDiagnostics(TEST_URI, createMockServices({ client }), documents);

        assert.deepEqual(client.calls, [{ method: 'diagnostics', params: { fullText: TEXT, uri: TEST_URI } }]);
        assert.deepEqual(result, [{
            range: { start: { line: 1, character: 22 }, end: { line: 1, character: 30 } },
            severity: DiagnosticSeverity.Warning,
            message: "Measure 'Revenu' not found",
            source: 'dax',
            code: 'DAX1001',
        }]);
    });

    it('should keep at most maxNumberOfProblems diagnostics', async () => {
        const client = new FakeEngineClient({
            diagnostics: () => ({ diagnostics: [problem(0, 'first'), problem(1, 'second'), problem(1, 'third')] }),
        });
        const services = createMockServices({ client, settings: { maxNumberOfProblems: 2 } });

        const result = await provideDiagnostics(TEST_URI, services, documents);

        assert.deepEqual(result.map(d => d.message), ['first', 'second']);
        assert.deepEqual(result.map(d => d.source), ['DAX', 'DAX']);
    });

    it('should report nothing when the engine errors or the call fails', async () => {
        const erroring = new FakeEngineClient({
            diagnostics: () => ({ error: 'Analysis failed', diagnostics: [problem(0, 'stale')] }),
        });
        const failing = new FakeEngineClient({
            diagnostics: () => {
                throw new Error('EPIPE');
            },
        });

        assert.deepEqual(await provideDiagnostics(TEST_URI, createMockServices({ client: erroring }), documents), []);
        assert.deepEqual(await provideDiagnostics(TEST_URI, createMockServices({ client: failing }), documents), []);
    });

    it('should wrap the items in a full report', async () => {
        const client = new FakeEngineClient({ diagnostics: () => ({ diagnostics: [problem(0, 'only')] }) });

        const report = await provideDocumentDiagnosticReport(TEST_URI, createMockServices({ client }), documents);

        assert.equal(report.kind, DocumentDiagnosticReportKind.Full);
        assert.deepEqual(report, {
            kind: DocumentDiagnosticReportKind.Full,
            items: [{
                range: { start: { line: 0, character: 0 }, end: { line: 0, character: 4 } },
                severity: DiagnosticSeverity.Error,
                message: 'only',
                source: 'DAX',
            }],
        });
    });

    it('should return an empty full report for an unknown document', async () => {
        const report = await provideDocumentDiagnosticReport('file:///closed.dax', createMockServices(), documents);
        assert.deepEqual(report, { kind: DocumentDiagnosticReportKind.Full, items: [] });
    });
});

describe('DiagnosticsPublisher', () => {
    function setup() {
        const sent: Array<{ uri: string; diagnostics: Diagnostic[] }> = [];
        const computed: string[] = [];
        const diagnostic: Diagnostic = {
            range: { start: { line: 0, character: 0 }, end: { line: 0, character: 1 } },
            message: 'x',
        };
        const publisher = new DiagnosticsPublisher(
            async (uri, diagnostics) => {
                sent.push({ uri, diagnostics });
            },
            async (uri) => {
                computed.push(uri);
                return [diagnostic];
            },
            () => 10
        );
        return { publisher, sent, computed, diagnostic };
    }

    it('should debounce bursts of changes into one validation', async () => {
        const { publisher, sent, computed, diagnostic } = setup();
        const document = { uri: TEST_URI };

        publisher.schedule(document);
        publisher.schedule(document);
        publisher.schedule(document);
        await waitFor(() => sent.length === 1);

        assert.deepEqual(computed, [TEST_URI]);
        assert.deepEqual(sent, [{ uri: TEST_URI, diagnostics: [diagnostic] }]);
        publisher.dispose();
    });

    it('should clear diagnostics and cancel the pending validation on close', async () => {
        const { publisher, sent, computed } = setup();

        publisher.schedule({ uri: TEST_URI });
        publisher.clear(TEST_URI);
        await new Promise<void>((resolve) => setTimeout(resolve, 40));

        assert.deepEqual(computed, []);
        assert.deepEqual(sent, [{ uri: TEST_URI, diagnostics: [] }]);
    });

    it('should validate immediately on request', async () => {
        const { publisher, sent } = setup();

        publisher.validateNow({ uri: TEST_URI });
        await waitFor(() => sent.length === 1);

        assert.equal(sent[0]?.uri, TEST_URI);
    });
});
