/**
 * Diagnostics Feature Handlers
 *
 * Serves textDocument/diagnostic (pull) requests. For clients without pull
 * support, validates documents on open and change (debounced) and publishes
 * the results instead.
 */

import { DocumentDiagnosticReportKind } from 'vscode-languageserver/node.js';
import type {
    Connection,
    Diagnostic,
    DocumentDiagnosticReport,
    TextDocuments,
} from 'vscode-languageserver/node.js';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { Logger, errorMessage } from '@dax-lsp/core';
import type { DocumentSource, Services } from '../services/index.js';
import { toDiagnostics } from './converters.js';
import { throwIfEngineError } from './utils/engine-response.js';

const log = new Logger('Diagnostics');

/**
 * Diagnostics for an open document, at most `maxNumberOfProblems` of them.
 * Never rejects: any failure yields no diagnostics.
 */
export async function provideDiagnostics(
    uri: string,
    services: Services,
    documents: DocumentSource
): Promise<Diagnostic[]> {
    const document = documents.get(uri);
    const bridge = services.bridge;
    if (!document || !bridge) {
        return [];
    }

    try {
        const response = await bridge.diagnostics({ fullText: document.getText(), uri });
        throwIfEngineError('diagnostics', response);
        const diagnostics = toDiagnostics(response, services.globalSettings.maxNumberOfProblems);
        log.debug('Diagnostics computed', { uri, version: document.version, count: diagnostics.length });
        return diagnostics;
    } catch (err) {
        log.warn('Diagnostics failed', { uri, error: errorMessage(err) });
        return [];
    }
}

/**
 * Full report for a textDocument/diagnostic request.
 */
export async function provideDocumentDiagnosticReport(
    uri: string,
    services: Services,
    documents: DocumentSource
): Promise<DocumentDiagnosticReport> {
    return {
        kind: DocumentDiagnosticReportKind.Full,
        items: await provideDiagnostics(uri, services, documents),
    };
}

export interface DiagnosticsOptions {
    /** False once the client has declared it pulls diagnostics itself */
    pushEnabled: () => boolean;
}

/**
 * Register diagnostics handlers with the LSP connection.
 *
 * @param connection - LSP connection
 * @param services - Server services bundle
 * @param documents - Text document manager
 */
export function registerDiagnosticsHandlers(
    connection: Connection,
    services: Services,
    documents: TextDocuments<TextDocument>,
    options: DiagnosticsOptions
): DiagnosticsPublisher {
    connection.languages.diagnostics.on((params) =>
        provideDocumentDiagnosticReport(params.textDocument.uri, services, documents)
    );

    const publisher = new DiagnosticsPublisher(
        (uri, diagnostics) => connection.sendDiagnostics({ uri, diagnostics }),
        (uri) => provideDiagnostics(uri, services, documents),
        () => services.globalSettings.diagnosticDelay
    );

    // Fires on open as well as on every change
    documents.onDidChangeContent((change) => {
        if (options.pushEnabled()) {
            publisher.schedule(change.document);
        }
    });
    documents.onDidClose((event) => {
        if (options.pushEnabled()) {
            publisher.clear(event.document.uri);
        }
    });

    return publisher;
}

/**
 * Debounced push of diagnostics, one timer per document.
 */
export class DiagnosticsPublisher {
    private readonly validationTimers = new Map<string, ReturnType<typeof setTimeout>>();
    /** Latest validation per document; older results are not published */
    private readonly generations = new Map<string, number>();

    constructor(
        private readonly send: (uri: string, diagnostics: Diagnostic[]) => Promise<void>,
        private readonly compute: (uri: string) => Promise<Diagnostic[]>,
        private readonly delay: () => number
    ) {}

    /**
     * Validate after `diagnosticDelay` ms of quiet.
     */
    schedule(document: Pick<TextDocument, 'uri'>): void {
        const uri = document.uri;
        this.cancelTimer(uri);
        const timer = setTimeout(() => {
            this.validationTimers.delete(uri);
            this.validateNow(document);
        }, this.delay());
        this.validationTimers.set(uri, timer);
    }

    validateNow(document: Pick<TextDocument, 'uri'>): void {
        this.validate(document.uri).catch((err: unknown) => {
            log.error('Publishing diagnostics failed', { uri: document.uri, error: errorMessage(err) });
        });
    }

    /**
     * Forget a closed document and clear its diagnostics.
     */
    clear(uri: string): void {
        this.cancelTimer(uri);
        this.generations.delete(uri);
        this.send(uri, []).catch((err: unknown) => {
            log.error('Clearing diagnostics failed', { uri, error: errorMessage(err) });
        });
    }

    /**
     * Cancel every pending validation.
     */
    dispose(): void {
        for (const timer of this.validationTimers.values()) {
            clearTimeout(timer);
        }
        this.validationTimers.clear();
    }

    private async validate(uri: string): Promise<void> {
        this.cancelTimer(uri);
        const generation = (this.generations.get(uri) ?? 0) + 1;
        this.generations.set(uri, generation);

        const diagnostics = await this.compute(uri);
        if (this.generations.get(uri) !== generation) {
            return;
        }
        await this.send(uri, diagnostics);
    }

    private cancelTimer(uri: string): void {
        const timer = this.validationTimers.get(uri);
        if (timer) {
            clearTimeout(timer);
            this.validationTimers.delete(uri);
        }
    }
}
