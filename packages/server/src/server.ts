/**
 * DAX LSP Server
 *
 * Language Server Protocol front end for the DAX language service engine.
 * Provides completion, signature help, hover and diagnostics.
 *
 * This is a wiring-only file - all handler logic is in feature modules.
 */

import {
    createConnection,
    ProposedFeatures,
    TextDocumentSyncKind,
    TextDocuments,
    DidChangeConfigurationNotification,
} from 'vscode-languageserver/node.js';
import type { InitializeParams, InitializeResult } from 'vscode-languageserver/node.js';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { EngineBridge } from '@dax-lsp/engine-bridge';
import { Logger, errorMessage } from '@dax-lsp/core';
import { BridgeManager, type Services } from './services/index.js';
import { applyConfigurationChange, defaultSettings, resolveSettings, toLogLevel } from './core/index.js';
import { DIAGNOSTIC_SOURCE, LSP } from './constants/index.js';
import * as features from './features/index.js';

// ============================================================================
// Connection and Documents
// ============================================================================

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

// ============================================================================
// Services
// ============================================================================

const logger = new Logger('DaxLSPServer');

const services: Services = {
    bridge: null, // set in onInitialize
    logger,
    globalSettings: defaultSettings,
};

let hasConfigurationCapability = false;
let clientPullsDiagnostics = false;

// ============================================================================
// LSP Lifecycle Handlers
// ============================================================================

connection.onInitialize(async (params: InitializeParams): Promise<InitializeResult> => {
    connection.console.log('DAX LSP Server initializing...');

    const settings = resolveSettings(params.initializationOptions);
    services.globalSettings = settings;
    Logger.setLevel(toLogLevel(settings.logLevel));

    hasConfigurationCapability = params.capabilities.workspace?.didChangeConfiguration?.dynamicRegistration === true;
    clientPullsDiagnostics = params.capabilities.textDocument?.diagnostic !== undefined;

    const bridge = new EngineBridge({
        enginePath: settings.enginePath,
        engineArgs: settings.engineArgs,
        timeout: settings.requestTimeout,
        readyLine: settings.engineReadyLine === '' ? undefined : settings.engineReadyLine,
    });
    bridge.on('stderr', (msg: string) => connection.console.log(`[Engine] ${msg}`));
    bridge.on('exit', (code: number | null) => connection.console.warn(`DAX engine exited with code ${code}`));
    services.bridge = new BridgeManager(bridge, logger);

    try {
        await services.bridge.start();
        connection.console.log(`DAX engine started: ${settings.enginePath}`);
    } catch (err) {
        // Keep serving; every feature answers with an empty result until a restart succeeds
        connection.console.error(`Failed to start DAX engine: ${errorMessage(err)}`);
        logger.error('Failed to start DAX engine', { enginePath: settings.enginePath, error: errorMessage(err) });
    }

    return {
        capabilities: {
            textDocumentSync: {
                openClose: true,
                change: TextDocumentSyncKind.Full,
            },
            completionProvider: {
                resolveProvider: false,
                triggerCharacters: [...LSP.COMPLETION_TRIGGERS],
            },
            signatureHelpProvider: {
                triggerCharacters: [...LSP.SIGNATURE_HELP_TRIGGERS],
            },
            hoverProvider: true,
            diagnosticProvider: {
                identifier: DIAGNOSTIC_SOURCE,
                interFileDependencies: false,
                workspaceDiagnostics: false,
            },
            executeCommandProvider: {
                commands: features.SUPPORTED_COMMANDS,
            },
        },
        serverInfo: { name: 'dax-lsp' },
    };
});

connection.onInitialized(() => {
    connection.console.log('DAX LSP Server initialized');
    if (hasConfigurationCapability) {
        connection.client.register(DidChangeConfigurationNotification.type, undefined).catch((err: unknown) => {
            logger.warn('Configuration registration failed', { error: errorMessage(err) });
        });
    }
});

connection.onDidChangeConfiguration((change) => {
    services.globalSettings = applyConfigurationChange(services.globalSettings, change.settings);
    Logger.setLevel(toLogLevel(services.globalSettings.logLevel));
    if (!clientPullsDiagnostics) {
        documents.all().forEach((document) => publisher.schedule(document));
    }
});

// ============================================================================
// Register Feature Handlers (BEFORE documents.listen!)
// ============================================================================

const publisher = features.registerDiagnosticsHandlers(connection, services, documents, {
    pushEnabled: () => !clientPullsDiagnostics,
});
features.registerNavigationHandlers(connection, services, documents);
features.registerEditingHandlers(connection, services, documents);
features.registerCommandHandlers(connection, services);

// ============================================================================
// Shutdown Handlers
// ============================================================================

connection.onShutdown(async () => {
    connection.console.log('DAX LSP Server shutting down...');
    publisher.dispose();
    await services.bridge?.stop();
});

connection.onExit(() => {
    services.bridge?.stop().catch((err: unknown) => {
        logger.debug('Engine stop during exit failed', { error: errorMessage(err) });
    });
});

// ============================================================================
// Start Listening
// ============================================================================

documents.listen(connection);
connection.listen();

connection.console.log('DAX LSP Server started');
