/**
 * Feature Module Exports
 *
 * Re-exports all feature registration functions for convenient importing.
 */

// Diagnostics feature - pull requests and push fallback
export {
    registerDiagnosticsHandlers,
    provideDiagnostics,
    provideDocumentDiagnosticReport,
    DiagnosticsPublisher,
    type DiagnosticsOptions,
} from './diagnostics.js';

// Navigation feature - hover
export { registerNavigationHandlers, provideHover } from './navigation/index.js';

// Editing feature - completion, signature help
export { registerEditingHandlers, provideCompletion, provideSignatureHelp } from './editing/index.js';

// Workspace commands
export { registerCommandHandlers, executeCommand, SUPPORTED_COMMANDS } from './commands.js';
