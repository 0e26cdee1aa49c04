/**
 * Shared types for the DAX LSP server.
 */

import { BRIDGE_TIMEOUT_DEFAULT, DEFAULT_ENGINE_PATH } from '@dax-lsp/engine-bridge';
import { DEFAULT_MAX_PROBLEMS, DIAGNOSTIC_DELAY_DEFAULT, ENGINE_READY_LINE } from '../constants/index.js';

/**
 * Level names accepted by the `logLevel` setting.
 */
export type LogLevelName = 'off' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * LSP server configuration settings.
 */
export interface ServerSettings {
    /** Path to the DAX engine executable */
    enginePath: string;
    /** Extra command-line arguments for the engine */
    engineArgs: string[];
    /** Startup banner to wait for before serving requests; empty to not wait */
    engineReadyLine: string;
    /** Engine round-trip timeout in milliseconds (0 disables it) */
    requestTimeout: number;
    /** Maximum number of problems to report per document */
    maxNumberOfProblems: number;
    /** Delay in milliseconds before validating after document change */
    diagnosticDelay: number;
    /** Global log level */
    logLevel: LogLevelName;
}

/**
 * Default settings, before environment and client overrides.
 */
export const defaultSettings: ServerSettings = {
    enginePath: DEFAULT_ENGINE_PATH,
    engineArgs: [],
    engineReadyLine: ENGINE_READY_LINE,
    requestTimeout: BRIDGE_TIMEOUT_DEFAULT,
    maxNumberOfProblems: DEFAULT_MAX_PROBLEMS,
    diagnosticDelay: DIAGNOSTIC_DELAY_DEFAULT,
    logLevel: 'warn',
};
