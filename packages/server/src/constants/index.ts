/**
 * Constants for the DAX LSP Server
 */

/**
 * Default max number of problems (diagnostics)
 */
export const DEFAULT_MAX_PROBLEMS = 100;

/**
 * Default diagnostic delay (ms) - debounce validation to avoid triggering on every keystroke
 */
export const DIAGNOSTIC_DELAY_DEFAULT = 250;

/**
 * Banner the DAX engine prints on stdout once it is ready to serve
 */
export const ENGINE_READY_LINE = 'DAX Language Service Started';

/**
 * `source` of diagnostics the engine leaves unlabelled, and the pull diagnostics identifier
 */
export const DIAGNOSTIC_SOURCE = 'dax';

/**
 * Key of the server's section in workspace configuration
 */
export const CONFIGURATION_SECTION = 'dax';

/**
 * Commands served through workspace/executeCommand
 */
export const COMMANDS = {
    UPDATE_MODEL: 'dax.updateModel',
    SHOW_HEALTH: 'dax.showHealth',
    RESTART_ENGINE: 'dax.restartEngine',
} as const;

/**
 * LSP trigger characters
 */
export const LSP = {
    /** Table quote, column bracket, call paren, argument separator, space */
    COMPLETION_TRIGGERS: ['[', "'", '(', ',', ' '],
    SIGNATURE_HELP_TRIGGERS: ['(', ','],
    /** Stderr lines kept for the health report */
    MAX_RECENT_ERRORS: 5,
} as const;
