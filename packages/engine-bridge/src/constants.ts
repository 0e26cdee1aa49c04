/**
 * Configuration constants for the engine bridge.
 */

/**
 * Default timeout for a single engine round trip in milliseconds.
 *
 * @remarks
 * A call that gets no reply within this window fails with
 * `EngineUnresponsiveError` and the engine process is terminated.
 * Can be overridden via {@link EngineBridgeOptions.timeout}; `0` disables it.
 */
export const BRIDGE_TIMEOUT_DEFAULT = 30000;

/**
 * Time to wait for the engine to exit after SIGTERM before sending SIGKILL (ms).
 */
export const GRACEFUL_SHUTDOWN_TIMEOUT = 2000;

/**
 * Default engine executable, resolved against the server's working directory.
 */
export const DEFAULT_ENGINE_PATH = './DaxLanguageService.exe';

/**
 * Environment variable that overrides {@link DEFAULT_ENGINE_PATH}.
 */
export const ENGINE_PATH_ENV = 'DAX_ENGINE_PATH';
