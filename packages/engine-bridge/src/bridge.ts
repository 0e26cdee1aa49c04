/**
 * Engine Bridge
 *
 * Manages the engine subprocess lifecycle and provides the single call
 * primitive used by the language server: write one JSON line, read one
 * JSON line back.
 */

import { EventEmitter } from 'events';
import { BridgeError, EngineUnresponsiveError, Logger, errorMessage } from '@dax-lsp/core';
import { EngineProcess, type EngineChannel } from './process.js';
import type {
    CompletionParams,
    CompletionResponse,
    DiagnosticsParams,
    DiagnosticsResponse,
    HoverParams,
    HoverResponse,
    ModelMetadata,
    RequestEnvelope,
    SignatureHelpParams,
    SignatureHelpResponse,
} from './types.js';
import { BRIDGE_TIMEOUT_DEFAULT, DEFAULT_ENGINE_PATH, GRACEFUL_SHUTDOWN_TIMEOUT } from './constants.js';
import { objectResponse, type ResponseValidator } from './response-validator.js';

/**
 * Configuration options for the EngineBridge.
 */
export interface EngineBridgeOptions {
    /** Path to the engine executable. Defaults to './DaxLanguageService.exe'. */
    enginePath?: string;
    /** Extra command-line arguments for the engine. */
    engineArgs?: string[];
    /** Working directory for the engine process. */
    cwd?: string;
    /** Environment variables merged over the server's own. */
    env?: NodeJS.ProcessEnv;
    /**
     * Startup banner the engine prints once it is ready to serve.
     * When set, start() resolves only after a stdout line beginning with it.
     */
    readyLine?: string;
    /** Round-trip (and ready-wait) timeout in milliseconds. Defaults to 30000; 0 disables it. */
    timeout?: number;
    /** Log raw traffic regardless of the global log level. */
    debug?: boolean;
    /** Factory for the subprocess wrapper. Defaults to a new EngineProcess. */
    createProcess?: () => EngineChannel;
}

/**
 * Internal options with all required properties.
 */
interface InternalBridgeOptions {
    enginePath: string;
    engineArgs: string[];
    cwd: string | undefined;
    env: NodeJS.ProcessEnv;
    readyLine: string | undefined;
    timeout: number;
}

/**
 * The one call currently waiting for its reply line.
 */
interface PendingReply {
    method: string;
    resolve: (line: string) => void;
    reject: (error: Error) => void;
    timeout: ReturnType<typeof setTimeout> | null;
}

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

/**
 * EngineBridge - Communication layer with the engine subprocess.
 *
 * The wire protocol carries no request ids: a reply is matched to its
 * request only by order. Calls therefore pass through a single-slot FIFO
 * queue, and the slot is held from the write until the reply line has been
 * consumed. At most one request is ever outstanding.
 *
 * Lines the engine prints while no call is waiting (a startup banner, for
 * instance) are discarded and emitted as `unsolicited`.
 *
 * Events: `started`, `stopped`, `exit` (code), `stderr` (text),
 * `unsolicited` (line).
 *
 * @example
 * ```ts
 * const bridge = new EngineBridge({ enginePath: './DaxLanguageService.exe' });
 * await bridge.start();
 * const hover = await bridge.hover({ line: 'SUM(', column: 1, lineOffset: 0, fullText: 'SUM(' });
 * await bridge.stop();
 * ```
 */
export class EngineBridge extends EventEmitter {
    private process: EngineChannel | null = null;
    private startPromise: Promise<void> | null = null;
    private pending: PendingReply | null = null;
    /** Tail of the call queue; settles when the last queued call releases the slot */
    private queue: Promise<void> = Promise.resolve();
    private queued = 0;
    private started = false;

    private readonly options: InternalBridgeOptions;
    private readonly createProcess: () => EngineChannel;
    private readonly logger = new Logger('EngineBridge');
    private readonly debugLog: (message: string) => void;

    constructor(options: EngineBridgeOptions = {}) {
        super();

        const debug = options.debug ?? false;
        // With `debug`, traffic goes out at ERROR so it passes the global level filter
        this.debugLog = debug
            ? (message: string) => this.logger.error(`[DEBUG] ${message}`)
            : (message: string) => this.logger.trace(message);

        this.options = {
            enginePath: options.enginePath ?? DEFAULT_ENGINE_PATH,
            engineArgs: options.engineArgs ?? [],
            cwd: options.cwd,
            env: options.env ?? {},
            readyLine: options.readyLine,
            timeout: options.timeout ?? BRIDGE_TIMEOUT_DEFAULT,
        };
        this.createProcess = options.createProcess ?? (() => new EngineProcess());

        this.debugLog(`Initialized with enginePath="${this.options.enginePath}", timeout=${this.options.timeout}`);
    }

    /**
     * Start the engine subprocess.
     *
     * Resolves once the OS reports the process as spawned, or, with
     * `readyLine` set, once the engine has printed its startup banner.
     * If the process is already running (or starting), the same start is shared.
     *
     * @throws BridgeError if the executable cannot be found or spawned.
     * @emits started when the subprocess is ready.
     */
    start(): Promise<void> {
        if (this.startPromise) {
            return this.startPromise;
        }
        if (this.isRunning()) {
            this.debugLog('Process already running, skipping start');
            return Promise.resolve();
        }

        const { enginePath, engineArgs, env, cwd } = this.options;
        this.debugLog(`Starting engine subprocess: ${enginePath} ${engineArgs.join(' ')}`);

        const proc = this.createProcess();
        this.process = proc;

        const startPromise = new Promise<void>((resolve, reject) => {
            const { readyLine, timeout } = this.options;
            let awaitingReady = false;
            let readyTimer: ReturnType<typeof setTimeout> | null = null;

            const markStarted = () => {
                this.started = true;
                this.logger.info('Engine subprocess started', { pid: proc.pid, enginePath });
                this.emit('started');
                resolve();
            };

            // No-op once the start has settled
            const failStart = (error: BridgeError) => {
                awaitingReady = false;
                if (readyTimer) {
                    clearTimeout(readyTimer);
                    readyTimer = null;
                }
                reject(error);
            };

            proc.once('spawn', () => {
                if (this.process !== proc) {
                    failStart(new BridgeError('Engine bridge stopped while starting'));
                    return;
                }
                if (readyLine === undefined) {
                    markStarted();
                    return;
                }

                this.debugLog(`Waiting for ready line "${readyLine}"`);
                awaitingReady = true;
                if (timeout > 0) {
                    readyTimer = setTimeout(() => {
                        if (!awaitingReady) {
                            return;
                        }
                        failStart(new BridgeError(`Engine did not report ready ('${readyLine}') within ${timeout}ms`));
                        this.detach(proc);
                        this.terminate(proc).catch((err: unknown) => {
                            this.logger.error('Failed to terminate engine after startup timeout', { error: errorMessage(err) });
                        });
                    }, timeout);
                }
            });

            proc.on('error', (err: Error) => {
                if (this.process !== proc) {
                    return;
                }
                if (!this.started) {
                    this.detach(proc);
                    failStart(new BridgeError(`Failed to start engine '${enginePath}': ${err.message}`, err));
                    return;
                }
                this.logger.error('Engine subprocess error', { error: err.message });
            });

            proc.on('message', (line: string) => {
                if (this.process !== proc) {
                    return;
                }
                if (!awaitingReady) {
                    this.handleLine(line);
                    return;
                }
                if (readyLine !== undefined && line.startsWith(readyLine)) {
                    awaitingReady = false;
                    if (readyTimer) {
                        clearTimeout(readyTimer);
                        readyTimer = null;
                    }
                    markStarted();
                    return;
                }
                this.discard(line);
            });

            proc.on('stderr', (data: string) => {
                const message = data.trim();
                if (message) {
                    this.logger.debug('Engine stderr', { raw: message });
                    this.emit('stderr', message);
                }
            });

            proc.on('pipeError', (err: Error) => {
                this.logger.debug('Engine stdin error', { error: err.message });
            });

            proc.on('outputClosed', () => {
                if (this.process !== proc) {
                    return;
                }
                // Nothing more can be read, so the session is over even if the process lingers
                this.started = false;
                failStart(new BridgeError('Engine closed its output before it was ready'));
                this.rejectPending(new BridgeError('No response from engine: output stream closed'));
                this.terminate(proc).catch((err: unknown) => {
                    this.logger.error('Failed to terminate engine after output closed', { error: errorMessage(err) });
                });
            });

            proc.on('exit', (code: number | null) => {
                this.debugLog(`Process closed with code: ${code}`);
                failStart(new BridgeError(`Engine exited with code ${code} before it was ready`));
                if (this.process !== proc) {
                    return;
                }
                this.detach(proc);
                this.rejectPending(new BridgeError(`No response from engine: process exited with code ${code}`));
                this.logger.warn('Engine subprocess exited', { code });
                this.emit('exit', code);
            });

            try {
                proc.spawn(enginePath, { args: engineArgs, env, cwd });
            } catch (err) {
                this.detach(proc);
                failStart(new BridgeError(`Failed to start engine '${enginePath}': ${errorMessage(err)}`, toError(err)));
            }
        });

        this.startPromise = startPromise;
        const clear = () => {
            if (this.startPromise === startPromise) {
                this.startPromise = null;
            }
        };
        startPromise.then(clear, clear);
        return startPromise;
    }

    /**
     * Stop the engine subprocess.
     *
     * Closes stdin and sends SIGTERM, then waits for the process to exit.
     * Falls back to SIGKILL if it has not exited within the grace period.
     * Safe to call when nothing is running.
     *
     * @emits stopped when the subprocess has terminated.
     */
    async stop(): Promise<void> {
        const proc = this.process;
        if (proc) {
            this.debugLog('Stopping engine subprocess...');
            this.detach(proc);
            this.rejectPending(new BridgeError('No response from engine: bridge stopped'));
            await this.terminate(proc);
            this.logger.info('Engine subprocess stopped');
        }
        this.emit('stopped');
    }

    /**
     * @returns `true` if the subprocess is started and alive.
     */
    isRunning(): boolean {
        return this.started && this.process !== null && this.process.isAlive();
    }

    /**
     * PID of the engine subprocess, null when not running.
     */
    get pid(): number | null {
        return this.process?.pid ?? null;
    }

    /**
     * Number of calls queued or in flight.
     */
    get pendingCount(): number {
        return this.queued;
    }

    /**
     * Send one request to the engine and return its parsed reply verbatim.
     *
     * Calls are serialized: each waits for every earlier call to finish,
     * then writes its envelope and consumes exactly one reply line. A reply
     * carrying an `error` field is still a successful exchange and is
     * returned as-is.
     *
     * @throws BridgeError when the bridge is not started, the write fails,
     *   the engine exits before replying, or the reply is not valid JSON.
     * @throws EngineUnresponsiveError when no reply arrives within the timeout;
     *   the engine process is terminated.
     */
    invoke(method: string, params: object): Promise<unknown> {
        if (!this.isRunning()) {
            return Promise.reject(new BridgeError(`Engine bridge not started (method '${method}')`));
        }

        this.queued++;
        const call = this.queue.then(() => this.roundTrip(method, params));
        // The slot is released whatever the outcome; the caller sees failures through `call`
        this.queue = call.then(() => undefined, () => undefined);
        return call.finally(() => {
            this.queued--;
        });
    }

    /**
     * One write + one read. Runs only while holding the queue slot.
     */
    private async roundTrip(method: string, params: object): Promise<unknown> {
        const proc = this.process;
        if (!proc || !this.isRunning()) {
            throw new BridgeError(`Engine bridge not started (method '${method}')`);
        }

        const envelope: RequestEnvelope = { method, params };
        // JSON.stringify escapes embedded newlines, so one envelope is one line
        const json = JSON.stringify(envelope);
        this.debugLog(`Sending: ${json.substring(0, 200)}`);

        const reply = new Promise<string>((resolve, reject) => {
            this.pending = { method, resolve, reject, timeout: null };
        });
        const current = this.pending;
        if (current && this.options.timeout > 0) {
            current.timeout = setTimeout(() => this.handleTimeout(current, proc), this.options.timeout);
        }

        const written = proc.send(json).catch((err: unknown) => {
            throw new BridgeError(`Failed to write '${method}' request to engine`, toError(err));
        });

        let line: string;
        try {
            [line] = await Promise.all([reply, written]);
        } finally {
            if (this.pending === current) {
                this.clearPending();
            }
        }

        try {
            return JSON.parse(line);
        } catch (err) {
            throw new BridgeError(`Malformed response to '${method}' from engine`, toError(err));
        }
    }

    /**
     * Route one stdout line to the waiting call.
     */
    private handleLine(line: string): void {
        const pending = this.pending;
        if (!pending) {
            this.discard(line);
            return;
        }

        this.debugLog(`Received: ${line.substring(0, 200)}`);
        this.clearPending();
        pending.resolve(line);
    }

    private discard(line: string): void {
        this.logger.debug('Discarding unsolicited engine output', { line: line.substring(0, 200) });
        this.emit('unsolicited', line);
    }

    /**
     * A request went unanswered. A late reply would be read by the next
     * call, so the session is torn down instead.
     */
    private handleTimeout(pending: PendingReply, proc: EngineChannel): void {
        if (this.pending !== pending) {
            return;
        }
        this.logger.error('Engine did not respond; terminating engine process', {
            method: pending.method,
            timeout: this.options.timeout,
        });
        this.clearPending();
        pending.reject(new EngineUnresponsiveError(pending.method, this.options.timeout));

        if (this.process === proc) {
            this.detach(proc);
            this.terminate(proc).catch((err: unknown) => {
                this.logger.error('Failed to terminate unresponsive engine', { error: errorMessage(err) });
            });
        }
    }

    private clearPending(): void {
        if (this.pending?.timeout) {
            clearTimeout(this.pending.timeout);
        }
        this.pending = null;
    }

    private rejectPending(error: Error): void {
        const pending = this.pending;
        if (pending) {
            this.clearPending();
            this.debugLog(`Rejecting pending '${pending.method}': ${error.message}`);
            pending.reject(error);
        }
    }

    /**
     * Forget the process; events from it are ignored from here on.
     */
    private detach(proc: EngineChannel): void {
        if (this.process === proc) {
            this.process = null;
            this.started = false;
        }
    }

    private terminate(proc: EngineChannel): Promise<void> {
        if (!proc.isAlive()) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            const killTimer = setTimeout(() => {
                this.logger.warn('Engine ignored SIGTERM; sending SIGKILL');
                proc.kill('SIGKILL');
            }, GRACEFUL_SHUTDOWN_TIMEOUT);
            proc.once('exit', () => {
                clearTimeout(killTimer);
                resolve();
            });
            proc.closeInput();
            proc.kill('SIGTERM');
        });
    }

    /**
     * Invoke and validate the reply shape.
     */
    private async request<T>(method: string, params: object, validate: ResponseValidator<T>): Promise<T> {
        const raw = await this.invoke(method, params);
        return validate(raw, method);
    }

    /**
     * Completion items for the cursor position.
     *
     * @example
     * ```ts
     * const result = await bridge.completion({ line: "'Sales'[", column: 8, lineOffset: 0, fullText: "'Sales'[" });
     * console.log(result.items?.map(i => i.label));
     * ```
     */
    async completion(params: CompletionParams): Promise<CompletionResponse> {
        return this.request('completion', params, objectResponse<CompletionResponse>());
    }

    /**
     * Signature of the function call enclosing the cursor.
     */
    async signatureHelp(params: SignatureHelpParams): Promise<SignatureHelpResponse> {
        return this.request('signatureHelp', params, objectResponse<SignatureHelpResponse>());
    }

    /**
     * Markdown hover text for the symbol under the cursor.
     */
    async hover(params: HoverParams): Promise<HoverResponse> {
        return this.request('hover', params, objectResponse<HoverResponse>());
    }

    /**
     * Syntax and semantic problems for a whole document.
     */
    async diagnostics(params: DiagnosticsParams): Promise<DiagnosticsResponse> {
        return this.request('diagnostics', params, objectResponse<DiagnosticsResponse>());
    }

    /**
     * Replace the engine's semantic model. The engine's reply is not used.
     */
    async setModel(metadata: ModelMetadata): Promise<void> {
        await this.invoke('setModel', metadata);
    }
}
