/**
 * Engine Process - Low-level subprocess IPC wrapper
 *
 * Manages the engine subprocess and its line-oriented stdin/stdout pipes.
 * This class handles ONLY IPC mechanics (spawn, readline, events).
 * Call serialization and timeouts are handled by EngineBridge.
 */

import type { ChildProcess } from 'child_process';
import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import * as readline from 'readline';

/**
 * Spawn options forwarded to `child_process.spawn`.
 */
export interface EngineSpawnOptions {
    args?: string[];
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

/**
 * What EngineBridge needs from a subprocess wrapper.
 *
 * EngineProcess is the real implementation; tests substitute in-process fakes.
 */
export interface EngineChannel extends EventEmitter {
    spawn(enginePath: string, options?: EngineSpawnOptions): void;
    send(line: string): Promise<void>;
    closeInput(): void;
    kill(signal?: NodeJS.Signals): void;
    isAlive(): boolean;
    readonly pid: number | null;
}

/**
 * Low-level wrapper for the engine subprocess.
 *
 * Events: `spawn`, `message` (one stdout line), `outputClosed` (stdout
 * ended), `stderr` (text), `pipeError` (stdin write failure), `exit`
 * (code, signal), `error` (spawn or signal failure).
 *
 * @example
 * ```ts
 * const proc = new EngineProcess();
 * proc.on('message', (line) => console.log('Got:', line));
 * proc.spawn('./DaxLanguageService.exe');
 * await proc.send('{"method":"hover","params":{...}}');
 * proc.kill();
 * ```
 */
export class EngineProcess extends EventEmitter implements EngineChannel {
    private process: ChildProcess | null = null;
    private readlineInterface: readline.Interface | null = null;
    private _enginePath = '';
    private exited = false;

    /**
     * Start the engine subprocess.
     *
     * Sets up line-based reading of stdout so that a reply split across
     * pipe chunks is still delivered as one message. Spawn failures such as
     * a missing executable arrive asynchronously as an `error` event.
     *
     * @throws Error if already spawned or the pipes cannot be created
     */
    spawn(enginePath: string, options: EngineSpawnOptions = {}): void {
        if (this.process) {
            throw new Error('EngineProcess already spawned. Call kill() first.');
        }

        this._enginePath = enginePath;
        this.exited = false;

        const child = spawn(enginePath, options.args ?? [], {
            stdio: ['pipe', 'pipe', 'pipe'],
            env: { ...process.env, ...options.env },
            cwd: options.cwd,
        });

        if (!child.stdout || !child.stdin) {
            throw new Error('Failed to create stdin/stdout pipes for engine subprocess');
        }
        this.process = child;

        this.readlineInterface = readline.createInterface({
            input: child.stdout,
            crlfDelay: Infinity, // \r\n is one line break
        });

        this.readlineInterface.on('line', (line) => {
            this.emit('message', line);
        });

        child.stdout.once('end', () => {
            this.emit('outputClosed');
        });

        child.stderr?.setEncoding('utf8');
        child.stderr?.on('data', (data: string) => {
            this.emit('stderr', data);
        });

        child.stdin.on('error', (err: Error) => {
            this.emit('pipeError', err);
        });

        child.on('spawn', () => {
            this.emit('spawn');
        });

        // 'close' fires after stdio is drained, so every line has been delivered
        child.on('close', (code, signal) => {
            this.markExited();
            this.emit('exit', code, signal);
        });

        child.on('error', (err) => {
            // A failed spawn never reaches 'close' when no pipe was opened
            if (child.pid === undefined) {
                this.markExited();
            }
            this.emit('error', err);
        });
    }

    private markExited(): void {
        this.exited = true;
        this.readlineInterface?.close();
        this.readlineInterface = null;
        this.process = null;
    }

    /**
     * Write one line to the engine's stdin.
     *
     * Appends the newline terminator and resolves once the chunk has been
     * handed to the pipe.
     *
     * @throws Error if the process is not running or stdin is not writable
     */
    send(line: string): Promise<void> {
        const stdin = this.process?.stdin;
        if (!stdin?.writable) {
            return Promise.reject(new Error('EngineProcess not running or stdin not writable'));
        }
        return new Promise((resolve, reject) => {
            stdin.write(line + '\n', 'utf8', (err) => {
                if (err) {
                    reject(err);
                } else {
                    resolve();
                }
            });
        });
    }

    /**
     * Close stdin. A line-loop engine treats end of input as a request to exit.
     */
    closeInput(): void {
        this.process?.stdin?.end();
    }

    /**
     * Send a signal to the subprocess.
     *
     * The process handle is kept until the `exit` event, so callers can
     * still wait for termination.
     */
    kill(signal: NodeJS.Signals = 'SIGTERM'): void {
        this.process?.kill(signal);
    }

    /**
     * @returns true if the process exists and has not exited
     */
    isAlive(): boolean {
        return this.process !== null && !this.exited && this.process.exitCode === null;
    }

    /**
     * Process ID of the running subprocess, null otherwise.
     */
    get pid(): number | null {
        return this.process?.pid ?? null;
    }

    get enginePath(): string {
        return this._enginePath;
    }
}
