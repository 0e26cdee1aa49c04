/**
 * Bridge Manager - EngineBridge wrapper with health monitoring
 *
 * Wraps the engine bridge with lifecycle management and health monitoring.
 * Provides a single interface for feature handlers to interact
 * with the DAX engine subprocess.
 */

import type {
    CompletionParams,
    CompletionResponse,
    DiagnosticsParams,
    DiagnosticsResponse,
    HoverParams,
    HoverResponse,
    ModelMetadata,
    SignatureHelpParams,
    SignatureHelpResponse,
} from '@dax-lsp/engine-bridge';
import type { Logger } from '@dax-lsp/core';
import { LSP } from '../constants/index.js';

/**
 * The part of EngineBridge the server relies on.
 */
export interface EngineClient {
    start(): Promise<void>;
    stop(): Promise<void>;
    isRunning(): boolean;
    readonly pid: number | null;
    readonly pendingCount: number;
    completion(params: CompletionParams): Promise<CompletionResponse>;
    signatureHelp(params: SignatureHelpParams): Promise<SignatureHelpResponse>;
    hover(params: HoverParams): Promise<HoverResponse>;
    diagnostics(params: DiagnosticsParams): Promise<DiagnosticsResponse>;
    setModel(metadata: ModelMetadata): Promise<void>;
    on(event: 'stderr', listener: (message: string) => void): unknown;
}

/**
 * Health status of the bridge and server.
 */
export interface HealthStatus {
    /** Server uptime in milliseconds */
    serverUptime: number;
    /** Whether the bridge is connected */
    bridgeConnected: boolean;
    /** Engine subprocess PID (if running) */
    enginePid: number | null;
    /** Calls queued or in flight */
    pendingCalls: number;
    /** Recent error messages from stderr */
    recentErrors: string[];
    /** Milliseconds the last successful start took */
    startupDuration: number | null;
}

/**
 * Bridge manager wraps the engine bridge with health monitoring.
 *
 * Tracks server uptime, recent engine errors and startup timing, and
 * provides pass-through methods for the engine calls.
 */
export class BridgeManager {
    private startTime: number;
    private errorLog: string[] = [];
    private startupDuration: number | null = null;

    constructor(
        public readonly bridge: EngineClient,
        private logger: Logger,
        private readonly now: () => number = Date.now,
    ) {
        this.startTime = now();
        this.setupErrorLogging();
    }

    /**
     * Keep stderr lines that mention an error for the health report.
     */
    private setupErrorLogging(): void {
        this.bridge.on('stderr', (msg: string) => {
            if (msg.toLowerCase().includes('error')) {
                this.errorLog.push(msg);
                this.logger.debug('Engine error logged', { message: msg });
                if (this.errorLog.length > LSP.MAX_RECENT_ERRORS) {
                    this.errorLog.shift();
                }
            }
        });
    }

    /**
     * Start the engine subprocess.
     */
    async start(): Promise<void> {
        const startedAt = performance.now();
        await this.bridge.start();
        this.startupDuration = performance.now() - startedAt;
        this.logger.info('Engine bridge ready', { startupDuration: `${this.startupDuration.toFixed(2)}ms` });
    }

    /**
     * Stop the engine subprocess.
     */
    async stop(): Promise<void> {
        await this.bridge.stop();
        this.startupDuration = null;
    }

    isRunning(): boolean {
        return this.bridge.isRunning();
    }

    /**
     * Get health status of the bridge and server.
     */
    getHealth(): HealthStatus {
        return {
            serverUptime: this.now() - this.startTime,
            bridgeConnected: this.bridge.isRunning(),
            enginePid: this.bridge.pid,
            pendingCalls: this.bridge.pendingCount,
            recentErrors: [...this.errorLog],
            startupDuration: this.startupDuration,
        };
    }

    async completion(params: CompletionParams): Promise<CompletionResponse> {
        return this.bridge.completion(params);
    }

    async signatureHelp(params: SignatureHelpParams): Promise<SignatureHelpResponse> {
        return this.bridge.signatureHelp(params);
    }

    async hover(params: HoverParams): Promise<HoverResponse> {
        return this.bridge.hover(params);
    }

    async diagnostics(params: DiagnosticsParams): Promise<DiagnosticsResponse> {
        return this.bridge.diagnostics(params);
    }

    /**
     * Replace the engine's semantic model.
     */
    async setModel(metadata: ModelMetadata): Promise<void> {
        await this.bridge.setModel(metadata);
        this.logger.info('Model metadata sent to engine', {
            tables: metadata.tables?.length ?? 0,
            measures: metadata.measures?.length ?? 0,
        });
    }
}

/**
 * Render a health status as the text shown by `dax.showHealth`.
 */
export function formatHealth(health: HealthStatus | null): string {
    const lines: string[] = [];
    lines.push('=== DAX LSP Server Health ===');
    lines.push('');

    if (health) {
        const uptime = Math.floor(health.serverUptime / 1000);
        const uptimeStr = uptime > 60
            ? `${Math.floor(uptime / 60)}m ${uptime % 60}s`
            : `${uptime}s`;

        lines.push(`Server Uptime: ${uptimeStr}`);
        lines.push(`Bridge Connected: ${health.bridgeConnected ? 'YES' : 'NO'}`);
        lines.push(`Engine PID: ${health.enginePid ?? 'N/A'}`);
        lines.push(`Pending Calls: ${health.pendingCalls}`);
        if (health.startupDuration !== null) {
            lines.push(`Startup Time: ${health.startupDuration.toFixed(0)}ms`);
        }

        lines.push('');
        if (health.recentErrors.length > 0) {
            lines.push('Recent Errors:');
            for (const err of health.recentErrors) {
                lines.push(`  - ${err}`);
            }
        } else {
            lines.push('No recent errors');
        }
    } else {
        lines.push('Health status unavailable');
    }

    lines.push('');
    lines.push('=============================');

    return lines.join('\n');
}
