/**
 * Workspace Commands
 *
 * - dax.updateModel [metadata]: replace the engine's semantic model
 * - dax.showHealth: readable health report of the bridge and server
 * - dax.restartEngine: stop the engine and start a fresh one
 */

import type { Connection, ExecuteCommandParams } from 'vscode-languageserver/node.js';
import type { ModelMetadata } from '@dax-lsp/engine-bridge';
import { errorMessage } from '@dax-lsp/core';
import { formatHealth, type Services } from '../services/index.js';
import { COMMANDS } from '../constants/index.js';

export const SUPPORTED_COMMANDS: string[] = [COMMANDS.UPDATE_MODEL, COMMANDS.SHOW_HEALTH, COMMANDS.RESTART_ENGINE];

const MODEL_LISTS = ['tables', 'measures', 'functions'];

/**
 * A JSON object whose model lists, where present, are arrays.
 */
export function isModelMetadata(value: unknown): value is ModelMetadata {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const fields = new Map<string, unknown>(Object.entries(value));
    return MODEL_LISTS.every((key) => {
        const list = fields.get(key);
        return list === undefined || Array.isArray(list);
    });
}

async function updateModel(services: Services, args: unknown[]): Promise<null> {
    const { logger } = services;
    const metadata: unknown = args.length > 0 ? args[0] : {};
    if (!isModelMetadata(metadata)) {
        logger.warn(`Ignoring ${COMMANDS.UPDATE_MODEL}: argument is not model metadata`);
        return null;
    }
    if (!services.bridge) {
        logger.warn(`Ignoring ${COMMANDS.UPDATE_MODEL}: engine bridge not initialized`);
        return null;
    }
    try {
        await services.bridge.setModel(metadata);
    } catch (err) {
        logger.error('Failed to update model', { error: errorMessage(err) });
    }
    return null;
}

async function restartEngine(services: Services): Promise<null> {
    const { logger, bridge } = services;
    if (!bridge) {
        logger.warn(`Ignoring ${COMMANDS.RESTART_ENGINE}: engine bridge not initialized`);
        return null;
    }
    try {
        await bridge.stop();
        await bridge.start();
        logger.info('Engine restarted');
    } catch (err) {
        logger.error('Failed to restart engine', { error: errorMessage(err) });
    }
    return null;
}

/**
 * Run a workspace command. Unknown commands yield null; failures are
 * logged and never reach the client.
 */
export async function executeCommand(params: ExecuteCommandParams, services: Services): Promise<string | null> {
    const args: unknown[] = params.arguments ?? [];
    switch (params.command) {
        case COMMANDS.UPDATE_MODEL:
            return updateModel(services, args);
        case COMMANDS.SHOW_HEALTH:
            return formatHealth(services.bridge?.getHealth() ?? null);
        case COMMANDS.RESTART_ENGINE:
            return restartEngine(services);
        default:
            services.logger.warn('Unknown command', { command: params.command });
            return null;
    }
}

export function registerCommandHandlers(connection: Connection, services: Services): void {
    connection.onExecuteCommand((params) => executeCommand(params, services));
}
