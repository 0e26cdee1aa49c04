/**
 * Settings resolution.
 *
 * Sources, lowest to highest precedence: defaults, the DAX_ENGINE_PATH
 * environment variable, initializationOptions, then `dax` section updates
 * from workspace/didChangeConfiguration (non-engine settings only).
 * Each field is validated on its own; a bad value is dropped, the rest apply.
 */

import { ENGINE_PATH_ENV } from '@dax-lsp/engine-bridge';
import { LogLevel, parseLogLevel } from '@dax-lsp/core';
import { CONFIGURATION_SECTION } from '../constants/index.js';
import { defaultSettings, type LogLevelName, type ServerSettings } from './types.js';

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['off', 'error', 'warn', 'info', 'debug', 'trace'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonNegative(value: unknown): number | undefined {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function logLevelName(value: unknown): LogLevelName | undefined {
    if (typeof value !== 'string' || parseLogLevel(value) === undefined) {
        return undefined;
    }
    const name = value.trim().toLowerCase();
    return LOG_LEVEL_NAMES.find(candidate => candidate === name);
}

/**
 * Pick the valid settings out of an untrusted object.
 */
export function parseSettings(raw: unknown): Partial<ServerSettings> {
    if (!isRecord(raw)) {
        return {};
    }
    const parsed: Partial<ServerSettings> = {};

    const enginePath = raw['enginePath'];
    if (typeof enginePath === 'string' && enginePath.trim() !== '') {
        parsed.enginePath = enginePath;
    }
    const engineArgs = raw['engineArgs'];
    if (Array.isArray(engineArgs) && engineArgs.every((arg): arg is string => typeof arg === 'string')) {
        parsed.engineArgs = [...engineArgs];
    }
    const engineReadyLine = raw['engineReadyLine'];
    if (typeof engineReadyLine === 'string') {
        parsed.engineReadyLine = engineReadyLine;
    }

    const requestTimeout = nonNegative(raw['requestTimeout']);
    if (requestTimeout !== undefined) {
        parsed.requestTimeout = requestTimeout;
    }
    const maxNumberOfProblems = nonNegative(raw['maxNumberOfProblems']);
    if (maxNumberOfProblems !== undefined) {
        parsed.maxNumberOfProblems = Math.floor(maxNumberOfProblems);
    }
    const diagnosticDelay = nonNegative(raw['diagnosticDelay']);
    if (diagnosticDelay !== undefined) {
        parsed.diagnosticDelay = diagnosticDelay;
    }
    const logLevel = logLevelName(raw['logLevel']);
    if (logLevel !== undefined) {
        parsed.logLevel = logLevel;
    }

    return parsed;
}

/**
 * Settings overridden through the environment.
 */
export function settingsFromEnvironment(env: NodeJS.ProcessEnv): Partial<ServerSettings> {
    const enginePath = env[ENGINE_PATH_ENV];
    return enginePath && enginePath.trim() !== '' ? { enginePath } : {};
}

/**
 * Settings in effect at initialize time.
 */
export function resolveSettings(initializationOptions: unknown, env: NodeJS.ProcessEnv = process.env): ServerSettings {
    return {
        ...defaultSettings,
        ...settingsFromEnvironment(env),
        ...parseSettings(initializationOptions),
    };
}

/**
 * Apply a workspace/didChangeConfiguration payload.
 *
 * Engine settings only take effect at startup and are kept as they are;
 * the others restart from their defaults, as the client sends the whole section.
 */
export function applyConfigurationChange(current: ServerSettings, changeSettings: unknown): ServerSettings {
    const section = isRecord(changeSettings) ? changeSettings[CONFIGURATION_SECTION] : undefined;
    const { maxNumberOfProblems, diagnosticDelay, logLevel } = { ...defaultSettings, ...parseSettings(section) };
    return { ...current, maxNumberOfProblems, diagnosticDelay, logLevel };
}

/**
 * Numeric level for a `logLevel` setting.
 */
export function toLogLevel(name: LogLevelName): LogLevel {
    return parseLogLevel(name) ?? LogLevel.WARN;
}
