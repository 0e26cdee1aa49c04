/**
 * Settings Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { LogLevel } from '@dax-lsp/core';
import {
    applyConfigurationChange,
    parseSettings,
    resolveSettings,
    settingsFromEnvironment,
    toLogLevel,
} from '../../core/settings.js';
import { defaultSettings } from '../../core/types.js';

describe('resolveSettings', () => {
    it('should use the defaults when nothing is configured', () => {
        assert.deepEqual(resolveSettings(undefined, {}), {
            enginePath: './DaxLanguageService.exe',
            engineArgs: [],
            engineReadyLine: 'DAX Language Service Started',
            requestTimeout: 30000,
            maxNumberOfProblems: 100,
            diagnosticDelay: 250,
            logLevel: 'warn',
        });
    });

    it('should let the environment override the default engine path', () => {
        const settings = resolveSettings(undefined, { DAX_ENGINE_PATH: '/opt/dax/DaxLanguageService' });
        assert.equal(settings.enginePath, '/opt/dax/DaxLanguageService');
    });

    it('should let initializationOptions override the environment', () => {
        const settings = resolveSettings(
            { enginePath: 'C:\\tools\\DaxLanguageService.exe', engineArgs: ['--culture', 'en-US'], requestTimeout: 0 },
            { DAX_ENGINE_PATH: '/opt/dax/DaxLanguageService' }
        );
        assert.equal(settings.enginePath, 'C:\\tools\\DaxLanguageService.exe');
        assert.deepEqual(settings.engineArgs, ['--culture', 'en-US']);
        assert.equal(settings.requestTimeout, 0);
    });
});

describe('parseSettings', () => {
    it('should drop invalid fields one by one', () => {
        assert.deepEqual(parseSettings({
            enginePath: 42,
            engineArgs: ['--verbose', 1],
            requestTimeout: -5,
            maxNumberOfProblems: 20.7,
            diagnosticDelay: 'fast',
            logLevel: 'LOUD',
            engineReadyLine: '',
        }), {
            maxNumberOfProblems: 20,
            engineReadyLine: '',
        });
    });

    it('should normalize log level names', () => {
        assert.deepEqual(parseSettings({ logLevel: ' DEBUG ' }), { logLevel: 'debug' });
    });

    it('should ignore values that are not objects', () => {
        assert.deepEqual(parseSettings(null), {});
        assert.deepEqual(parseSettings(['enginePath']), {});
        assert.deepEqual(parseSettings('dax'), {});
    });

    it('should reject a blank engine path', () => {
        assert.deepEqual(parseSettings({ enginePath: '   ' }), {});
        assert.deepEqual(settingsFromEnvironment({ DAX_ENGINE_PATH: '' }), {});
    });
});

describe('applyConfigurationChange', () => {
    const current = {
        ...defaultSettings,
        enginePath: '/opt/dax/DaxLanguageService',
        maxNumberOfProblems: 10,
        logLevel: 'debug' as const,
    };

    it('should apply the dax section but keep engine settings', () => {
        const next = applyConfigurationChange(current, {
            dax: { maxNumberOfProblems: 5, enginePath: '/elsewhere', diagnosticDelay: 0 },
        });

        assert.deepEqual(next, {
            ...current,
            maxNumberOfProblems: 5,
            diagnosticDelay: 0,
            logLevel: 'warn',
        });
    });

    it('should reset non-engine settings when the section is missing', () => {
        const next = applyConfigurationChange(current, { other: {} });

        assert.equal(next.enginePath, '/opt/dax/DaxLanguageService');
        assert.equal(next.maxNumberOfProblems, 100);
        assert.equal(next.logLevel, 'warn');
    });
});

describe('toLogLevel', () => {
    it('should map names to levels', () => {
        assert.equal(toLogLevel('off'), LogLevel.OFF);
        assert.equal(toLogLevel('trace'), LogLevel.TRACE);
        assert.equal(toLogLevel('warn'), LogLevel.WARN);
    });
});
