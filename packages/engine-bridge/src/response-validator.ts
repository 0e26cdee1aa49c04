/**
 * Runtime response validation for engine responses.
 *
 * TypeScript types are erased at runtime, and the engine is a separate
 * program. The bridge only performs presence checks: a typed method
 * asserts that the reply is a JSON object before handing it out.
 */

import { BridgeError } from '@dax-lsp/core';

/**
 * Error thrown when an engine response doesn't match the expected shape.
 * Includes method name, field name, expected type, and actual value.
 */
export class BridgeResponseError extends BridgeError {
    readonly method: string;
    readonly field: string;

    constructor(method: string, field: string, expected: string, got: unknown) {
        super(`Bridge '${method}': '${field}' expected ${expected}, got ${describeValue(got)}`);
        this.name = 'BridgeResponseError';
        this.method = method;
        this.field = field;
    }
}

function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    if (Array.isArray(value)) return `array(${value.length})`;
    return `${typeof value}(${String(value).substring(0, 50)})`;
}

/**
 * Narrow to a response type whose fields are all optional. Field values
 * are not checked here; the adapter re-checks each one it reads.
 */
function isResponseObject<T extends object>(value: unknown): value is T {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validator function type for typed bridge methods. */
export type ResponseValidator<T> = (raw: unknown, method: string) => T;

/**
 * Validator accepting any JSON object as `T`.
 *
 * Engine response interfaces declare every field optional, so an object
 * is all that is checked here.
 */
export function objectResponse<T extends object>(): ResponseValidator<T> {
    return (raw, method) => {
        if (!isResponseObject<T>(raw)) {
            throw new BridgeResponseError(method, 'response', 'object', raw);
        }
        return raw;
    };
}
