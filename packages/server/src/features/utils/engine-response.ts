import { EngineError } from '@dax-lsp/core';
import type { EngineResponseBase } from '@dax-lsp/engine-bridge';

/**
 * Raise the `error` field of an engine reply as an EngineError.
 */
export function throwIfEngineError(method: string, response: EngineResponseBase): void {
    if (response.error !== undefined && response.error !== null) {
        throw new EngineError(`Engine rejected '${method}': ${String(response.error)}`);
    }
}
