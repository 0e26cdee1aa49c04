/**
 * Engine -> LSP conversion.
 *
 * The engine numbers completion kinds and severities the way LSP does, but
 * its replies are only checked to be JSON objects, so every field is
 * re-checked here and replaced by a neutral default when it is unusable.
 */

import { CompletionItemKind, DiagnosticSeverity, MarkupKind } from 'vscode-languageserver/node.js';
import type {
    CompletionItem,
    CompletionList,
    Diagnostic,
    Hover,
    ParameterInformation,
    Position,
    Range,
    SignatureHelp,
    SignatureInformation,
} from 'vscode-languageserver/node.js';
import type {
    CompletionResponse,
    DiagnosticsResponse,
    EngineCompletionItem,
    EngineDiagnostic,
    EngineParameterInformation,
    EnginePosition,
    EngineRange,
    EngineSignatureInformation,
    HoverResponse,
    SignatureHelpResponse,
} from '@dax-lsp/engine-bridge';
import { DIAGNOSTIC_SOURCE } from '../constants/index.js';

const COMPLETION_KINDS: readonly CompletionItemKind[] = [
    CompletionItemKind.Text,
    CompletionItemKind.Method,
    CompletionItemKind.Function,
    CompletionItemKind.Constructor,
    CompletionItemKind.Field,
    CompletionItemKind.Variable,
    CompletionItemKind.Class,
    CompletionItemKind.Interface,
    CompletionItemKind.Module,
    CompletionItemKind.Property,
    CompletionItemKind.Unit,
    CompletionItemKind.Value,
    CompletionItemKind.Enum,
    CompletionItemKind.Keyword,
    CompletionItemKind.Snippet,
    CompletionItemKind.Color,
    CompletionItemKind.File,
    CompletionItemKind.Reference,
    CompletionItemKind.Folder,
    CompletionItemKind.EnumMember,
    CompletionItemKind.Constant,
    CompletionItemKind.Struct,
    CompletionItemKind.Event,
    CompletionItemKind.Operator,
    CompletionItemKind.TypeParameter,
];

const SEVERITIES: readonly DiagnosticSeverity[] = [
    DiagnosticSeverity.Error,
    DiagnosticSeverity.Warning,
    DiagnosticSeverity.Information,
    DiagnosticSeverity.Hint,
];

/** The result handed out whenever completion cannot be computed. */
export function emptyCompletionList(): CompletionList {
    return { isIncomplete: false, items: [] };
}

/** Entries that are objects; anything else the engine sent is skipped. */
function listOf<T extends object>(value: T[] | undefined): T[] {
    return Array.isArray(value) ? value.filter(item => typeof item === 'object' && item !== null) : [];
}

function nonNegativeInt(value: unknown): number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : 0;
}

/**
 * Engine kind number -> LSP kind; unknown values become Text.
 */
export function toCompletionItemKind(kind: unknown): CompletionItemKind {
    return COMPLETION_KINDS.find(candidate => candidate === kind) ?? CompletionItemKind.Text;
}

/**
 * Engine severity number -> LSP severity; unknown values become Error.
 */
export function toDiagnosticSeverity(severity: unknown): DiagnosticSeverity {
    return SEVERITIES.find(candidate => candidate === severity) ?? DiagnosticSeverity.Error;
}

export function toPosition(position: EnginePosition | null | undefined): Position {
    return {
        line: nonNegativeInt(position?.line),
        character: nonNegativeInt(position?.character),
    };
}

export function toRange(range: EngineRange | null | undefined): Range {
    return {
        start: toPosition(range?.start),
        end: toPosition(range?.end),
    };
}

export function toCompletionItem(item: EngineCompletionItem): CompletionItem {
    const label = typeof item.label === 'string' ? item.label : '';
    const result: CompletionItem = {
        label,
        kind: toCompletionItemKind(item.kind),
        insertText: typeof item.insertText === 'string' && item.insertText !== '' ? item.insertText : label,
    };
    if (typeof item.detail === 'string') {
        result.detail = item.detail;
    }
    if (typeof item.documentation === 'string') {
        result.documentation = item.documentation;
    }
    if (typeof item.sortText === 'string') {
        result.sortText = item.sortText;
    }
    if (typeof item.filterText === 'string') {
        result.filterText = item.filterText;
    }
    return result;
}

export function toCompletionList(response: CompletionResponse): CompletionList {
    return {
        isIncomplete: response.isIncomplete === true,
        items: listOf(response.items).map(toCompletionItem),
    };
}

function toParameterInformation(parameter: EngineParameterInformation): ParameterInformation {
    const result: ParameterInformation = {
        label: typeof parameter.label === 'string' ? parameter.label : '',
    };
    if (typeof parameter.documentation === 'string') {
        result.documentation = parameter.documentation;
    }
    return result;
}

function toSignatureInformation(signature: EngineSignatureInformation): SignatureInformation {
    const result: SignatureInformation = {
        label: typeof signature.label === 'string' ? signature.label : '',
        parameters: listOf(signature.parameters).map(toParameterInformation),
    };
    if (typeof signature.documentation === 'string') {
        result.documentation = signature.documentation;
    }
    return result;
}

export function toSignatureHelp(response: SignatureHelpResponse): SignatureHelp {
    return {
        signatures: listOf(response.signatures).map(toSignatureInformation),
        activeSignature: nonNegativeInt(response.activeSignature),
        activeParameter: nonNegativeInt(response.activeParameter),
    };
}

/**
 * @returns null when the engine has nothing to show.
 */
export function toHover(response: HoverResponse): Hover | null {
    if (typeof response.contents !== 'string' || response.contents === '') {
        return null;
    }
    return {
        contents: {
            kind: MarkupKind.Markdown,
            value: response.contents,
        },
        range: toRange(response.range),
    };
}

export function toDiagnostic(diagnostic: EngineDiagnostic): Diagnostic {
    const result: Diagnostic = {
        range: toRange(diagnostic.range),
        severity: toDiagnosticSeverity(diagnostic.severity),
        message: typeof diagnostic.message === 'string' ? diagnostic.message : '',
        source: typeof diagnostic.source === 'string' ? diagnostic.source : DIAGNOSTIC_SOURCE,
    };
    if (typeof diagnostic.code === 'string' || typeof diagnostic.code === 'number') {
        result.code = diagnostic.code;
    }
    return result;
}

/**
 * Convert at most `maxProblems` diagnostics, in engine order.
 */
export function toDiagnostics(response: DiagnosticsResponse, maxProblems: number): Diagnostic[] {
    return listOf(response.diagnostics).slice(0, maxProblems).map(toDiagnostic);
}
