/**
 * Engine Bridge Types
 *
 * TypeScript definitions of the JSON shapes exchanged with the DAX language
 * service. Field names follow the engine's camelCase serialization. Every
 * response field is optional: the bridge only checks that a response is a
 * JSON object, and the adapter supplies defaults for anything missing.
 */

/**
 * JSON value as produced by `JSON.parse`.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * One request line: `{"method": ..., "params": ...}`.
 */
export interface RequestEnvelope {
    method: string;
    params: object;
}

/**
 * Fields every engine response may carry.
 *
 * `error` is a semantic failure reported by the engine; the exchange
 * itself still succeeded.
 */
export interface EngineResponseBase {
    error?: string;
}

/**
 * Zero-based position, as in LSP.
 */
export interface EnginePosition {
    line?: number;
    character?: number;
}

export interface EngineRange {
    start?: EnginePosition;
    end?: EnginePosition;
}

// ============================================================================
// Completion
// ============================================================================

/**
 * Parameters shared by cursor-based requests.
 */
export interface CursorParams {
    /** Text of the cursor line, without its line terminator */
    line: string;
    /** Zero-based character of the cursor within `line` */
    column: number;
    /** Full document text */
    fullText: string;
}

export interface CompletionParams extends CursorParams {
    /** Offset of the first character of the cursor line within `fullText` */
    lineOffset: number;
}

export interface EngineCompletionItem {
    label?: string;
    detail?: string | null;
    documentation?: string | null;
    /** Same numbering as LSP `CompletionItemKind` */
    kind?: number;
    sortText?: string | null;
    insertText?: string | null;
    filterText?: string | null;
}

export interface CompletionResponse extends EngineResponseBase {
    isIncomplete?: boolean;
    items?: EngineCompletionItem[];
}

// ============================================================================
// Signature help
// ============================================================================

export type SignatureHelpParams = CursorParams;

export interface EngineParameterInformation {
    label?: string;
    documentation?: string | null;
}

export interface EngineSignatureInformation {
    label?: string;
    documentation?: string | null;
    parameters?: EngineParameterInformation[];
}

export interface SignatureHelpResponse extends EngineResponseBase {
    signatures?: EngineSignatureInformation[];
    activeSignature?: number;
    activeParameter?: number;
}

// ============================================================================
// Hover
// ============================================================================

export type HoverParams = CompletionParams;

export interface HoverResponse extends EngineResponseBase {
    /** Markdown text */
    contents?: string | null;
    range?: EngineRange | null;
}

// ============================================================================
// Diagnostics
// ============================================================================

export interface DiagnosticsParams {
    fullText: string;
    uri: string;
}

export interface EngineDiagnostic {
    range?: EngineRange | null;
    /** Same numbering as LSP `DiagnosticSeverity` (1 = Error .. 4 = Hint) */
    severity?: number;
    message?: string;
    source?: string | null;
    code?: string | number | null;
}

export interface DiagnosticsResponse extends EngineResponseBase {
    diagnostics?: EngineDiagnostic[];
}

// ============================================================================
// Model metadata (setModel)
// ============================================================================

export interface ColumnMetadata {
    name: string;
    caption?: string;
    description?: string;
    dataType?: string;
    isHidden?: boolean;
    tableName?: string;
}

export interface TableMetadata {
    name: string;
    caption?: string;
    description?: string;
    columns?: ColumnMetadata[];
}

export interface MeasureMetadata {
    name: string;
    caption?: string;
    description?: string;
    expression?: string;
    tableName?: string;
}

export interface FunctionMetadata {
    name: string;
    description?: string;
    syntax?: string;
    parameters?: string[];
    category?: string;
}

/**
 * Semantic model description pushed to the engine by `dax.updateModel`.
 *
 * Passed through as given; the engine owns its interpretation.
 */
export interface ModelMetadata {
    tables?: TableMetadata[];
    measures?: MeasureMetadata[];
    functions?: FunctionMetadata[];
    /** Dynamic management views, engine-defined shape */
    dmvs?: JsonValue;
    [key: string]: unknown;
}
