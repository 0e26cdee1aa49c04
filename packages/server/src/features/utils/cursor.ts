/**
 * Cursor context for engine requests.
 */

import type { Position } from 'vscode-languageserver/node.js';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { CompletionParams } from '@dax-lsp/engine-bridge';

const LINE_TERMINATOR = /(\r\n|\r|\n)$/;

/**
 * Build the `line` / `column` / `lineOffset` / `fullText` fields the engine
 * expects for a cursor position.
 *
 * `lineOffset` counts UTF-16 code units, as does `column`, which is clamped
 * to the line length.
 *
 * @returns null when the position lies beyond the last line.
 */
export function cursorContext(document: TextDocument, position: Position): CompletionParams | null {
    if (position.line < 0 || position.line >= document.lineCount) {
        return null;
    }

    const fullText = document.getText();
    const lineOffset = document.offsetAt({ line: position.line, character: 0 });
    const nextLineOffset = position.line + 1 < document.lineCount
        ? document.offsetAt({ line: position.line + 1, character: 0 })
        : fullText.length;
    const line = fullText.slice(lineOffset, nextLineOffset).replace(LINE_TERMINATOR, '');

    return {
        line,
        column: Math.max(0, Math.min(position.character, line.length)),
        lineOffset,
        fullText,
    };
}
