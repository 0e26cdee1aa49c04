/**
 * Cursor Context Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { cursorContext } from '../../features/utils/cursor.js';

function doc(text: string): TextDocument {
    return TextDocument.create('file:///query.dax', 'dax', 1, text);
}

describe('cursorContext', () => {
    it('should give the line without its terminator and the offset of its start', () => {
        const text = 'DEFINE\r\n  MEASURE Sales[Total] = SUM(Sales[Amount])\nEVALUATE';
        assert.deepEqual(cursorContext(doc(text), { line: 1, character: 28 }), {
            line: '  MEASURE Sales[Total] = SUM(Sales[Amount])',
            column: 28,
            lineOffset: 8,
            fullText: text,
        });
        assert.deepEqual(cursorContext(doc(text), { line: 2, character: 0 }), {
            line: 'EVALUATE',
            column: 0,
            lineOffset: 52,
            fullText: text,
        });
    });

    it('should count UTF-16 code units', () => {
        const text = '// Café ☕ 🍰\nSUM(';
        const context = cursorContext(doc(text), { line: 1, character: 4 });
        assert.equal(context?.lineOffset, 13);
        assert.equal(context?.line, 'SUM(');
    });

    it('should clamp the column to the line length', () => {
        assert.equal(cursorContext(doc('ALL('), { line: 0, character: 99 })?.column, 4);
    });

    it('should return null past the last line', () => {
        assert.equal(cursorContext(doc('EVALUATE'), { line: 1, character: 0 }), null);
        assert.equal(cursorContext(doc(''), { line: 0, character: 0 })?.line, '');
    });
});
