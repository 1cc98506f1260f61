/**
 * gcad CLI Tests: error formatting
 */

import { describe, expect, it } from 'vitest';
import {
  extractSnippet,
  formatError,
  readVersion,
  renderSnippet,
} from '../../src/cli-shared.js';
import {
  ConfigError,
  GCAD_ERROR_CODES,
  RuntimeError,
} from '../../src/index.js';

const SOURCE = 'a = 1;\nb = q;\nc = 2;';
const AT_Q = { line: 2, column: 5, offset: 11 };

describe('error formatting', () => {
  describe('extractSnippet', () => {
    it('returns the error line with one line of context', () => {
      expect(extractSnippet(SOURCE, AT_Q)).toEqual([
        { lineNumber: 1, content: 'a = 1;', isErrorLine: false },
        { lineNumber: 2, content: 'b = q;', isErrorLine: true },
        { lineNumber: 3, content: 'c = 2;', isErrorLine: false },
      ]);
    });

    it('stops at the start of the source', () => {
      const snippet = extractSnippet(SOURCE, { line: 1, column: 1, offset: 0 });
      expect(snippet.map((l) => l.lineNumber)).toEqual([1, 2]);
    });

    it('strips carriage returns', () => {
      const snippet = extractSnippet('x;\r\ny;\r\n', AT_Q, 0);
      expect(snippet).toEqual([
        { lineNumber: 2, content: 'y;', isErrorLine: true },
      ]);
    });

    it('returns nothing for a line outside the source', () => {
      expect(extractSnippet(SOURCE, { line: 9, column: 1, offset: 0 })).toEqual(
        []
      );
      expect(extractSnippet('', AT_Q)).toEqual([]);
    });
  });

  describe('renderSnippet', () => {
    it('aligns the gutter to the widest line number', () => {
      const source = Array.from({ length: 10 }, (_, i) => `s${i + 1};`).join(
        '\n'
      );
      const location = { line: 10, column: 2, offset: 0 };
      expect(renderSnippet(extractSnippet(source, location), location)).toEqual(
        [' 9 | s9;', '10 | s10;', '   |  ^']
      );
    });
  });

  describe('formatError', () => {
    const undefinedQ = new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
      "Undefined variable 'q'",
      AT_Q
    );

    it('shows kind, position and the offending line', () => {
      expect(formatError(undefinedQ, SOURCE)).toBe(
        [
          "NameError at line 2, column 5: Undefined variable 'q'",
          '1 | a = 1;',
          '2 | b = q;',
          '  |     ^',
          '3 | c = 2;',
        ].join('\n')
      );
    });

    it('shows only the header without source', () => {
      expect(formatError(undefinedQ)).toBe(
        "NameError at line 2, column 5: Undefined variable 'q'"
      );
    });

    it('omits the position of errors without a location', () => {
      expect(formatError(new ConfigError('Unknown default material: x'))).toBe(
        'ConfigError: Unknown default material: x'
      );
    });

    it('reports missing files by path', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: 'plate.gcad',
      });
      expect(formatError(err)).toBe('File not found: plate.gcad');
    });

    it('prefixes other errors', () => {
      expect(formatError(new Error('boom'))).toBe('Error: boom');
    });
  });

  describe('readVersion', () => {
    it('reads the package version', () => {
      expect(readVersion()).toBe('0.1.0');
    });
  });
});
