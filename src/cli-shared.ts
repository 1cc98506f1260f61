/**
 * CLI Shared Utilities
 * Error formatting, source snippets and version lookup for the gcad CLI
 */

import { readFileSync } from 'node:fs';
import type { SourceLocation } from './types.js';
import { GcadError } from './types.js';

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

/**
 * Extract source lines around an error location.
 *
 * Line numbers are 1-based. Returns no lines for empty source or a
 * location outside it.
 */
export function extractSnippet(
  source: string,
  location: SourceLocation,
  contextLines: number = 1
): SnippetLine[] {
  if (source === '') return [];

  const lines = source.split('\n');
  if (location.line < 1 || location.line > lines.length) return [];

  const firstLine = Math.max(1, location.line - contextLines);
  const lastLine = Math.min(lines.length, location.line + contextLines);

  const snippet: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippet.push({
      lineNumber: lineNum,
      content: (lines[lineNum - 1] ?? '').replace(/\r$/, ''),
      isErrorLine: lineNum === location.line,
    });
  }
  return snippet;
}

/** Render snippet lines with a gutter and a caret under the error column */
export function renderSnippet(
  snippet: readonly SnippetLine[],
  location: SourceLocation
): string[] {
  const width = Math.max(...snippet.map((l) => String(l.lineNumber).length));
  const gutter = ' '.repeat(width);

  const out: string[] = [];
  for (const line of snippet) {
    out.push(`${String(line.lineNumber).padStart(width)} | ${line.content}`);
    if (line.isErrorLine) {
      out.push(`${gutter} | ${' '.repeat(location.column - 1)}^`);
    }
  }
  return out;
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format an error for stderr output.
 *
 * gcad errors read `<Kind> at line L, column C: message`, followed by the
 * offending source line when the source is given.
 */
export function formatError(err: Error, source?: string): string {
  if (err instanceof GcadError) {
    const { message, location } = err.toData();
    if (!location) return `${err.kind}: ${message}`;

    const header = `${err.kind} at line ${location.line}, column ${location.column}: ${message}`;
    if (source === undefined) return header;

    const snippet = extractSnippet(source, location);
    if (snippet.length === 0) return header;
    return [header, ...renderSnippet(snippet, location)].join('\n');
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return `Error: ${err.message}`;
}

// ============================================================
// VERSION
// ============================================================

const PACKAGE_JSON_URL = new URL('../package.json', import.meta.url);

/** Package version from package.json, or 0.0.0 when it cannot be read */
export function readVersion(): string {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(PACKAGE_JSON_URL, 'utf-8'));
  } catch {
    return '0.0.0';
  }
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}
