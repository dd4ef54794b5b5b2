/**
 * Line/column diagnostics for stylesheet sources.
 *
 * Positions are recomputed from the start of the source on every call, so a
 * diagnostic only depends on the input and the failing offset, never on how far
 * the parser had got when it failed.
 */

export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 0-based column within the line */
  column: number;
  /** Offset of the first character of the line */
  lineStart: number;
  /** Offset of the newline ending the line, or the source length on the last line */
  lineEnd: number;
}

export interface Diagnostic extends SourcePosition {
  offset: number;
  message: string;
  lineText: string;
}

/**
 * Find the line containing `offset`.
 *
 * An offset on a newline belongs to the line that newline ends. An offset at
 * (or past) the end of the source belongs to the last line.
 */
export function locate(source: string, offset: number): SourcePosition {
  let line = 1;
  let column = 0;
  let lineStart = 0;
  let found = false;

  let i = 0;
  for (; i < source.length; i++) {
    if (i === offset) found = true;

    if (source[i] === "\n") {
      if (found) break;
      line++;
      column = 0;
      lineStart = i + 1;
      continue;
    }

    if (!found) column++;
  }

  return { line, column, lineStart, lineEnd: i };
}

export function createDiagnostic(
  source: string,
  offset: number,
  message: string,
): Diagnostic {
  const position = locate(source, offset);
  return {
    ...position,
    offset,
    message,
    // lineEnd stops at "\n", so a CRLF line still ends in "\r"
    lineText: source.slice(position.lineStart, position.lineEnd).replace(/\r$/, ""),
  };
}

/** Header, blank line, the source line, then a caret under the column */
export function renderDiagnostic(diagnostic: Diagnostic): string {
  return [
    `Error at line ${diagnostic.line}, column ${diagnostic.column}. ${diagnostic.message}`,
    "",
    diagnostic.lineText,
    `${" ".repeat(diagnostic.column)}^ Near here.`,
  ].join("\n");
}

export function formatDiagnostic(
  source: string,
  offset: number,
  message: string,
): string {
  return renderDiagnostic(createDiagnostic(source, offset, message));
}
