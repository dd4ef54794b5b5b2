import type { Span } from "../model/sheet.js";
import { ParseErrorKind, StylesheetParseError } from "./errors.js";

const WHITESPACE = new Set([" ", "\t", "\n", "\r", "\v", "\f"]);

export interface IdentifierResult {
  span: Span;
  /** Position just past the identifier */
  pos: number;
}

export function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && WHITESPACE.has(ch);
}

export function isAlpha(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z]$/.test(ch);
}

export function skipWhitespace(input: string, pos: number): number {
  while (pos < input.length && isWhitespace(input[pos])) pos++;
  return pos;
}

export function expectChar(input: string, pos: number, expected: string): number {
  if (pos < input.length && input[pos] === expected) return pos + 1;
  throw new StylesheetParseError(
    ParseErrorKind.NoSuchSyntax,
    input,
    pos,
    `Expected syntax: '${expected}'.`,
  );
}

/** Consume the run of ASCII letters at `pos`; an empty run is an error */
export function parseIdentifier(input: string, pos: number): IdentifierResult {
  let end = pos;
  while (end < input.length && isAlpha(input[end])) end++;

  if (end === pos) {
    throw new StylesheetParseError(
      ParseErrorKind.InvalidIdentifier,
      input,
      pos,
      "Expected valid identifier.",
    );
  }

  return { span: { start: pos, end }, pos: end };
}
