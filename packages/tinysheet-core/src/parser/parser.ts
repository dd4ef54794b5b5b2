/**
 * Recursive-descent parser for the stylesheet subset.
 *
 * Grammar:
 *   Sheet       ::= Rule*
 *   Rule        ::= Identifier '{' Declaration* '}'
 *   Declaration ::= PropertyName ':' Identifier ';'
 *   Identifier  ::= [A-Za-z]+
 *
 * Whitespace may appear between any two tokens. Scanning and parsing are one
 * pass: every production takes the source and a position and returns what it
 * parsed plus the position just after it. The first failure aborts the parse.
 */
import type { Diagnostic } from "../diagnostics/index.js";
import {
  createProperty,
  isPropertyName,
  sliceSpan,
  type Property,
  type Rule,
  type Sheet,
} from "../model/sheet.js";
import { ParseErrorKind, StylesheetParseError } from "./errors.js";
import { expectChar, parseIdentifier, skipWhitespace } from "./scanner.js";

export interface PropertyResult {
  property: Property;
  pos: number;
}

export interface RuleResult {
  rule: Rule;
  pos: number;
}

export interface ParseOptions {
  /** Receives the diagnostic of a failed parse, once, before the error is thrown */
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}

export function parseProperty(input: string, start: number): PropertyResult {
  let pos = skipWhitespace(input, start);

  const name = parseIdentifier(input, pos);
  pos = skipWhitespace(input, name.pos);
  pos = expectChar(input, pos, ":");

  const nameText = sliceSpan(input, name.span);
  if (!isPropertyName(nameText)) {
    throw new StylesheetParseError(
      ParseErrorKind.UnknownProperty,
      input,
      start,
      `Unknown property: '${nameText}'.`,
    );
  }

  pos = skipWhitespace(input, pos);
  const value = parseIdentifier(input, pos);
  pos = skipWhitespace(input, value.pos);
  pos = expectChar(input, pos, ";");

  return { property: createProperty(nameText, value.span), pos };
}

export function parseRule(input: string, start: number): RuleResult {
  let pos = skipWhitespace(input, start);

  const selector = parseIdentifier(input, pos);
  pos = skipWhitespace(input, selector.pos);
  pos = expectChar(input, pos, "{");

  const properties: Property[] = [];
  while (pos < input.length) {
    pos = skipWhitespace(input, pos);
    if (pos >= input.length || input[pos] === "}") break;

    const result = parseProperty(input, pos);
    properties.push(result.property);
    pos = result.pos;
  }

  pos = skipWhitespace(input, pos);
  pos = expectChar(input, pos, "}");

  return { rule: { selector: selector.span, properties }, pos };
}

export function parseSheet(input: string): Sheet {
  const rules: Rule[] = [];
  let pos = skipWhitespace(input, 0);

  while (pos < input.length) {
    const result = parseRule(input, pos);
    rules.push(result.rule);
    pos = skipWhitespace(input, result.pos);
  }

  return { source: input, rules };
}

/** Parse a stylesheet, throwing {@link StylesheetParseError} on the first error */
export function parseStylesheet(source: string, options: ParseOptions = {}): Sheet {
  try {
    return parseSheet(source);
  } catch (err) {
    if (err instanceof StylesheetParseError) {
      options.onDiagnostic?.(err.diagnostic);
    }
    throw err;
  }
}

/** Validate stylesheet syntax. Returns null if valid, the rendered diagnostic if not. */
export function validateStylesheetSyntax(source: string): string | null {
  try {
    parseSheet(source);
    return null;
  } catch (err) {
    if (err instanceof StylesheetParseError) return err.message;
    throw err;
  }
}
