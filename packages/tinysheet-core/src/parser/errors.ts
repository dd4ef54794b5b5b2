import { createDiagnostic, renderDiagnostic, type Diagnostic } from "../diagnostics/index.js";

export enum ParseErrorKind {
  /** An expected `:`, `;`, `{` or `}` is missing */
  NoSuchSyntax = "NoSuchSyntax",
  /** No letters where an identifier was required */
  InvalidIdentifier = "InvalidIdentifier",
  /** Declaration name outside the recognized property set */
  UnknownProperty = "UnknownProperty",
}

export class StylesheetParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly offset: number;
  readonly diagnostic: Diagnostic;

  constructor(kind: ParseErrorKind, source: string, offset: number, detail: string) {
    const diagnostic = createDiagnostic(source, offset, detail);
    super(renderDiagnostic(diagnostic));
    this.name = "StylesheetParseError";
    this.kind = kind;
    this.offset = offset;
    this.diagnostic = diagnostic;
  }
}
