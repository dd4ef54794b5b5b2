/** Half-open range `[start, end)` into the source a sheet was parsed from */
export interface Span {
  readonly start: number;
  readonly end: number;
}

export interface ColorProperty {
  readonly kind: "color";
  readonly value: Span;
}

export interface BackgroundProperty {
  readonly kind: "background";
  readonly value: Span;
}

/** Placeholder variant. The parser never produces it. */
export interface UnknownProperty {
  readonly kind: "unknown";
}

export type KnownProperty = ColorProperty | BackgroundProperty;

export type Property = KnownProperty | UnknownProperty;

export type PropertyName = KnownProperty["kind"];

/** Declaration names the grammar accepts */
export const PROPERTY_NAMES: readonly PropertyName[] = ["color", "background"];

export interface Rule {
  readonly selector: Span;
  readonly properties: readonly Property[];
}

export interface Sheet {
  /** The buffer every span in `rules` points into */
  readonly source: string;
  readonly rules: readonly Rule[];
}

export function sliceSpan(source: string, span: Span): string {
  return source.slice(span.start, span.end);
}

export function isPropertyName(name: string): name is PropertyName {
  return PROPERTY_NAMES.some((known) => known === name);
}

export function createProperty(name: PropertyName, value: Span): KnownProperty {
  switch (name) {
    case "color":
      return { kind: "color", value };
    case "background":
      return { kind: "background", value };
  }
}
