import { describe, it, expect } from "vitest";
import {
  createProperty,
  isPropertyName,
  PROPERTY_NAMES,
  sliceSpan,
} from "../src/model/sheet.js";

describe("Property model", () => {
  it("recognizes color and background", () => {
    expect(PROPERTY_NAMES).toEqual(["color", "background"]);
    expect(isPropertyName("color")).toBe(true);
    expect(isPropertyName("background")).toBe(true);
  });

  it("does not recognize other names", () => {
    expect(isPropertyName("margin")).toBe(false);
    expect(isPropertyName("unknown")).toBe(false);
    expect(isPropertyName("Color")).toBe(false);
  });

  it("creates the variant for a name", () => {
    const value = { start: 3, end: 6 };
    expect(createProperty("background", value)).toEqual({ kind: "background", value });
  });

  it("slices span text from the source", () => {
    expect(sliceSpan("a { color: red; }", { start: 11, end: 14 })).toBe("red");
  });
});
