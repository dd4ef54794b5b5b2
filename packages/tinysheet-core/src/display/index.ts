import { sliceSpan, type Property, type Sheet } from "../model/sheet.js";

function formatProperty(source: string, property: Property): string | null {
  switch (property.kind) {
    case "color":
    case "background":
      return ` ${property.kind}: ${sliceSpan(source, property.value)}`;
    case "unknown":
      return null;
  }
}

/**
 * Render a sheet one declaration per line: `selector: <name>`, then each
 * property indented by a space, then a blank line after every rule.
 */
export function formatSheet(sheet: Sheet): string {
  const lines: string[] = [];
  for (const rule of sheet.rules) {
    lines.push(`selector: ${sliceSpan(sheet.source, rule.selector)}`);
    for (const property of rule.properties) {
      const line = formatProperty(sheet.source, property);
      if (line !== null) lines.push(line);
    }
    lines.push("");
  }
  return lines.map((line) => `${line}\n`).join("");
}
