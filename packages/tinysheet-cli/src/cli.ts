import * as fs from "node:fs";
import * as path from "node:path";
import { glob } from "glob";
import {
  formatSheet,
  parseStylesheet,
  renderDiagnostic,
  StylesheetParseError,
  type Sheet,
} from "@tinysheet/core";

export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

export interface CliOptions {
  /** Directory relative paths and glob patterns resolve against */
  cwd?: string;
  output?: CliOutput;
}

const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

/** Run the CLI and return its exit code */
export async function runCli(args: string[], options: CliOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const output = options.output ?? consoleOutput;
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    printUsage(output);
    return 0;
  }

  if (command === "print") {
    return printCommand(args.slice(1), cwd, output);
  }
  if (command === "check") {
    return checkCommand(args.slice(1), cwd, output);
  }

  output.error(`Unknown command: ${command}`);
  printUsage(output);
  return 1;
}

function printUsage(output: CliOutput) {
  output.log(`
tinysheet - stylesheet subset parser

Usage:
  tinysheet print <file.css>
  tinysheet check <pattern...>

Commands:
  print      Parse a stylesheet and print its rules
  check      Parse every file matching the glob patterns

General:
  --help, -h         Show this help
`);
}

/** Parse one file; the diagnostic of a failed parse goes to `output.error` */
function parseFile(filePath: string, output: CliOutput): Sheet | null {
  const source = fs.readFileSync(filePath, "utf-8");
  try {
    return parseStylesheet(source, {
      onDiagnostic: (diagnostic) => output.error(renderDiagnostic(diagnostic)),
    });
  } catch (err) {
    if (err instanceof StylesheetParseError) return null;
    throw err;
  }
}

function printCommand(args: string[], cwd: string, output: CliOutput): number {
  const file = args.find((a) => !a.startsWith("--"));
  if (!file) {
    output.error("Error: No stylesheet specified");
    return 1;
  }

  const filePath = path.resolve(cwd, file);
  if (!fs.existsSync(filePath)) {
    output.error(`Error: File not found: ${filePath}`);
    return 1;
  }

  const sheet = parseFile(filePath, output);
  if (!sheet) return 1;

  // formatSheet ends every rule with a blank line; log adds the last newline
  const text = formatSheet(sheet);
  if (text) output.log(text.replace(/\n$/, ""));
  return 0;
}

async function checkCommand(args: string[], cwd: string, output: CliOutput): Promise<number> {
  const patterns = args.filter((a) => !a.startsWith("--"));
  if (patterns.length === 0) {
    output.error("Error: No file patterns specified");
    return 1;
  }

  const files = (await glob(patterns, { cwd, absolute: true, nodir: true })).sort();
  if (files.length === 0) {
    output.error(`Error: No files matched: ${patterns.join(" ")}`);
    return 1;
  }

  let failures = 0;
  for (const file of files) {
    const name = path.relative(cwd, file);
    const sheet = parseFile(file, {
      log: (message) => output.log(message),
      error: (message) => output.error(`FAIL ${name}\n${message}`),
    });
    if (!sheet) {
      failures++;
      continue;
    }
    const count = sheet.rules.length;
    output.log(`ok ${name} (${count} ${count === 1 ? "rule" : "rules"})`);
  }

  if (failures > 0) {
    output.error(`${failures} of ${files.length} stylesheets failed to parse`);
    return 1;
  }
  return 0;
}
