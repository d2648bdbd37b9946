/*
Purpose: terminal rendering of gate errors, colored only on an interactive stderr.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineLabel = {
  label: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
};

// =============================================================================
// CONSTANTS
// =============================================================================

const DIM: LineLabel = { label: "", labelStyles: ["dim"], textStyles: ["dim"] };

const LINE_LABELS: Partial<Record<ErrorFormatLineKind, LineLabel>> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { ...DIM, label: "Code:" },
  name: { ...DIM, label: "Name:" },
  cause: { ...DIM, label: "Cause:" },
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const useColor = resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((stackLine) => `  ${stackLine}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const label = LINE_LABELS[line.kind];
  if (!label) return line.text;
  return `${format(label.label, label.labelStyles)} ${format(line.text, label.textStyles)}`;
}
