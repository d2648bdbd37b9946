import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { GateError } from "./errors.js";
import { readTextFile } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type DataTable = {
  header: string[];
  rows: string[][];
};

export class TableParseError extends GateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TableParseError";
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseDataTable(text: string): DataTable {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new TableParseError(`Failed to parse table: ${detail}`, err);
  }

  const rows = toStringRows(records);
  const [header, ...body] = rows;
  if (!header) {
    return { header: [], rows: [] };
  }

  // Short rows are padded so column-wise checks can index every cell.
  const width = header.length;
  return {
    header: header.map((name) => name.trim()),
    rows: body.map((row) =>
      row.length >= width ? row : [...row, ...Array.from({ length: width - row.length }, () => "")],
    ),
  };
}

export async function readDataTable(filePath: string): Promise<DataTable> {
  return parseDataTable(await readTextFile(filePath));
}

export function stringifyDataTable(table: DataTable): string {
  return stringify([table.header, ...table.rows]);
}

/** Non-blank lines after the header line. */
export function countDataRows(text: string): number {
  const nonBlank = text.split(/\r?\n/).filter((line) => line.trim().length > 0).length;
  return Math.max(0, nonBlank - 1);
}

export function columnIndex(table: DataTable, name: string): number {
  return table.header.indexOf(name);
}

export function isBlankCell(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

// =============================================================================
// INTERNALS
// =============================================================================

function toStringRows(records: unknown): string[][] {
  if (!Array.isArray(records)) {
    throw new TableParseError("Table parser returned an unexpected shape.");
  }

  return records.map((record, index) => {
    if (!Array.isArray(record)) {
      throw new TableParseError(`Table record ${index + 1} is not a list of cells.`);
    }
    return record.map((cell) => (typeof cell === "string" ? cell : String(cell)));
  });
}
