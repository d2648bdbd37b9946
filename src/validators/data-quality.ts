import type { Finding, StageResult } from "../app/pipeline/types.js";
import { isBlankCell, readDataTable, type DataTable } from "../core/table.js";

import { createFinding, failedResult, resultFromFindings } from "./lib/stage-result.js";

// =============================================================================
// TYPES
// =============================================================================

export type EmptyColumnMode = "block" | "warn";

export type DataQualityInput = {
  tablePath: string;
  valueColumn?: string;
  emptyColumns?: EmptyColumnMode;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const MAX_NON_NUMERIC_FINDINGS = 5;
const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
// Non-finite spellings still parse as floats downstream.
const NON_FINITE_PATTERN = /^[+-]?(nan|inf|infinity)$/i;
// Header occupies line 1, so data row i sits on line i + 2.
const FIRST_DATA_LINE = 2;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runDataQualityCheck(input: DataQualityInput): Promise<StageResult> {
  let table: DataTable;
  try {
    table = await readDataTable(input.tablePath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return failedResult("quality", [
      createFinding("TABLE_UNREADABLE", `Data table could not be read: ${detail}`, {
        file: input.tablePath,
      }),
    ]);
  }

  return checkDataTable(table, input);
}

/** Every check runs; nothing short-circuits. */
export function checkDataTable(table: DataTable, input: DataQualityInput): StageResult {
  const file = input.tablePath;

  if (table.header.length === 0) {
    return failedResult("quality", [
      createFinding("EMPTY_TABLE", "Data table has no header row.", { file }),
    ]);
  }

  const findings: Finding[] = [
    ...findDuplicateColumns(table, file),
    ...findEmptyColumns(table, file, input.emptyColumns ?? "block"),
    ...findDuplicateRows(table, file),
    ...findNonNumericValues(table, file, input.valueColumn),
  ];

  return resultFromFindings("quality", findings);
}

export function isNumericCell(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.length === 0 || NUMERIC_PATTERN.test(trimmed) || NON_FINITE_PATTERN.test(trimmed);
}

// =============================================================================
// CHECKS
// =============================================================================

function findDuplicateColumns(table: DataTable, file: string): Finding[] {
  const counts = new Map<string, number>();
  for (const name of table.header) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  const repeated = [...counts.entries()].filter(([, count]) => count > 1).map(([name]) => name);
  if (repeated.length === 0) return [];

  return [
    createFinding(
      "DUPLICATE_COLUMN",
      `Duplicate column name(s): ${repeated.map((name) => `'${name}'`).join(", ")}`,
      { file, line: 1 },
    ),
  ];
}

function findEmptyColumns(table: DataTable, file: string, mode: EmptyColumnMode): Finding[] {
  if (table.rows.length === 0) return [];

  const severity = mode === "warn" ? "ADVISORY" : "BLOCKING";
  return table.header.flatMap((name, index) => {
    if (!name) return [];
    const allEmpty = table.rows.every((row) => isBlankCell(row[index]));
    if (!allEmpty) return [];
    return [
      createFinding(
        "EMPTY_COLUMN",
        `Column is entirely empty: '${name}'`,
        { file, line: 1, column: index + 1 },
        { severity },
      ),
    ];
  });
}

function findDuplicateRows(table: DataTable, file: string): Finding[] {
  const firstSeen = new Map<string, number>();
  const findings: Finding[] = [];

  table.rows.forEach((row, index) => {
    const line = index + FIRST_DATA_LINE;
    const key = JSON.stringify(row.map((cell) => cell.trim()));
    const original = firstSeen.get(key);
    if (original === undefined) {
      firstSeen.set(key, line);
      return;
    }
    findings.push(
      createFinding("DUPLICATE_ROW", `Row ${line} duplicates row ${original}.`, { file, line }),
    );
  });

  return findings;
}

function findNonNumericValues(
  table: DataTable,
  file: string,
  valueColumn: string | undefined,
): Finding[] {
  if (!valueColumn) return [];

  const index = table.header.indexOf(valueColumn);
  if (index < 0) {
    return [
      createFinding(
        "MISSING_VALUE_COLUMN",
        `Value column '${valueColumn}' is not in the header; numeric check skipped.`,
        { file, line: 1 },
        { severity: "ADVISORY" },
      ),
    ];
  }

  const offenders = table.rows.flatMap((row, rowIndex) => {
    const raw = row[index] ?? "";
    return isNumericCell(raw) ? [] : [{ line: rowIndex + FIRST_DATA_LINE, raw }];
  });

  const findings = offenders.slice(0, MAX_NON_NUMERIC_FINDINGS).map(({ line, raw }) =>
    createFinding(
      "NON_NUMERIC_VALUE",
      `Non-numeric value '${raw}' in column '${valueColumn}' at row ${line}.`,
      { file, line, column: index + 1 },
    ),
  );

  const remaining = offenders.length - MAX_NON_NUMERIC_FINDINGS;
  if (remaining > 0) {
    findings.push(
      createFinding(
        "NON_NUMERIC_VALUE",
        `${remaining} more non-numeric value(s) in column '${valueColumn}'.`,
        { file, column: index + 1 },
      ),
    );
  }

  return findings;
}
