import { readDataTable, stringifyDataTable, type DataTable } from "../core/table.js";
import { writeTextFile } from "../core/utils.js";

const YEAR_ONLY = /^\d{4}$/;
const YEAR_MONTH = /^\d{4}-\d{2}$/;

/** MinDate, MaxDate and any other column whose name ends in "Date". */
export function isDateColumn(name: string): boolean {
  return name.endsWith("Date");
}

/** `YYYY` becomes `YYYY-01-01` and `YYYY-MM` becomes `YYYY-MM-01`; anything else is kept as is. */
export function normalizeDateCell(value: string): string {
  const trimmed = value.trim();
  if (YEAR_ONLY.test(trimmed)) return `${trimmed}-01-01`;
  if (YEAR_MONTH.test(trimmed)) return `${trimmed}-01`;
  return value;
}

export function normalizeSummaryDates(table: DataTable): { table: DataTable; changed: number } {
  const dateColumns = table.header
    .map((name, index) => (isDateColumn(name) ? index : -1))
    .filter((index) => index >= 0);

  let changed = 0;
  const rows = table.rows.map((row) =>
    row.map((cell, index) => {
      if (!dateColumns.includes(index)) return cell;
      const normalized = normalizeDateCell(cell);
      if (normalized !== cell) changed += 1;
      return normalized;
    }),
  );

  return { table: { header: table.header, rows }, changed };
}

export async function writeNormalizedSummary(sourcePath: string, targetPath: string): Promise<number> {
  const { table, changed } = normalizeSummaryDates(await readDataTable(sourcePath));
  await writeTextFile(targetPath, stringifyDataTable(table));
  return changed;
}
