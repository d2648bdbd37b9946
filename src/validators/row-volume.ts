import type { StageResult } from "../app/pipeline/types.js";
import { countDataRows } from "../core/table.js";
import { readTextFile } from "../core/utils.js";

import { createFinding, failedResult, passedResult } from "./lib/stage-result.js";

export type RowVolumeInput = {
  tablePath: string;
  threshold: number;
  ruleId: string;
};

/**
 * Row limits are deployment policy rather than data correctness, so the result
 * carries `ruleId` and the controller decides (via warn-only) whether it blocks.
 */
export async function runRowVolumeCheck(input: RowVolumeInput): Promise<StageResult> {
  let text: string;
  try {
    text = await readTextFile(input.tablePath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return failedResult(
      "row_volume",
      [createFinding("TABLE_UNREADABLE", `Data table could not be read: ${detail}`, { file: input.tablePath })],
      "BLOCKING",
      { ruleId: input.ruleId },
    );
  }

  const rowCount = countDataRows(text);
  const note = `${rowCount} data rows (limit ${input.threshold})`;

  if (rowCount <= input.threshold) {
    return passedResult("row_volume", [], { ruleId: input.ruleId, note });
  }

  return failedResult(
    "row_volume",
    [
      createFinding(
        "ROW_COUNT_EXCEEDED",
        `Input table has ${rowCount} data rows, which exceeds the sample limit of ${input.threshold}.`,
        { file: input.tablePath },
        { limit: input.threshold },
      ),
    ],
    "BLOCKING",
    { ruleId: input.ruleId, note },
  );
}
