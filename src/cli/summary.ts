import path from "node:path";

import { renderMarkdownReport } from "../app/pipeline/report-emitter.js";
import { readResultDocument } from "../app/pipeline/result-schema.js";
import { buildReviewSummary, formatReviewSummary } from "../app/pipeline/review-summary.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { pathExists } from "../core/utils.js";

export type SummaryFlags = {
  markdown?: boolean;
};

/** Prints the review summary of a finished run; exits with the run's verdict. */
export async function summaryCommand(runDir: string, flags: SummaryFlags, cwd: string = process.cwd()): Promise<number> {
  const documentPath = path.join(path.resolve(cwd, runDir), "result.json");
  if (!(await pathExists(documentPath))) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "No result document.",
      message: `No result.json in ${path.resolve(cwd, runDir)}.`,
      hint: "Pass the run directory printed by `import-gate run` (<output_dir>/<dataset>/<run_id>).",
    });
  }

  const document = await readResultDocument(documentPath);
  if (flags.markdown) {
    process.stdout.write(await renderMarkdownReport(document));
  } else {
    console.log(`Dataset ${document.dataset}, run ${document.run_id}`);
    console.log(formatReviewSummary(buildReviewSummary(document)));
  }
  return document.verdict === "PASS" ? 0 : 1;
}
