import type { Finding, StageResult } from "../../app/pipeline/types.js";
import { createDeadline } from "../../core/deadline.js";
import { readDataTable, type DataTable } from "../../core/table.js";
import { readTextFile } from "../../core/utils.js";
import { createFinding, failedResult, resultFromFindings } from "../lib/stage-result.js";

import { checkMapping, collectStatVarIds } from "./mapping-checks.js";
import { parseNodeFile } from "./mapping.js";
import { checkMetadata, type MetadataFile } from "./metadata-checks.js";
import { toGateFindings, type SchemaReviewer } from "./reviewer.js";

export type SchemaReviewInput = {
  mappingPath: string;
  tablePath: string;
  metadataPaths: string[];
  /** Absent when the external reviewer is disabled. */
  reviewer?: SchemaReviewer;
  advisory?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export async function runSchemaReview(input: SchemaReviewInput): Promise<StageResult> {
  let mappingText: string;
  try {
    mappingText = await readTextFile(input.mappingPath);
  } catch (err) {
    return failedResult("schema_review", [
      createFinding("MAPPING_UNREADABLE", `Mapping file could not be read: ${describe(err)}`, {
        file: input.mappingPath,
      }),
    ]);
  }

  if (!mappingText.trim()) {
    return failedResult("schema_review", [
      createFinding("MAPPING_EMPTY", "Mapping file is empty.", { file: input.mappingPath }),
    ]);
  }

  const parsed = parseNodeFile(mappingText);
  const table = await readTableQuietly(input.tablePath);
  const { files: metadata, findings: metadataErrors } = await readMetadata(input.metadataPaths);

  const findings: Finding[] = [
    ...metadataErrors,
    ...checkMapping({ mappingPath: input.mappingPath, parsed, table }),
    ...checkMetadata(
      metadata.map((file) => ({ path: file.path, parsed: file.parsed })),
      collectStatVarIds(parsed, table),
    ),
  ];

  if (!input.reviewer) {
    return resultFromFindings("schema_review", findings, { note: "external reviewer disabled" });
  }

  const deadline = createDeadline({ signal: input.signal, timeoutMs: input.timeoutMs });
  try {
    const reviewed = await deadline.race(
      input.reviewer.review(
        {
          mappingPath: input.mappingPath,
          mappingText,
          header: table?.header,
          metadata: metadata.map((file) => ({ path: file.path, text: file.text })),
        },
        { signal: deadline.signal },
      ),
    );
    const reviewerFindings = toGateFindings(reviewed, {
      mappingPath: input.mappingPath,
      advisory: input.advisory ?? false,
    });
    return resultFromFindings("schema_review", [...findings, ...reviewerFindings], {
      note: `external reviewer reported ${reviewerFindings.length} finding(s)`,
    });
  } catch (err) {
    const locator = { file: input.mappingPath };
    // Reviewer failures block even in advisory mode.
    const failure =
      deadline.timedOut || deadline.canceled
        ? createFinding("REVIEWER_TIMEOUT", "External reviewer did not answer before the deadline.", locator, {
            severity: "BLOCKING",
          })
        : createFinding("REVIEWER_FAILED", `External reviewer failed: ${describe(err)}`, locator, {
            severity: "BLOCKING",
          });
    return failedResult("schema_review", [...findings, failure], "BLOCKING", { error: describe(err) });
  } finally {
    deadline.dispose();
  }
}

// =============================================================================
// HELPERS
// =============================================================================

async function readTableQuietly(tablePath: string): Promise<DataTable | undefined> {
  try {
    return await readDataTable(tablePath);
  } catch {
    // The quality stage already reported an unreadable table.
    return undefined;
  }
}

type LoadedMetadata = MetadataFile & { text: string };

async function readMetadata(paths: string[]): Promise<{ files: LoadedMetadata[]; findings: Finding[] }> {
  const files: LoadedMetadata[] = [];
  const findings: Finding[] = [];

  for (const filePath of paths) {
    try {
      const text = await readTextFile(filePath);
      files.push({ path: filePath, text, parsed: parseNodeFile(text) });
    } catch (err) {
      findings.push(
        createFinding("METADATA_UNREADABLE", `Metadata file could not be read: ${describe(err)}`, {
          file: filePath,
        }),
      );
    }
  }

  return { files, findings };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
