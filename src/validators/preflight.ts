import path from "node:path";

import type { Finding, StageResult } from "../app/pipeline/types.js";
import { isFile } from "../core/utils.js";

import { createFinding, resultFromFindings } from "./lib/stage-result.js";

// =============================================================================
// TYPES
// =============================================================================

export type PreflightInput = {
  mappingPath: string;
  tablePath: string;
  metadataPaths?: readonly string[];
};

type ArtifactKind = {
  label: string;
  suffixes: readonly string[];
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const ARTIFACT_KINDS = {
  mapping: { label: "Mapping file", suffixes: [".tmcf", ".mcf"] },
  table: { label: "Data table", suffixes: [".csv"] },
  metadata: { label: "Metadata file", suffixes: [".mcf"] },
} as const satisfies Record<string, ArtifactKind>;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPreflight(input: PreflightInput): Promise<StageResult> {
  const findings: Finding[] = [];

  const checks: Array<[string, ArtifactKind]> = [
    [input.mappingPath, ARTIFACT_KINDS.mapping],
    [input.tablePath, ARTIFACT_KINDS.table],
    ...(input.metadataPaths ?? []).map((p): [string, ArtifactKind] => [p, ARTIFACT_KINDS.metadata]),
  ];

  for (const [filePath, kind] of checks) {
    const finding = await checkArtifact(filePath, kind);
    if (finding) findings.push(finding);
  }

  return resultFromFindings("preflight", findings);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function checkArtifact(filePath: string, kind: ArtifactKind): Promise<Finding | null> {
  if (!filePath || !(await isFile(filePath))) {
    return createFinding("MISSING_FILE", `${kind.label} not found: ${filePath}`, { file: filePath });
  }

  const suffix = path.extname(filePath).toLowerCase();
  if (!kind.suffixes.includes(suffix)) {
    const expected = kind.suffixes.join(" or ");
    return createFinding(
      "WRONG_EXTENSION",
      `${kind.label} must have a ${expected} extension: ${filePath}`,
      { file: filePath },
    );
  }

  return null;
}
