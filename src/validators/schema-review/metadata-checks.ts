import type { Finding } from "../../app/pipeline/types.js";
import { createFinding } from "../lib/stage-result.js";

import { propertyValue, stripIdPrefix, unquote, type NodeBlock, type ParsedNodeFile } from "./mapping.js";

// =============================================================================
// TYPES
// =============================================================================

export type MetadataFile = {
  path: string;
  parsed: ParsedNodeFile;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const UNDEFINED_STATVAR_LIMIT = 20;

// =============================================================================
// PUBLIC API
// =============================================================================

/** Advisory checks on metadata declarations; every finding is ADVISORY. */
export function checkMetadata(files: MetadataFile[], usedStatVars: Set<string>): Finding[] {
  if (files.length === 0) return [];

  const findings: Finding[] = [];
  for (const file of files) {
    for (const node of file.parsed.nodes) {
      findings.push(...checkDeclaration(node, file.path));
      findings.push(...checkDenominator(node, file.path));
    }
  }
  findings.push(...checkUndefinedStatVars(files, usedStatVars));

  return findings;
}

// =============================================================================
// CHECKS
// =============================================================================

function checkDeclaration(node: NodeBlock, file: string): Finding[] {
  const findings: Finding[] = [];
  const locator = { file, line: node.line };
  const label = stripIdPrefix(node.id);

  if (!textValue(node, "name")) {
    findings.push(advisory("METADATA_MISSING_NAME", `Node '${label}' has no name.`, locator));
  }
  if (!textValue(node, "description")) {
    findings.push(advisory("METADATA_MISSING_DESCRIPTION", `Node '${label}' has no description.`, locator));
  }

  const typeOf = (propertyValue(node, "typeOf") ?? "").toLowerCase();
  if (typeOf.includes("statisticalvariable")) {
    for (const key of ["populationType", "measuredProperty"]) {
      if (textValue(node, key)) continue;
      findings.push(
        advisory("STATVAR_MISSING_PROPERTY", `StatVar '${label}' has no ${key}.`, locator),
      );
    }
  }

  return findings;
}

function checkDenominator(node: NodeBlock, file: string): Finding[] {
  const unit = (propertyValue(node, "unit") ?? "").toLowerCase();
  const statType = (propertyValue(node, "statType") ?? "").toLowerCase();
  const measuredProperty = (propertyValue(node, "measuredProperty") ?? "").toLowerCase();

  const isRatio = unit.includes("percent") || statType.includes("rate") || measuredProperty.includes("rate");
  if (!isRatio || textValue(node, "measurementDenominator")) return [];

  return [
    advisory(
      "MISSING_DENOMINATOR",
      `Percent or rate StatVar '${stripIdPrefix(node.id)}' has no measurementDenominator.`,
      { file, line: node.line },
    ),
  ];
}

function checkUndefinedStatVars(files: MetadataFile[], usedStatVars: Set<string>): Finding[] {
  const defined = new Set(files.flatMap((file) => file.parsed.nodes.map((node) => stripIdPrefix(node.id))));
  const missing = [...usedStatVars].filter((id) => !defined.has(id)).sort();
  const file = files[0].path;

  const findings = missing
    .slice(0, UNDEFINED_STATVAR_LIMIT)
    .map((id) =>
      advisory("UNDEFINED_STATVAR", `StatVar '${id}' is used by the mapping but not defined in metadata.`, {
        file,
      }),
    );

  if (missing.length > UNDEFINED_STATVAR_LIMIT) {
    findings.push(
      advisory(
        "UNDEFINED_STATVAR",
        `${missing.length - UNDEFINED_STATVAR_LIMIT} more StatVar(s) used by the mapping but not defined in metadata.`,
        { file },
      ),
    );
  }

  return findings;
}

// =============================================================================
// HELPERS
// =============================================================================

function textValue(node: NodeBlock, key: string): string {
  return unquote(propertyValue(node, key) ?? "");
}

function advisory(code: string, message: string, locator: { file: string; line?: number }): Finding {
  return createFinding(code, message, locator, { severity: "ADVISORY" });
}
