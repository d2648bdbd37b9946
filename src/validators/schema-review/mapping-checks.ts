import type { Finding } from "../../app/pipeline/types.js";
import type { DataTable } from "../../core/table.js";
import { createFinding } from "../lib/stage-result.js";

import {
  columnRef,
  isObservationNode,
  propertyValue,
  referencedColumns,
  stripIdPrefix,
  unquote,
  type NodeBlock,
  type ParsedNodeFile,
} from "./mapping.js";

// =============================================================================
// TYPES
// =============================================================================

export type MappingCheckInput = {
  mappingPath: string;
  parsed: ParsedNodeFile;
  /** Parsed data table, when it could be read; enables the column checks. */
  table?: DataTable;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const KNOWN_PROPERTIES = [
  "typeOf",
  "dcid",
  "name",
  "description",
  "alternateName",
  "variableMeasured",
  "observationAbout",
  "observationDate",
  "observationPeriod",
  "value",
  "unit",
  "scalingFactor",
  "measurementMethod",
  "measuredProperty",
  "populationType",
  "statType",
  "measurementDenominator",
  "measurementQualifier",
  "provenance",
  "containedInPlace",
  "memberOf",
  "subClassOf",
  "domainIncludes",
  "rangeIncludes",
  "isProvisional",
  "footnote",
];
const KNOWN_PROPERTY_SET = new Set(KNOWN_PROPERTIES);

const PREFIXED_PROPERTIES = ["typeOf", "variableMeasured", "observationAbout", "unit"];
const ACCEPTED_PREFIXES = ["dcs:", "dcid:", "schema:", "E:", "C:"];
const REQUIRED_OBSERVATION_PROPERTIES = ["variableMeasured", "observationAbout", "observationDate"];

const MISSPELLING_MAX_DISTANCE = 2;
const MISSPELLING_MIN_LENGTH = 5;
const UNUSED_COLUMN_LIMIT = 10;

const DATE_LITERAL_RE = /^\d{4}(-\d{2}(-\d{2})?)?$/;
const STATVAR_ID_RE = /^[A-Z0-9][A-Za-z0-9]*(?:_[A-Z0-9][A-Za-z0-9]*)*$/;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Deterministic structural checks on the mapping file. Blocking findings come
 * first in file order; advisory ones carry an explicit ADVISORY severity.
 */
export function checkMapping(input: MappingCheckInput): Finding[] {
  const file = input.mappingPath;
  const { parsed, table } = input;

  const blocking: Finding[] = [
    ...checkOrphanLines(parsed, file),
    ...checkDuplicateNodes(parsed.nodes, file),
    ...parsed.nodes.flatMap((node) => checkNode(node, file)),
  ];
  if (table) {
    blocking.push(...checkColumnsInHeader(parsed, table, file));
  }

  const advisory: Finding[] = [];
  if (table) {
    advisory.push(...checkUnusedColumns(parsed, table, file));
  }
  advisory.push(...checkDateLiterals(parsed, file));
  advisory.push(...checkStatVarFormat(collectStatVarIds(parsed, table), file));

  return [...blocking, ...advisory];
}

/** StatVar ids the mapping produces: literal `variableMeasured` values plus column values. */
export function collectStatVarIds(parsed: ParsedNodeFile, table?: DataTable): Set<string> {
  const ids = new Set<string>();
  const columns = new Set<string>();

  for (const node of parsed.nodes) {
    for (const property of node.properties) {
      if (property.key !== "variableMeasured") continue;
      const column = columnRef(property.value);
      if (column !== null) {
        columns.add(column);
        continue;
      }
      const id = stripIdPrefix(property.value);
      if (id) ids.add(id);
    }
  }

  if (table) {
    for (const column of columns) {
      const index = table.header.indexOf(column);
      if (index === -1) continue;
      for (const row of table.rows) {
        const id = stripIdPrefix(row[index] ?? "");
        if (id) ids.add(id);
      }
    }
  }

  return ids;
}

// =============================================================================
// BLOCKING CHECKS
// =============================================================================

function checkOrphanLines(parsed: ParsedNodeFile, file: string): Finding[] {
  return parsed.orphanLines.map((property) =>
    createFinding(
      "MISSING_NODE_HEADER",
      `Property '${property.key}' appears before any Node: line.`,
      { file, line: property.line },
    ),
  );
}

function checkDuplicateNodes(nodes: NodeBlock[], file: string): Finding[] {
  const firstSeen = new Map<string, number>();
  const findings: Finding[] = [];

  for (const node of nodes) {
    const first = firstSeen.get(node.id);
    if (first === undefined) {
      firstSeen.set(node.id, node.line);
      continue;
    }
    findings.push(
      createFinding(
        "DUPLICATE_NODE",
        `Node '${node.id}' is declared again (first declared at line ${first}).`,
        { file, line: node.line },
      ),
    );
  }

  return findings;
}

function checkNode(node: NodeBlock, file: string): Finding[] {
  const findings: Finding[] = [];
  const firstSeen = new Map<string, number>();

  for (const property of node.properties) {
    const first = firstSeen.get(property.key);
    if (first !== undefined) {
      findings.push(
        createFinding(
          "DUPLICATE_PROPERTY",
          `Property '${property.key}' repeats in node '${node.id}' (first at line ${first}).`,
          { file, line: property.line },
        ),
      );
    } else {
      firstSeen.set(property.key, property.line);
    }

    if (PREFIXED_PROPERTIES.includes(property.key) && !hasAcceptedPrefix(property.value)) {
      findings.push(
        createFinding(
          "MISSING_PREFIX",
          `Value '${property.value}' of '${property.key}' needs a namespace prefix such as dcs:.`,
          { file, line: property.line },
        ),
      );
    }

    const suggestion = suggestKnownProperty(property.key);
    if (suggestion) {
      findings.push(
        createFinding(
          "MISSPELLED_PROPERTY",
          `Property '${property.key}' looks like a misspelling of '${suggestion}'.`,
          { file, line: property.line },
        ),
      );
    }
  }

  if (isObservationNode(node)) {
    if (propertyValue(node, "value") === undefined) {
      findings.push(
        createFinding(
          "VALUE_NOT_MAPPED",
          `StatVarObservation node '${node.id}' has no 'value' property.`,
          { file, line: node.line },
        ),
      );
    }
    for (const required of REQUIRED_OBSERVATION_PROPERTIES) {
      if (propertyValue(node, required) !== undefined) continue;
      findings.push(
        createFinding(
          "MISSING_REQUIRED_PROPERTY",
          `StatVarObservation node '${node.id}' is missing '${required}'.`,
          { file, line: node.line },
        ),
      );
    }
  }

  return findings;
}

function checkColumnsInHeader(parsed: ParsedNodeFile, table: DataTable, file: string): Finding[] {
  const header = new Set(table.header);
  return referencedColumns(parsed)
    .filter((ref) => !header.has(ref.value))
    .map((ref) =>
      createFinding(
        "COLUMN_NOT_IN_HEADER",
        `Column reference '${ref.value}' does not exist in the data table header.`,
        { file, line: ref.line },
      ),
    );
}

// =============================================================================
// ADVISORY CHECKS
// =============================================================================

function checkUnusedColumns(parsed: ParsedNodeFile, table: DataTable, file: string): Finding[] {
  const referenced = new Set(referencedColumns(parsed).map((ref) => ref.value));
  const unused = table.header.filter((column) => column.length > 0 && !referenced.has(column));

  const findings = unused
    .slice(0, UNUSED_COLUMN_LIMIT)
    .map((column) =>
      createFinding(
        "UNUSED_COLUMN",
        `Data table column '${column}' is not referenced by the mapping.`,
        { file },
        { severity: "ADVISORY" },
      ),
    );

  if (unused.length > UNUSED_COLUMN_LIMIT) {
    findings.push(
      createFinding(
        "UNUSED_COLUMN",
        `${unused.length - UNUSED_COLUMN_LIMIT} more unused data table column(s).`,
        { file },
        { severity: "ADVISORY" },
      ),
    );
  }

  return findings;
}

function checkDateLiterals(parsed: ParsedNodeFile, file: string): Finding[] {
  const findings: Finding[] = [];

  for (const node of parsed.nodes) {
    for (const property of node.properties) {
      if (property.key !== "observationDate" || columnRef(property.value) !== null) continue;
      const literal = unquote(property.value);
      if (DATE_LITERAL_RE.test(literal)) continue;
      findings.push(
        createFinding(
          "INVALID_DATE_LITERAL",
          `observationDate literal '${literal}' is not YYYY, YYYY-MM or YYYY-MM-DD.`,
          { file, line: property.line },
          { severity: "ADVISORY" },
        ),
      );
    }
  }

  return findings;
}

function checkStatVarFormat(ids: Set<string>, file: string): Finding[] {
  return [...ids]
    .filter((id) => !STATVAR_ID_RE.test(id))
    .sort()
    .map((id) =>
      createFinding(
        "STATVAR_FORMAT",
        `StatVar id '${id}' should be UpperCamelCase segments joined by underscores.`,
        { file },
        { severity: "ADVISORY" },
      ),
    );
}

// =============================================================================
// HELPERS
// =============================================================================

function hasAcceptedPrefix(value: string): boolean {
  const trimmed = value.trim();
  if (trimmed.startsWith('"')) return true;
  return ACCEPTED_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
}

export function suggestKnownProperty(key: string): string | null {
  if (KNOWN_PROPERTY_SET.has(key) || key.length < MISSPELLING_MIN_LENGTH) return null;

  let best: { name: string; distance: number } | null = null;
  for (const known of KNOWN_PROPERTIES) {
    const distance = editDistance(key.toLowerCase(), known.toLowerCase());
    if (distance > MISSPELLING_MAX_DISTANCE) continue;
    if (!best || distance < best.distance) {
      best = { name: known, distance };
    }
  }

  return best?.name ?? null;
}

export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);

  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }

  return previous[b.length];
}
