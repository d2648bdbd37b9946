// Line-oriented parser for mapping and metadata files: `Node:` blocks of `property: value` lines.

// =============================================================================
// TYPES
// =============================================================================

export type NodeProperty = {
  key: string;
  value: string;
  line: number;
};

export type NodeBlock = {
  id: string;
  line: number;
  properties: NodeProperty[];
};

export type ParsedNodeFile = {
  nodes: NodeBlock[];
  /** Property lines that appear before the first `Node:` line. */
  orphanLines: NodeProperty[];
};

// =============================================================================
// PARSING
// =============================================================================

export function parseNodeFile(text: string): ParsedNodeFile {
  const nodes: NodeBlock[] = [];
  const orphanLines: NodeProperty[] = [];
  let current: NodeBlock | null = null;

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = stripComment(raw).trim();
    if (!line) return;

    const separator = line.indexOf(":");
    if (separator <= 0) return;

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    const lineNumber = index + 1;

    if (key === "Node") {
      current = { id: value, line: lineNumber, properties: [] };
      nodes.push(current);
      return;
    }

    const property = { key, value, line: lineNumber };
    if (current) {
      current.properties.push(property);
    } else {
      orphanLines.push(property);
    }
  });

  return { nodes, orphanLines };
}

export function stripComment(line: string): string {
  const hash = line.indexOf("#");
  return hash === -1 ? line : line.slice(0, hash);
}

// =============================================================================
// NODE HELPERS
// =============================================================================

export function propertyValue(node: NodeBlock, key: string): string | undefined {
  return node.properties.find((property) => property.key === key)?.value;
}

export function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\"/g, '"').trim();
  }
  return trimmed;
}

export function isObservationNode(node: NodeBlock): boolean {
  const typeOf = propertyValue(node, "typeOf");
  return typeOf !== undefined && stripIdPrefix(typeOf) === "StatVarObservation";
}

/** Drops a leading `dcid:`, `dcs:` or `schema:` namespace. */
export function stripIdPrefix(raw: string): string {
  const trimmed = unquote(raw);
  const match = /^(dcid|dcs|schema):\s*/i.exec(trimmed);
  return match ? trimmed.slice(match[0].length).trim() : trimmed;
}

// =============================================================================
// COLUMN REFERENCES
// =============================================================================

const COLUMN_REF_RE = /^C:[^>]+->(.+)$/;

export function columnRef(value: string): string | null {
  const match = COLUMN_REF_RE.exec(value.trim());
  return match ? match[1].trim() : null;
}

/** Column ids referenced through `C:<table>-><column>`, in order of first use. */
export function referencedColumns(parsed: ParsedNodeFile): NodeProperty[] {
  const seen = new Set<string>();
  const refs: NodeProperty[] = [];

  for (const node of parsed.nodes) {
    for (const property of node.properties) {
      const column = columnRef(property.value);
      if (column === null || seen.has(column)) continue;
      seen.add(column);
      refs.push({ key: property.key, value: column, line: property.line });
    }
  }

  return refs;
}
