import { describe, expect, it } from "vitest";

import { parseDataTable } from "../../core/table.js";

import { checkMapping, editDistance, suggestKnownProperty } from "./mapping-checks.js";
import { parseNodeFile } from "./mapping.js";
import { checkMetadata } from "./metadata-checks.js";

const MAPPING = "prices.tmcf";

const CLEAN_MAPPING = [
  "Node: E:prices->E0",
  "typeOf: dcs:StatVarObservation",
  "variableMeasured: dcs:Count_Person",
  "observationAbout: C:prices->geo",
  "observationDate: C:prices->date",
  "value: C:prices->value # measured count",
].join("\n");

function check(text: string, csv?: string) {
  return checkMapping({
    mappingPath: MAPPING,
    parsed: parseNodeFile(text),
    table: csv === undefined ? undefined : parseDataTable(csv),
  });
}

describe("parseNodeFile", () => {
  it("splits nodes and keeps 1-based line numbers", () => {
    const parsed = parseNodeFile("# header comment\n\nNode: E:t->E0\ntypeOf: dcs:StatVarObservation\n");

    expect(parsed.orphanLines).toEqual([]);
    expect(parsed.nodes).toEqual([
      {
        id: "E:t->E0",
        line: 3,
        properties: [{ key: "typeOf", value: "dcs:StatVarObservation", line: 4 }],
      },
    ]);
  });
});

describe("checkMapping", () => {
  it("accepts a complete observation mapping", () => {
    expect(check(CLEAN_MAPPING, "geo,date,value\ncountry/USA,2020,1\n")).toEqual([]);
  });

  it("reports every structural problem in file order", () => {
    const text = [
      "typeOf: dcs:Thing",
      "Node: E:prices->E0",
      "typeOf: StatVarObservation",
      "variableMeasure: dcs:Count_Person",
      "observationAbout: C:prices->geo",
      "observationAbout: C:prices->geo",
      "observationDate: 2020/01",
      "Node: E:prices->E0",
      'name: "second"',
    ].join("\n");

    const findings = check(text);

    expect(findings.map((finding) => [finding.code, finding.locator.line])).toEqual([
      ["MISSING_NODE_HEADER", 1],
      ["DUPLICATE_NODE", 8],
      ["MISSING_PREFIX", 3],
      ["MISSPELLED_PROPERTY", 4],
      ["DUPLICATE_PROPERTY", 6],
      ["VALUE_NOT_MAPPED", 2],
      ["MISSING_REQUIRED_PROPERTY", 2],
      ["INVALID_DATE_LITERAL", 7],
    ]);
    expect(findings[3].message).toBe("Property 'variableMeasure' looks like a misspelling of 'variableMeasured'.");
    expect(findings[6].message).toBe("StatVarObservation node 'E:prices->E0' is missing 'variableMeasured'.");
    expect(findings[7].severity).toBe("ADVISORY");
    expect(findings.slice(0, 7).every((finding) => finding.severity === undefined)).toBe(true);
  });

  it("checks column references against the table header case-sensitively", () => {
    const text = CLEAN_MAPPING.replace("C:prices->date", "C:prices->Date");

    const findings = check(text, "geo,date,value,notes\nA,2020,1,\n");

    expect(findings).toEqual([
      {
        code: "COLUMN_NOT_IN_HEADER",
        message: "Column reference 'Date' does not exist in the data table header.",
        locator: { file: MAPPING, line: 5 },
      },
      {
        code: "UNUSED_COLUMN",
        message: "Data table column 'date' is not referenced by the mapping.",
        locator: { file: MAPPING },
        severity: "ADVISORY",
      },
      {
        code: "UNUSED_COLUMN",
        message: "Data table column 'notes' is not referenced by the mapping.",
        locator: { file: MAPPING },
        severity: "ADVISORY",
      },
    ]);
  });

  it("caps unused column findings", () => {
    const extra = Array.from({ length: 12 }, (_, index) => `extra${index}`);
    const csv = `${["geo", "date", "value", ...extra].join(",")}\n`;

    const findings = check(CLEAN_MAPPING, csv);

    expect(findings).toHaveLength(11);
    expect(findings[10].message).toBe("2 more unused data table column(s).");
  });

  it("flags StatVar ids read from a mapped column", () => {
    const text = [
      "Node: E:t->E0",
      "typeOf: dcs:StatVarObservation",
      "variableMeasured: C:t->sv",
      "observationAbout: C:t->geo",
      "observationDate: 2021",
      "value: C:t->value",
    ].join("\n");
    const csv = "sv,geo,value\nCount_Person,country/USA,1\ndcid:median-income,country/USA,2\n";

    expect(check(text, csv)).toEqual([
      {
        code: "STATVAR_FORMAT",
        message: "StatVar id 'median-income' should be UpperCamelCase segments joined by underscores.",
        locator: { file: MAPPING },
        severity: "ADVISORY",
      },
    ]);
  });

  it("accepts quoted literals where a prefix is otherwise required", () => {
    const text = CLEAN_MAPPING.replace("dcs:Count_Person", '"Count_Person"');

    expect(check(text).map((finding) => finding.code)).toEqual([]);
  });
});

describe("suggestKnownProperty", () => {
  it("suggests the closest well-known property", () => {
    expect(suggestKnownProperty("observationdate")).toBe("observationDate");
    expect(suggestKnownProperty("unitt")).toBe("unit");
    expect(suggestKnownProperty("observationAbout")).toBeNull();
    expect(suggestKnownProperty("geo")).toBeNull();
  });

  it("computes edit distance", () => {
    expect(editDistance("kitten", "sitting")).toBe(3);
    expect(editDistance("", "abc")).toBe(3);
    expect(editDistance("same", "same")).toBe(0);
  });
});

describe("checkMetadata", () => {
  it("reports advisory gaps in StatVar declarations", () => {
    const text = [
      "Node: dcid:Count_Person",
      "typeOf: dcs:StatisticalVariable",
      'name: "Count of persons"',
      "populationType: dcs:Person",
      "",
      "Node: dcid:Percent_Unemployed",
      "typeOf: dcs:StatisticalVariable",
      'description: "Share of people without work"',
      "populationType: dcs:Person",
      "measuredProperty: dcs:unemploymentRate",
      "unit: dcs:Percent",
    ].join("\n");
    const file = "stat_vars.mcf";

    const findings = checkMetadata(
      [{ path: file, parsed: parseNodeFile(text) }],
      new Set(["Count_Person", "Median_Age"]),
    );

    expect(findings.map((finding) => [finding.code, finding.locator.line])).toEqual([
      ["METADATA_MISSING_DESCRIPTION", 1],
      ["STATVAR_MISSING_PROPERTY", 1],
      ["METADATA_MISSING_NAME", 6],
      ["MISSING_DENOMINATOR", 6],
      ["UNDEFINED_STATVAR", undefined],
    ]);
    expect(findings[1].message).toBe("StatVar 'Count_Person' has no measuredProperty.");
    expect(findings[4].message).toBe("StatVar 'Median_Age' is used by the mapping but not defined in metadata.");
    expect(findings.every((finding) => finding.severity === "ADVISORY")).toBe(true);
  });

  it("does nothing without metadata files", () => {
    expect(checkMetadata([], new Set(["Count_Person"]))).toEqual([]);
  });
});
