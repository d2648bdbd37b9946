import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { runPipeline } from "../app/pipeline/controller.js";
import { MarkdownReportRenderer } from "../app/pipeline/report-emitter.js";
import { buildPipelineSettings, type PipelineSettings } from "../app/pipeline/run-context.js";
import type { ResultDocument } from "../app/pipeline/types.js";
import { GateConfigSchema } from "../core/config.js";

import { FakeProcessRunner, reportJson, summaryCsv, writesEngineOutput, writesToolOutputs } from "./fakes.js";

const MAPPING = [
  "Node: E:prices->E0",
  "typeOf: dcs:StatVarObservation",
  "variableMeasured: dcs:Count_Person",
  "observationAbout: C:prices->geo",
  "observationDate: C:prices->date",
  "value: C:prices->value",
].join("\n");

const RULES = {
  schema_version: "1.0",
  rules: [
    {
      rule_id: "check_min_value",
      description: "Values are not negative",
      validator: "MIN_VALUE_CHECK",
      scope: { data_source: "stats" },
      params: { minimum: 0 },
    },
  ],
};

const MIN_VALUE_FAILURE = { validation_name: "check_min_value", status: "FAILED", message: "1 value below 0" };

type Workspace = {
  dir: string;
  mappingPath: string;
  tablePath: string;
};

describe("gate scenarios", () => {
  let ws: Workspace;
  let runner: FakeProcessRunner;

  beforeEach(async () => {
    const dir = await fse.mkdtemp(path.join(os.tmpdir(), "gate-scenario-"));
    ws = {
      dir,
      mappingPath: path.join(dir, "prices.tmcf"),
      tablePath: path.join(dir, "prices.csv"),
    };
    await fse.writeFile(ws.mappingPath, MAPPING);
    await fse.writeJson(path.join(dir, "rules.json"), RULES);
    await writeTable(["country/USA,2020,-1", "country/CAN,2020,5"]);

    runner = new FakeProcessRunner()
      .on(
        "genmcf",
        writesToolOutputs({
          summary: summaryCsv(["Count_Person,2,2,-1,5,2020,2020,"]),
          report: reportJson({ info: { NumNodeSuccesses: 2 } }),
        }),
      )
      .on("--validation_output=", writesEngineOutput([MIN_VALUE_FAILURE], 1));
  });

  afterEach(async () => {
    await fse.remove(ws.dir);
  });

  async function writeTable(rows: string[]): Promise<void> {
    await fse.writeFile(ws.tablePath, ["geo,date,value", ...rows].join("\n") + "\n");
  }

  async function writeWarnOnly(doc: Record<string, string[]>): Promise<void> {
    await fse.writeJson(path.join(ws.dir, "warn-only.json"), doc);
  }

  function settings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
    const config = GateConfigSchema.parse({
      output_dir: path.join(ws.dir, "output"),
      rules_config: path.join(ws.dir, "rules.json"),
      warn_only: path.join(ws.dir, "warn-only.json"),
      generator: { command: ["import-tool"] },
      validator: { command: ["engine"] },
    });
    const base = buildPipelineSettings(config, {
      runId: "run-1",
      dataset: "prices",
      inputs: { mappingPath: ws.mappingPath, tablePath: ws.tablePath, metadataPaths: [] },
    });
    return { ...base, ...overrides };
  }

  async function readDocument(runDir: string): Promise<ResultDocument> {
    const raw: ResultDocument = await fse.readJson(path.join(runDir, "result.json"));
    return raw;
  }

  it("scenario 1: a missing mapping file aborts at preflight with one finding", async () => {
    await fse.remove(ws.mappingPath);

    const run = await runPipeline(settings(), { runner });

    expect(run.verdict).toBe("FAIL");
    expect(run.exitCode).toBe(1);
    expect(run.document.aborted_stage).toBe("preflight");
    expect(run.document.records).toEqual([
      {
        kind: "finding",
        stage: "preflight",
        code: "MISSING_FILE",
        status: "FAILED",
        severity: "BLOCKING",
        message: `Mapping file not found: ${ws.mappingPath}`,
        file: ws.mappingPath,
      },
    ]);
    expect(run.document.stages.map((stage) => stage.stage)).toEqual(["init", "preflight"]);
    expect(runner.calls).toEqual([]);

    expect(await readDocument(run.paths.runDir)).toEqual(run.document);
    expect(await fse.readJson(run.paths.failureSidecar)).toEqual({
      stage: "preflight",
      code: "MISSING_FILE",
      message: `Mapping file not found: ${ws.mappingPath}`,
    });
  });

  it("scenario 2: a negative value passes quality but fails check_min_value", async () => {
    const run = await runPipeline(settings(), { runner });

    expect(run.verdict).toBe("FAIL");
    expect(run.exitCode).toBe(1);
    expect(run.document.aborted_stage).toBeNull();

    const quality = run.document.stages.find((stage) => stage.stage === "quality");
    expect(quality?.status).toBe("PASSED");

    const outcomes = run.document.records.filter((record) => record.kind === "outcome");
    expect(outcomes).toEqual([
      {
        kind: "outcome",
        stage: "validate",
        code: "check_min_value",
        status: "FAILED",
        severity: "BLOCKING",
        message: "1 value below 0",
        rule_id: "check_min_value",
      },
    ]);
    expect(run.document.counts).toEqual({ blocking: 1, advisory: 1, passed: 0 });
    expect(await fse.pathExists(run.paths.failureSidecar)).toBe(false);
  });

  it("scenario 3: the warn-only entry turns the failed rule into a warning", async () => {
    await writeWarnOnly({ prices: ["check_min_value"] });

    const run = await runPipeline(settings(), { runner });

    expect(run.verdict).toBe("PASS");
    expect(run.exitCode).toBe(0);
    const outcome = run.document.records.find((record) => record.code === "check_min_value");
    expect(outcome).toEqual({
      kind: "outcome",
      stage: "validate",
      code: "check_min_value",
      status: "WARNING",
      severity: "ADVISORY",
      message: "1 value below 0",
      rule_id: "check_min_value",
      reclassified_from: "FAILED",
    });
    expect(run.document.counts).toEqual({ blocking: 0, advisory: 2, passed: 0 });
    expect(run.document.stages.at(-1)).toEqual({
      stage: "reclassify",
      status: "PASSED",
      severity: "BLOCKING",
      note: "1 result(s) downgraded for prices",
    });
  });

  it("scenario 4: 1001 rows abort at the row volume check with limit 1000", async () => {
    await writeTable(Array.from({ length: 1001 }, (_, i) => `geoId/${i},2020,${i}`));

    const run = await runPipeline(settings(), { runner });

    expect(run.verdict).toBe("FAIL");
    expect(run.document.aborted_stage).toBe("row_volume");
    expect(run.document.records).toEqual([
      {
        kind: "finding",
        stage: "row_volume",
        code: "ROW_COUNT_EXCEEDED",
        status: "FAILED",
        severity: "BLOCKING",
        message: "Input table has 1001 data rows, which exceeds the sample limit of 1000.",
        file: ws.tablePath,
        limit: 1000,
        rule_id: "check_csv_row_count",
      },
    ]);
    expect(runner.calls).toEqual([]);
    expect(await fse.readJson(run.paths.failureSidecar)).toEqual({
      stage: "row_volume",
      code: "ROW_COUNT_EXCEEDED",
      message: "Input table has 1001 data rows, which exceeds the sample limit of 1000.",
      limit: 1000,
    });
  });

  it("carries an over-limit table forward when the row rule is warn-only", async () => {
    await writeTable(Array.from({ length: 1001 }, (_, i) => `geoId/${i},2020,${i}`));
    await writeWarnOnly({ prices: ["check_csv_row_count"] });
    runner = new FakeProcessRunner()
      .on(
        "genmcf",
        writesToolOutputs({
          summary: summaryCsv(["Count_Person,1001,1001,0,1000,2020,2020,"]),
          report: reportJson({ info: { NumNodeSuccesses: 1001 } }),
        }),
      )
      .on("--validation_output=", writesEngineOutput([{ validation_name: "check_min_value", status: "PASSED" }]));

    const run = await runPipeline(settings(), { runner });

    expect(run.verdict).toBe("PASS");
    expect(run.document.aborted_stage).toBeNull();
    expect(run.document.stages.find((stage) => stage.stage === "row_volume")).toEqual({
      stage: "row_volume",
      status: "FAILED",
      severity: "ADVISORY",
      note: "reclassified from FAILED/BLOCKING by warn-only policy for prices",
    });
    expect(run.document.records[0]).toMatchObject({ code: "ROW_COUNT_EXCEEDED", severity: "ADVISORY", limit: 1000 });
    expect(runner.callsFor("genmcf")).toHaveLength(1);
  });

  it("scenario 5: a failing generator aborts at generate with a minimal document", async () => {
    runner = new FakeProcessRunner()
      .on("genmcf", { exitCode: 2, stderr: "java.lang.IllegalStateException: bad mapping" })
      .on("--validation_output=", writesEngineOutput([MIN_VALUE_FAILURE], 1));

    const run = await runPipeline(settings(), { runner });

    expect(run.verdict).toBe("FAIL");
    expect(run.exitCode).toBe(1);
    expect(run.document.aborted_stage).toBe("generate");
    expect(run.document.records).toHaveLength(1);
    expect(run.document.records[0]).toMatchObject({
      stage: "generate",
      code: "GENERATION_FAILED",
      severity: "BLOCKING",
    });
    expect(runner.callsFor("--validation_output=")).toEqual([]);
    expect((await readDocument(run.paths.runDir)).records).toHaveLength(1);
    expect(await fse.readJson(run.paths.validationOutput)).toEqual(run.document.records);
  });

  it("writes the rendered summary and run events", async () => {
    await writeWarnOnly({ prices: ["check_min_value"] });

    const run = await runPipeline(settings(), { runner, renderer: new MarkdownReportRenderer() });

    expect(run.renderError).toBeUndefined();
    expect(await fse.pathExists(run.paths.reportSummary)).toBe(true);

    const events = (await fse.readFile(run.paths.eventsLog, "utf8"))
      .trim()
      .split("\n")
      .map((line): { type: string; run_id: string; stage?: string } => JSON.parse(line));
    expect(events[0]?.type).toBe("run.start");
    expect(events.at(-1)?.type).toBe("run.complete");
    expect(events.every((event) => event.run_id === "run-1")).toBe(true);
    expect(events.filter((event) => event.type === "stage.start")).toHaveLength(9);
    expect(events.filter((event) => event.type === "tool.start").map((event) => event.stage)).toEqual([
      "generate",
      "validate",
    ]);
    expect(events.find((event) => event.type === "stage.reclassified")).toMatchObject({ stage: "validate" });
  });
});

describe("controller failure paths", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fse.mkdtemp(path.join(os.tmpdir(), "gate-controller-"));
    await fse.writeFile(path.join(dir, "prices.tmcf"), MAPPING);
    await fse.writeFile(path.join(dir, "prices.csv"), "geo,date,value\ncountry/USA,2020,1\n");
    await fse.writeJson(path.join(dir, "rules.json"), RULES);
  });

  afterEach(async () => {
    await fse.remove(dir);
  });

  function settings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
    const config = GateConfigSchema.parse({
      output_dir: path.join(dir, "output"),
      rules_config: path.join(dir, "rules.json"),
      warn_only: path.join(dir, "warn-only.json"),
      generator: { command: ["import-tool"] },
      validator: { command: ["engine"] },
    });
    const base = buildPipelineSettings(config, {
      runId: "run-2",
      dataset: "prices",
      inputs: {
        mappingPath: path.join(dir, "prices.tmcf"),
        tablePath: path.join(dir, "prices.csv"),
        metadataPaths: [],
      },
    });
    return { ...base, ...overrides };
  }

  it("fails init on an unknown rule id in the inclusion set", async () => {
    const runner = new FakeProcessRunner();

    const run = await runPipeline(settings({ ruleSelection: { include: ["check_typo"] } }), { runner });

    expect(run.document.aborted_stage).toBe("init");
    expect(run.failure?.code).toBe("UNKNOWN_RULE_ID");
    expect(run.document.stages).toHaveLength(1);
  });

  it("fails init when inclusion and exclusion are both given", async () => {
    const run = await runPipeline(
      settings({ ruleSelection: { include: ["check_min_value"], exclude: ["check_min_value"] } }),
      { runner: new FakeProcessRunner() },
    );

    expect(run.failure?.code).toBe("RULE_SELECTION_CONFLICT");
  });

  it("fails init on an invalid rule configuration", async () => {
    await fse.writeFile(path.join(dir, "rules.json"), "{ not json");

    const run = await runPipeline(settings(), { runner: new FakeProcessRunner() });

    expect(run.failure?.code).toBe("RULE_CONFIG_INVALID");
    expect(run.document.records[0]?.file).toBe(path.join(dir, "rules.json"));
  });

  it("fails init on a malformed warn-only document", async () => {
    await fse.writeJson(path.join(dir, "warn-only.json"), { prices: "check_min_value" });

    const run = await runPipeline(settings(), { runner: new FakeProcessRunner() });

    expect(run.failure?.code).toBe("WARN_ONLY_INVALID");
  });

  it("reports RUN_CANCELED when the run is canceled before it starts", async () => {
    const controller = new AbortController();
    controller.abort();

    const run = await runPipeline(settings(), { runner: new FakeProcessRunner() }, { signal: controller.signal });

    expect(run.verdict).toBe("FAIL");
    expect(run.failure).toEqual({
      stage: "init",
      code: "RUN_CANCELED",
      message: "Run was canceled before stage init started.",
    });
  });

  it("turns the caller timeout into a generation timeout", async () => {
    const runner = new FakeProcessRunner().on("genmcf", { hangUntilAborted: true });

    const run = await runPipeline(settings({ timeoutMs: 500 }), { runner });

    expect(run.document.aborted_stage).toBe("generate");
    expect(run.failure?.code).toBe("GENERATION_TIMEOUT");
  });

  it("converts a throwing port into INTERNAL_ERROR", async () => {
    const runner = new FakeProcessRunner().on("genmcf", () => {
      throw new Error("runner exploded");
    });

    const run = await runPipeline(settings(), { runner });

    expect(run.document.aborted_stage).toBe("generate");
    expect(run.failure).toEqual({
      stage: "generate",
      code: "INTERNAL_ERROR",
      message: "Stage generate raised an unexpected error: runner exploded",
    });
  });

  it("keeps the verdict when the renderer fails", async () => {
    const runner = new FakeProcessRunner()
      .on(
        "genmcf",
        writesToolOutputs({
          summary: summaryCsv(["Count_Person,1,1,1,1,2020,2020,"]),
          report: reportJson({ info: { NumNodeSuccesses: 1 } }),
        }),
      )
      .on("--validation_output=", writesEngineOutput([{ validation_name: "check_min_value", status: "PASSED" }]));
    const renderer = {
      render: async (): Promise<void> => {
        throw new Error("template missing");
      },
    };

    const run = await runPipeline(settings(), { runner, renderer });

    expect(run.verdict).toBe("PASS");
    expect(run.exitCode).toBe(0);
    expect(run.renderError).toBe("template missing");
    expect(run.document.counts).toEqual({ blocking: 0, advisory: 0, passed: 1 });
  });
});
