import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { runPreflight } from "./preflight.js";

describe("runPreflight", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fse.mkdtemp(path.join(os.tmpdir(), "preflight-"));
  });

  afterEach(async () => {
    await fse.remove(tmpDir);
  });

  async function touch(name: string): Promise<string> {
    const filePath = path.join(tmpDir, name);
    await fse.outputFile(filePath, "x\n");
    return filePath;
  }

  it("passes when every artifact exists with the expected suffix", async () => {
    const mappingPath = await touch("prices.TMCF");
    const tablePath = await touch("prices.csv");
    const metadata = await touch("stat_vars.mcf");

    const result = await runPreflight({ mappingPath, tablePath, metadataPaths: [metadata] });

    expect(result).toEqual({ stage: "preflight", status: "PASSED", severity: "BLOCKING", findings: [] });
  });

  it("reports a missing mapping file as the only finding", async () => {
    const tablePath = await touch("prices.csv");
    const mappingPath = path.join(tmpDir, "prices.tmcf");

    const result = await runPreflight({ mappingPath, tablePath });

    expect(result.status).toBe("FAILED");
    expect(result.severity).toBe("BLOCKING");
    expect(result.findings).toEqual([
      {
        code: "MISSING_FILE",
        message: `Mapping file not found: ${mappingPath}`,
        locator: { file: mappingPath },
      },
    ]);
  });

  it("reports every violation in input order", async () => {
    const mappingPath = await touch("prices.txt");
    const tablePath = await touch("prices.tsv");
    const metadataPath = path.join(tmpDir, "missing.mcf");

    const result = await runPreflight({ mappingPath, tablePath, metadataPaths: [metadataPath] });

    expect(result.findings.map((finding) => finding.code)).toEqual([
      "WRONG_EXTENSION",
      "WRONG_EXTENSION",
      "MISSING_FILE",
    ]);
    expect(result.findings[0].message).toBe(
      `Mapping file must have a .tmcf or .mcf extension: ${mappingPath}`,
    );
  });

  it("treats a directory as missing", async () => {
    const tablePath = await touch("prices.csv");
    const mappingPath = path.join(tmpDir, "dir.tmcf");
    await fse.ensureDir(mappingPath);

    const result = await runPreflight({ mappingPath, tablePath });

    expect(result.findings.map((finding) => finding.code)).toEqual(["MISSING_FILE"]);
  });
});
