import { Command } from "commander";
import { z } from "zod";

import { parseFlags } from "./flags.js";
import { registerRulesCommand } from "./rules.js";
import { RunFlagsSchema, runGateCommand } from "./run.js";
import { summaryCommand } from "./summary.js";

const SummaryFlagsSchema = z.object({ markdown: z.boolean().default(false) });

export function buildCli(): Command {
  const program = new Command();

  program
    .name("import-gate")
    .description("Staged quality gate for tabular knowledge-graph imports")
    .version("0.1.0")
    .option("--debug", "Show error stacks and debug details", false);

  program
    .command("run")
    .description("Run the gate on one mapping file and data table")
    .requiredOption("--mapping <path>", "Mapping template (.tmcf or .mcf)")
    .requiredOption("--table <path>", "Data table (.csv)")
    .option("--metadata <path...>", "Metadata files (.mcf)")
    .option("--differ <path>", "Prior-vs-current differ output (default: empty differ)")
    .option("--dataset <id>", "Dataset id (default: the table's file stem)")
    .option("--run-id <id>", "Run id (default: UTC timestamp)")
    .option("--rules <ids>", "Comma-separated rule ids to evaluate")
    .option("--skip-rules <ids>", "Comma-separated rule ids to leave out")
    .option("--reviewer", "Enable the external schema reviewer")
    .option("--no-reviewer", "Disable the external schema reviewer")
    .option("--advisory", "Report external reviewer findings as advisory")
    .option("--timeout <seconds>", "Wall-clock limit for the whole run", (v) => Number.parseFloat(v))
    .option("--config <path>", "Gate config (default: ./import-gate.yaml)")
    .option("--output-dir <path>", "Root directory for run outputs")
    .action(async (_opts: unknown, command: Command) => {
      const flags = parseFlags(RunFlagsSchema, command.optsWithGlobals(), "run");
      process.exitCode = await runGateCommand(flags);
    });

  registerRulesCommand(program);

  program
    .command("summary")
    .description("Print the review summary of a finished run")
    .argument("<run-dir>", "Run directory holding result.json")
    .option("--markdown", "Print the rendered markdown report", false)
    .action(async (runDir: string, opts: unknown) => {
      process.exitCode = await summaryCommand(runDir, parseFlags(SummaryFlagsSchema, opts, "summary"));
    });

  return program;
}
