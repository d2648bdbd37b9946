import path from "node:path";

import { Command } from "commander";
import { z } from "zod";

import { readTextFile, serializeJson, writeTextFile } from "../core/utils.js";
import { loadRuleConfig, validateRuleConfig } from "../rules/rule-config.js";
import { parseRuleIdList, selectRules } from "../rules/rule-selector.js";

import { parseFlags } from "./flags.js";

// =============================================================================
// TYPES
// =============================================================================

const FilterFlagsSchema = z.object({
  config: z.string().min(1),
  rules: z.string().optional(),
  skipRules: z.string().optional(),
  output: z.string().min(1).optional(),
});

export type FilterFlags = z.infer<typeof FilterFlagsSchema>;

// =============================================================================
// REGISTRATION
// =============================================================================

export function registerRulesCommand(program: Command): void {
  const rules = program.command("rules").description("Inspect and filter rule configurations");

  rules
    .command("filter")
    .description("Write a rule configuration restricted to an inclusion or exclusion set")
    .requiredOption("--config <path>", "Rule configuration JSON")
    .option("--rules <ids>", "Comma-separated rule ids to keep")
    .option("--skip-rules <ids>", "Comma-separated rule ids to drop")
    .option("--output <path>", "Write the filtered document here instead of stdout")
    .action(async (opts: unknown) => {
      process.exitCode = await filterRulesCommand(parseFlags(FilterFlagsSchema, opts, "rules filter"));
    });

  rules
    .command("check")
    .description("Validate a rule configuration document")
    .argument("<path>", "Rule configuration JSON")
    .action(async (filePath: string) => {
      process.exitCode = await checkRulesCommand(filePath);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function filterRulesCommand(flags: FilterFlags, cwd: string = process.cwd()): Promise<number> {
  const config = await loadRuleConfig(path.resolve(cwd, flags.config));
  const filtered = selectRules(config, {
    include: parseRuleIdList(flags.rules),
    exclude: parseRuleIdList(flags.skipRules),
  });

  const json = serializeJson(filtered);
  if (flags.output) {
    const outputPath = path.resolve(cwd, flags.output);
    await writeTextFile(outputPath, json);
    console.log(`Wrote ${filtered.rules.length} rule(s) to ${outputPath}`);
  } else {
    process.stdout.write(json);
  }
  return 0;
}

/** Prints one line per issue; exit 1 when the document does not match the template. */
export async function checkRulesCommand(filePath: string, cwd: string = process.cwd()): Promise<number> {
  const absolutePath = path.resolve(cwd, filePath);
  let doc: unknown;
  try {
    doc = JSON.parse(await readTextFile(absolutePath));
  } catch (err) {
    console.log(`${absolutePath}: not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const validation = validateRuleConfig(doc);
  if (!validation.ok) {
    for (const issue of validation.issues) {
      console.log(`${absolutePath}: ${issue}`);
    }
    return 1;
  }

  console.log(`${absolutePath}: OK (${validation.config.rules.length} rule(s))`);
  return 0;
}
