import { z } from "zod";

export const DEFAULT_CONFIG_FILENAME = "import-gate.yaml";

const RowVolumeSchema = z
  .object({
    threshold: z.number().int().positive().default(1000),
    rule_id: z.string().min(1).default("check_csv_row_count"),
    // Optional separate override table; falls back to the shared warn_only document.
    warn_only: z.string().min(1).optional(),
  })
  .strict();

const QualitySchema = z
  .object({
    value_column: z.string().min(1).default("value"),
    empty_columns: z.enum(["block", "warn"]).default("block"),
  })
  .strict();

const ReviewerProviderSchema = z.enum(["openai", "anthropic", "mock"]);

const ReviewerSchema = z
  .object({
    enabled: z.boolean().default(false),
    provider: ReviewerProviderSchema.default("openai"),
    model: z.string().min(1).default("gpt-4o-mini"),
    temperature: z.number().min(0).max(2).default(0),
    timeout_seconds: z.number().int().positive().default(120),
    advisory: z.boolean().default(false),
  })
  .strict();

const SchemaReviewSchema = z
  .object({
    reviewer: ReviewerSchema.default({}),
  })
  .strict();

const GeneratorSchema = z
  .object({
    command: z.array(z.string().min(1)).min(1).default(["java", "-jar", "bin/import-tool.jar"]),
    resolution: z.string().min(1).default("LOCAL"),
    existence_checks: z.boolean().default(true),
    timeout_seconds: z.number().int().positive().default(900),
    cwd: z.string().min(1).optional(),
  })
  .strict();

const ValidatorSchema = z
  .object({
    command: z.array(z.string().min(1)).min(1).default(["import-validator"]),
    timeout_seconds: z.number().int().positive().default(600),
    cwd: z.string().min(1).optional(),
    empty_differ: z.string().min(1).optional(),
  })
  .strict();

export const GateConfigSchema = z
  .object({
    output_dir: z.string().min(1).default("./output"),
    rules_config: z.string().min(1).default("./config/rules.json"),
    warn_only: z.string().min(1).default("./config/warn-only.json"),
    row_volume: RowVolumeSchema.default({}),
    quality: QualitySchema.default({}),
    schema_review: SchemaReviewSchema.default({}),
    generator: GeneratorSchema.default({}),
    validator: ValidatorSchema.default({}),
  })
  .strict();

export type GateConfig = z.infer<typeof GateConfigSchema>;
export type ReviewerConfig = GateConfig["schema_review"]["reviewer"];
