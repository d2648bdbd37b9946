import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { DEFAULT_CONFIG_FILENAME, GateConfigSchema, type GateConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { isRecord } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadedGateConfig = {
  config: GateConfig;
  configPath: string | null;
};

export type LoadGateConfigOptions = {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Create ${DEFAULT_CONFIG_FILENAME} or pass --config <path>.`;
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!isRecord(error) || !isRecord(error.mark)) {
    return null;
  }

  const { line, column } = error.mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Gate config missing.",
    message: `Gate config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Gate config invalid.",
    message: cause.message,
    hint: INVALID_CONFIG_HINT,
    next: `Edit ${configPath}`,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadGateConfig(options: LoadGateConfigOptions = {}): LoadedGateConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (!options.configPath) {
    const implicitPath = path.join(cwd, DEFAULT_CONFIG_FILENAME);
    if (!fs.existsSync(implicitPath)) {
      return { config: parseGateConfig({}, "<defaults>", cwd), configPath: null };
    }
    return { config: readGateConfigFile(implicitPath, env), configPath: implicitPath };
  }

  const absolutePath = path.resolve(cwd, options.configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  return { config: readGateConfigFile(absolutePath, env), configPath: absolutePath };
}

// =============================================================================
// INTERNALS
// =============================================================================

function readGateConfigFile(absolutePath: string, env: NodeJS.ProcessEnv): GateConfig {
  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read gate config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [], env });
    return parseGateConfig(expanded, absolutePath, path.dirname(absolutePath));
  } catch (err) {
    if (err instanceof ConfigError) {
      throw createInvalidConfigError(absolutePath, err);
    }
    throw err;
  }
}

function parseGateConfig(doc: unknown, label: string, baseDir: string): GateConfig {
  const parsed = GateConfigSchema.safeParse(doc);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid gate config at ${label}:\n${details}`, parsed.error);
  }

  const cfg = parsed.data;
  const resolve = (p: string): string => path.resolve(baseDir, p);
  const resolveOptional = (p: string | undefined): string | undefined =>
    p === undefined ? undefined : resolve(p);

  // Relative paths are relative to the config file, not the caller's cwd.
  return {
    ...cfg,
    output_dir: resolve(cfg.output_dir),
    rules_config: resolve(cfg.rules_config),
    warn_only: resolve(cfg.warn_only),
    row_volume: { ...cfg.row_volume, warn_only: resolveOptional(cfg.row_volume.warn_only) },
    generator: { ...cfg.generator, cwd: resolveOptional(cfg.generator.cwd) },
    validator: {
      ...cfg.validator,
      cwd: resolveOptional(cfg.validator.cwd),
      empty_differ: resolveOptional(cfg.validator.empty_differ),
    },
  };
}
