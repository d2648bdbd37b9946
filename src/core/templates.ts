import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

// =============================================================================
// TYPES
// =============================================================================

export type PromptTemplateName = "schema-reviewer";
export type ReportTemplateName = "summary";

export type PromptTemplateValues = Record<string, string>;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderPromptTemplate(
  name: PromptTemplateName,
  values: PromptTemplateValues,
): Promise<string> {
  const template = await loadTemplate(path.join("prompts", `${name}.md`));
  const output = template(values).trim();

  if (/\{\{[^}]+\}\}/.test(output)) {
    throw new Error(`Unresolved placeholder(s) remain in ${name} prompt output`);
  }

  return output;
}

export async function renderReportTemplate(name: ReportTemplateName, context: object): Promise<string> {
  const template = await loadTemplate(path.join("report", `${name}.md`));
  return `${template(context).trim()}\n`;
}

/** Absolute path of a file shipped under `templates/`. */
export function packagedTemplatePath(relativePath: string): string {
  return path.join(resolveTemplatesDir(), relativePath);
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<string, Handlebars.TemplateDelegate>();

async function loadTemplate(relativePath: string): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(relativePath);
  if (cached) return cached;

  const templatePath = packagedTemplatePath(relativePath);
  const exists = await fse.pathExists(templatePath);
  if (!exists) {
    throw new Error(`Template not found: ${templatePath}`);
  }

  const raw = await fse.readFile(templatePath, "utf8");
  const compiled = Handlebars.compile(raw, { noEscape: true, strict: true });

  TEMPLATE_CACHE.set(relativePath, compiled);
  return compiled;
}

function resolveTemplatesDir(): string {
  const packageRoot = findPackageRoot(fileURLToPath(new URL(".", import.meta.url)));
  return path.join(packageRoot, "templates");
}

// Compiled output lives under dist/, so walk up to the package root.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new Error("package.json not found while resolving templates directory");
}
