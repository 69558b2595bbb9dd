import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

// =============================================================================
// TYPES
// =============================================================================

export type PromptTemplateName =
  | "quality-system"
  | "quality-user"
  | "generate-system"
  | "generate-user";

export type PromptTemplateValues = Record<string, string | number>;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Renders `templates/prompts/<name>.md`. Templates compile in strict mode, so a missing value
 * throws instead of rendering empty; values are inserted verbatim and never re-expanded.
 */
export async function renderPromptTemplate(
  name: PromptTemplateName,
  values: PromptTemplateValues = {},
): Promise<string> {
  const template = await loadTemplate(name);
  try {
    return template(values).trim();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to render ${name} prompt: ${detail}`);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<PromptTemplateName, Handlebars.TemplateDelegate>();

async function loadTemplate(name: PromptTemplateName): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = await resolveTemplatePath(name);
  const raw = await fse.readFile(templatePath, "utf8");
  const compiled = Handlebars.compile(raw, { noEscape: true, strict: true });

  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}

async function resolveTemplatePath(name: PromptTemplateName): Promise<string> {
  const promptsDir = resolvePromptsDir();
  const templatePath = path.join(promptsDir, `${name}.md`);
  const exists = await fse.pathExists(templatePath);
  if (!exists) {
    throw new Error(`Prompt template not found: ${templatePath}`);
  }
  return templatePath;
}

function resolvePromptsDir(): string {
  const packageRoot = findPackageRoot(fileURLToPath(new URL(".", import.meta.url)));
  return path.join(packageRoot, "templates", "prompts");
}

// Walk upward to the package root so both src/ and dist/src/ find templates/.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new Error("package.json not found while resolving prompts directory");
}
