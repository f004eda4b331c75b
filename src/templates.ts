import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

// Resolves to <package>/templates from both src/ and dist/.
const TEMPLATES_DIR = new URL("../templates/", import.meta.url);

export function templatePath(name: string): string {
  return fileURLToPath(new URL(name, TEMPLATES_DIR));
}

export function loadTemplate(name: string): string {
  return readFileSync(templatePath(name), "utf-8");
}

/**
 * Replace `{{KEY}}` placeholders in one pass. Substituted values are not
 * scanned again, so a concept that itself contains `{{...}}` stays intact.
 * Placeholders without a replacement are left as they are.
 */
export function renderTemplate(
  template: string,
  replacements: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{\{([A-Z0-9_]+)\}\}/g, (match, key: string) =>
    Object.hasOwn(replacements, key) ? (replacements[key] ?? match) : match,
  );
}

export function buildPrompt(
  name: string,
  replacements: Readonly<Record<string, string>>,
): string {
  return renderTemplate(loadTemplate(name), replacements);
}
