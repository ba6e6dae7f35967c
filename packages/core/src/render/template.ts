/**
 * Template substitution for `{{ name }}` placeholders.
 */

import { readFile } from "node:fs/promises";

export type TemplateVars = Readonly<Record<string, unknown>>;

/**
 * Replace every literal `{{ key }}` (one space on each side) with
 * `String(value)`. Values are inserted verbatim, without HTML escaping;
 * placeholders with no matching key are left as they are.
 *
 * @example
 * ```typescript
 * renderTemplate("<h1>{{ title }}</h1>", { title: "Hello" });
 * // "<h1>Hello</h1>"
 * ```
 */
export function renderTemplate(source: string, vars: TemplateVars = {}): string {
  let out = source;
  for (const [key, value] of Object.entries(vars)) {
    const text = String(value);
    // A replacer function keeps `$&` and friends literal.
    out = out.replaceAll(`{{ ${key} }}`, () => text);
  }
  return out;
}

export function loadTemplate(path: string | URL): Promise<string> {
  return readFile(path, "utf8");
}

/**
 * Load a template file and render it.
 */
export async function render(
  path: string | URL,
  vars: TemplateVars = {},
): Promise<string> {
  return renderTemplate(await loadTemplate(path), vars);
}
