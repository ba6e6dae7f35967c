import { fileURLToPath } from "node:url";
import type { Logger } from "~/app/types.ts";
import { describeError } from "~/errors/mod.ts";
import { loadTemplate, renderTemplate } from "~/render/template.ts";

export const DEFAULT_ERROR_TEMPLATE = fileURLToPath(
  new URL("../../templates/error.html", import.meta.url),
);

// Used when the template file cannot be read.
const FALLBACK_TEMPLATE =
  "<!DOCTYPE html><html><head><title>{{ title }}</title></head>" +
  "<body><h1>{{ title }}</h1><p>{{ message }}</p></body></html>";

export const NOT_FOUND_TITLE = "404 Not Found";
export const NOT_FOUND_MESSAGE = "Page Not Found";
export const INTERNAL_ERROR_TITLE = "500 Internal Server Error";

export interface ErrorPage {
  title: string;
  message: string;
}

/**
 * Renders error pages from a template file read once and kept in memory.
 */
export class ErrorPageRenderer {
  private readonly templatePath: string;
  private readonly logger?: Logger;
  private template: Promise<string> | null = null;

  constructor(templatePath: string = DEFAULT_ERROR_TEMPLATE, logger?: Logger) {
    this.templatePath = templatePath;
    this.logger = logger;
  }

  async render(page: ErrorPage): Promise<string> {
    const source = await this.source();
    return renderTemplate(source, {
      title: page.title,
      message: page.message,
    });
  }

  notFound(): Promise<string> {
    return this.render({ title: NOT_FOUND_TITLE, message: NOT_FOUND_MESSAGE });
  }

  internalError(message: string): Promise<string> {
    return this.render({ title: INTERNAL_ERROR_TITLE, message });
  }

  private source(): Promise<string> {
    if (!this.template) {
      this.template = loadTemplate(this.templatePath).catch((error) => {
        this.logger?.error("Error template unavailable, using fallback", {
          path: this.templatePath,
          error: describeError(error),
        });
        return FALLBACK_TEMPLATE;
      });
    }
    return this.template;
  }
}
