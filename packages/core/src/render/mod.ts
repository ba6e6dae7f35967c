export {
  DEFAULT_ERROR_TEMPLATE,
  ErrorPageRenderer,
  INTERNAL_ERROR_TITLE,
  NOT_FOUND_MESSAGE,
  NOT_FOUND_TITLE,
} from "~/render/error_page.ts";
export type { ErrorPage } from "~/render/error_page.ts";
export { loadTemplate, render, renderTemplate } from "~/render/template.ts";
export type { TemplateVars } from "~/render/template.ts";
