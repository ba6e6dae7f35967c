export { PatternCompiler, compilePattern, escapeRegExp } from "~/router/compiler.ts";
export type { PatternCompilerOptions } from "~/router/compiler.ts";
export {
  floatConverter,
  intConverter,
  isConverterKind,
  lookupConverter,
  stringConverter,
} from "~/router/converters.ts";
export type { Converter } from "~/router/converters.ts";
export { Dispatcher } from "~/router/dispatcher.ts";
export type { PatternParams, Placeholders } from "~/router/params.ts";
export { joinPath, parseQuery, splitRawPath, stripTrailingSlash } from "~/router/path.ts";
export { parseMethod, RouteTable, toHttpMethod } from "~/router/table.ts";
export type {
  CompiledPattern,
  ConverterKind,
  ConverterValues,
  Handler,
  HandlerResult,
  HttpMethod,
  Match,
  MatchStrategy,
  ParamValue,
  PatternMode,
  Route,
} from "~/router/types.ts";
