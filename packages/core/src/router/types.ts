export type HttpMethod = "GET" | "POST";

/** Value produced by a converter and handed to a handler. */
export type ParamValue = string | number;

export type HandlerResult = string | Promise<string>;

// Declared through a method signature so that a handler typed for a concrete
// tuple (e.g. `[number]`) stays assignable to the table's generic handler.
export type Handler<TParams extends readonly ParamValue[] = ParamValue[]> = {
  handle(...params: TParams): HandlerResult;
}["handle"];

export interface Route {
  method: HttpMethod;
  /** Normalized pattern: one trailing slash stripped. */
  pattern: string;
  handler: Handler;
}

export type ConverterKind = "int" | "string" | "float";

export interface ConverterValues {
  int: number;
  string: string;
  float: number;
}

export type PatternMode = "typed" | "untyped" | "literal";

export interface CompiledPattern {
  pattern: string;
  mode: PatternMode;
  regex: RegExp;
  /** Converter per capture, in placeholder order. */
  kinds: ConverterKind[];
  /** Capture names, in placeholder order. */
  names: string[];
}

export type MatchStrategy = "exact" | "typed" | "untyped" | "query";

export interface Match {
  route: Route;
  params: ParamValue[];
  strategy: MatchStrategy;
}
