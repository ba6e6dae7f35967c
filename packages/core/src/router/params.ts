import type {
  ConverterKind,
  ConverterValues,
  ParamValue,
} from "~/router/types.ts";

/**
 * Bodies of every `<...>` token in a pattern, in order.
 *
 * @example
 * Placeholders<"/a/<int:id>/<slug>"> // ["int:id", "slug"]
 */
export type Placeholders<T extends string> = T extends
  `${string}<${infer Body}>${infer Rest}` ? [Body, ...Placeholders<Rest>]
  : [];

type TypedParams<T> = T extends
  [infer Head extends string, ...infer Tail extends string[]]
  ? Head extends `${infer Kind extends ConverterKind}:${string}`
    ? [ConverterValues[Kind], ...TypedParams<Tail>]
  : TypedParams<Tail>
  : [];

type UntypedParams<T> = T extends
  [infer Head extends string, ...infer Tail extends string[]]
  ? Head extends `${string}:${string}` ? UntypedParams<Tail>
  : [string, ...UntypedParams<Tail>]
  : [];

type ResolveParams<T> = TypedParams<T> extends [] ? UntypedParams<T>
  : TypedParams<T>;

/**
 * Positional handler parameters for a pattern.
 *
 * Typed placeholders win: when a pattern has any, untyped tokens are not
 * parameters.
 *
 * @example
 * PatternParams<"/user/<int:id>">           // [number]
 * PatternParams<"/item/<slug>">             // [string]
 * PatternParams<"/a/<float:p>/<slug>">      // [number]
 */
export type PatternParams<T extends string> = Extract<
  string extends T ? ParamValue[] : ResolveParams<Placeholders<T>>,
  ParamValue[]
>;
