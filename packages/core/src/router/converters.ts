/**
 * Converter registry: the fixed set of placeholder kinds a pattern may use.
 */

import { ConversionError, UnknownConverterKindError } from "~/errors/mod.ts";
import type { ConverterKind, ConverterValues } from "~/router/types.ts";

export interface Converter<K extends ConverterKind = ConverterKind> {
  readonly name: K;
  /** Regex fragment without anchors or capture groups. */
  readonly regex: string;
  convert(raw: string): ConverterValues[K];
}

function anchored(fragment: string): RegExp {
  return new RegExp(`^(?:${fragment})$`);
}

const INT_REGEX = "\\d+";
const STRING_REGEX = "[^/]+";
const FLOAT_REGEX = "\\d+\\.\\d+";

const INT_FULL = anchored(INT_REGEX);
const STRING_FULL = anchored(STRING_REGEX);
const FLOAT_FULL = anchored(FLOAT_REGEX);

export const intConverter: Converter<"int"> = {
  name: "int",
  regex: INT_REGEX,
  convert(raw: string): number {
    if (!INT_FULL.test(raw)) {
      throw new ConversionError("int", raw);
    }
    const value = Number(raw);
    if (!Number.isSafeInteger(value)) {
      throw new ConversionError("int", raw, "exceeds the safe integer range");
    }
    return value;
  },
};

export const stringConverter: Converter<"string"> = {
  name: "string",
  regex: STRING_REGEX,
  convert(raw: string): string {
    if (!STRING_FULL.test(raw)) {
      throw new ConversionError("string", raw);
    }
    return raw;
  },
};

export const floatConverter: Converter<"float"> = {
  name: "float",
  regex: FLOAT_REGEX,
  convert(raw: string): number {
    if (!FLOAT_FULL.test(raw)) {
      throw new ConversionError("float", raw);
    }
    return Number.parseFloat(raw);
  },
};

const CONVERTERS: { readonly [K in ConverterKind]: Converter<K> } = Object
  .freeze({
    int: intConverter,
    string: stringConverter,
    float: floatConverter,
  });

export function isConverterKind(name: string): name is ConverterKind {
  return Object.hasOwn(CONVERTERS, name);
}

export function lookupConverter(name: string): Converter {
  if (!isConverterKind(name)) {
    throw new UnknownConverterKindError(name);
  }
  return CONVERTERS[name];
}
