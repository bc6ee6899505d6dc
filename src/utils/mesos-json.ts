import { isInteger, parse, stringify } from "lossless-json";

/**
 * JSON codec for Mesos documents. Time values are int64 nanoseconds, which
 * do not survive a round trip through a double, so every integer is decoded
 * as a bigint and written back digit for digit.
 */

function parseMesosNumber(value: string): bigint | number {
  return isInteger(value) ? BigInt(value) : Number(value);
}

export function parseMesosJson(text: string): unknown {
  return parse(text, null, parseMesosNumber);
}

export function stringifyMesosJson(value: unknown, space?: number): string {
  const text = stringify(value, undefined, space);
  if (text === undefined) {
    throw new TypeError("Value cannot be serialized as JSON");
  }
  return text;
}
