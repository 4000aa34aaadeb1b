import { INT_RANGE, type IntWidth } from "./constants.js";
import type { Binding } from "./binding.js";
import type { LeafShape, ScalarShape } from "./schema.js";
import { ConversionError } from "../util/errors.js";

/** A scalar as handed to the printers. */
export type ScalarValue = string | number | boolean;

const TRUE_LITERALS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_LITERALS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

const DECIMAL_FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT = /^([+-]?(inf|infinity)|nan)$/i;

// ─── Reading ─────────────────────────────────────────────────────────

/** Value a never-assigned slot of this shape reads as. */
export function zeroScalar(shape: LeafShape): unknown {
  if (shape.kind === "text") return shape.codec.zero;
  switch (shape.scalar) {
    case "bool":
      return false;
    case "int":
    case "float":
      return 0;
    case "string":
      return "";
  }
}

/**
 * Read a slot for printing. Text codecs marshal to their symbolic form;
 * raw scalars come back typed.
 */
export function readScalar(shape: LeafShape, value: unknown): ScalarValue {
  const current = value === undefined ? zeroScalar(shape) : value;

  if (shape.kind === "text") {
    return shape.codec.marshalText(current);
  }

  switch (shape.scalar) {
    case "bool":
      if (typeof current === "boolean") return current;
      break;
    case "int":
    case "float":
      if (typeof current === "number") return current;
      break;
    case "string":
      if (typeof current === "string") return current;
      break;
  }
  throw new ConversionError(
    `slot holds ${typeof current}, expected ${shape.scalar}`,
  );
}

export function formatScalar(value: ScalarValue): string {
  return String(value);
}

// ─── Parsing ─────────────────────────────────────────────────────────

/**
 * Parse text into a value for the given shape.
 * Text codecs unmarshal and their errors propagate unchanged.
 */
export function parseScalar(shape: LeafShape, text: string): unknown {
  if (shape.kind === "text") {
    return shape.codec.unmarshalText(text);
  }
  return parseRaw(shape, text);
}

function parseRaw(shape: ScalarShape, text: string): ScalarValue {
  switch (shape.scalar) {
    case "bool":
      return parseBool(text);
    case "int":
      return parseInteger(text, shape.width);
    case "float":
      return parseFloat64(text);
    case "string":
      return text;
  }
}

export function parseBool(text: string): boolean {
  if (TRUE_LITERALS.has(text)) return true;
  if (FALSE_LITERALS.has(text)) return false;
  throw new ConversionError(`invalid boolean '${text}'`);
}

/**
 * Integer literal with an optional sign and base prefix:
 * 0x/0X hex, 0o/0O octal, 0b/0B binary, a bare leading 0 octal,
 * otherwise decimal. A single underscore may separate digits, or follow
 * the prefix.
 */
export function parseInteger(text: string, width: IntWidth): number {
  let body = text;
  let negative = false;
  if (body.startsWith("+") || body.startsWith("-")) {
    negative = body[0] === "-";
    body = body.slice(1);
  }

  let radix = 10;
  let prefixed = false;
  if (body.length >= 3 && body[0] === "0" && /[xXoObB]/.test(body[1])) {
    const p = body[1].toLowerCase();
    radix = p === "x" ? 16 : p === "o" ? 8 : 2;
    body = body.slice(2);
    prefixed = true;
  } else if (body === "0") {
    return 0;
  } else if (body[0] === "0") {
    radix = 8;
    body = body.slice(1);
    prefixed = true;
  }

  const digits = prefixed ? body.replace(/^_/, "") : body;
  if (!validDigits(digits, radix)) {
    throw new ConversionError(`invalid integer '${text}'`);
  }

  let magnitude = 0n;
  for (const ch of digits.replace(/_/g, "")) {
    magnitude = magnitude * BigInt(radix) + BigInt(parseInt(ch, radix));
  }
  const value = negative ? -magnitude : magnitude;

  const range = INT_RANGE[width];
  if (value < range.min || value > range.max) {
    throw new ConversionError(`value overflows ${width}: ${text}`);
  }
  return Number(value);
}

function validDigits(digits: string, radix: number): boolean {
  const set = "0123456789abcdef".slice(0, radix);
  return digits.toLowerCase().split("_").every(
    (g) => g.length > 0 && [...g].every((ch) => set.includes(ch)),
  );
}

/** Decimal or exponential notation, plus Inf/Infinity/NaN in any case. */
export function parseFloat64(text: string): number {
  if (DECIMAL_FLOAT.test(text)) {
    const value = Number(text);
    if (!Number.isFinite(value)) {
      throw new ConversionError(`value out of range: ${text}`);
    }
    return value;
  }
  if (SPECIAL_FLOAT.test(text)) {
    const lower = text.toLowerCase();
    if (lower === "nan") return NaN;
    return lower.startsWith("-") ? -Infinity : Infinity;
  }
  throw new ConversionError(`invalid float '${text}'`);
}

// ─── Writing ─────────────────────────────────────────────────────────

/** Parse then assign; a failed parse leaves the slot untouched. */
export function writeScalar(shape: LeafShape, binding: Binding, text: string): void {
  const value = parseScalar(shape, text);
  binding.set(value);
}
