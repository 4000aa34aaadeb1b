import {
  describeShape,
  isExported,
  isLeafShape,
  resolveSchema,
  type LeafShape,
  type RecordSchema,
  type Shape,
} from "./schema.js";
import { asList, asMap, isRecordValue } from "./binding.js";
import { formatScalar, parseScalar, readScalar, zeroScalar } from "./scalar.js";
import { INT_RANGE } from "./constants.js";
import {
  ConversionError,
  RecordTreeError,
  UnsupportedKindError,
  wrapField,
} from "../util/errors.js";

// ─── Zero values ─────────────────────────────────────────────────────

/**
 * Fresh value for a slot: scalars at their zero, inline records built
 * recursively, references absent, collections empty.
 */
export function zeroValue(shape: Shape): unknown {
  switch (shape.kind) {
    case "scalar":
    case "text":
      return zeroScalar(shape);
    case "record":
      return shape.ref ? undefined : zeroRecord(resolveSchema(shape));
    case "list":
      return [];
    case "map":
      return new Map();
    case "opaque":
      return undefined;
  }
}

export function zeroRecord(schema: RecordSchema): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const f of schema.fields) {
    record[f.name] = zeroValue(f.shape);
  }
  return record;
}

// ─── Live value → plain data ─────────────────────────────────────────

/**
 * Convert a live value into data a serializer can encode: maps become
 * objects keyed by the key's text, text codecs become their text, and
 * unexported fields are dropped. NaN and the infinities have no plain
 * form and are a conversion error.
 */
export function toPlain(shape: Shape, value: unknown): unknown {
  return plainOf(shape, value, new Set());
}

function plainOf(shape: Shape, value: unknown, ancestors: Set<object>): unknown {
  switch (shape.kind) {
    case "scalar":
    case "text": {
      if (value === undefined && zeroScalar(shape) === undefined) return null;
      const scalar = readScalar(shape, value);
      if (typeof scalar === "number" && !Number.isFinite(scalar)) {
        throw new ConversionError(`unsupported value: ${scalar}`);
      }
      return scalar;
    }

    case "record": {
      if (value === undefined || value === null) return null;
      if (!isRecordValue(value)) {
        throw new UnsupportedKindError("record", "slot does not hold an object");
      }
      const schema = resolveSchema(shape);
      if (ancestors.has(value)) {
        throw new UnsupportedKindError("record", `cycle through ${schema.name}`);
      }
      ancestors.add(value);
      const out: Record<string, unknown> = {};
      for (const f of schema.fields) {
        if (!isExported(f)) continue;
        try {
          out[f.name] = plainOf(f.shape, Reflect.get(value, f.name), ancestors);
        } catch (err) {
          throw wrapField(f.name, err);
        }
      }
      ancestors.delete(value);
      return out;
    }

    case "list":
      return asList(value).map((item) => plainOf(shape.element, item, ancestors));

    case "map": {
      const { key, value: valueShape } = shape;
      if (!isLeafShape(key)) {
        throw new UnsupportedKindError(describeShape(key), "map key");
      }
      const out: Record<string, unknown> = {};
      for (const [k, v] of asMap(value)) {
        out[formatScalar(readScalar(key, k))] = plainOf(valueShape, v, ancestors);
      }
      return out;
    }

    case "opaque":
      throw new UnsupportedKindError(shape.typeName);
  }
}

// ─── Plain data → live value ─────────────────────────────────────────

/**
 * Validate decoded data against a shape and build the live value.
 * Missing record fields keep their zero value; unknown keys are ignored.
 */
export function fromPlain(shape: Shape, data: unknown): unknown {
  switch (shape.kind) {
    case "scalar":
    case "text":
      return leafFromPlain(shape, data);

    case "record": {
      if (data === null || data === undefined) {
        if (shape.ref) return undefined;
        throw mismatch(shape, data);
      }
      if (!isRecordValue(data)) throw mismatch(shape, data);
      const schema = resolveSchema(shape);
      const record = zeroRecord(schema);
      for (const f of schema.fields) {
        if (!isExported(f) || !Object.hasOwn(data, f.name)) continue;
        try {
          record[f.name] = fromPlain(f.shape, Reflect.get(data, f.name));
        } catch (err) {
          throw wrapField(f.name, err);
        }
      }
      return record;
    }

    case "list":
      if (data === null || data === undefined) return [];
      if (!Array.isArray(data)) throw mismatch(shape, data);
      return data.map((item, idx) => {
        try {
          return fromPlain(shape.element, item);
        } catch (err) {
          throw wrapField(String(idx), err);
        }
      });

    case "map": {
      const { key, value } = shape;
      if (!isLeafShape(key)) {
        throw new UnsupportedKindError(describeShape(key), "map key");
      }
      const map = new Map<unknown, unknown>();
      if (data === null || data === undefined) return map;
      if (!isRecordValue(data)) throw mismatch(shape, data);
      for (const [k, v] of Object.entries(data)) {
        try {
          map.set(parseScalar(key, k), fromPlain(value, v));
        } catch (err) {
          throw wrapField(k, err);
        }
      }
      return map;
    }

    case "opaque":
      throw new UnsupportedKindError(shape.typeName);
  }
}

function leafFromPlain(shape: LeafShape, data: unknown): unknown {
  if (shape.kind === "text") {
    if (typeof data !== "string") throw mismatch(shape, data);
    return shape.codec.unmarshalText(data);
  }
  switch (shape.scalar) {
    case "bool":
      if (typeof data === "boolean") return data;
      break;
    case "int":
      if (typeof data === "number" && Number.isInteger(data)) {
        const range = INT_RANGE[shape.width];
        if (BigInt(data) < range.min || BigInt(data) > range.max) {
          throw new ConversionError(`value overflows ${shape.width}: ${data}`);
        }
        return data;
      }
      break;
    case "float":
      if (typeof data === "number") return data;
      break;
    case "string":
      if (typeof data === "string") return data;
      break;
  }
  throw mismatch(shape, data);
}

function mismatch(shape: Shape, data: unknown): RecordTreeError {
  const got = data === null ? "null" : Array.isArray(data) ? "array" : typeof data;
  return new ConversionError(`expected ${describeShape(shape)}, got ${got}`);
}
