import {
  describeShape,
  resolveSchema,
  type ListShape,
  type MapShape,
  type RecordSchema,
  type ScalarShape,
  type Shape,
  type TextShape,
} from "./schema.js";
import { isRecordValue } from "./binding.js";
import { UnsupportedKindError } from "../util/errors.js";

export type Classified =
  | { category: "scalar"; shape: ScalarShape }
  | { category: "text"; shape: TextShape }
  | { category: "record"; schema: RecordSchema; value: object }
  | { category: "list"; shape: ListShape }
  | { category: "map"; shape: MapShape };

/**
 * Reduce a declared shape and the value currently in its slot to one
 * category. A record only classifies when an object is present to bind
 * its fields to; collections classify when empty or absent.
 */
export function classify(shape: Shape, value: unknown): Classified {
  switch (shape.kind) {
    case "text":
      return { category: "text", shape };
    case "scalar":
      return { category: "scalar", shape };
    case "record":
      if (!isRecordValue(value)) {
        throw new UnsupportedKindError(
          "record",
          `no ${resolveSchema(shape).name} value to bind`,
        );
      }
      return { category: "record", schema: resolveSchema(shape), value };
    case "list":
      if (value !== undefined && value !== null && !Array.isArray(value)) {
        throw new UnsupportedKindError(describeShape(shape), "slot does not hold an array");
      }
      return { category: "list", shape };
    case "map":
      if (value !== undefined && value !== null && !(value instanceof Map)) {
        throw new UnsupportedKindError(describeShape(shape), "slot does not hold a Map");
      }
      return { category: "map", shape };
    case "opaque":
      throw new UnsupportedKindError(shape.typeName);
  }
}
