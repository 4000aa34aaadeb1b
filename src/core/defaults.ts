import {
  describeShape,
  isExported,
  isLeafShape,
  resolveSchema,
  type FieldSchema,
  type RecordSchema,
} from "./schema.js";
import { isRecordValue } from "./binding.js";
import { parseScalar } from "./scalar.js";
import { LIST_SEPARATOR } from "./constants.js";
import { UnsupportedKindError, wrapField } from "../util/errors.js";

/**
 * Apply tag-declared defaults across a record graph, depth-first.
 *
 * Nested records are descended into before the default tag is looked at,
 * since only leaf-shaped fields declare defaults. Every record object is
 * visited once: a record already in `visited` (shared, or an ancestor
 * reached again through a reference) is skipped, so each default is
 * applied exactly once per object.
 *
 * A field carrying a default is overwritten whatever it held; fields
 * without one are left alone.
 */
export function applyDefaults(
  schema: RecordSchema,
  record: object,
  defaultTagName: string,
  visited: Set<object> = new Set(),
): void {
  if (visited.has(record)) return;
  visited.add(record);

  for (const f of schema.fields) {
    if (!isExported(f)) continue;
    try {
      applyFieldDefault(f, record, defaultTagName, visited);
    } catch (err) {
      throw wrapField(f.name, err);
    }
  }
}

function applyFieldDefault(
  f: FieldSchema,
  record: object,
  defaultTagName: string,
  visited: Set<object>,
): void {
  const { shape } = f;

  if (shape.kind === "record") {
    const nested: unknown = Reflect.get(record, f.name);
    if (isRecordValue(nested)) {
      applyDefaults(resolveSchema(shape), nested, defaultTagName, visited);
      return;
    }
  }

  const text = f.tags[defaultTagName];
  if (text === undefined || text === "") return;

  if (f.parseDefault) {
    Reflect.set(record, f.name, f.parseDefault(text));
    return;
  }

  if (isLeafShape(shape)) {
    Reflect.set(record, f.name, parseScalar(shape, text));
    return;
  }

  if (shape.kind === "list" && isLeafShape(shape.element)) {
    const element = shape.element;
    Reflect.set(
      record,
      f.name,
      text.split(LIST_SEPARATOR).map((part) => parseScalar(element, part)),
    );
    return;
  }

  throw new UnsupportedKindError(describeShape(shape), "cannot take a default");
}
