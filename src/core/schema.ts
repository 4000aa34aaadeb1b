import type { IntWidth } from "./constants.js";
import { ConversionError } from "../util/errors.js";

// ─── Text codecs ─────────────────────────────────────────────────────

/**
 * A marshal/unmarshal pair for a value with a symbolic text form.
 * `unmarshalText` throws on bad input; the error reaches the caller
 * unchanged.
 */
export interface TextCodec<T> {
  marshalText(value: T): string;
  unmarshalText(text: string): T;
  /** Value of a freshly constructed field. */
  zero?: T;
}

// ─── Shapes ──────────────────────────────────────────────────────────

export type ScalarKind = "bool" | "int" | "float" | "string";

export type ScalarShape =
  | { kind: "scalar"; scalar: "bool" }
  | { kind: "scalar"; scalar: "int"; width: IntWidth }
  | { kind: "scalar"; scalar: "float" }
  | { kind: "scalar"; scalar: "string" };

export interface TextShape {
  kind: "text";
  codec: TextCodec<unknown>;
}

export interface RecordShape {
  kind: "record";
  schema: RecordSchema | (() => RecordSchema);
  /**
   * A reference rather than an inline value: absent until assigned,
   * and the only way a schema may refer back to itself.
   */
  ref: boolean;
}

export interface ListShape {
  kind: "list";
  element: Shape;
}

export interface MapShape {
  kind: "map";
  key: Shape;
  value: Shape;
}

/** A type the builder has no handling for (functions, channels, ...). */
export interface OpaqueShape {
  kind: "opaque";
  typeName: string;
}

export type Shape =
  | ScalarShape
  | TextShape
  | RecordShape
  | ListShape
  | MapShape
  | OpaqueShape;

/** Shapes that read and write through the scalar codec. */
export type LeafShape = ScalarShape | TextShape;

// ─── Records ─────────────────────────────────────────────────────────

export interface FieldSchema {
  name: string;
  shape: Shape;
  /** Tag name → comma-separated tag values. */
  tags: Readonly<Record<string, string>>;
  /** Anonymous (embedded) field; never exposed as a command. */
  embedded: boolean;
  /** No `set` leaf is produced for a read-only field. */
  readonly: boolean;
  /** Custom default parser; takes precedence over the shape's own parsing. */
  parseDefault?: (text: string) => unknown;
}

export interface RecordSchema {
  name: string;
  fields: readonly FieldSchema[];
}

export interface FieldOptions {
  tags?: Record<string, string>;
  embedded?: boolean;
  readonly?: boolean;
  parseDefault?: (text: string) => unknown;
}

/** A field definition before it is given its name by `defineRecord`. */
export type FieldDef = Shape | { shape: Shape } & FieldOptions;

export const t = {
  bool: (): ScalarShape => ({ kind: "scalar", scalar: "bool" }),
  int: (width: IntWidth = "int64"): ScalarShape => ({
    kind: "scalar",
    scalar: "int",
    width,
  }),
  float: (): ScalarShape => ({ kind: "scalar", scalar: "float" }),
  string: (): ScalarShape => ({ kind: "scalar", scalar: "string" }),
  text: <T>(codec: TextCodec<T>): TextShape => ({ kind: "text", codec }),
  record: (schema: RecordSchema | (() => RecordSchema)): RecordShape => ({
    kind: "record",
    schema,
    ref: false,
  }),
  ref: (schema: RecordSchema | (() => RecordSchema)): RecordShape => ({
    kind: "record",
    schema,
    ref: true,
  }),
  list: (element: Shape): ListShape => ({ kind: "list", element }),
  map: (key: Shape, value: Shape): MapShape => ({ kind: "map", key, value }),
  opaque: (typeName: string): OpaqueShape => ({ kind: "opaque", typeName }),
};

/** Attach tags and flags to a shape. */
export function field(shape: Shape, options: FieldOptions = {}): FieldDef {
  return { shape, ...options };
}

/**
 * Declare a record schema. Field order is the key order of `fields`.
 * Names starting with "_" are unexported and never reach the builder.
 */
export function defineRecord(
  name: string,
  fields: Record<string, FieldDef>,
): RecordSchema {
  return {
    name,
    fields: Object.entries(fields).map(([fieldName, def]) => {
      if (!("shape" in def)) {
        return {
          name: fieldName,
          shape: def,
          tags: {},
          embedded: false,
          readonly: false,
        };
      }
      return {
        name: fieldName,
        shape: def.shape,
        tags: def.tags ?? {},
        embedded: def.embedded ?? false,
        readonly: def.readonly ?? false,
        parseDefault: def.parseDefault,
      };
    }),
  };
}

export function resolveSchema(shape: RecordShape): RecordSchema {
  return typeof shape.schema === "function" ? shape.schema() : shape.schema;
}

export function isExported(fieldSchema: FieldSchema): boolean {
  return !fieldSchema.name.startsWith("_");
}

export function isLeafShape(shape: Shape): shape is LeafShape {
  return shape.kind === "scalar" || shape.kind === "text";
}

export function describeShape(shape: Shape): string {
  switch (shape.kind) {
    case "scalar":
      return shape.scalar === "int" ? shape.width : shape.scalar;
    case "text":
      return "text";
    case "record":
      return "record";
    case "list":
      return `list of ${describeShape(shape.element)}`;
    case "map":
      return `map of ${describeShape(shape.key)} to ${describeShape(shape.value)}`;
    case "opaque":
      return shape.typeName;
  }
}

// ─── Enum codec ──────────────────────────────────────────────────────

/**
 * Codec for an enum stored as its ordinal. Marshals to the symbolic
 * name; unmarshalling an unknown name is a conversion error.
 */
export function enumCodec(
  typeName: string,
  names: readonly string[],
): TextCodec<number> {
  return {
    marshalText(value) {
      const name = names[value];
      if (name === undefined) {
        throw new ConversionError(`${typeName}: no name for ordinal ${value}`);
      }
      return name;
    },
    unmarshalText(text) {
      const idx = names.indexOf(text);
      if (idx < 0) {
        throw new EnumNameError(typeName, text, names);
      }
      return idx;
    },
    zero: 0,
  };
}

class EnumNameError extends ConversionError {
  constructor(typeName: string, given: string, names: readonly string[]) {
    super(
      `invalid ${typeName} '${given}'. Must be one of: ${names.join(", ")}`,
    );
    this.name = "EnumNameError";
  }
}
