import { fieldBinding, isRecordValue, type Binding } from "../core/binding.js";
import { classify } from "../core/classify.js";
import { DEFAULT_CONFIG, type Config } from "../core/config.js";
import { CATEGORY } from "../core/constants.js";
import { hasTag } from "../core/names.js";
import { isExported, type RecordSchema, type Shape } from "../core/schema.js";
import {
  InvalidInputError,
  UnsupportedKindError,
  wrapField,
} from "../util/errors.js";
import { makeDumpCommand } from "./dump.js";
import { makeListCommands } from "./list.js";
import { makeMapCommands } from "./map.js";
import { makeScalarCommands } from "./scalar.js";
import type { BuildContext, CommandNode } from "./tree.js";

export interface Constructor {
  /**
   * Build the command tree for `record`. Leaves hold live bindings into
   * `record`, so running one mutates the caller's object directly.
   * Either the whole tree is returned or an error is thrown.
   */
  construct(schema: RecordSchema, record: unknown): CommandNode[];
}

export function createConstructor(
  config: Readonly<Config> = DEFAULT_CONFIG,
): Constructor {
  return new TreeBuilder(config);
}

/** Build with a one-off constructor; `config` defaults to DEFAULT_CONFIG. */
export function construct(
  schema: RecordSchema,
  record: unknown,
  config: Readonly<Config> = DEFAULT_CONFIG,
): CommandNode[] {
  return createConstructor(config).construct(schema, record);
}

class TreeBuilder implements Constructor, BuildContext {
  /** Records on the path from the root to the one being built. */
  private readonly ancestors = new Set<object>();

  constructor(readonly config: Readonly<Config>) {}

  construct(schema: RecordSchema, record: unknown): CommandNode[] {
    if (!isRecordValue(record)) {
      throw new InvalidInputError(
        `expected a ${schema.name} record, got ${describeValue(record)}`,
      );
    }
    if (Object.isFrozen(record)) {
      throw new InvalidInputError(`${schema.name} record is frozen`);
    }
    return this.buildRecord(schema, record);
  }

  commandsFor(shape: Shape, binding: Binding): CommandNode[] {
    const classified = classify(shape, binding.get());
    switch (classified.category) {
      case "scalar":
      case "text":
        return makeScalarCommands(this, classified.shape, binding);
      case "record":
        return this.buildRecord(classified.schema, classified.value);
      case "list":
        return makeListCommands(this, classified.shape, binding);
      case "map":
        return makeMapCommands(this, classified.shape, binding);
    }
  }

  private buildRecord(schema: RecordSchema, record: object): CommandNode[] {
    if (this.ancestors.has(record)) {
      throw new UnsupportedKindError("record", `cycle through ${schema.name}`);
    }
    this.ancestors.add(record);
    try {
      return this.buildFields(schema, record);
    } finally {
      this.ancestors.delete(record);
    }
  }

  private buildFields(schema: RecordSchema, record: object): CommandNode[] {
    const { skipTag, usageTagName, fieldNameConverter } = this.config;
    const settable = !Object.isFrozen(record);
    const cmds: CommandNode[] = [];

    for (const f of schema.fields) {
      if (f.embedded || !isExported(f) || hasTag(f, skipTag)) continue;

      let children: CommandNode[];
      try {
        children = this.commandsFor(
          f.shape,
          fieldBinding(record, f.name, settable && !f.readonly),
        );
      } catch (err) {
        throw wrapField(f.name, err);
      }

      cmds.push({
        name: fieldNameConverter(f.name),
        usage: f.tags[usageTagName],
        category: CATEGORY.PROPERTIES,
        children,
      });
    }

    cmds.push(
      makeDumpCommand(this, { kind: "record", schema, ref: false }, () => record),
    );
    return cmds;
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Map) return "Map";
  return typeof value;
}
