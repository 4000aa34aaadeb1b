import {
  asList,
  elementBinding,
  isRecordValue,
  type Binding,
} from "../core/binding.js";
import { CATEGORY } from "../core/constants.js";
import { applyDefaults } from "../core/defaults.js";
import { hasTag } from "../core/names.js";
import { fromPlain, zeroRecord } from "../core/plain.js";
import { formatScalar, parseScalar, readScalar } from "../core/scalar.js";
import {
  describeShape,
  isExported,
  isLeafShape,
  resolveSchema,
  type LeafShape,
  type ListShape,
  type RecordSchema,
  type Shape,
} from "../core/schema.js";
import {
  ConversionError,
  NoPropertiesError,
  UnsupportedKindError,
  wrapField,
} from "../util/errors.js";
import {
  expectArgs,
  type BuildContext,
  type CommandNode,
  type FlagKind,
  type FlagSpec,
  type FlagValue,
} from "./tree.js";

/** Maps an element's position to the name its command node goes by. */
type Keyer = (index: number) => string;

/**
 * Commands for a list field: one node per element (its own commands plus
 * `delete`), then `list` and the add leaves.
 *
 * Scalar elements get `add <value>`. Record elements get `add` driven by
 * flags, and `add-<format>` that decodes one element from text.
 */
export function makeListCommands(
  ctx: BuildContext,
  shape: ListShape,
  binding: Binding,
): CommandNode[] {
  const { element } = shape;
  if (!isLeafShape(element) && element.kind !== "record") {
    throw new UnsupportedKindError(describeShape(element), "list element");
  }

  const keyer = makeKeyer(ctx, element, binding);
  const cmds = makeItemCommands(ctx, element, binding, keyer);

  cmds.push({
    name: "list",
    usage: "List item keys in the collection",
    category: CATEGORY.ACTIONS,
    children: [],
    action: expectArgs(0, () => {
      const count = asList(binding.get()).length;
      for (let idx = 0; idx < count; idx++) {
        ctx.config.valuePrinter(keyer(idx));
      }
    }),
  });

  if (!binding.settable) return cmds;

  if (isLeafShape(element)) {
    cmds.push({
      name: "add",
      usage: "Add a new item to collection",
      argsUsage: "[value]",
      category: CATEGORY.ACTIONS,
      children: [],
      action: expectArgs(1, ([text]) => {
        append(binding, parseScalar(element, text));
      }),
    });
  } else {
    cmds.push(...makeRecordBuilders(ctx, resolveSchema(element), element, binding));
  }

  return cmds;
}

// ─── Keys ────────────────────────────────────────────────────────────

/**
 * Elements are keyed by position, unless they are records with exactly
 * one field carrying the id tag, in which case that field's text is the key.
 */
function makeKeyer(ctx: BuildContext, element: Shape, binding: Binding): Keyer {
  const byIndex: Keyer = (idx) => String(idx);
  if (element.kind !== "record") return byIndex;

  const schema = resolveSchema(element);
  const idFields = schema.fields.filter(
    (f) => isExported(f) && hasTag(f, ctx.config.idTag),
  );
  if (idFields.length !== 1) return byIndex;

  const [idField] = idFields;
  const idShape = idField.shape;
  if (!isLeafShape(idShape)) {
    throw new UnsupportedKindError(
      describeShape(idShape),
      `id field ${idField.name} must be a scalar`,
    );
  }

  return (idx) => {
    const item = asList(binding.get())[idx];
    if (!isRecordValue(item)) {
      throw new UnsupportedKindError("record", `no ${schema.name} at index ${idx}`);
    }
    return formatScalar(readScalar(idShape, Reflect.get(item, idField.name)));
  };
}

function makeItemCommands(
  ctx: BuildContext,
  element: Shape,
  binding: Binding,
  keyer: Keyer,
): CommandNode[] {
  const count = asList(binding.get()).length;
  const nodes: CommandNode[] = [];

  for (let idx = 0; idx < count; idx++) {
    const key = keyer(idx);
    let children: CommandNode[];
    try {
      children = ctx.commandsFor(element, elementBinding(binding, idx));
    } catch (err) {
      throw wrapField(key, err);
    }

    if (binding.settable) {
      children.push({
        name: "delete",
        usage: `Delete item represented by key "${key}" from the collection`,
        category: CATEGORY.ACTIONS,
        children: [],
        action: expectArgs(0, () => {
          const items = asList(binding.get());
          items.splice(idx, 1);
          binding.set(items);
        }),
      });
    }

    nodes.push({ name: key, category: CATEGORY.ITEMS, children });
  }

  return nodes;
}

function append(binding: Binding, value: unknown): void {
  const items = asList(binding.get());
  items.push(value);
  binding.set(items);
}

// ─── Record element builders ─────────────────────────────────────────

function makeRecordBuilders(
  ctx: BuildContext,
  schema: RecordSchema,
  element: Shape,
  binding: Binding,
): CommandNode[] {
  const { config } = ctx;
  const flagFields = schema.fields
    .filter((f) => isExported(f) && !f.embedded && !hasTag(f, config.skipTag))
    .flatMap((f) => {
      const kind = flagKindFor(f.shape);
      if (!kind) return [];
      const defaultText = f.tags[config.defaultTagName];
      const spec: FlagSpec = {
        name: config.fieldNameConverter(f.name),
        kind,
        usage: defaultText ? `default value: ${defaultText}` : "",
      };
      return [{ field: f, spec }];
    });

  return [
    {
      name: "add",
      usage: "Add a new item to collection",
      argsUsage: "--attribute=value",
      category: CATEGORY.ACTIONS,
      flags: flagFields.map((ff) => ff.spec),
      children: [],
      action: expectArgs(0, (_args, flags) => {
        if (flags.size === 0) {
          throw new NoPropertiesError();
        }

        const item = zeroRecord(schema);
        applyDefaults(schema, item, config.defaultTagName);

        for (const { field, spec } of flagFields) {
          const value = flags.get(spec.name);
          if (value === undefined) continue;
          try {
            item[field.name] = valueFromFlag(field.shape, value);
          } catch (err) {
            throw wrapField(field.name, err);
          }
        }

        append(binding, item);
      }),
    },
    {
      name: `add-${config.serializer.name}`,
      usage: `Add a new item to collection deserialised from ${config.serializer.name}`,
      argsUsage: "[value]",
      category: CATEGORY.ACTIONS,
      children: [],
      action: expectArgs(1, ([text]) => {
        append(binding, fromPlain(element, config.serializer.decode(text)));
      }),
    },
  ];
}

/** Flag type for a field, or undefined when the field takes no flag. */
function flagKindFor(shape: Shape): FlagKind | undefined {
  if (shape.kind === "text") return "string";
  if (shape.kind === "scalar") {
    return shape.scalar;
  }
  if (shape.kind === "list" && isLeafShape(shape.element)) {
    const el = shape.element;
    if (el.kind === "scalar" && el.scalar === "int") return "int-list";
    if (el.kind === "scalar" && el.scalar === "float") return "float-list";
    return "string-list";
  }
  return undefined;
}

/** Route a parsed flag value through the scalar codec so width checks apply. */
function valueFromFlag(shape: Shape, value: FlagValue): unknown {
  if (isLeafShape(shape) && !Array.isArray(value)) {
    return parseScalar(shape, String(value));
  }
  if (shape.kind === "list" && isLeafShape(shape.element) && Array.isArray(value)) {
    const element: LeafShape = shape.element;
    const values: (string | number)[] = value;
    return values.map((v) => parseScalar(element, String(v)));
  }
  throw new ConversionError(`flag value does not fit ${describeShape(shape)}`);
}
