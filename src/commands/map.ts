import { asMap, type Binding } from "../core/binding.js";
import { NOT_FOUND } from "../core/config.js";
import { CATEGORY } from "../core/constants.js";
import { parseScalar, readScalar } from "../core/scalar.js";
import { describeShape, isLeafShape, type MapShape } from "../core/schema.js";
import { UnsupportedKindError } from "../util/errors.js";
import { expectArgs, type BuildContext, type CommandNode } from "./tree.js";

/**
 * Commands for a map field. Keys and values must both be scalars;
 * `dump` prints entries in the map's own iteration order.
 */
export function makeMapCommands(
  ctx: BuildContext,
  shape: MapShape,
  binding: Binding,
): CommandNode[] {
  const { key: keyShape, value: valueShape } = shape;
  if (!isLeafShape(keyShape)) {
    throw new UnsupportedKindError(describeShape(keyShape), "map key");
  }
  if (!isLeafShape(valueShape)) {
    throw new UnsupportedKindError(describeShape(valueShape), "map value");
  }

  const cmds: CommandNode[] = [
    {
      name: "dump",
      usage: "Dump all keys and their values",
      category: CATEGORY.ACTIONS,
      children: [],
      action: expectArgs(0, () => {
        for (const [k, v] of asMap(binding.get())) {
          ctx.config.keyValuePrinter(
            readScalar(keyShape, k),
            readScalar(valueShape, v),
          );
        }
      }),
    },
    {
      name: "get",
      usage: "Get the value of a given key",
      argsUsage: "[key]",
      category: CATEGORY.ACTIONS,
      children: [],
      action: expectArgs(1, ([keyText]) => {
        const entries = asMap(binding.get());
        const key = parseScalar(keyShape, keyText);
        ctx.config.valuePrinter(
          entries.has(key) ? readScalar(valueShape, entries.get(key)) : NOT_FOUND,
        );
      }),
    },
  ];

  if (!binding.settable) return cmds;

  cmds.push(
    {
      name: "set",
      usage: "Set the key to the given value",
      argsUsage: "[key] [value]",
      category: CATEGORY.ACTIONS,
      children: [],
      action: expectArgs(2, ([keyText, valueText]) => {
        const key = parseScalar(keyShape, keyText);
        const value = parseScalar(valueShape, valueText);
        const entries = asMap(binding.get());
        entries.set(key, value);
        binding.set(entries);
      }),
    },
    {
      name: "unset",
      usage: "Remove the key from the map",
      argsUsage: "[key]",
      category: CATEGORY.ACTIONS,
      children: [],
      action: expectArgs(1, ([keyText]) => {
        const key = parseScalar(keyShape, keyText);
        const entries = asMap(binding.get());
        entries.delete(key);
        binding.set(entries);
      }),
    },
  );

  return cmds;
}
