import type { Binding } from "../core/binding.js";
import { CATEGORY } from "../core/constants.js";
import { readScalar, writeScalar } from "../core/scalar.js";
import type { LeafShape } from "../core/schema.js";
import { expectArgs, type BuildContext, type CommandNode } from "./tree.js";

/** `get`, and `set <value>` when the slot can be written. */
export function makeScalarCommands(
  ctx: BuildContext,
  shape: LeafShape,
  binding: Binding,
): CommandNode[] {
  const cmds: CommandNode[] = [
    {
      name: "get",
      usage: "Get the value",
      category: CATEGORY.ACTIONS,
      children: [],
      action: expectArgs(0, () => {
        ctx.config.valuePrinter(readScalar(shape, binding.get()));
      }),
    },
  ];

  if (binding.settable) {
    cmds.push({
      name: "set",
      usage: "Set the value",
      argsUsage: "[value]",
      category: CATEGORY.ACTIONS,
      children: [],
      action: expectArgs(1, ([text]) => {
        writeScalar(shape, binding, text);
      }),
    });
  }

  return cmds;
}
