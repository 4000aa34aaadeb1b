import { CATEGORY } from "../core/constants.js";
import { toPlain } from "../core/plain.js";
import type { Shape } from "../core/schema.js";
import { expectArgs, type BuildContext, type CommandNode } from "./tree.js";

/** `dump-<format>`: serialize the whole value and print it. */
export function makeDumpCommand(
  ctx: BuildContext,
  shape: Shape,
  read: () => unknown,
): CommandNode {
  const { serializer } = ctx.config;
  return {
    name: `dump-${serializer.name}`,
    usage: `Dump item as ${serializer.name}`,
    category: CATEGORY.ACTIONS,
    children: [],
    action: expectArgs(0, () => {
      ctx.config.valuePrinter(serializer.encode(toPlain(shape, read())));
    }),
  };
}
