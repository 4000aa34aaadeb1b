import type { Binding } from "../core/binding.js";
import type { Category } from "../core/constants.js";
import type { Config } from "../core/config.js";
import type { Shape } from "../core/schema.js";
import { InvalidInputError, WrongArityError } from "../util/errors.js";

// ─── Types ───────────────────────────────────────────────────────────

export type FlagKind =
  | "bool"
  | "string"
  | "int"
  | "float"
  | "string-list"
  | "int-list"
  | "float-list";

/**
 * A flag a leaf declares. Numeric flags may reach the leaf as text;
 * the leaf parses them with the field's codec.
 */
export interface FlagSpec {
  name: string;
  kind: FlagKind;
  usage: string;
}

export type FlagValue = boolean | string | number | string[] | number[];

/**
 * Runs a leaf. `args` are the positional arguments; `flags` holds only
 * the flags the operator set, keyed by flag name.
 */
export type LeafAction = (
  args: string[],
  flags: ReadonlyMap<string, FlagValue>,
) => void;

/**
 * One node of the command tree. Grouping nodes have children only;
 * leaves have an action and no children.
 */
export interface CommandNode {
  name: string;
  usage?: string;
  /** Shown after the command name in help, e.g. "[key] [value]". */
  argsUsage?: string;
  category?: Category;
  flags?: FlagSpec[];
  children: CommandNode[];
  action?: LeafAction;
}

/**
 * What the sub-builders need from the tree builder: its configuration,
 * and recursion back into it for structured elements.
 */
export interface BuildContext {
  readonly config: Readonly<Config>;
  commandsFor(shape: Shape, binding: Binding): CommandNode[];
}

// ─── Helpers ─────────────────────────────────────────────────────────

/** Wrap a leaf so it runs only with exactly `n` positional arguments. */
export function expectArgs(n: number, action: LeafAction): LeafAction {
  return (args, flags) => {
    if (args.length !== n) {
      throw new WrongArityError(n, args.length);
    }
    action(args, flags);
  };
}

/**
 * Walk a path of command names from the top of a tree.
 * Siblings sharing a name resolve to the last one.
 */
export function findCommand(
  nodes: CommandNode[],
  path: string[],
): CommandNode | undefined {
  let level = nodes;
  let found: CommandNode | undefined;
  for (const name of path) {
    found = level.findLast((n) => n.name === name);
    if (!found) return undefined;
    level = found.children;
  }
  return found;
}

/**
 * Invoke the leaf at `path`. Throws when the path does not end at a leaf.
 */
export function runCommand(
  nodes: CommandNode[],
  path: string[],
  args: string[] = [],
  flags: ReadonlyMap<string, FlagValue> = new Map(),
): void {
  const node = findCommand(nodes, path);
  if (!node?.action) {
    throw new InvalidInputError(`No command at '${path.join(" ")}'`);
  }
  node.action(args, flags);
}
