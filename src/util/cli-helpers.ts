import { Command, InvalidArgumentError, Option } from "commander";
import { parseFloat64, parseInteger } from "../core/scalar.js";
import { ConversionError, RecordTreeError } from "./errors.js";
import type {
  CommandNode,
  FlagSpec,
  FlagValue,
} from "../commands/tree.js";

/**
 * Handle errors uniformly: RecordTreeError → stderr + exit with code.
 * Unknown errors → re-throw.
 */
export function handleError(err: unknown): never {
  if (err instanceof RecordTreeError) {
    process.stderr.write(`Error: ${err.message}\n`);
    process.exit(err.exitCode);
  }
  throw err;
}

// ─── Flag value parsers ──────────────────────────────────────────────

/**
 * Numeric flags are checked with the scalar codec but keep their text,
 * so the field's own width and base rules apply when the leaf parses it.
 */
function checkedArg(parse: (value: string) => unknown) {
  return (value: string): string => {
    try {
      parse(value);
    } catch (err) {
      if (err instanceof ConversionError) {
        throw new InvalidArgumentError(`${err.message}.`);
      }
      throw err;
    }
    return value;
  };
}

export const parseIntegerArg = checkedArg((value) => parseInteger(value, "int64"));

export const parseFloatArg = checkedArg(parseFloat64);

function collect<T>(parse: (value: string) => T) {
  return (value: string, previous: T[] | undefined): T[] => [
    ...(previous ?? []),
    parse(value),
  ];
}

function toOption(flag: FlagSpec): Option {
  const long = `--${flag.name}`;
  switch (flag.kind) {
    case "bool":
      return new Option(long, flag.usage);
    case "string":
      return new Option(`${long} <value>`, flag.usage);
    case "int":
      return new Option(`${long} <n>`, flag.usage).argParser(parseIntegerArg);
    case "float":
      return new Option(`${long} <n>`, flag.usage).argParser(parseFloatArg);
    case "string-list":
      return new Option(`${long} <value>`, `${flag.usage} (repeatable)`.trim())
        .argParser(collect((v) => v));
    case "int-list":
      return new Option(`${long} <n>`, `${flag.usage} (repeatable)`.trim())
        .argParser(collect(parseIntegerArg));
    case "float-list":
      return new Option(`${long} <n>`, `${flag.usage} (repeatable)`.trim())
        .argParser(collect(parseFloatArg));
  }
}

function isFlagValue(value: unknown): value is FlagValue {
  if (Array.isArray(value)) {
    return value.every((v) => typeof v === "string" || typeof v === "number");
  }
  return (
    typeof value === "boolean" ||
    typeof value === "string" ||
    typeof value === "number"
  );
}

/** Flags the operator set on `cmd`, keyed by flag name. */
function collectFlags(
  cmd: Command,
  options: Array<{ flag: FlagSpec; option: Option }>,
): Map<string, FlagValue> {
  const flags = new Map<string, FlagValue>();
  for (const { flag, option } of options) {
    const value: unknown = cmd.getOptionValue(option.attributeName());
    if (value !== undefined && isFlagValue(value)) {
      flags.set(flag.name, value);
    }
  }
  return flags;
}

// ─── Tree → commander ────────────────────────────────────────────────

/**
 * Turn a command node into a commander Command. Categories become help
 * groups; a leaf takes its positional arguments variadically and checks
 * their count itself.
 *
 * Errors from a leaf go to `onError`, which defaults to handleError.
 */
export function toCommand(
  node: CommandNode,
  onError: (err: unknown) => void = handleError,
): Command {
  const cmd = new Command(node.name);
  if (node.usage) cmd.description(node.usage);
  if (node.category) cmd.helpGroup(node.category);

  for (const child of node.children) {
    cmd.addCommand(toCommand(child, onError));
  }

  const action = node.action;
  if (!action) return cmd;

  const options = (node.flags ?? []).map((flag) => ({
    flag,
    option: toOption(flag),
  }));
  for (const { option } of options) {
    cmd.addOption(option);
  }
  if (node.argsUsage) cmd.usage(node.argsUsage);
  cmd.argument("[args...]");

  cmd.action((args: string[], _opts: unknown, self: Command) => {
    try {
      action(args, collectFlags(self, options));
    } catch (err) {
      onError(err);
    }
  });

  return cmd;
}
