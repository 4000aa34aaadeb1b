import { toLowerDashCase, type Tag } from "./names.js";
import { formatScalar, type ScalarValue } from "./scalar.js";
import { jsonSerializer, type Serializer } from "../util/format.js";

/** Printed by a map `get` when the key is absent. */
export const NOT_FOUND: unique symbol = Symbol("not found");

export type Printable = ScalarValue | typeof NOT_FOUND;

export type ValuePrinter = (value: Printable) => void;
export type KeyValuePrinter = (key: Printable, value: Printable) => void;
export type FieldNameConverter = (fieldName: string) => string;

/** Policy for one builder. Never mutated once handed over. */
export interface Config {
  /** Fields carrying this tag are left out of the tree. */
  skipTag: Tag;
  /** Within a list of records, the field whose value names each element. */
  idTag: Tag;
  usageTagName: string;
  defaultTagName: string;
  fieldNameConverter: FieldNameConverter;
  valuePrinter: ValuePrinter;
  keyValuePrinter: KeyValuePrinter;
  /** Encoding for the dump leaf and the add-from-blob leaf. */
  serializer: Serializer;
}

export function formatPrintable(value: Printable): string {
  return value === NOT_FOUND ? "<not found>" : formatScalar(value);
}

export const DEFAULT_CONFIG: Readonly<Config> = Object.freeze({
  skipTag: Object.freeze({ name: "recli", value: "-" }),
  idTag: Object.freeze({ name: "recli", value: "id" }),
  usageTagName: "usage",
  defaultTagName: "default",
  fieldNameConverter: toLowerDashCase,
  valuePrinter: (value: Printable) => {
    process.stdout.write(formatPrintable(value) + "\n");
  },
  keyValuePrinter: (key: Printable, value: Printable) => {
    process.stdout.write(`${formatPrintable(key)} = ${formatPrintable(value)}\n`);
  },
  serializer: jsonSerializer,
});

/** A new frozen configuration: the defaults with `overrides` on top. */
export function withConfig(overrides: Partial<Config>): Readonly<Config> {
  return Object.freeze({ ...DEFAULT_CONFIG, ...overrides });
}
