export {
  construct,
  createConstructor,
  type Constructor,
} from "./commands/construct.js";
export {
  expectArgs,
  findCommand,
  runCommand,
  type CommandNode,
  type FlagKind,
  type FlagSpec,
  type FlagValue,
  type LeafAction,
} from "./commands/tree.js";
export {
  DEFAULT_CONFIG,
  NOT_FOUND,
  formatPrintable,
  withConfig,
  type Config,
  type FieldNameConverter,
  type KeyValuePrinter,
  type Printable,
  type ValuePrinter,
} from "./core/config.js";
export { applyDefaults } from "./core/defaults.js";
export { hasTag, toLowerDashCase, type Tag } from "./core/names.js";
export { fromPlain, toPlain, zeroRecord, zeroValue } from "./core/plain.js";
export { parseScalar, readScalar, formatScalar } from "./core/scalar.js";
export {
  defineRecord,
  enumCodec,
  field,
  t,
  type FieldSchema,
  type RecordSchema,
  type Shape,
  type TextCodec,
} from "./core/schema.js";
export * from "./util/errors.js";
export {
  jsonSerializer,
  resolveSerializer,
  toonSerializer,
  yamlSerializer,
  type Serializer,
} from "./util/format.js";
export { toCommand } from "./util/cli-helpers.js";
