import { encode, decode } from "@toon-format/toon";
import YAML from "yaml";
import { ConversionError, InvalidInputError } from "./errors.js";

// ─── Output format enum ─────────────────────────────────────────────

export const FORMATS = ["json", "yaml", "toon"] as const;
export type OutputFormat = (typeof FORMATS)[number];

/**
 * Text encoding used by the dump and add-from-blob leaves.
 * `decode` throws a ConversionError on malformed input.
 */
export interface Serializer {
  name: OutputFormat;
  encode(data: unknown): string;
  decode(text: string): unknown;
}

// ─── Serializers ─────────────────────────────────────────────────────

export const jsonSerializer: Serializer = {
  name: "json",
  encode: (data) => JSON.stringify(data, null, 2),
  decode: (text) => parseWith("json", () => JSON.parse(text)),
};

export const yamlSerializer: Serializer = {
  name: "yaml",
  encode: (data) => YAML.stringify(data).trimEnd(),
  decode: (text) => parseWith("yaml", () => YAML.parse(text)),
};

/** TOON: Token-Oriented Object Notation. */
export const toonSerializer: Serializer = {
  name: "toon",
  encode: (data) => encode(data),
  decode: (text) => parseWith("toon", () => decode(text)),
};

const SERIALIZERS: Record<OutputFormat, Serializer> = {
  json: jsonSerializer,
  yaml: yamlSerializer,
  toon: toonSerializer,
};

function isFormat(name: string): name is OutputFormat {
  return (FORMATS as readonly string[]).includes(name);
}

/**
 * Determine the serializer from the --format flag.
 * Default: json.
 */
export function resolveSerializer(format?: string): Serializer {
  if (format === undefined) return jsonSerializer;
  if (!isFormat(format)) {
    throw new InvalidInputError(
      `Invalid format '${format}'. Must be one of: ${FORMATS.join(", ")}`,
    );
  }
  return SERIALIZERS[format];
}

function parseWith(format: OutputFormat, parse: () => unknown): unknown {
  try {
    return parse();
  } catch (err) {
    throw new ConversionError(
      `invalid ${format}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}
