import type { FieldSchema } from "./schema.js";
import { LIST_SEPARATOR } from "./constants.js";

/** A tag role: the field must list `value` under tag `name`. */
export interface Tag {
  name: string;
  value: string;
}

/** True when the comma-separated values under `tag.name` include `tag.value`. */
export function hasTag(fieldSchema: FieldSchema, tag: Tag): boolean {
  const raw = fieldSchema.tags[tag.name];
  if (raw === undefined) return false;
  return raw.split(LIST_SEPARATOR).includes(tag.value);
}

/**
 * Convert a field name to a command name: lowercase words joined by "-".
 * A capital directly after another capital continues the same word, and
 * a capital in final position is treated as a unit suffix with no dash.
 *
 *   listenAddress → listen-address
 *   TimeoutS      → timeouts
 *   URL           → url
 */
export function toLowerDashCase(name: string): string {
  const chars = [...name];
  let out = "";
  let previousUpper = false;
  chars.forEach((ch, i) => {
    const upper = isUpper(ch);
    if (i === 0) {
      out += ch.toLowerCase();
    } else if (upper) {
      if (!previousUpper && i !== chars.length - 1) {
        out += "-";
      }
      out += ch.toLowerCase();
    } else {
      out += ch;
    }
    previousUpper = upper;
  });
  return out;
}

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}
