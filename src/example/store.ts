import { readFile, writeFile } from "node:fs/promises";
import YAML from "yaml";
import { applyDefaults } from "../core/defaults.js";
import { fromPlain, toPlain, zeroRecord } from "../core/plain.js";
import { t, type RecordSchema } from "../core/schema.js";
import { isRecordValue } from "../core/binding.js";
import { FilesystemError } from "../util/errors.js";

/**
 * Load a record from a YAML file. A missing file yields a fresh record
 * with its defaults applied; anything else unreadable is a FilesystemError.
 */
export async function loadRecord(
  filePath: string,
  schema: RecordSchema,
  defaultTagName: string,
): Promise<object> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      const fresh = zeroRecord(schema);
      applyDefaults(schema, fresh, defaultTagName);
      return fresh;
    }
    throw new FilesystemError(
      `Cannot read '${filePath}': ${(err as Error).message}`,
    );
  }

  const parsed: unknown = YAML.parse(raw) ?? {};
  const record = fromPlain(t.record(schema), parsed);
  if (!isRecordValue(record)) {
    throw new FilesystemError(`'${filePath}' does not hold a ${schema.name}`);
  }
  return record;
}

function renderRecord(schema: RecordSchema, record: object): string {
  return YAML.stringify(toPlain(t.record(schema), record));
}

/** Write the record back as YAML. */
export async function saveRecord(
  filePath: string,
  schema: RecordSchema,
  record: object,
): Promise<void> {
  const body = renderRecord(schema, record);
  try {
    await writeFile(filePath, body, "utf-8");
  } catch (err) {
    throw new FilesystemError(
      `Cannot write '${filePath}': ${(err as Error).message}`,
    );
  }
}

export interface RecordTracker {
  /** Write the record back if it differs from what was loaded. */
  saveIfChanged(): Promise<boolean>;
}

/** Remember the record as it is now, for a later `saveIfChanged`. */
export function trackRecord(
  filePath: string,
  schema: RecordSchema,
  record: object,
): RecordTracker {
  const loaded = renderRecord(schema, record);
  return {
    async saveIfChanged() {
      if (renderRecord(schema, record) === loaded) return false;
      await saveRecord(filePath, schema, record);
      return true;
    },
  };
}
