import { describe, expect, it } from "vitest";
import { construct } from "../src/commands/construct.js";
import { runCommand } from "../src/commands/tree.js";
import { NOT_FOUND } from "../src/core/config.js";
import { defineRecord, field, t } from "../src/core/schema.js";
import { names, recordingConfig } from "./helpers.js";

const Labels = defineRecord("Labels", { labels: t.map(t.string(), t.int()) });

describe("map commands", () => {
  it("offers dump, get, set and unset", () => {
    const { config } = recordingConfig();
    const nodes = construct(Labels, { labels: new Map() }, config);

    expect(names(nodes[0].children)).toEqual(["dump", "get", "set", "unset"]);
  });

  it("sets, reads and removes a key", () => {
    const { config, values } = recordingConfig();
    const record = { labels: new Map([["a", 1]]) };
    const nodes = construct(Labels, record, config);

    runCommand(nodes, ["labels", "set"], ["b", "2"]);
    runCommand(nodes, ["labels", "get"], ["b"]);
    runCommand(nodes, ["labels", "unset"], ["b"]);
    runCommand(nodes, ["labels", "get"], ["b"]);

    expect(values).toEqual([2, NOT_FOUND]);
    expect([...record.labels]).toEqual([["a", 1]]);
  });

  it("ignores unset of a missing key", () => {
    const { config } = recordingConfig();
    const record = { labels: new Map([["a", 1]]) };
    const nodes = construct(Labels, record, config);

    runCommand(nodes, ["labels", "unset"], ["zzz"]);

    expect(record.labels.size).toBe(1);
  });

  it("dumps entries in insertion order", () => {
    const { config, pairs } = recordingConfig();
    const nodes = construct(
      Labels,
      { labels: new Map([["z", 26], ["a", 1]]) },
      config,
    );

    runCommand(nodes, ["labels", "dump"]);

    expect(pairs).toEqual([
      ["z", 26],
      ["a", 1],
    ]);
  });

  it("parses keys with the key type's codec", () => {
    const Ports = defineRecord("Ports", { names: t.map(t.int(), t.string()) });
    const { config, values } = recordingConfig();
    const record = { names: new Map<number, string>() };
    const nodes = construct(Ports, record, config);

    runCommand(nodes, ["names", "set"], ["0x10", "sixteen"]);
    runCommand(nodes, ["names", "get"], ["16"]);

    expect(record.names.get(16)).toBe("sixteen");
    expect(values).toEqual(["sixteen"]);
  });

  it("leaves the map untouched when the value fails to parse", () => {
    const { config } = recordingConfig();
    const record = { labels: new Map([["a", 1]]) };
    const nodes = construct(Labels, record, config);

    expect(() => runCommand(nodes, ["labels", "set"], ["b", "two"])).toThrow(
      "invalid integer 'two'",
    );
    expect(record.labels.has("b")).toBe(false);
  });

  it("creates the map on the first set when absent", () => {
    const { config } = recordingConfig();
    const record: { labels?: Map<string, number> } = {};
    const nodes = construct(Labels, record, config);

    runCommand(nodes, ["labels", "set"], ["a", "1"]);

    expect(record.labels).toEqual(new Map([["a", 1]]));
  });

  it("is read-only on a read-only field", () => {
    const Fixed = defineRecord("Fixed", {
      labels: field(t.map(t.string(), t.string()), { readonly: true }),
    });
    const { config } = recordingConfig();
    const nodes = construct(Fixed, { labels: new Map() }, config);

    expect(names(nodes[0].children)).toEqual(["dump", "get"]);
  });

  it("rejects a map with structured values", () => {
    const Nested = defineRecord("Nested", {
      groups: t.map(t.string(), t.list(t.int())),
    });

    expect(() => construct(Nested, { groups: new Map() })).toThrow(
      "groups: unsupported kind: list of int64 (map value)",
    );
  });
});
