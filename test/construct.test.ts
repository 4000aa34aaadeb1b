import { describe, expect, it } from "vitest";
import { construct, createConstructor } from "../src/commands/construct.js";
import { findCommand, runCommand } from "../src/commands/tree.js";
import { CATEGORY } from "../src/core/constants.js";
import {
  defineRecord,
  enumCodec,
  field,
  t,
  type RecordSchema,
} from "../src/core/schema.js";
import {
  ConversionError,
  FieldError,
  InvalidInputError,
  NoPropertiesError,
  WrongArityError,
} from "../src/util/errors.js";
import { yamlSerializer } from "../src/util/format.js";
import { names, recordingConfig } from "./helpers.js";

const Backend = defineRecord("Backend", {
  Hostname: field(t.string(), { tags: { recli: "id" } }),
  Port: field(t.int(), { tags: { default: "2019" } }),
});

const Root = defineRecord("Root", {
  Address: t.string(),
  Backends: t.list(t.record(Backend)),
});

function sample() {
  return {
    Address: "127.0.0.1",
    Backends: [{ Hostname: "b1.com", Port: 1010 }],
  };
}

describe("construct", () => {
  it("builds one node per field plus a dump leaf", () => {
    const { config } = recordingConfig();
    const nodes = construct(Root, sample(), config);

    expect(names(nodes)).toEqual(["address", "backends", "dump-json"]);
    expect(names(nodes[0].children)).toEqual(["get", "set"]);
    expect(names(nodes[1].children)).toEqual(["b1.com", "list", "add", "add-json"]);
    expect(names(nodes[1].children[0].children)).toEqual([
      "hostname",
      "port",
      "dump-json",
      "delete",
    ]);
  });

  it("categorises nodes", () => {
    const { config } = recordingConfig();
    const nodes = construct(Root, sample(), config);
    const backends = nodes[1];

    expect(backends.category).toBe(CATEGORY.PROPERTIES);
    expect(backends.children[0].category).toBe(CATEGORY.ITEMS);
    expect(backends.children[1].category).toBe(CATEGORY.ACTIONS);
    expect(nodes[2].category).toBe(CATEGORY.ACTIONS);
  });

  it("adds a backend from flags with tag defaults filled in", () => {
    const { config } = recordingConfig();
    const record = sample();
    const nodes = construct(Root, record, config);

    runCommand(nodes, ["backends", "add"], [], new Map([["hostname", "b2.com"]]));

    expect(record.Backends).toEqual([
      { Hostname: "b1.com", Port: 1010 },
      { Hostname: "b2.com", Port: 2019 },
    ]);
  });

  it("lets a flag override a default", () => {
    const { config } = recordingConfig();
    const record = sample();
    const nodes = construct(Root, record, config);

    runCommand(
      nodes,
      ["backends", "add"],
      [],
      new Map<string, string | number>([
        ["hostname", "b2.com"],
        ["port", 8443],
      ]),
    );

    expect(record.Backends[1]).toEqual({ Hostname: "b2.com", Port: 8443 });
  });

  it("refuses a flag-based add with no flags", () => {
    const { config } = recordingConfig();
    const record = sample();
    const nodes = construct(Root, record, config);

    expect(() => runCommand(nodes, ["backends", "add"])).toThrow(NoPropertiesError);
    expect(record.Backends).toHaveLength(1);
  });

  it("reads and writes through the caller's record", () => {
    const { config, values } = recordingConfig();
    const record = sample();
    const nodes = construct(Root, record, config);

    runCommand(nodes, ["address", "set"], ["0.0.0.0"]);
    runCommand(nodes, ["address", "get"]);
    runCommand(nodes, ["backends", "b1.com", "port", "set"], ["0x50"]);

    expect(record.Address).toBe("0.0.0.0");
    expect(values).toEqual(["0.0.0.0"]);
    expect(record.Backends[0].Port).toBe(80);
  });

  it("checks the number of arguments", () => {
    const { config } = recordingConfig();
    const nodes = construct(Root, sample(), config);

    expect(() => runCommand(nodes, ["address", "set"])).toThrow(
      new WrongArityError(1, 0),
    );
    expect(() => runCommand(nodes, ["address", "get"], ["x"])).toThrow(
      "expected 0 arguments, got 1",
    );
  });

  it("keeps the old value when a set fails to parse", () => {
    const { config } = recordingConfig();
    const record = sample();
    const nodes = construct(Root, record, config);

    expect(() =>
      runCommand(nodes, ["backends", "b1.com", "port", "set"], ["eighty"]),
    ).toThrow(ConversionError);
    expect(record.Backends[0].Port).toBe(1010);
  });

  it("dumps the whole record with the configured serializer", () => {
    const { config, values } = recordingConfig();
    const nodes = construct(Root, sample(), config);

    runCommand(nodes, ["dump-json"]);

    expect(values).toEqual([
      JSON.stringify(
        { Address: "127.0.0.1", Backends: [{ Hostname: "b1.com", Port: 1010 }] },
        null,
        2,
      ),
    ]);
  });

  it("names leaves after a different serializer and name converter", () => {
    const { config, values } = recordingConfig({
      serializer: yamlSerializer,
      fieldNameConverter: (name) => name.toUpperCase(),
    });
    const nodes = construct(Root, sample(), config);

    expect(names(nodes)).toEqual(["ADDRESS", "BACKENDS", "dump-yaml"]);
    expect(names(nodes[1].children)).toEqual(["b1.com", "list", "add", "add-yaml"]);

    runCommand(nodes, ["BACKENDS", "b1.com", "dump-yaml"]);
    expect(values).toEqual(["Hostname: b1.com\nPort: 1010"]);
  });

  it("works through a reusable constructor", () => {
    const { config } = recordingConfig();
    const builder = createConstructor(config);

    expect(names(builder.construct(Root, sample()))).toEqual(
      names(builder.construct(Root, sample())),
    );
  });
});

describe("construct input checks", () => {
  it.each([
    [null, "expected a Root record, got null"],
    [42, "expected a Root record, got number"],
    [[], "expected a Root record, got array"],
    [new Map(), "expected a Root record, got Map"],
  ])("rejects %j", (input, message) => {
    expect(() => construct(Root, input)).toThrow(new InvalidInputError(message));
  });

  it("rejects a frozen record", () => {
    expect(() => construct(Root, Object.freeze(sample()))).toThrow(
      "Root record is frozen",
    );
  });
});

describe("field selection", () => {
  const Base = defineRecord("Base", { id: t.string() });
  const Settings = defineRecord("Settings", {
    base: field(t.record(Base), { embedded: true }),
    hidden: field(t.string(), { tags: { recli: "-" } }),
    _internal: t.int(),
    version: field(t.int(), { readonly: true, tags: { usage: "Schema version" } }),
    name: t.string(),
  });

  it("leaves out embedded, skipped and unexported fields", () => {
    const { config } = recordingConfig();
    const nodes = construct(
      Settings,
      { base: { id: "b" }, hidden: "h", _internal: 1, version: 3, name: "n" },
      config,
    );

    expect(names(nodes)).toEqual(["version", "name", "dump-json"]);
  });

  it("gives a read-only field no set leaf", () => {
    const { config } = recordingConfig();
    const nodes = construct(
      Settings,
      { base: { id: "b" }, hidden: "", _internal: 0, version: 3, name: "" },
      config,
    );

    expect(nodes[0].usage).toBe("Schema version");
    expect(names(nodes[0].children)).toEqual(["get"]);
    expect(names(nodes[1].children)).toEqual(["get", "set"]);
  });

  it("gives a frozen nested record no set leaves", () => {
    const Tls = defineRecord("Tls", { enabled: t.bool() });
    const Server = defineRecord("Server", { tls: t.record(Tls) });
    const { config } = recordingConfig();

    const nodes = construct(Server, { tls: Object.freeze({ enabled: true }) }, config);

    expect(names(nodes[0].children)).toEqual(["enabled", "dump-json"]);
    expect(names(nodes[0].children[0].children)).toEqual(["get"]);
  });
});

describe("nested and text fields", () => {
  const Mode = enumCodec("mode", ["static", "ldap"]);
  const Tls = defineRecord("Tls", { enabled: t.bool(), ratio: t.float() });
  const Server = defineRecord("Server", {
    mode: t.text(Mode),
    tls: t.record(Tls),
  });

  it("round-trips a text codec value", () => {
    const { config, values } = recordingConfig();
    const record = { mode: 0, tls: { enabled: false, ratio: 0 } };
    const nodes = construct(Server, record, config);

    runCommand(nodes, ["mode", "set"], ["ldap"]);
    runCommand(nodes, ["mode", "get"]);

    expect(record.mode).toBe(1);
    expect(values).toEqual(["ldap"]);
  });

  it("rejects an unknown enum name and keeps the value", () => {
    const { config } = recordingConfig();
    const record = { mode: 1, tls: { enabled: false, ratio: 0 } };
    const nodes = construct(Server, record, config);

    let caught: unknown;
    try {
      runCommand(nodes, ["mode", "set"], ["bogus"]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConversionError);
    expect(caught).toMatchObject({ kind: "conversion-error" });
    expect(record.mode).toBe(1);
  });

  it("reaches fields of a nested record", () => {
    const { config, values } = recordingConfig();
    const record = { mode: 0, tls: { enabled: false, ratio: 0 } };
    const nodes = construct(Server, record, config);

    runCommand(nodes, ["tls", "enabled", "set"], ["true"]);
    runCommand(nodes, ["tls", "ratio", "set"], ["1.5e3"]);
    runCommand(nodes, ["tls", "ratio", "get"]);

    expect(record.tls).toEqual({ enabled: true, ratio: 1500 });
    expect(values).toEqual([1500]);
  });

  it("dumps a nested record on its own", () => {
    const { config, values } = recordingConfig();
    const nodes = construct(
      Server,
      { mode: 1, tls: { enabled: true, ratio: 0.5 } },
      config,
    );

    runCommand(nodes, ["dump-json"]);
    runCommand(nodes, ["tls", "dump-json"]);

    expect(values).toEqual([
      JSON.stringify({ mode: "ldap", tls: { enabled: true, ratio: 0.5 } }, null, 2),
      JSON.stringify({ enabled: true, ratio: 0.5 }, null, 2),
    ]);
  });

  it("fails to dump a float that JSON cannot hold", () => {
    const { config, values } = recordingConfig();
    const record = { mode: 0, tls: { enabled: false, ratio: 0 } };
    const nodes = construct(Server, record, config);

    runCommand(nodes, ["tls", "ratio", "set"], ["NaN"]);

    expect(() => runCommand(nodes, ["dump-json"])).toThrow(
      new ConversionError("tls.ratio: unsupported value: NaN"),
    );
    expect(values).toEqual([]);
  });
});

describe("unsupported shapes", () => {
  it("names the field holding a function", () => {
    const Hooks = defineRecord("Hooks", { onReload: t.opaque("function") });

    expect(() => construct(Hooks, { onReload: () => undefined })).toThrow(
      "onReload: unsupported kind: function",
    );
  });

  it("builds the dotted path through nested records and list items", () => {
    const Check = defineRecord("Check", { probe: t.opaque("channel") });
    const Backend = defineRecord("Backend", {
      host: field(t.string(), { tags: { recli: "id" } }),
      check: t.record(Check),
    });
    const Proxy = defineRecord("Proxy", { Backends: t.list(t.record(Backend)) });

    let caught: unknown;
    try {
      construct(Proxy, { Backends: [{ host: "b1.com", check: { probe: null } }] });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(FieldError);
    expect(caught).toMatchObject({
      kind: "unsupported-kind",
      path: ["Backends", "b1.com", "check", "probe"],
      message: "Backends.b1.com.check.probe: unsupported kind: channel",
    });
  });

  it("rejects a reference with nothing to bind", () => {
    const Tls = defineRecord("Tls", { enabled: t.bool() });
    const Server = defineRecord("Server", { tls: t.ref(Tls) });

    expect(() => construct(Server, { tls: undefined })).toThrow(
      "tls: unsupported kind: record (no Tls value to bind)",
    );
  });

  it("rejects a list of lists", () => {
    const Grid = defineRecord("Grid", { rows: t.list(t.list(t.int())) });

    expect(() => construct(Grid, { rows: [] })).toThrow(
      "rows: unsupported kind: list of int64 (list element)",
    );
  });
});

describe("record graphs", () => {
  interface LinkValue {
    name: string;
    next?: LinkValue;
  }
  const Link: RecordSchema = defineRecord("Link", {
    name: t.string(),
    next: t.ref(() => Link),
  });

  it("rejects a record that reaches itself", () => {
    const a: LinkValue = { name: "a" };
    const b: LinkValue = { name: "b", next: a };
    a.next = b;

    let caught: unknown;
    try {
      construct(Link, a);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(FieldError);
    expect(caught).toMatchObject({
      kind: "unsupported-kind",
      path: ["next", "next"],
      message: "next.next: unsupported kind: record (cycle through Link)",
    });
  });

  it("builds a record shared by two fields", () => {
    const Leaf = defineRecord("Leaf", { name: t.string() });
    const Pair = defineRecord("Pair", { left: t.ref(Leaf), right: t.ref(Leaf) });
    const { config } = recordingConfig();
    const shared = { name: "s" };
    const record = { left: shared, right: shared };

    const nodes = construct(Pair, record, config);
    runCommand(nodes, ["right", "name", "set"], ["shared"]);

    expect(names(nodes)).toEqual(["left", "right", "dump-json"]);
    expect(record.left.name).toBe("shared");
  });

  it("can build again after a cycle error", () => {
    const builder = createConstructor();
    const a: LinkValue = { name: "a" };
    a.next = a;

    expect(() => builder.construct(Link, a)).toThrow("cycle through Link");
    a.next = undefined;
    expect(() => builder.construct(Link, a)).toThrow(
      "next: unsupported kind: record (no Link value to bind)",
    );
  });
});

describe("runCommand", () => {
  it("fails on a path that ends at a group", () => {
    const { config } = recordingConfig();
    const nodes = construct(Root, sample(), config);

    expect(findCommand(nodes, ["backends", "b1.com"])?.action).toBeUndefined();
    expect(() => runCommand(nodes, ["backends", "b1.com"])).toThrow(
      "No command at 'backends b1.com'",
    );
  });
});
