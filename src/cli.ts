import { Command, Option } from "commander";
import { createConstructor } from "./commands/construct.js";
import { withConfig } from "./core/config.js";
import { ProxyConfigSchema } from "./example/proxy.js";
import { loadRecord, trackRecord } from "./example/store.js";
import { handleError, toCommand } from "./util/cli-helpers.js";
import { FORMATS, resolveSerializer } from "./util/format.js";

const DEFAULT_FILE = "proxy.yaml";

interface GlobalOpts {
  config: string;
  format: string;
}

function globalOptions(): Option[] {
  return [
    new Option("-c, --config <path>", "Proxy configuration file (YAML)").default(
      DEFAULT_FILE,
    ),
    new Option("-f, --format <format>", "Encoding for dump-* and add-* commands")
      .choices([...FORMATS])
      .default("json"),
  ];
}

/**
 * The command tree depends on the file's contents and on --format, so the
 * global options are read in a first pass that ignores everything else.
 */
function readGlobalOpts(argv: string[]): GlobalOpts {
  const pre = new Command()
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments();
  for (const option of globalOptions()) pre.addOption(option);
  pre.parse(argv);
  return pre.opts<GlobalOpts>();
}

async function main(): Promise<void> {
  const globals = readGlobalOpts(process.argv);
  const config = withConfig({ serializer: resolveSerializer(globals.format) });

  const record = await loadRecord(
    globals.config,
    ProxyConfigSchema,
    config.defaultTagName,
  );
  const tracker = trackRecord(globals.config, ProxyConfigSchema, record);
  const nodes = createConstructor(config).construct(ProxyConfigSchema, record);

  const program = new Command();
  program
    .name("recordtree")
    .version("1.0.0")
    .description("Inspect and edit a proxy configuration file field by field")
    .addHelpText(
      "after",
      `
Every field of the configuration is a command; leaves read or write it:
  $ recordtree listen-address get
  $ recordtree listen-address set :9090
  $ recordtree backends list
  $ recordtree backends add --hostname b2.example --port 8443
  $ recordtree backends b2.example weight set 5
  $ recordtree headers set X-Env staging
  $ recordtree --format yaml dump-yaml

The file is rewritten when a command changes the configuration.
`,
    );
  for (const option of globalOptions()) program.addOption(option);
  for (const node of nodes) program.addCommand(toCommand(node));

  program.hook("postAction", async () => {
    await tracker.saveIfChanged();
  });

  await program.parseAsync(process.argv);
}

main().catch(handleError);
