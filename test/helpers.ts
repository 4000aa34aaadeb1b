import { withConfig, type Config, type Printable } from "../src/core/config.js";

/** Configuration whose printers record into arrays instead of stdout. */
export function recordingConfig(overrides: Partial<Config> = {}) {
  const values: Printable[] = [];
  const pairs: Array<[Printable, Printable]> = [];
  const config = withConfig({
    valuePrinter: (value) => {
      values.push(value);
    },
    keyValuePrinter: (key, value) => {
      pairs.push([key, value]);
    },
    ...overrides,
  });
  return { config, values, pairs };
}

export function names(nodes: Array<{ name: string }>): string[] {
  return nodes.map((n) => n.name);
}
