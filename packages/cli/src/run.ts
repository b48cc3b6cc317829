import minimist from "minimist";
import { resolve } from "node:path";
import { blockLines, readSchematic, rewriteSchematic, summarize } from "./commands.js";
import { isOutputCompression, readConfigFromYaml, type LitekitConfig } from "./config.js";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

const HELP = `litekit

Usage:
  litekit info <file>
  litekit blocks <file> [--region <name>]
  litekit rewrite <file> --out <file> [options]

Options:
  --region <name>          Only list blocks of this region
  --out <path>             Output file for rewrite
  --name <text>            Replace the schematic name
  --author <text>          Replace the author
  --description <text>     Replace the description
  --compression <mode>     gzip | none (default: gzip)
  --touch                  Set the modification time to now
  --config <file>          YAML defaults for author, compression and touch
`;

/** A flag given without a value (minimist yields `""`) counts as absent. */
function stringFlag(argv: minimist.ParsedArgs, name: string): string | undefined {
  const value: unknown = argv[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

export async function run(args: string[], io: CliIo = consoleIo): Promise<void> {
  const argv = minimist(args, {
    boolean: ["touch", "help"],
    string: ["region", "out", "name", "author", "description", "compression", "config"],
    alias: { h: "help" }
  });

  const command = argv._[0];
  if (!command || command === "help" || argv.help === true) {
    io.out(HELP);
    return;
  }
  if (command !== "info" && command !== "blocks" && command !== "rewrite") {
    throw new Error(`Unknown command: ${String(command)}`);
  }

  const file = argv._[1];
  if (file === undefined) {
    throw new Error("Missing file argument.");
  }
  const { schematic, warnings } = await readSchematic(resolve(String(file)));
  for (const warning of warnings) {
    io.err(`[litekit] warning ${warning.code}: ${warning.message}`);
  }

  if (command === "info") {
    io.out(JSON.stringify(summarize(schematic), null, 2));
    return;
  }

  if (command === "blocks") {
    for (const line of blockLines(schematic, stringFlag(argv, "region"))) io.out(line);
    return;
  }

  const out = stringFlag(argv, "out");
  if (!out) {
    throw new Error("rewrite needs --out <file>.");
  }
  const configPath = stringFlag(argv, "config");
  const config: LitekitConfig = configPath ? readConfigFromYaml(resolve(configPath)) : {};
  const compression = stringFlag(argv, "compression") ?? config.compression ?? "gzip";
  if (!isOutputCompression(compression)) {
    throw new Error(`Unknown compression: ${compression}`);
  }

  const result = await rewriteSchematic(schematic, {
    out: resolve(out),
    name: stringFlag(argv, "name"),
    author: stringFlag(argv, "author") ?? config.author,
    description: stringFlag(argv, "description"),
    compression,
    touch: argv.touch === true || config.touch === true
  });
  io.out(JSON.stringify(result, null, 2));
}
