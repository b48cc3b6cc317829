export { run, consoleIo, type CliIo } from "./run.js";
export {
  blockLines,
  readSchematic,
  rewriteSchematic,
  summarize,
  type LoadedSchematic,
  type RegionSummary,
  type RewriteOptions,
  type RewriteResult,
  type SchematicSummary
} from "./commands.js";
export {
  isOutputCompression,
  parseConfig,
  readConfigFromYaml,
  type LitekitConfig,
  type OutputCompression
} from "./config.js";
