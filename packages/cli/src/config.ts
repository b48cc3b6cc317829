import { readFileSync } from "node:fs";
import YAML from "js-yaml";

export type OutputCompression = "gzip" | "none";

/** Defaults for `rewrite`, overridden by command line flags. */
export interface LitekitConfig {
  author?: string;
  compression?: OutputCompression;
  touch?: boolean;
}

export function isOutputCompression(value: unknown): value is OutputCompression {
  return value === "gzip" || value === "none";
}

/** Unknown keys are ignored; known keys of the wrong type are rejected. */
export function parseConfig(parsed: unknown, source = "config"): LitekitConfig {
  if (!parsed || typeof parsed !== "object") {
    return {};
  }
  if (Array.isArray(parsed)) {
    throw new Error(`${source}: expected a mapping at the top level`);
  }
  const fields = new Map<string, unknown>(Object.entries(parsed));
  const out: LitekitConfig = {};

  const author = fields.get("author");
  if (author !== undefined) {
    if (typeof author !== "string") throw new Error(`${source}: "author" must be a string`);
    out.author = author;
  }
  const compression = fields.get("compression");
  if (compression !== undefined) {
    if (!isOutputCompression(compression)) throw new Error(`${source}: "compression" must be gzip or none`);
    out.compression = compression;
  }
  const touch = fields.get("touch");
  if (touch !== undefined) {
    if (typeof touch !== "boolean") throw new Error(`${source}: "touch" must be true or false`);
    out.touch = touch;
  }
  return out;
}

export function readConfigFromYaml(path: string): LitekitConfig {
  const raw = readFileSync(path, "utf8");
  return parseConfig(YAML.load(raw), path);
}
