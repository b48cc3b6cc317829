import { readFile, writeFile } from "node:fs/promises";
import type { Vector3 } from "@litekit/core";
import { loadLitematic, type Diagnostic, type Schematic } from "@litekit/litematic";
import type { OutputCompression } from "./config.js";

export interface LoadedSchematic {
  schematic: Schematic;
  warnings: Diagnostic[];
}

export interface RegionSummary {
  name: string;
  position: Vector3;
  size: Vector3;
  blocks: number;
  palette: number;
}

export interface SchematicSummary {
  name: string;
  author: string;
  description: string;
  dataVersion: number;
  subVersion?: number;
  timeCreated: string;
  timeModified: string;
  regions: RegionSummary[];
  totalBlocks: number;
  enclosingSize: Vector3;
  totalVolume: number;
}

export interface RewriteOptions {
  out: string;
  name?: string;
  author?: string;
  description?: string;
  compression: OutputCompression;
  touch: boolean;
  now?: () => bigint;
}

export interface RewriteResult {
  out: string;
  bytes: number;
  regions: number;
  totalBlocks: number;
}

export async function readSchematic(path: string): Promise<LoadedSchematic> {
  const bytes = await readFile(path);
  const result = loadLitematic(bytes, { sourcePath: path });
  if (!result.schematic) {
    const first = result.errors[0];
    throw new Error(`${path}: ${first ? `${first.code} ${first.message}` : "unreadable schematic"}`);
  }
  return { schematic: result.schematic, warnings: result.warnings };
}

export function summarize(schematic: Schematic): SchematicSummary {
  const regions: RegionSummary[] = [];
  for (const [name, region] of schematic.regions) {
    const volume = region.volume().makeSizePositive();
    regions.push({
      name,
      position: volume.origin(),
      size: volume.size(),
      blocks: region.blockCount(),
      palette: region.palette().length
    });
  }
  const enclosing = schematic.enclosingVolume();
  return {
    name: schematic.name,
    author: schematic.author,
    description: schematic.description,
    dataVersion: schematic.dataVersion,
    subVersion: schematic.subVersion,
    timeCreated: schematic.timeCreated.toString(),
    timeModified: schematic.timeModified.toString(),
    regions,
    totalBlocks: schematic.totalBlocks(),
    enclosingSize: enclosing.size(),
    totalVolume: enclosing.volume()
  };
}

/** One JSON line per stored block, regions in file order and blocks in disk order. */
export function blockLines(schematic: Schematic, only?: string): string[] {
  if (only !== undefined && !schematic.regions.has(only)) {
    throw new Error(`Unknown region: ${only}`);
  }
  const lines: string[] = [];
  for (const [name, region] of schematic.regions) {
    if (only !== undefined && name !== only) continue;
    for (const { pos, state } of region.blocks()) {
      lines.push(JSON.stringify({ region: name, x: pos.x, y: pos.y, z: pos.z, state: state.toString() }));
    }
  }
  return lines;
}

export async function rewriteSchematic(schematic: Schematic, options: RewriteOptions): Promise<RewriteResult> {
  if (options.name !== undefined) schematic.name = options.name;
  if (options.author !== undefined) schematic.author = options.author;
  if (options.description !== undefined) schematic.description = options.description;
  if (options.touch) schematic.timeModified = (options.now ?? (() => BigInt(Date.now())))();

  const bytes = schematic.toBuffer({ compression: options.compression });
  await writeFile(options.out, bytes);
  return {
    out: options.out,
    bytes: bytes.length,
    regions: schematic.regions.size,
    totalBlocks: schematic.totalBlocks()
  };
}
