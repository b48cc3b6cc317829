import { isGzip } from "@litekit/nbt";
import { toLitematicError, type Diagnostic } from "./errors.js";
import { Schematic } from "./schematic.js";

const TAG_COMPOUND = 10;

export interface LitematicSniffResult {
  match: boolean;
  confidence: "high" | "medium" | "low";
  reasonCodes: string[];
}

export interface LitematicLoadOptions {
  sourcePath?: string;
}

export interface LitematicLoadResult {
  format: "litematic";
  valid: boolean;
  schematic?: Schematic;
  metadata: Record<string, string>;
  warnings: Diagnostic[];
  errors: Diagnostic[];
}

function sniffByMagic(input: Uint8Array): boolean {
  if (isGzip(input)) return true;
  return input.length >= 3 && input[0] === TAG_COMPOUND && input[1] === 0x00;
}

export function sniffLitematic(input: Uint8Array, pathHint = ""): LitematicSniffResult {
  if (pathHint.toLowerCase().endsWith(".litematic")) {
    return { match: true, confidence: "high", reasonCodes: ["EXTENSION_MATCH"] };
  }
  if (sniffByMagic(input)) {
    return { match: true, confidence: "medium", reasonCodes: ["NBT_MAGIC_LIKE"] };
  }
  return { match: false, confidence: "low", reasonCodes: ["NO_NBT_HINT"] };
}

function metadataOf(schematic: Schematic, sourcePath: string | undefined): Record<string, string> {
  const metadata: Record<string, string> = {};
  if (schematic.name) metadata.name = schematic.name;
  if (schematic.author) metadata.author = schematic.author;
  if (schematic.description) metadata.description = schematic.description;
  metadata.dataVersion = String(schematic.dataVersion);
  metadata.regionCount = String(schematic.regions.size);
  metadata.totalBlocks = String(schematic.totalBlocks());
  if (sourcePath) metadata.sourcePath = sourcePath;
  return metadata;
}

/** Decodes a schematic, reporting every problem as a diagnostic instead of throwing. */
export function loadLitematic(input: Uint8Array, options: LitematicLoadOptions = {}): LitematicLoadResult {
  const warnings: Diagnostic[] = [];
  try {
    const schematic = Schematic.fromBuffer(input, { diagnostics: warnings });
    return {
      format: "litematic",
      valid: true,
      schematic,
      metadata: metadataOf(schematic, options.sourcePath),
      warnings,
      errors: []
    };
  } catch (error) {
    const metadata: Record<string, string> = {};
    if (options.sourcePath) metadata.sourcePath = options.sourcePath;
    return {
      format: "litematic",
      valid: false,
      metadata,
      warnings,
      errors: [toLitematicError(error).toDiagnostic()]
    };
  }
}
