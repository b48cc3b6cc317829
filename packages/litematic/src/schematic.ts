import { Volume } from "@litekit/core";
import { NbtCompound, readNbt, writeNbt, type NbtCompression } from "@litekit/nbt";
import { LitematicError, toLitematicError, withFieldPrefix, type Diagnostic } from "./errors.js";
import { Region } from "./region.js";

export const LITEMATIC_VERSION = 5;
/** Minecraft 1.20.1. */
export const DEFAULT_DATA_VERSION = 3465;

export interface SchematicInit {
  name?: string;
  author?: string;
  description?: string;
  timeCreated?: bigint;
  timeModified?: bigint;
  dataVersion?: number;
  subVersion?: number;
}

export interface SchematicDecodeOptions {
  diagnostics?: Diagnostic[];
  compression?: NbtCompression;
}

export interface SchematicEncodeOptions {
  compression?: Exclude<NbtCompression, "auto">;
}

function unionOf(volumes: Iterable<Volume>): Volume {
  let total: Volume | undefined;
  for (const volume of volumes) {
    if (volume.volume() === 0) continue;
    total = total ? total.expandToFitVolume(volume) : volume.makeSizePositive();
  }
  return total ?? Volume.empty();
}

export class Schematic {
  public name: string;
  public author: string;
  public description: string;
  /** Milliseconds since the epoch. */
  public timeCreated: bigint;
  public timeModified: bigint;
  public dataVersion: number;
  public subVersion?: number;
  /** Packed ARGB thumbnail pixels, kept as read. */
  public previewImage?: number[];
  public readonly regions = new Map<string, Region>();

  public constructor(init: SchematicInit = {}) {
    const now = BigInt(Date.now());
    this.name = init.name ?? "Unnamed";
    this.author = init.author ?? "";
    this.description = init.description ?? "";
    this.timeCreated = init.timeCreated ?? now;
    this.timeModified = init.timeModified ?? this.timeCreated;
    this.dataVersion = init.dataVersion ?? DEFAULT_DATA_VERSION;
    this.subVersion = init.subVersion;
  }

  /** Adds or replaces a region and returns it. */
  public addRegion(name: string, region: Region = new Region()): Region {
    this.regions.set(name, region);
    return region;
  }

  public getRegion(name: string): Region | undefined {
    return this.regions.get(name);
  }

  public removeRegion(name: string): boolean {
    return this.regions.delete(name);
  }

  public totalBlocks(): number {
    let total = 0;
    for (const region of this.regions.values()) total += region.blockCount();
    return total;
  }

  /** Smallest box holding every non-empty region; empty at the origin when there is none. */
  public enclosingVolume(): Volume {
    return unionOf([...this.regions.values()].map((region) => region.volume()));
  }

  public static fromBuffer(input: Uint8Array, options: SchematicDecodeOptions = {}): Schematic {
    let root: NbtCompound;
    try {
      root = readNbt(input, { compression: options.compression }).root;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LitematicError("LITEMATIC_NBT_MALFORMED", `Invalid NBT: ${message}`, { cause: error });
    }
    return Schematic.fromNbt(root, options);
  }

  public static fromNbt(root: NbtCompound, options: SchematicDecodeOptions = {}): Schematic {
    try {
      return Schematic.decode(root, options.diagnostics);
    } catch (error) {
      throw toLitematicError(error);
    }
  }

  private static decode(root: NbtCompound, diagnostics: Diagnostic[] | undefined): Schematic {
    const version = root.getInt("Version");
    if (version !== LITEMATIC_VERSION) {
      throw new LitematicError(
        "LITEMATIC_VERSION_UNSUPPORTED",
        `Version ${version} is not supported; expected ${LITEMATIC_VERSION}`,
        { field: "Version", version }
      );
    }

    const dataVersion = root.getInt("MinecraftDataVersion");
    const subVersion = root.findAs("SubVersion", "int");
    const metadata = root.getCompound("Metadata");
    const schematic = withFieldPrefix(
      "Metadata",
      () =>
        new Schematic({
          name: metadata.getString("Name"),
          author: metadata.getString("Author"),
          description: metadata.getString("Description"),
          timeCreated: metadata.getLong("TimeCreated"),
          timeModified: metadata.getLong("TimeModified"),
          dataVersion,
          subVersion
        })
    );
    const preview = withFieldPrefix("Metadata", () => metadata.findAs("PreviewImageData", "intArray"));
    if (preview) schematic.previewImage = [...preview];

    const regions = root.getCompound("Regions");
    for (const [name, tag] of regions) {
      if (tag.type !== "compound") {
        throw new LitematicError("LITEMATIC_FIELD_WRONG_TAG", `Region is a ${tag.type} tag, expected compound`, {
          field: name,
          region: name
        });
      }
      schematic.regions.set(name, Region.fromNbt(tag.value, { name, diagnostics }));
    }

    const storedRegions = withFieldPrefix("Metadata", () => metadata.findAs("RegionCount", "int"));
    if (storedRegions !== undefined && storedRegions !== schematic.regions.size) {
      diagnostics?.push({
        code: "LITEMATIC_REGION_COUNT_MISMATCH",
        severity: "warning",
        message: `Metadata lists ${storedRegions} regions, found ${schematic.regions.size}`
      });
    }
    const storedBlocks = withFieldPrefix("Metadata", () => metadata.findAs("TotalBlocks", "int"));
    const totalBlocks = schematic.totalBlocks();
    if (storedBlocks !== undefined && storedBlocks !== totalBlocks) {
      diagnostics?.push({
        code: "LITEMATIC_TOTAL_BLOCKS_MISMATCH",
        severity: "warning",
        message: `Metadata lists ${storedBlocks} blocks, decoded ${totalBlocks}`
      });
    }
    return schematic;
  }

  public toNbt(): NbtCompound {
    const regions = new NbtCompound();
    const volumes: Volume[] = [];
    for (const [name, region] of this.regions) {
      const { tag, volume } = region.toNbt();
      regions.setCompound(name, tag);
      volumes.push(volume);
    }
    const enclosing = unionOf(volumes);
    const size = enclosing.size();

    const metadata = new NbtCompound()
      .setString("Name", this.name)
      .setString("Author", this.author)
      .setString("Description", this.description)
      .setLong("TimeCreated", this.timeCreated)
      .setLong("TimeModified", this.timeModified)
      .setInt("RegionCount", this.regions.size)
      .setInt("TotalBlocks", this.totalBlocks())
      .setCompound("EnclosingSize", new NbtCompound().setInt("x", size.x).setInt("y", size.y).setInt("z", size.z))
      .setInt("TotalVolume", enclosing.volume());
    if (this.previewImage) metadata.setIntArray("PreviewImageData", [...this.previewImage]);

    const root = new NbtCompound()
      .setInt("MinecraftDataVersion", this.dataVersion)
      .setInt("Version", LITEMATIC_VERSION);
    if (this.subVersion !== undefined) root.setInt("SubVersion", this.subVersion);
    return root.setCompound("Metadata", metadata).setCompound("Regions", regions);
  }

  /** Gzip-compressed by default, as the game writes it. */
  public toBuffer(options: SchematicEncodeOptions = {}): Uint8Array {
    return writeNbt(this.toNbt(), { compression: options.compression ?? "gzip" });
  }
}
