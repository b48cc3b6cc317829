import {
  BlockMap,
  BlockState,
  coordinateToIndex,
  fieldCapacity,
  getField,
  indexToCoordinate,
  requiredBits,
  requiredWordCount,
  setField,
  Vector3,
  Volume,
  type BlockEntry,
  type Vec3Like
} from "@litekit/core";
import { NbtCompound, NbtList, type NbtTag } from "@litekit/nbt";
import { LitematicError, toLitematicError, withFieldPrefix, type Diagnostic } from "./errors.js";

/** List payloads carried through untouched. */
export const OPAQUE_PAYLOAD_FIELDS = ["Entities", "PendingBlockTicks", "PendingFluidTicks", "TileEntities"] as const;
export type OpaquePayloadField = (typeof OPAQUE_PAYLOAD_FIELDS)[number];

export interface RegionDecodeOptions {
  /** Region name, attached to errors and warnings. */
  name?: string;
  /** Receives non-fatal findings about the packed block array. */
  diagnostics?: Diagnostic[];
}

export interface EncodedRegion {
  tag: NbtCompound;
  /** Normalized box the block array was laid out over. */
  volume: Volume;
}

function readVector(parent: NbtCompound, field: string): Vector3 {
  const tag = parent.getCompound(field);
  return withFieldPrefix(field, () => new Vector3(tag.getInt("x"), tag.getInt("y"), tag.getInt("z")));
}

function vectorTag(v: Vec3Like): NbtCompound {
  return new NbtCompound().setInt("x", v.x).setInt("y", v.y).setInt("z", v.z);
}

function malformed(message: string, field: string): LitematicError {
  return new LitematicError("LITEMATIC_BLOCK_STATE_MALFORMED", message, { field });
}

function parseBlockState(entry: NbtTag, index: number): BlockState {
  if (entry.type !== "compound") {
    throw malformed(`Palette entry ${index} is a ${entry.type} tag, expected compound`, "BlockStatePalette");
  }
  const name = entry.value.get("Name");
  if (name === undefined || name.type !== "string") {
    throw malformed(`Palette entry ${index} has no string Name`, "Name");
  }
  const props = entry.value.get("Properties");
  const properties: Record<string, string> = {};
  if (props !== undefined) {
    if (props.type !== "compound") {
      throw malformed(`Palette entry ${index} has ${props.type} Properties, expected compound`, "Properties");
    }
    for (const [key, value] of props.value) {
      if (value.type !== "string") {
        throw malformed(`Property "${key}" of palette entry ${index} is a ${value.type} tag`, `Properties.${key}`);
      }
      properties[key] = value.value;
    }
  }
  return new BlockState(name.value, properties);
}

function blockStateTag(state: BlockState): NbtTag {
  const value = new NbtCompound().setString("Name", state.name);
  if (state.propertyCount > 0) {
    const props = new NbtCompound();
    for (const [key, prop] of Object.entries(state.properties)) props.setString(key, prop);
    value.setCompound("Properties", props);
  }
  return { type: "compound", value };
}

/**
 * A named box of blocks inside a schematic. Blocks are keyed by their
 * schematic-space coordinate; air is never stored. The declared volume is kept
 * as read (its size may be negative); `volume()` widens it over the stored blocks.
 */
export class Region {
  private readonly declared: Volume;
  private readonly blockMap: BlockMap;
  private readonly payloads = new Map<OpaquePayloadField, NbtList>();

  public constructor(declared: Volume = Volume.empty(), blocks: BlockMap = new BlockMap()) {
    this.declared = declared;
    this.blockMap = blocks;
  }

  public static at(position: Vec3Like): Region {
    return new Region(Volume.empty(position));
  }

  public get declaredVolume(): Volume {
    return this.declared;
  }

  public getBlock(pos: Vec3Like): BlockState {
    return this.blockMap.get(pos) ?? BlockState.AIR;
  }

  /** Air removes the block. */
  public setBlock(pos: Vec3Like, state: BlockState): void {
    this.blockMap.set(pos, state);
  }

  public blockCount(): number {
    return this.blockMap.size;
  }

  public blocks(): BlockEntry[] {
    return this.blockMap.sorted();
  }

  /** The declared volume grown to hold every stored block. */
  public volume(): Volume {
    let volume = this.declared;
    for (const pos of this.blockMap.positions()) volume = volume.expandToFit(pos);
    return volume;
  }

  /** Air first, then the distinct stored states in first-seen order. */
  public palette(): BlockState[] {
    return [BlockState.AIR, ...this.blockMap.distinctStates()];
  }

  public getPayload(field: OpaquePayloadField): NbtList | undefined {
    return this.payloads.get(field);
  }

  public setPayload(field: OpaquePayloadField, list: NbtList | undefined): void {
    if (list === undefined) {
      this.payloads.delete(field);
      return;
    }
    this.payloads.set(field, list);
  }

  public clone(): Region {
    const copy = new Region(this.declared, this.blockMap.clone());
    for (const [field, list] of this.payloads) copy.payloads.set(field, list.clone());
    return copy;
  }

  public static fromNbt(tag: NbtCompound, options: RegionDecodeOptions = {}): Region {
    try {
      return Region.decode(tag, options);
    } catch (error) {
      throw toLitematicError(error, options.name);
    }
  }

  private static decode(tag: NbtCompound, options: RegionDecodeOptions): Region {
    const position = readVector(tag, "Position");
    const size = readVector(tag, "Size");
    const palette = [...tag.getList("BlockStatePalette")].map(parseBlockState);
    const words = tag.getLongArray("BlockStates");

    const region = new Region(Volume.fromOriginSize(position, size));
    const bounds = region.declared.makeSizePositive();
    const origin = bounds.origin();
    const extent = bounds.size();
    const bits = requiredBits(palette.length);
    const cells = extent.volume();
    const capacity = fieldCapacity(words.length, bits);
    const count = Math.min(capacity, cells);

    for (let i = 0; i < count; i++) {
      const index = getField(words, i, bits);
      const state = palette[index];
      if (state === undefined) {
        throw malformed(`Block ${i} refers to palette entry ${index} of ${palette.length}`, "BlockStates");
      }
      if (state.isAir()) continue;
      const local = indexToCoordinate(extent, i);
      if (local) region.blockMap.set(origin.add(local), state);
    }

    const prefix = options.name === undefined ? "" : `Region "${options.name}": `;
    if (capacity < cells) {
      options.diagnostics?.push({
        code: "LITEMATIC_BLOCKSTATES_SHORT",
        severity: "warning",
        message: `${prefix}block array holds ${capacity} of ${cells} cells; the rest read as air`
      });
    } else {
      const needed = requiredWordCount(cells, bits);
      if (words.length > needed) {
        options.diagnostics?.push({
          code: "LITEMATIC_BLOCKSTATES_PADDING",
          severity: "warning",
          message: `${prefix}block array has ${words.length - needed} words past the ${needed} its size needs`
        });
      }
    }

    for (const field of OPAQUE_PAYLOAD_FIELDS) {
      const list = tag.findList(field);
      if (list) region.payloads.set(field, list.clone());
    }
    return region;
  }

  public toNbt(): EncodedRegion {
    const volume = this.volume().makeSizePositive();
    const origin = volume.origin();
    const extent = volume.size();
    const palette = this.palette();
    const paletteIndex = new Map(palette.map((state, i) => [state.key, i]));
    const bits = requiredBits(palette.length);
    const words = new Array<bigint>(requiredWordCount(extent.volume(), bits)).fill(0n);

    for (const { pos, state } of this.blockMap) {
      const index = coordinateToIndex(extent, pos.sub(origin));
      const value = paletteIndex.get(state.key);
      if (index === undefined || value === undefined) {
        throw new Error(`Block ${state.toString()} at ${pos.toString()} lies outside ${volume.toString()}`);
      }
      setField(words, index, bits, value);
    }

    const tag = new NbtCompound()
      .setCompound("Position", vectorTag(origin))
      .setCompound("Size", vectorTag(extent))
      .setList("BlockStatePalette", NbtList.of("compound", palette.map(blockStateTag)))
      .setLongArray("BlockStates", words);
    for (const [field, list] of this.payloads) tag.setList(field, list.clone());
    return { tag, volume };
  }
}
