import type { BlockState } from "./block-state.js";
import type { BlockEntry, Vec3Like } from "./types.js";
import { Vector3 } from "./vector.js";

export function voxelCoordKey(x: number, y: number, z: number): string {
  return `${x},${y},${z}`;
}

export function compareDiskOrder(a: Vec3Like, b: Vec3Like): number {
  // y-major, then z, then x
  if (a.y !== b.y) return a.y - b.y;
  if (a.z !== b.z) return a.z - b.z;
  return a.x - b.x;
}

/**
 * Sparse overlay of block states over an implicit air background. Setting a
 * coordinate to air removes its entry, so every stored state is non-air.
 */
export class BlockMap implements Iterable<BlockEntry> {
  private readonly entries = new Map<string, BlockEntry>();

  public get size(): number {
    return this.entries.size;
  }

  public get(pos: Vec3Like): BlockState | undefined {
    return this.entries.get(voxelCoordKey(pos.x, pos.y, pos.z))?.state;
  }

  public has(pos: Vec3Like): boolean {
    return this.entries.has(voxelCoordKey(pos.x, pos.y, pos.z));
  }

  public set(pos: Vec3Like, state: BlockState): void {
    const at = Vector3.from(pos);
    if (state.isAir()) {
      this.entries.delete(at.key());
      return;
    }
    this.entries.set(at.key(), { pos: at, state });
  }

  public delete(pos: Vec3Like): boolean {
    return this.entries.delete(voxelCoordKey(pos.x, pos.y, pos.z));
  }

  public *positions(): IterableIterator<Vector3> {
    for (const entry of this.entries.values()) yield entry.pos;
  }

  public [Symbol.iterator](): Iterator<BlockEntry> {
    return this.entries.values();
  }

  /** Entries sorted the way the packed array lays cells out. */
  public sorted(): BlockEntry[] {
    return [...this.entries.values()].sort((a, b) => compareDiskOrder(a.pos, b.pos));
  }

  /** Distinct states in first-seen order. */
  public distinctStates(): BlockState[] {
    const seen = new Map<string, BlockState>();
    for (const { state } of this.entries.values()) {
      if (!seen.has(state.key)) seen.set(state.key, state);
    }
    return [...seen.values()];
  }

  public clone(): BlockMap {
    const out = new BlockMap();
    for (const [key, entry] of this.entries) out.entries.set(key, entry);
    return out;
  }
}
