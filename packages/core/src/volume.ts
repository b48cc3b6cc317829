import type { Vec3Like } from "./types.js";
import { Vector3 } from "./vector.js";

function fitAxis(p1: number, p2: number, c: number): [number, number] {
  if (p1 < p2) return [Math.min(p1, c), Math.max(p2, c + 1)];
  if (p1 > p2) return [Math.max(p1, c + 1), Math.min(p2, c)];
  return c >= p1 ? [p1, c + 1] : [p1, c];
}

/**
 * Axis-aligned box spanning `[pos1, pos2)` per axis. `pos2` may lie before
 * `pos1` on any axis, giving that axis a negative size. Instances are never
 * mutated; every operation returns a new volume.
 */
export class Volume {
  public constructor(
    public readonly pos1: Vector3,
    public readonly pos2: Vector3
  ) {}

  public static empty(at: Vec3Like = Vector3.ZERO): Volume {
    const p = Vector3.from(at);
    return new Volume(p, p);
  }

  public static fromOriginSize(origin: Vec3Like, size: Vec3Like): Volume {
    const p = Vector3.from(origin);
    return new Volume(p, p.add(size));
  }

  public origin(): Vector3 {
    return this.pos1;
  }

  public size(): Vector3 {
    return this.pos2.sub(this.pos1);
  }

  public volume(): number {
    return this.size().volume();
  }

  public min(): Vector3 {
    return new Vector3(
      Math.min(this.pos1.x, this.pos2.x),
      Math.min(this.pos1.y, this.pos2.y),
      Math.min(this.pos1.z, this.pos2.z)
    );
  }

  public max(): Vector3 {
    return new Vector3(
      Math.max(this.pos1.x, this.pos2.x),
      Math.max(this.pos1.y, this.pos2.y),
      Math.max(this.pos1.z, this.pos2.z)
    );
  }

  public moveTo(origin: Vec3Like): Volume {
    return Volume.fromOriginSize(origin, this.size());
  }

  public changeSize(size: Vec3Like): Volume {
    return Volume.fromOriginSize(this.pos1, size);
  }

  /** Grows the box so the unit cube at `point` lies inside it. */
  public expandToFit(point: Vec3Like): Volume {
    const [x1, x2] = fitAxis(this.pos1.x, this.pos2.x, point.x);
    const [y1, y2] = fitAxis(this.pos1.y, this.pos2.y, point.y);
    const [z1, z2] = fitAxis(this.pos1.z, this.pos2.z, point.z);
    return new Volume(new Vector3(x1, y1, z1), new Vector3(x2, y2, z2));
  }

  public expandToFitVolume(other: Volume): Volume {
    const positive = other.makeSizePositive();
    return this.expandToFit(positive.pos1).expandToFit(positive.pos2.sub(Vector3.ONE));
  }

  public makeSizePositive(): Volume {
    return new Volume(this.min(), this.max());
  }

  public contains(point: Vec3Like): boolean {
    const lo = this.min();
    const hi = this.max();
    return (
      point.x >= lo.x && point.x < hi.x && point.y >= lo.y && point.y < hi.y && point.z >= lo.z && point.z < hi.z
    );
  }

  public equals(other: Volume): boolean {
    return this.pos1.equals(other.pos1) && this.pos2.equals(other.pos2);
  }

  /** Every cell of the normalized box, x fastest, then z, then y. Each iteration starts over. */
  public iterate(): Iterable<Vector3> {
    const lo = this.min();
    const hi = this.max();
    return {
      *[Symbol.iterator]() {
        for (let y = lo.y; y < hi.y; y++) {
          for (let z = lo.z; z < hi.z; z++) {
            for (let x = lo.x; x < hi.x; x++) {
              yield new Vector3(x, y, z);
            }
          }
        }
      }
    };
  }

  public toString(): string {
    return `Volume(origin=${this.pos1.toString()}, size=${this.size().toString()})`;
  }
}

/** Linear index of `point` inside a box of non-negative `size` anchored at zero. */
export function coordinateToIndex(size: Vec3Like, point: Vec3Like): number | undefined {
  if (point.x < 0 || point.y < 0 || point.z < 0) return undefined;
  if (point.x >= size.x || point.y >= size.y || point.z >= size.z) return undefined;
  return (point.y * size.z + point.z) * size.x + point.x;
}

export function indexToCoordinate(size: Vec3Like, index: number): Vector3 | undefined {
  if (size.x < 0 || size.y < 0 || size.z < 0) return undefined;
  const layer = size.x * size.z;
  if (!Number.isInteger(index) || index < 0 || index >= layer * size.y) return undefined;
  const rem = index % layer;
  return new Vector3(rem % size.x, Math.floor(index / layer), Math.floor(rem / size.x));
}
