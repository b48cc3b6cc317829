import type { Vec3Like } from "./types.js";

/** Integer point or extent. Components are truncated to signed 32-bit. */
export class Vector3 implements Vec3Like {
  public static readonly ZERO = new Vector3(0, 0, 0);
  public static readonly ONE = new Vector3(1, 1, 1);

  public readonly x: number;
  public readonly y: number;
  public readonly z: number;

  public constructor(x: number, y: number, z: number) {
    this.x = x | 0;
    this.y = y | 0;
    this.z = z | 0;
  }

  public static from(v: Vec3Like): Vector3 {
    return v instanceof Vector3 ? v : new Vector3(v.x, v.y, v.z);
  }

  public add(other: Vec3Like): Vector3 {
    return new Vector3(this.x + other.x, this.y + other.y, this.z + other.z);
  }

  public sub(other: Vec3Like): Vector3 {
    return new Vector3(this.x - other.x, this.y - other.y, this.z - other.z);
  }

  public equals(other: Vec3Like): boolean {
    return this.x === other.x && this.y === other.y && this.z === other.z;
  }

  /** |x·y·z|, a cell count when the vector is an extent. */
  public volume(): number {
    return Math.abs(this.x * this.y * this.z);
  }

  public key(): string {
    return `${this.x},${this.y},${this.z}`;
  }

  public toString(): string {
    return `(${this.x}, ${this.y}, ${this.z})`;
  }

  public toJSON(): Vec3Like {
    return { x: this.x, y: this.y, z: this.z };
  }
}
