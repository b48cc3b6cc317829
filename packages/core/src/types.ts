import type { BlockState } from "./block-state.js";
import type { Vector3 } from "./vector.js";

export interface Vec3Like {
  x: number;
  y: number;
  z: number;
}

export interface BlockEntry {
  pos: Vector3;
  state: BlockState;
}
