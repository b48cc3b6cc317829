export * from "./types.js";
export * from "./vector.js";
export * from "./volume.js";
export * from "./block-state.js";
export * from "./packed.js";
export { BlockMap, compareDiskOrder, voxelCoordKey } from "./blocks.js";
