import { gunzipSync, gzipSync } from "node:zlib";
import { decodeNbt, type NbtDocument } from "./reader.js";
import { encodeNbt } from "./writer.js";
import { NbtError, type NbtCompound } from "./tags.js";

export { decodeNbt, MAX_DEPTH, TAG_TYPES, type NbtDocument } from "./reader.js";
export { encodeNbt } from "./writer.js";
export {
  cloneTag,
  isTagOf,
  NbtCompound,
  NbtError,
  NbtList,
  type NbtErrorCode,
  type NbtListElementType,
  type NbtTag,
  type NbtTagOf,
  type NbtTagType,
  type NbtValueOf
} from "./tags.js";

export type NbtCompression = "auto" | "gzip" | "none";

export interface ReadNbtOptions {
  compression?: NbtCompression;
}

export interface WriteNbtOptions {
  name?: string;
  compression?: Exclude<NbtCompression, "auto">;
}

export function isGzip(input: Uint8Array): boolean {
  return input.length >= 2 && input[0] === 0x1f && input[1] === 0x8b;
}

function gunzip(input: Uint8Array): Uint8Array {
  try {
    return gunzipSync(input);
  } catch (error) {
    throw new NbtError("NBT_GZIP_FAILED", `Gzip envelope could not be read: ${(error as Error).message}`, {
      cause: error
    });
  }
}

/** Decodes a whole document. `auto` (the default) unwraps gzip only when the magic bytes are present. */
export function readNbt(input: Uint8Array, options: ReadNbtOptions = {}): NbtDocument {
  const compression = options.compression ?? "auto";
  if (compression === "gzip" || (compression === "auto" && isGzip(input))) {
    return decodeNbt(gunzip(input));
  }
  return decodeNbt(input);
}

export function writeNbt(root: NbtCompound, options: WriteNbtOptions = {}): Uint8Array {
  const raw = encodeNbt(root, options.name ?? "");
  if ((options.compression ?? "gzip") === "gzip") {
    return new Uint8Array(gzipSync(raw));
  }
  return raw;
}
