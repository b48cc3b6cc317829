import { TAG_TYPES } from "./reader.js";
import type { NbtCompound, NbtListElementType, NbtTag } from "./tags.js";

class Sink {
  private buffer = new Uint8Array(256);
  private view = new DataView(this.buffer.buffer);
  private offset = 0;

  private reserve(size: number): number {
    const at = this.offset;
    if (at + size > this.buffer.length) {
      let capacity = this.buffer.length * 2;
      while (at + size > capacity) capacity *= 2;
      const next = new Uint8Array(capacity);
      next.set(this.buffer.subarray(0, at));
      this.buffer = next;
      this.view = new DataView(next.buffer);
    }
    this.offset += size;
    return at;
  }

  public i8(v: number): void {
    this.view.setInt8(this.reserve(1), v);
  }

  public u8(v: number): void {
    this.view.setUint8(this.reserve(1), v);
  }

  public i16(v: number): void {
    this.view.setInt16(this.reserve(2), v, false);
  }

  public u16(v: number): void {
    this.view.setUint16(this.reserve(2), v, false);
  }

  public i32(v: number): void {
    this.view.setInt32(this.reserve(4), v, false);
  }

  public i64(v: bigint): void {
    this.view.setBigInt64(this.reserve(8), BigInt.asIntN(64, v), false);
  }

  public f32(v: number): void {
    this.view.setFloat32(this.reserve(4), v, false);
  }

  public f64(v: number): void {
    this.view.setFloat64(this.reserve(8), v, false);
  }

  public bytes(b: Uint8Array): void {
    this.buffer.set(b, this.reserve(b.length));
  }

  public finish(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}

function tagId(type: NbtListElementType): number {
  return TAG_TYPES.indexOf(type);
}

function writeString(s: Sink, value: string): void {
  const utf8 = Buffer.from(value, "utf8");
  if (utf8.length > 0xffff) {
    throw new RangeError(`String of ${utf8.length} bytes does not fit an NBT string`);
  }
  s.u16(utf8.length);
  s.bytes(utf8);
}

function writeCompound(s: Sink, compound: NbtCompound): void {
  for (const [name, tag] of compound) {
    s.u8(tagId(tag.type));
    writeString(s, name);
    writePayload(s, tag);
  }
  s.u8(0);
}

function writePayload(s: Sink, tag: NbtTag): void {
  switch (tag.type) {
    case "byte":
      s.i8(tag.value);
      return;
    case "short":
      s.i16(tag.value);
      return;
    case "int":
      s.i32(tag.value);
      return;
    case "long":
      s.i64(tag.value);
      return;
    case "float":
      s.f32(tag.value);
      return;
    case "double":
      s.f64(tag.value);
      return;
    case "byteArray":
      s.i32(tag.value.length);
      s.bytes(tag.value);
      return;
    case "string":
      writeString(s, tag.value);
      return;
    case "list":
      s.u8(tagId(tag.value.elementType));
      s.i32(tag.value.length);
      for (const item of tag.value) writePayload(s, item);
      return;
    case "compound":
      writeCompound(s, tag.value);
      return;
    case "intArray":
      s.i32(tag.value.length);
      for (const v of tag.value) s.i32(v);
      return;
    case "longArray":
      s.i32(tag.value.length);
      for (const v of tag.value) s.i64(v);
      return;
  }
}

export function encodeNbt(root: NbtCompound, name = ""): Uint8Array {
  const s = new Sink();
  s.u8(tagId("compound"));
  writeString(s, name);
  writeCompound(s, root);
  return s.finish();
}
