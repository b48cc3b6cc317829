import { NbtCompound, NbtError, NbtList, type NbtListElementType, type NbtTag } from "./tags.js";

export const TAG_TYPES: readonly NbtListElementType[] = [
  "end",
  "byte",
  "short",
  "int",
  "long",
  "float",
  "double",
  "byteArray",
  "string",
  "list",
  "compound",
  "intArray",
  "longArray"
];

export const MAX_DEPTH = 512;

class Cursor {
  public offset = 0;
  public constructor(public readonly view: DataView) {}

  public ensure(size: number): void {
    if (this.offset + size > this.view.byteLength) {
      throw new NbtError("NBT_TRUNCATED", `Truncated at offset=${this.offset}, wanted ${size} more bytes`);
    }
  }

  public i8(): number {
    this.ensure(1);
    const v = this.view.getInt8(this.offset);
    this.offset += 1;
    return v;
  }

  public u8(): number {
    this.ensure(1);
    const v = this.view.getUint8(this.offset);
    this.offset += 1;
    return v;
  }

  public i16(): number {
    this.ensure(2);
    const v = this.view.getInt16(this.offset, false);
    this.offset += 2;
    return v;
  }

  public u16(): number {
    this.ensure(2);
    const v = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return v;
  }

  public i32(): number {
    this.ensure(4);
    const v = this.view.getInt32(this.offset, false);
    this.offset += 4;
    return v;
  }

  public i64(): bigint {
    this.ensure(8);
    const hi = this.view.getInt32(this.offset, false);
    const lo = this.view.getUint32(this.offset + 4, false);
    this.offset += 8;
    return (BigInt(hi) << 32n) + BigInt(lo);
  }

  public f32(): number {
    this.ensure(4);
    const v = this.view.getFloat32(this.offset, false);
    this.offset += 4;
    return v;
  }

  public f64(): number {
    this.ensure(8);
    const v = this.view.getFloat64(this.offset, false);
    this.offset += 8;
    return v;
  }

  public bytes(n: number): Uint8Array {
    this.ensure(n);
    const out = new Uint8Array(this.view.buffer, this.view.byteOffset + this.offset, n);
    this.offset += n;
    return new Uint8Array(out);
  }

  public length(what: string): number {
    const len = this.i32();
    if (len < 0) throw new NbtError("NBT_NEGATIVE_LENGTH", `Negative ${what} length ${len} at offset=${this.offset - 4}`);
    return len;
  }
}

function tagType(id: number): NbtListElementType {
  const type = TAG_TYPES[id];
  if (type === undefined) {
    throw new NbtError("NBT_UNSUPPORTED_TAG", `Unsupported tag id ${id}`);
  }
  return type;
}

function readString(c: Cursor): string {
  return Buffer.from(c.bytes(c.u16())).toString("utf8");
}

function readCompound(c: Cursor, depth: number): NbtCompound {
  const out = new NbtCompound();
  while (true) {
    const nextType = tagType(c.u8());
    if (nextType === "end") break;
    const key = readString(c);
    out.set(key, readPayload(c, nextType, depth + 1));
  }
  return out;
}

function readPayload(c: Cursor, type: NbtListElementType, depth: number): NbtTag {
  if (depth > MAX_DEPTH) {
    throw new NbtError("NBT_DEPTH_EXCEEDED", `Nesting deeper than ${MAX_DEPTH}`);
  }
  switch (type) {
    case "byte":
      return { type, value: c.i8() };
    case "short":
      return { type, value: c.i16() };
    case "int":
      return { type, value: c.i32() };
    case "long":
      return { type, value: c.i64() };
    case "float":
      return { type, value: c.f32() };
    case "double":
      return { type, value: c.f64() };
    case "byteArray":
      return { type, value: c.bytes(c.length("byte array")) };
    case "string":
      return { type, value: readString(c) };
    case "list": {
      const childType = tagType(c.u8());
      const len = c.length("list");
      const out = new NbtList(childType);
      if (childType === "end") {
        if (len > 0) throw new NbtError("NBT_UNSUPPORTED_TAG", `List of ${len} end tags`);
        return { type, value: out };
      }
      for (let i = 0; i < len; i++) {
        out.push(readPayload(c, childType, depth + 1));
      }
      return { type, value: out };
    }
    case "compound":
      return { type, value: readCompound(c, depth) };
    case "intArray": {
      const len = c.length("int array");
      c.ensure(len * 4);
      const out = new Array<number>(len);
      for (let i = 0; i < len; i++) out[i] = c.i32();
      return { type, value: out };
    }
    case "longArray": {
      const len = c.length("long array");
      c.ensure(len * 8);
      const out = new Array<bigint>(len);
      for (let i = 0; i < len; i++) out[i] = c.i64();
      return { type, value: out };
    }
    case "end":
      throw new NbtError("NBT_UNSUPPORTED_TAG", "Unexpected end tag");
  }
}

export interface NbtDocument {
  name: string;
  root: NbtCompound;
}

export function decodeNbt(input: Uint8Array): NbtDocument {
  const c = new Cursor(new DataView(input.buffer, input.byteOffset, input.byteLength));
  const rootType = c.u8();
  if (rootType !== 10) {
    throw new NbtError("NBT_ROOT_NOT_COMPOUND", `Root tag id is ${rootType}, expected a compound`);
  }
  const name = readString(c);
  return { name, root: readCompound(c, 0) };
}
