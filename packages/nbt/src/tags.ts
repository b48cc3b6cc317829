export type NbtTag =
  | { type: "byte"; value: number }
  | { type: "short"; value: number }
  | { type: "int"; value: number }
  | { type: "long"; value: bigint }
  | { type: "float"; value: number }
  | { type: "double"; value: number }
  | { type: "byteArray"; value: Uint8Array }
  | { type: "string"; value: string }
  | { type: "list"; value: NbtList }
  | { type: "compound"; value: NbtCompound }
  | { type: "intArray"; value: number[] }
  | { type: "longArray"; value: bigint[] };

export type NbtTagType = NbtTag["type"];
export type NbtListElementType = NbtTagType | "end";
export type NbtTagOf<T extends NbtTagType> = Extract<NbtTag, { type: T }>;
export type NbtValueOf<T extends NbtTagType> = NbtTagOf<T>["value"];

export type NbtErrorCode =
  | "NBT_TRUNCATED"
  | "NBT_NEGATIVE_LENGTH"
  | "NBT_UNSUPPORTED_TAG"
  | "NBT_ROOT_NOT_COMPOUND"
  | "NBT_DEPTH_EXCEEDED"
  | "NBT_GZIP_FAILED"
  | "NBT_MISSING_FIELD"
  | "NBT_WRONG_TAG";

export class NbtError extends Error {
  public readonly code: NbtErrorCode;
  public readonly field?: string;

  public constructor(code: NbtErrorCode, message: string, options: { field?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "NbtError";
    this.code = code;
    this.field = options.field;
  }
}

export function isTagOf<T extends NbtTagType>(tag: NbtTag, type: T): tag is NbtTagOf<T> {
  return tag.type === type;
}

export function cloneTag(tag: NbtTag): NbtTag {
  switch (tag.type) {
    case "byteArray":
      return { type: "byteArray", value: new Uint8Array(tag.value) };
    case "list":
      return { type: "list", value: tag.value.clone() };
    case "compound":
      return { type: "compound", value: tag.value.clone() };
    case "intArray":
      return { type: "intArray", value: [...tag.value] };
    case "longArray":
      return { type: "longArray", value: [...tag.value] };
    default:
      return { ...tag };
  }
}

/**
 * Homogeneous list. An empty list created without an element type is typed
 * `end` until the first push.
 */
export class NbtList implements Iterable<NbtTag> {
  private type: NbtListElementType;
  private readonly items: NbtTag[] = [];

  public constructor(elementType: NbtListElementType = "end") {
    this.type = elementType;
  }

  public static of(elementType: NbtListElementType, items: Iterable<NbtTag>): NbtList {
    const list = new NbtList(elementType);
    for (const item of items) list.push(item);
    return list;
  }

  public get elementType(): NbtListElementType {
    return this.type;
  }

  public get length(): number {
    return this.items.length;
  }

  public at(index: number): NbtTag | undefined {
    return this.items[index];
  }

  public push(tag: NbtTag): this {
    if (this.type === "end" && this.items.length === 0) {
      this.type = tag.type;
    }
    if (tag.type !== this.type) {
      throw new NbtError("NBT_WRONG_TAG", `Cannot add ${tag.type} to a list of ${this.type}`);
    }
    this.items.push(tag);
    return this;
  }

  public [Symbol.iterator](): Iterator<NbtTag> {
    return this.items[Symbol.iterator]();
  }

  public clone(): NbtList {
    return NbtList.of(this.type, this.items.map(cloneTag));
  }
}

/**
 * Named fields in insertion order. Typed getters throw `NbtError` naming the
 * field when it is absent or holds another tag type; the `find*` variants
 * return `undefined` for an absent field but still reject a wrong type.
 */
export class NbtCompound implements Iterable<[string, NbtTag]> {
  private readonly entries = new Map<string, NbtTag>();

  public get size(): number {
    return this.entries.size;
  }

  public has(name: string): boolean {
    return this.entries.has(name);
  }

  public get(name: string): NbtTag | undefined {
    return this.entries.get(name);
  }

  public keys(): string[] {
    return [...this.entries.keys()];
  }

  public set(name: string, tag: NbtTag): this {
    this.entries.set(name, tag);
    return this;
  }

  public delete(name: string): boolean {
    return this.entries.delete(name);
  }

  public [Symbol.iterator](): Iterator<[string, NbtTag]> {
    return this.entries[Symbol.iterator]();
  }

  public getAs<T extends NbtTagType>(name: string, type: T): NbtValueOf<T> {
    const value = this.findAs(name, type);
    if (value === undefined) {
      throw new NbtError("NBT_MISSING_FIELD", `Missing field "${name}"`, { field: name });
    }
    return value;
  }

  public findAs<T extends NbtTagType>(name: string, type: T): NbtValueOf<T> | undefined {
    const tag = this.entries.get(name);
    if (!tag) return undefined;
    if (!isTagOf(tag, type)) {
      throw new NbtError("NBT_WRONG_TAG", `Field "${name}" is ${tag.type}, expected ${type}`, { field: name });
    }
    return tag.value;
  }

  public getString(name: string): string {
    return this.getAs(name, "string");
  }

  public getInt(name: string): number {
    return this.getAs(name, "int");
  }

  public getLong(name: string): bigint {
    return this.getAs(name, "long");
  }

  public getList(name: string): NbtList {
    return this.getAs(name, "list");
  }

  public getCompound(name: string): NbtCompound {
    return this.getAs(name, "compound");
  }

  public getIntArray(name: string): number[] {
    return this.getAs(name, "intArray");
  }

  public getLongArray(name: string): bigint[] {
    return this.getAs(name, "longArray");
  }

  public findList(name: string): NbtList | undefined {
    return this.findAs(name, "list");
  }

  public setString(name: string, value: string): this {
    return this.set(name, { type: "string", value });
  }

  public setInt(name: string, value: number): this {
    return this.set(name, { type: "int", value: value | 0 });
  }

  public setLong(name: string, value: bigint): this {
    return this.set(name, { type: "long", value: BigInt.asIntN(64, value) });
  }

  public setList(name: string, value: NbtList): this {
    return this.set(name, { type: "list", value });
  }

  public setCompound(name: string, value: NbtCompound): this {
    return this.set(name, { type: "compound", value });
  }

  public setIntArray(name: string, value: number[]): this {
    return this.set(name, { type: "intArray", value });
  }

  public setLongArray(name: string, value: bigint[]): this {
    return this.set(name, { type: "longArray", value });
  }

  public clone(): NbtCompound {
    const out = new NbtCompound();
    for (const [name, tag] of this.entries) {
      out.set(name, cloneTag(tag));
    }
    return out;
  }
}
