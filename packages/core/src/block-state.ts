export const DEFAULT_NAMESPACE = "minecraft";

/** `"Stone"` → `"minecraft:stone"`, `"ModX:Foo"` → `"modx:foo"`. */
export function normalizeBlockName(name: string): string {
  const lowered = name.toLowerCase();
  return lowered.includes(":") ? lowered : `${DEFAULT_NAMESPACE}:${lowered}`;
}

/**
 * A block identifier plus its string properties. Equality ignores property
 * order. `key` is the matching hash: a JSON encoding of the name and the sorted
 * entries, so separators inside names or values cannot collide. `toString()`
 * gives the readable `name[k=v,...]` form.
 */
export class BlockState {
  public static readonly AIR = new BlockState("air");

  public readonly name: string;
  public readonly key: string;
  private readonly props: ReadonlyMap<string, string>;

  public constructor(name: string, properties: Record<string, string> = {}) {
    this.name = normalizeBlockName(name);
    const sorted = Object.entries(properties).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    this.props = new Map(sorted);
    this.key = JSON.stringify([this.name, sorted]);
  }

  public get properties(): Record<string, string> {
    return Object.fromEntries(this.props);
  }

  public get propertyCount(): number {
    return this.props.size;
  }

  public property(name: string): string | undefined {
    return this.props.get(name);
  }

  public isAir(): boolean {
    return this.equals(BlockState.AIR);
  }

  public equals(other: BlockState): boolean {
    if (this.name !== other.name || this.props.size !== other.props.size) return false;
    for (const [name, value] of this.props) {
      if (other.props.get(name) !== value) return false;
    }
    return true;
  }

  public withName(name: string): BlockState {
    return new BlockState(name, this.properties);
  }

  public withProperty(name: string, value: string): BlockState {
    return new BlockState(this.name, { ...this.properties, [name]: value });
  }

  public withoutProperty(name: string): BlockState {
    const next = this.properties;
    delete next[name];
    return new BlockState(this.name, next);
  }

  public toString(): string {
    if (this.props.size === 0) return this.name;
    return `${this.name}[${[...this.props].map(([k, v]) => `${k}=${v}`).join(",")}]`;
  }
}
