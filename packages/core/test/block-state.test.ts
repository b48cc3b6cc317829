import { describe, expect, it } from "vitest";
import { BlockMap, BlockState, normalizeBlockName, Vector3 } from "../src/index.js";

describe("normalizeBlockName", () => {
  it("lowercases and adds the default namespace", () => {
    expect(normalizeBlockName("air")).toBe("minecraft:air");
    expect(normalizeBlockName("Air")).toBe("minecraft:air");
    expect(normalizeBlockName("CoOlMoD:aIr")).toBe("coolmod:air");
    expect(normalizeBlockName("ModX:Foo")).toBe("modx:foo");
  });

  it("keeps surrounding whitespace", () => {
    expect(normalizeBlockName(" Stone")).toBe("minecraft: stone");
    expect(new BlockState(" stone").equals(new BlockState("stone"))).toBe(false);
  });
});

describe("BlockState", () => {
  it("compares properties regardless of order", () => {
    const a = new BlockState("oak_stairs", { facing: "north", half: "top" });
    const b = new BlockState("minecraft:OAK_STAIRS", { half: "top", facing: "north" });
    expect(a.equals(b)).toBe(true);
    expect(a.key).toBe(b.key);
    expect(a.toString()).toBe("minecraft:oak_stairs[facing=north,half=top]");
    expect(a.equals(b.withProperty("half", "bottom"))).toBe(false);
  });

  it("never confuses separators inside values with property boundaries", () => {
    const packed = new BlockState("note_block", { a: "1,b=2" });
    const split = new BlockState("note_block", { a: "1", b: "2" });
    expect(packed.toString()).toBe(split.toString());
    expect(packed.equals(split)).toBe(false);
    expect(packed.key).not.toBe(split.key);

    const bracket = new BlockState("note_block", { a: "1]" });
    expect(bracket.equals(new BlockState("note_block", { a: "1" }))).toBe(false);
    expect(bracket.key).not.toBe(new BlockState("note_block", { a: "1" }).key);
  });

  it("never confuses a bracketed name with properties", () => {
    const named = new BlockState("x[a=1]");
    const withProps = new BlockState("x", { a: "1" });
    expect(named.toString()).toBe(withProps.toString());
    expect(named.equals(withProps)).toBe(false);
    expect(named.key).not.toBe(withProps.key);
  });

  it("returns new values from controlled mutation", () => {
    const stone = new BlockState("stone");
    const renamed = stone.withName("Granite");
    expect(stone.name).toBe("minecraft:stone");
    expect(renamed.name).toBe("minecraft:granite");
    const lit = stone.withProperty("lit", "true");
    expect(lit.property("lit")).toBe("true");
    expect(lit.withoutProperty("lit").equals(stone)).toBe(true);
    expect(stone.propertyCount).toBe(0);
  });

  it("recognizes only the bare default air", () => {
    expect(new BlockState("AIR").isAir()).toBe(true);
    expect(new BlockState("air", { x: "1" }).isAir()).toBe(false);
    expect(new BlockState("cave_air").isAir()).toBe(false);
  });
});

describe("BlockMap", () => {
  it("drops entries set to air", () => {
    const map = new BlockMap();
    map.set({ x: 1, y: 2, z: 3 }, new BlockState("stone"));
    expect(map.get(new Vector3(1, 2, 3))?.name).toBe("minecraft:stone");
    map.set({ x: 1, y: 2, z: 3 }, BlockState.AIR);
    expect(map.size).toBe(0);
    expect(map.get({ x: 1, y: 2, z: 3 })).toBeUndefined();
  });

  it("sorts in packed-array order and lists distinct states", () => {
    const map = new BlockMap();
    map.set({ x: 1, y: 1, z: 0 }, new BlockState("dirt"));
    map.set({ x: 0, y: 0, z: 1 }, new BlockState("stone"));
    map.set({ x: 1, y: 0, z: 0 }, new BlockState("dirt"));
    expect(map.sorted().map((e) => e.pos.key())).toEqual(["1,0,0", "0,0,1", "1,1,0"]);
    expect(map.distinctStates().map((s) => s.toString())).toEqual(["minecraft:dirt", "minecraft:stone"]);
    const copy = map.clone();
    copy.delete({ x: 1, y: 1, z: 0 });
    expect(map.size).toBe(3);
    expect(copy.size).toBe(2);
  });

  it("keeps states with colliding readable forms distinct", () => {
    const map = new BlockMap();
    map.set({ x: 0, y: 0, z: 0 }, new BlockState("note_block", { a: "1,b=2" }));
    map.set({ x: 1, y: 0, z: 0 }, new BlockState("note_block", { a: "1", b: "2" }));
    expect(map.distinctStates()).toHaveLength(2);
  });
});
