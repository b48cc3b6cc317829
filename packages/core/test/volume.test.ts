import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { coordinateToIndex, indexToCoordinate, Vector3, Volume } from "../src/index.js";

const v = (x: number, y: number, z: number): Vector3 => new Vector3(x, y, z);

function expectVolume(actual: Volume, origin: Vector3, size: Vector3): void {
  expect(actual.origin().toJSON()).toEqual(origin.toJSON());
  expect(actual.size().toJSON()).toEqual(size.toJSON());
}

describe("Vector3", () => {
  it("adds, subtracts and counts cells", () => {
    expect(v(1, 2, 3).add(v(1, -1, 0)).toJSON()).toEqual({ x: 2, y: 1, z: 3 });
    expect(v(1, 2, 3).sub(v(1, 1, 1)).toJSON()).toEqual({ x: 0, y: 1, z: 2 });
    expect(v(2, -3, 4).volume()).toBe(24);
    expect(v(2.9, -1.5, 0).toJSON()).toEqual({ x: 2, y: -1, z: 0 });
  });
});

describe("Volume", () => {
  it("derives pos2 from origin and a possibly negative size", () => {
    expect(Volume.fromOriginSize(v(1, 1, 1), v(1, 1, 1)).pos2.toJSON()).toEqual({ x: 2, y: 2, z: 2 });
    expect(Volume.fromOriginSize(v(1, 1, 1), v(-1, -1, -1)).pos2.toJSON()).toEqual({ x: 0, y: 0, z: 0 });
    expect(Volume.fromOriginSize(v(0, 0, 0), v(2, -3, 4)).volume()).toBe(24);
  });

  it("expands to fit a point", () => {
    expectVolume(Volume.empty().expandToFit(v(1, 1, 1)), v(0, 0, 0), v(2, 2, 2));
    expectVolume(Volume.empty().expandToFit(v(-1, -1, -1)), v(0, 0, 0), v(-1, -1, -1));
    expectVolume(Volume.fromOriginSize(v(1, 1, 1), v(2, 2, 2)).expandToFit(v(0, 0, 0)), v(0, 0, 0), v(3, 3, 3));
    expectVolume(Volume.fromOriginSize(v(1, 1, 1), v(2, -2, 2)).expandToFit(v(0, 0, 0)), v(0, 1, 0), v(3, -2, 3));
  });

  it("does not move when the point is already inside", () => {
    const box = Volume.fromOriginSize(v(0, 0, 0), v(4, 4, 4));
    expect(box.expandToFit(v(3, 0, 2)).equals(box)).toBe(true);
  });

  it("expands to fit another volume", () => {
    const grown = Volume.fromOriginSize(v(0, 0, 0), v(1, 1, 1)).expandToFitVolume(
      Volume.fromOriginSize(v(5, 5, 5), v(-2, -2, -2))
    );
    expectVolume(grown, v(0, 0, 0), v(5, 5, 5));
  });

  it("expands to fit a flat volume by its corners", () => {
    const grown = Volume.fromOriginSize(v(0, 0, 0), v(1, 1, 1)).expandToFitVolume(
      Volume.fromOriginSize(v(5, 0, 0), v(3, 0, 3))
    );
    expectVolume(grown, v(0, -1, 0), v(8, 2, 3));
  });

  it("normalizes to a positive size", () => {
    const positive = Volume.fromOriginSize(v(2, 3, 4), v(-2, 5, -7)).makeSizePositive();
    expect(positive.equals(Volume.fromOriginSize(v(0, 3, -3), v(2, 5, 7)))).toBe(true);
  });

  it("moves and resizes", () => {
    const box = Volume.fromOriginSize(v(1, 2, 3), v(4, -5, 6));
    expectVolume(box.moveTo(v(0, 0, 0)), v(0, 0, 0), v(4, -5, 6));
    expectVolume(box.changeSize(v(1, 1, 1)), v(1, 2, 3), v(1, 1, 1));
  });

  it("contains cells of the normalized box", () => {
    const box = Volume.fromOriginSize(v(0, 0, 0), v(-2, 2, 2));
    expect(box.contains(v(-2, 0, 0))).toBe(true);
    expect(box.contains(v(-1, 1, 1))).toBe(true);
    expect(box.contains(v(0, 0, 0))).toBe(false);
  });

  it("iterates x fastest, then z, then y, restarting each time", () => {
    const box = Volume.fromOriginSize(v(1, 0, 0), v(2, 2, -1));
    const cells = box.iterate();
    const first = [...cells].map((c) => c.toJSON());
    expect(first).toEqual([
      { x: 1, y: 0, z: -1 },
      { x: 2, y: 0, z: -1 },
      { x: 1, y: 1, z: -1 },
      { x: 2, y: 1, z: -1 }
    ]);
    expect([...cells].map((c) => c.toJSON())).toEqual(first);
    expect(box.size().toJSON()).toEqual({ x: 2, y: 2, z: -1 });
    expect([...Volume.empty().iterate()]).toEqual([]);
  });
});

describe("coordinateToIndex / indexToCoordinate", () => {
  it("maps known indices", () => {
    expect(indexToCoordinate(v(4, 6, 5), 53)?.toJSON()).toEqual({ x: 1, y: 2, z: 3 });
    expect(indexToCoordinate(v(4, 6, 5), 54)?.toJSON()).toEqual({ x: 2, y: 2, z: 3 });
    expect(indexToCoordinate(v(2, 3, 3), 1)?.toJSON()).toEqual({ x: 1, y: 0, z: 0 });
    expect(indexToCoordinate(v(2, 3, 3), 9)?.toJSON()).toEqual({ x: 1, y: 1, z: 1 });
    expect(coordinateToIndex(v(4, 6, 5), v(1, 2, 3))).toBe(53);
  });

  it("reports out of range", () => {
    expect(indexToCoordinate(v(0, 0, 0), 0)).toBeUndefined();
    expect(indexToCoordinate(v(0, 0, 0), 1)).toBeUndefined();
    expect(indexToCoordinate(v(2, 3, 3), 18)).toBeUndefined();
    expect(coordinateToIndex(v(2, 3, 3), v(2, 0, 0))).toBeUndefined();
    expect(coordinateToIndex(v(2, 3, 3), v(0, -1, 0))).toBeUndefined();
  });

  it("property: the two mappings are inverse", () => {
    fc.assert(
      fc.property(
        fc.record({ x: fc.integer({ min: 0, max: 7 }), y: fc.integer({ min: 0, max: 7 }), z: fc.integer({ min: 0, max: 7 }) }),
        fc.nat({ max: 600 }),
        (s, index) => {
          const size = v(s.x, s.y, s.z);
          const pos = indexToCoordinate(size, index);
          if (index >= size.volume()) {
            expect(pos).toBeUndefined();
            return;
          }
          expect(pos).toBeDefined();
          if (pos) expect(coordinateToIndex(size, pos)).toBe(index);
        }
      )
    );
  });

  it("matches iteration order", () => {
    const box = Volume.fromOriginSize(v(0, 0, 0), v(3, 2, 4));
    let i = 0;
    for (const cell of box.iterate()) {
      expect(coordinateToIndex(box.size(), cell)).toBe(i++);
    }
    expect(i).toBe(24);
  });
});
