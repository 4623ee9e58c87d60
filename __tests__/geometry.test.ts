import {
  normalizeAngle,
  angleDifference,
  distance,
  directionAngle,
  advance,
  segmentIntersection,
  closestPointOnSegment,
  distanceToSegment,
  projectOntoWall,
  crossesAnyWall,
  pointInPolygon,
  pointInAnyPolygon,
  pathLength,
} from "@/lib/geometry";
import { toCampus, toFloorLocal, wallToCampus, polygonToCampus } from "@/lib/transform";
import { RingBuffer } from "@/lib/ringBuffer";
import { Channel } from "@/lib/channel";
import { BuildingPlacement } from "@/lib/types";

const square = [
  { x: 0, y: 0 },
  { x: 100, y: 0 },
  { x: 100, y: 100 },
  { x: 0, y: 100 },
];

describe("angles", () => {
  test("normalizes into (-π, π]", () => {
    expect(normalizeAngle(Math.PI)).toBeCloseTo(Math.PI);
    expect(normalizeAngle(-Math.PI)).toBeCloseTo(Math.PI);
    expect(normalizeAngle(Math.PI / 2 + 2 * Math.PI)).toBeCloseTo(Math.PI / 2);
  });

  test("angle difference takes the short way round", () => {
    expect(angleDifference(0.9 * Math.PI, -0.9 * Math.PI)).toBeCloseTo(0.2 * Math.PI);
    expect(angleDifference(0, -Math.PI / 2)).toBeCloseTo(-Math.PI / 2);
  });

  test("compass bearing: north is -y, east is +x", () => {
    expect(directionAngle({ x: 0, y: 0 }, { x: 0, y: -10 })).toBeCloseTo(0);
    expect(directionAngle({ x: 0, y: 0 }, { x: 10, y: 0 })).toBeCloseTo(Math.PI / 2);
    expect(directionAngle({ x: 0, y: 0 }, { x: -10, y: 0 })).toBeCloseTo(-Math.PI / 2);
  });

  test("advance walks along the heading", () => {
    const east = advance({ x: 0, y: 0 }, Math.PI / 2, 10);
    expect(east.x).toBeCloseTo(10);
    expect(east.y).toBeCloseTo(0);
    const north = advance({ x: 5, y: 5 }, 0, 3);
    expect(north.x).toBeCloseTo(5);
    expect(north.y).toBeCloseTo(2);
  });
});

describe("segments", () => {
  test("intersection of crossing segments", () => {
    const hit = segmentIntersection({ x: 0, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 }, { x: 10, y: 0 });
    expect(hit).not.toBeNull();
    expect(hit?.x).toBeCloseTo(5);
    expect(hit?.y).toBeCloseTo(5);
  });

  test("parallel or disjoint segments do not intersect", () => {
    expect(segmentIntersection({ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 0, y: 5 }, { x: 10, y: 5 })).toBeNull();
    expect(segmentIntersection({ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 5, y: 0 }, { x: 0, y: 5 })).toBeNull();
  });

  test("closest point clamps to the segment ends", () => {
    expect(closestPointOnSegment({ x: -5, y: 3 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toEqual({ x: 0, y: 0 });
    expect(closestPointOnSegment({ x: 4, y: 3 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toEqual({ x: 4, y: 0 });
    expect(distanceToSegment({ x: 4, y: 3 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(3);
  });

  test("projection keeps only the component along the wall", () => {
    expect(projectOntoWall({ x: 3, y: 4 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toEqual({ x: 3, y: 0 });
  });

  test("crossesAnyWall ignores hits within the tolerance of an endpoint", () => {
    const walls = [{ start: { x: 5, y: -10 }, end: { x: 5, y: 10 } }];
    expect(crossesAnyWall({ x: 0, y: 0 }, { x: 10, y: 0 }, walls)).toBe(true);
    expect(crossesAnyWall({ x: 0, y: 0 }, { x: 5, y: 0 }, walls, 0.5)).toBe(false);
    expect(crossesAnyWall({ x: 0, y: 0 }, { x: 4, y: 0 }, walls)).toBe(false);
  });

  test("path length sums the legs", () => {
    expect(pathLength([{ x: 0, y: 0 }, { x: 3, y: 4 }, { x: 3, y: 10 }])).toBe(11);
    expect(pathLength([])).toBe(0);
    expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });
});

describe("polygons", () => {
  test("point in square", () => {
    expect(pointInPolygon({ x: 50, y: 50 }, square)).toBe(true);
    expect(pointInPolygon({ x: 150, y: 150 }, square)).toBe(false);
  });

  test("fewer than three points contain nothing", () => {
    expect(pointInPolygon({ x: 0, y: 0 }, [{ x: 0, y: 0 }, { x: 1, y: 1 }])).toBe(false);
    expect(pointInAnyPolygon({ x: 50, y: 50 }, [[], square])).toBe(true);
  });
});

describe("coordinate transform", () => {
  const placement: BuildingPlacement = { scale: 2, rotationDegrees: 90, offset: { x: 100, y: 50 } };

  test("scale, rotate clockwise, then translate", () => {
    const p = toCampus({ x: 10, y: 0 }, placement);
    expect(p.x).toBeCloseTo(100);
    expect(p.y).toBeCloseTo(70);
  });

  test("inverse round trip", () => {
    const local = { x: 12.5, y: -7.25 };
    const back = toFloorLocal(toCampus(local, placement), placement);
    expect(back.x).toBeCloseTo(local.x);
    expect(back.y).toBeCloseTo(local.y);
  });

  test("inverse rejects a non-positive scale", () => {
    expect(() => toFloorLocal({ x: 0, y: 0 }, { ...placement, scale: 0 })).toThrow(RangeError);
  });

  test("walls and polygons are transformed point by point", () => {
    const identity: BuildingPlacement = { scale: 1, rotationDegrees: 0, offset: { x: 10, y: 20 } };
    expect(wallToCampus({ x1: 0, y1: 0, x2: 5, y2: 0 }, identity)).toEqual({
      start: { x: 10, y: 20 },
      end: { x: 15, y: 20 },
    });
    const polygon = polygonToCampus(
      {
        points: [
          { id: 2, x: 1, y: 1 },
          { id: 1, x: 0, y: 0 },
          { id: 3, x: 0, y: 1 },
        ],
      },
      identity
    );
    expect(polygon).toEqual([
      { x: 10, y: 20 },
      { x: 11, y: 21 },
      { x: 10, y: 21 },
    ]);
  });
});

describe("RingBuffer", () => {
  test("overwrites the oldest entry when full", () => {
    const ring = new RingBuffer<number>(3);
    [1, 2, 3, 4].forEach((n) => ring.push(n));
    expect(ring.toArray()).toEqual([2, 3, 4]);
    expect(ring.oldest()).toBe(2);
    expect(ring.newest()).toBe(4);
    expect(ring.isFull).toBe(true);
    expect(ring.countWhere((n) => n % 2 === 0)).toBe(2);
  });

  test("clear empties the buffer", () => {
    const ring = new RingBuffer<string>(2);
    ring.push("a");
    ring.clear();
    expect(ring.size).toBe(0);
    expect(ring.oldest()).toBeUndefined();
  });

  test("rejects an invalid capacity", () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
    expect(() => new RingBuffer<number>(1.5)).toThrow(RangeError);
  });
});

describe("Channel", () => {
  test("a throwing listener does not stop the others", () => {
    const errors: unknown[] = [];
    const channel = new Channel<number>((err) => errors.push(err));
    const seen: number[] = [];
    channel.subscribe(() => {
      throw new Error("boom");
    });
    const unsubscribe = channel.subscribe((n) => seen.push(n));
    channel.emit(1);
    unsubscribe();
    channel.emit(2);
    expect(seen).toEqual([1]);
    expect(errors).toHaveLength(2);
  });
});
