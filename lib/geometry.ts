import { Point, CampusWall, CampusPolygon } from "./types";

/**
 * 2-D geometry helpers shared by tracking, detection and routing.
 * All functions work in the campus-wide frame.
 *
 * Heading convention: 0 = north (screen up / −y), clockwise positive.
 */

const TWO_PI = 2 * Math.PI;
const EPS = 1e-10;

/** Normalizes an angle to (−π, π] */
export function normalizeAngle(angle: number): number {
  let a = angle % TWO_PI;
  if (a > Math.PI) a -= TWO_PI;
  if (a <= -Math.PI) a += TWO_PI;
  return a;
}

/** Shortest signed angle from → to. Positive = clockwise. */
export function angleDifference(from: number, to: number): number {
  return normalizeAngle(to - from);
}

export function distance(a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/** Compass bearing from → to (0 = north, clockwise) */
export function directionAngle(from: Point, to: Point): number {
  return Math.atan2(to.x - from.x, -(to.y - from.y));
}

/** Point reached by walking `length` along `heading` */
export function advance(from: Point, heading: number, length: number): Point {
  return {
    x: from.x + length * Math.sin(heading),
    y: from.y - length * Math.cos(heading),
  };
}

/**
 * Intersection of segments A→B and C→D, or null when they are parallel
 * or the crossing lies outside either segment.
 */
export function segmentIntersection(a: Point, b: Point, c: Point, d: Point): Point | null {
  const dx1 = b.x - a.x;
  const dy1 = b.y - a.y;
  const dx2 = d.x - c.x;
  const dy2 = d.y - c.y;

  const denom = dx1 * dy2 - dy1 * dx2;
  if (Math.abs(denom) < EPS) return null;

  const t = ((c.x - a.x) * dy2 - (c.y - a.y) * dx2) / denom;
  const u = ((c.x - a.x) * dy1 - (c.y - a.y) * dx1) / denom;
  if (t < 0 || t > 1 || u < 0 || u > 1) return null;

  return { x: a.x + t * dx1, y: a.y + t * dy1 };
}

export function closestPointOnSegment(p: Point, a: Point, b: Point): Point {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lenSq = dx * dx + dy * dy;
  if (lenSq < EPS) return { x: a.x, y: a.y };

  const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lenSq));
  return { x: a.x + t * dx, y: a.y + t * dy };
}

export function distanceToSegment(p: Point, a: Point, b: Point): number {
  return distance(p, closestPointOnSegment(p, a, b));
}

/** Component of `movement` along the wall direction */
export function projectOntoWall(movement: Point, wallStart: Point, wallEnd: Point): Point {
  const wx = wallEnd.x - wallStart.x;
  const wy = wallEnd.y - wallStart.y;
  const lenSq = wx * wx + wy * wy;
  if (lenSq < EPS) return { x: 0, y: 0 };

  const dot = (movement.x * wx + movement.y * wy) / lenSq;
  return { x: dot * wx, y: dot * wy };
}

/**
 * True if segment A→B crosses any wall. Crossings within `tolerance` of
 * either endpoint are ignored (an entrance usually sits on its wall line).
 */
export function crossesAnyWall(
  a: Point,
  b: Point,
  walls: readonly CampusWall[],
  tolerance = 0
): boolean {
  for (const wall of walls) {
    const hit = segmentIntersection(a, b, wall.start, wall.end);
    if (!hit) continue;
    if (distance(hit, a) <= tolerance || distance(hit, b) <= tolerance) continue;
    return true;
  }
  return false;
}

/**
 * Even-odd ray-casting point-in-polygon test.
 * Polygons with fewer than 3 points never contain anything.
 */
export function pointInPolygon(point: Point, polygon: CampusPolygon): boolean {
  const n = polygon.length;
  if (n < 3) return false;

  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const pi = polygon[i];
    const pj = polygon[j];
    const crosses =
      pi.y > point.y !== pj.y > point.y &&
      point.x < ((pj.x - pi.x) * (point.y - pi.y)) / (pj.y - pi.y) + pi.x;
    if (crosses) inside = !inside;
  }
  return inside;
}

export function pointInAnyPolygon(point: Point, polygons: readonly CampusPolygon[]): boolean {
  return polygons.some((polygon) => pointInPolygon(point, polygon));
}

/** Total polyline length */
export function pathLength(points: readonly Point[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += distance(points[i - 1], points[i]);
  }
  return total;
}
