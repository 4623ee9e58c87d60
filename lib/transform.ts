import {
  Point,
  BuildingPlacement,
  Wall,
  CampusWall,
  BoundaryPolygon,
  CampusPolygon,
} from "./types";

/**
 * Floor-local → campus-wide coordinate transform.
 * Pipeline: scale → rotate (degrees, clockwise on a y-down canvas) → translate.
 */
export function toCampus(point: Point, placement: BuildingPlacement): Point {
  const rad = (placement.rotationDegrees * Math.PI) / 180;
  const cosA = Math.cos(rad);
  const sinA = Math.sin(rad);
  const sx = point.x * placement.scale;
  const sy = point.y * placement.scale;
  return {
    x: sx * cosA - sy * sinA + placement.offset.x,
    y: sx * sinA + sy * cosA + placement.offset.y,
  };
}

/** Inverse of {@link toCampus}. Requires scale > 0. */
export function toFloorLocal(point: Point, placement: BuildingPlacement): Point {
  if (!(placement.scale > 0)) {
    throw new RangeError(`Cannot invert placement with scale ${placement.scale}`);
  }
  const rad = (placement.rotationDegrees * Math.PI) / 180;
  const cosA = Math.cos(rad);
  const sinA = Math.sin(rad);
  const tx = point.x - placement.offset.x;
  const ty = point.y - placement.offset.y;
  return {
    x: (tx * cosA + ty * sinA) / placement.scale,
    y: (-tx * sinA + ty * cosA) / placement.scale,
  };
}

export function wallToCampus(wall: Wall, placement: BuildingPlacement): CampusWall {
  return {
    start: toCampus({ x: wall.x1, y: wall.y1 }, placement),
    end: toCampus({ x: wall.x2, y: wall.y2 }, placement),
  };
}

/** Vertices are ordered by their point id before transforming */
export function polygonToCampus(polygon: BoundaryPolygon, placement: BuildingPlacement): CampusPolygon {
  return [...polygon.points]
    .sort((a, b) => a.id - b.id)
    .map((p) => toCampus(p, placement));
}
