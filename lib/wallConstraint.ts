import { Point, CampusWall } from "./types";
import { CorrectionConfig } from "./config";
import {
  segmentIntersection,
  distance,
  projectOntoWall,
  directionAngle,
  angleDifference,
} from "./geometry";

export interface WallConstraintResult {
  position: Point;
  wasConstrained: boolean;
  /** Heading correction (rad) suggested by wall sliding */
  headingCorrection: number;
}

interface WallHit {
  point: Point;
  wall: CampusWall;
}

function firstHit(from: Point, to: Point, walls: readonly CampusWall[]): WallHit | null {
  let closest: WallHit | null = null;
  let minDist = Infinity;
  for (const wall of walls) {
    const point = segmentIntersection(from, to, wall.start, wall.end);
    if (!point) continue;
    const d = distance(from, point);
    if (d < minDist) {
      minDist = d;
      closest = { point, wall };
    }
  }
  return closest;
}

/**
 * Keeps a movement from → to on the near side of walls: stop just before the
 * first wall hit, slide the remaining movement along that wall, and re-check
 * up to `maxWallIterations` times.
 */
export function constrainMovement(
  from: Point,
  to: Point,
  walls: readonly CampusWall[],
  config: Pick<CorrectionConfig, "wallEpsilon" | "maxWallIterations" | "headingCorrectionFactor">
): WallConstraintResult {
  if (walls.length === 0) {
    return { position: to, wasConstrained: false, headingCorrection: 0 };
  }

  let currentFrom = from;
  let currentTo = to;
  let wasConstrained = false;
  let headingCorrection = 0;

  for (let i = 0; i < config.maxWallIterations; i++) {
    const hit = firstHit(currentFrom, currentTo, walls);
    if (!hit) {
      return { position: currentTo, wasConstrained, headingCorrection };
    }
    wasConstrained = true;

    const d = distance(currentFrom, hit.point);
    const epsilon = d > config.wallEpsilon ? config.wallEpsilon : d * 0.5;
    const stopped =
      d > epsilon
        ? {
            x: currentFrom.x + (hit.point.x - currentFrom.x) * ((d - epsilon) / d),
            y: currentFrom.y + (hit.point.y - currentFrom.y) * ((d - epsilon) / d),
          }
        : currentFrom;

    const remaining = { x: currentTo.x - hit.point.x, y: currentTo.y - hit.point.y };
    const slide = projectOntoWall(remaining, hit.wall.start, hit.wall.end);
    const slideTarget = { x: stopped.x + slide.x, y: stopped.y + slide.y };

    if (distance(stopped, slideTarget) > 0.5) {
      const original = directionAngle(currentFrom, currentTo);
      const slid = directionAngle(stopped, slideTarget);
      headingCorrection += angleDifference(original, slid) * config.headingCorrectionFactor;
    }

    currentFrom = stopped;
    currentTo = slideTarget;
  }

  // Iterations exhausted: only accept the last slide if it is clear
  if (firstHit(currentFrom, currentTo, walls)) {
    return { position: currentFrom, wasConstrained, headingCorrection };
  }
  return { position: currentTo, wasConstrained, headingCorrection };
}
