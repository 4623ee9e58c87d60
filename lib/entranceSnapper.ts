import { Point } from "./types";
import { CorrectionConfig } from "./config";
import { FloorConstraintProvider } from "./floorConstraints";
import { distance, crossesAnyWall } from "./geometry";

export type SnapResult =
  | { snapped: false }
  | {
      snapped: true;
      position: Point;
      delta: Point;
      /** > 1: stride was too short, < 1: too long */
      strideCalibrationFactor: number;
    };

/** Crossings this close to the entrance are the doorway itself */
const DOORWAY_TOLERANCE = 2;

/**
 * Snaps a detected turn point to the closest plausible entrance ahead of
 * the pre-turn heading and derives a stride calibration factor from the
 * along-track part of the correction.
 */
export function snapToEntrance(
  turnPosition: Point,
  preHeading: number,
  strideLengthUnits: number,
  provider: FloorConstraintProvider,
  config: CorrectionConfig
): SnapResult {
  const candidates = provider.entrancesNear(
    turnPosition,
    config.entranceSnapRadius,
    preHeading,
    config.entranceDirectionTolerance
  );
  if (candidates.length === 0) return { snapped: false };

  let closest = candidates[0];
  let closestDist = distance(turnPosition, closest.position);
  for (const entrance of candidates.slice(1)) {
    const d = distance(turnPosition, entrance.position);
    if (d < closestDist) {
      closest = entrance;
      closestDist = d;
    }
  }

  // Too far is likely the wrong entrance; bounded to avoid visible jumps
  const maxSnap = Math.min(config.entranceSnapRadius * 0.5, config.maxCorrectionPerStep);
  if (closestDist > maxSnap) return { snapped: false };

  const walls = provider.wallsNear(turnPosition, config.wallSearchRadius);
  if (crossesAnyWall(turnPosition, closest.position, walls, DOORWAY_TOLERANCE)) {
    return { snapped: false };
  }

  const delta = {
    x: closest.position.x - turnPosition.x,
    y: closest.position.y - turnPosition.y,
  };

  let strideCalibrationFactor = 1;
  if (strideLengthUnits > 0) {
    // Positive along-track component: the entrance is farther ahead than we thought
    const along = delta.x * Math.sin(preHeading) + delta.y * -Math.cos(preHeading);
    const adjustment = Math.max(
      -config.maxStrideAdjustment,
      Math.min(config.maxStrideAdjustment, along / strideLengthUnits)
    );
    strideCalibrationFactor = 1 + adjustment;
  }

  return {
    snapped: true,
    position: { ...closest.position },
    delta,
    strideCalibrationFactor,
  };
}
