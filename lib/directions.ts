import { Point, MultiFloorRoute, RouteStep } from "./types";
import { Language, t } from "./i18n";
import { angleDifference, directionAngle, distance } from "./geometry";

/** 1 unit = 2 cm */
export const DEFAULT_UNITS_PER_METER = 50;

/** Heading changes above this many degrees are announced as turns */
const TURN_THRESHOLD_DEGREES = 30;

type WalkDirection = "straight" | "left" | "right";

function meters(units: number, unitsPerMeter: number): number {
  return Math.round(units / unitsPerMeter);
}

function walkStep(direction: WalkDirection, units: number, lang: Language, unitsPerMeter: number): RouteStep {
  const distanceM = meters(units, unitsPerMeter);
  return {
    text: { [lang]: t(`dir.${direction}`, lang, { distance: String(distanceM) }) },
    distance: distanceM,
    direction,
  };
}

/**
 * One step per straight run: the first run is "straight", each later run is
 * the turn that starts it. Runs split where the heading changes by > 30°.
 */
function walkSteps(points: readonly Point[], lang: Language, unitsPerMeter: number): RouteStep[] {
  // Repeated points have no heading
  const legs: { from: Point; to: Point }[] = [];
  for (let i = 1; i < points.length; i++) {
    if (distance(points[i - 1], points[i]) > 1e-9) legs.push({ from: points[i - 1], to: points[i] });
  }
  if (legs.length === 0) return [];

  const steps: RouteStep[] = [];
  let direction: WalkDirection = "straight";
  let length = distance(legs[0].from, legs[0].to);

  for (let i = 1; i < legs.length; i++) {
    const before = directionAngle(legs[i - 1].from, legs[i - 1].to);
    const after = directionAngle(legs[i].from, legs[i].to);
    const turn = (angleDifference(before, after) * 180) / Math.PI;
    const leg = distance(legs[i].from, legs[i].to);

    if (Math.abs(turn) > TURN_THRESHOLD_DEGREES) {
      steps.push(walkStep(direction, length, lang, unitsPerMeter));
      direction = turn > 0 ? "right" : "left";
      length = leg;
    } else {
      length += leg;
    }
  }
  steps.push(walkStep(direction, length, lang, unitsPerMeter));
  return steps;
}

/**
 * Turn-by-turn directions for a route. Clockwise heading changes are right
 * turns; stairwell hops become stairs_up / stairs_down steps.
 * @param unitsPerMeter campus units per meter (50 at 2 cm per unit)
 */
export function generateDirections(
  route: MultiFloorRoute,
  lang: Language,
  destination: string,
  unitsPerMeter: number = DEFAULT_UNITS_PER_METER
): RouteStep[] {
  const segments = route.segments;
  if (segments.length === 0) return [];

  const steps: RouteStep[] = [
    {
      text: { [lang]: t("dir.start", lang, { floor: String(segments[0].floorNumber) }) },
      distance: 0,
      direction: "start",
    },
  ];

  segments.forEach((segment, i) => {
    if (!segment.isTransition) {
      steps.push(...walkSteps(segment.points, lang, unitsPerMeter));
      return;
    }
    const previous = i > 0 ? segments[i - 1].floorNumber : segment.floorNumber;
    const direction = segment.floorNumber >= previous ? "stairs_up" : "stairs_down";
    steps.push({
      text: { [lang]: t(`dir.${direction}`, lang, { floor: String(segment.floorNumber) }) },
      distance: 0,
      direction,
    });
  });

  steps.push({
    text: { [lang]: t("dir.arrive", lang, { destination }) },
    distance: 0,
    direction: "arrive",
  });
  return steps;
}
