import { Point, CampusWall, ConstraintEntrance, FloorConstraintData } from "./types";
import { distance, distanceToSegment, directionAngle, angleDifference } from "./geometry";

/**
 * Spatial queries over the active floor's walls and entrances.
 * The data is swapped wholesale on floor change and never mutated.
 */
export class FloorConstraintProvider {
  private data: FloorConstraintData | null = null;

  load(data: FloorConstraintData | null): void {
    this.data = data;
  }

  /** True when walls are available for correction */
  isLoaded(): boolean {
    return (this.data?.walls.length ?? 0) > 0;
  }

  allWalls(): readonly CampusWall[] {
    return this.data?.walls ?? [];
  }

  wallsNear(position: Point, radius: number): CampusWall[] {
    return this.allWalls().filter((w) => distanceToSegment(position, w.start, w.end) <= radius);
  }

  /**
   * Entrances within `radius`. With a heading, only entrances roughly ahead
   * (within `headingTolerance`) count; the angle check is skipped within 1 unit.
   */
  entrancesNear(
    position: Point,
    radius: number,
    heading?: number,
    headingTolerance = 0.785
  ): ConstraintEntrance[] {
    const entrances = this.data?.entrances ?? [];
    return entrances.filter((entrance) => {
      const d = distance(position, entrance.position);
      if (d > radius) return false;
      if (heading === undefined || d <= 1) return true;
      const bearing = directionAngle(position, entrance.position);
      return Math.abs(angleDifference(heading, bearing)) <= headingTolerance;
    });
  }
}
