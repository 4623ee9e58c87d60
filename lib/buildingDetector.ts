import { Point, CampusBuilding, BuildingId, FloorId, FloorConstraintData } from "./types";
import { pointInAnyPolygon } from "./geometry";

export interface DetectionResult {
  buildingId: BuildingId | null;
  floorId: FloorId | null;
  changed: boolean;
  /** Only set when the change entered a building */
  newConstraintData?: FloorConstraintData;
}

/**
 * Point-in-polygon building/floor membership. Buildings are tested in list
 * order and the first containing one wins; no match means outdoors.
 */
export class BuildingDetector {
  private buildings: readonly CampusBuilding[] = [];
  private buildingId: BuildingId | null = null;
  private floorId: FloorId | null = null;

  get currentBuildingId(): BuildingId | null {
    return this.buildingId;
  }

  get currentFloorId(): FloorId | null {
    return this.floorId;
  }

  loadBuildings(buildings: readonly CampusBuilding[]): void {
    this.buildings = buildings;
  }

  /** Seeds state without scanning, e.g. when the user picks an origin */
  setInitial(buildingId: BuildingId | null, floorId: FloorId | null): void {
    this.buildingId = buildingId;
    this.floorId = floorId;
  }

  detect(position: Point): DetectionResult {
    const match = this.buildings.find((b) => pointInAnyPolygon(position, b.polygons)) ?? null;
    const buildingId = match?.buildingId ?? null;
    const floorId = match?.floorId ?? null;
    const changed = buildingId !== this.buildingId || floorId !== this.floorId;

    this.buildingId = buildingId;
    this.floorId = floorId;

    if (changed && match) {
      return { buildingId, floorId, changed, newConstraintData: match.constraintData };
    }
    return { buildingId, floorId, changed };
  }

  clear(): void {
    this.buildings = [];
    this.buildingId = null;
    this.floorId = null;
  }
}
