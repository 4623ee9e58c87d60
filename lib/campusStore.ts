import { FloorPlanData, FloorId, BuildingId } from "./types";
import { Campus, EMPTY_CAMPUS, buildCampus } from "./campus";
import { MultiFloorRouter } from "./multiFloorRouter";
import { NavigationService } from "./navigationService";
import { loadConfig } from "./config";
import { createLogger } from "./logger";

const log = createLogger("campus-store");

export interface FloorSummary {
  floorId: FloorId;
  floorNumber: number;
  buildings: BuildingId[];
  walls: number;
  entrances: number;
}

export interface CampusSummary {
  loadGeneration: number;
  suppliedAt: string | null;
  floors: FloorSummary[];
  stairPairs: number;
}

/** Process-wide campus data shared by the HTTP handlers */
export class CampusStore {
  readonly router: MultiFloorRouter;
  readonly navigation: NavigationService;
  private current: Campus = EMPTY_CAMPUS;
  private suppliedAt: Date | null = null;

  constructor(router: MultiFloorRouter = new MultiFloorRouter(loadConfig().routing)) {
    this.router = router;
    this.navigation = new NavigationService(router);
  }

  get campus(): Campus {
    return this.current;
  }

  /** Replaces the campus; in-flight routes are cancelled and grids dropped */
  supply(floors: readonly FloorPlanData[]): CampusSummary {
    const campus = buildCampus(floors);
    this.navigation.cancelAll();
    this.current = campus;
    this.suppliedAt = new Date();
    this.router.supplyFloorData(campus);
    log.info("Campus replaced", { floors: floors.length, stairPairs: campus.stairPairs.length });
    return this.summary();
  }

  summary(): CampusSummary {
    const byFloor = new Map<FloorId, FloorSummary>();
    for (const floor of this.current.floors) {
      const entry = byFloor.get(floor.floorId) ?? {
        floorId: floor.floorId,
        floorNumber: floor.floorNumber,
        buildings: [],
        walls: 0,
        entrances: 0,
      };
      if (!entry.buildings.includes(floor.buildingId)) entry.buildings.push(floor.buildingId);
      entry.walls += floor.walls.length;
      entry.entrances += floor.entrances.length;
      byFloor.set(floor.floorId, entry);
    }
    return {
      loadGeneration: this.router.loadGeneration,
      suppliedAt: this.suppliedAt?.toISOString() ?? null,
      floors: [...byFloor.values()].sort((a, b) => a.floorNumber - b.floorNumber),
      stairPairs: this.current.stairPairs.length,
    };
  }
}

let store: CampusStore | null = null;

export function getCampusStore(): CampusStore {
  if (!store) store = new CampusStore();
  return store;
}

/** Drops the shared store; the next access starts empty */
export function resetCampusStore(): void {
  store?.navigation.cancelAll();
  store = null;
}
