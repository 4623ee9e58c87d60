import {
  Point,
  FloorId,
  BuildingId,
  FloorPlanData,
  Entrance,
  CampusWall,
  CampusPolygon,
  CampusEntrance,
  CampusBuilding,
  ConstraintEntrance,
  FloorConstraintData,
  StairPair,
} from "./types";
import { toCampus, wallToCampus, polygonToCampus } from "./transform";
import { distance } from "./geometry";
import { createLogger } from "./logger";

const log = createLogger("campus");

/** Pairs closer than this at both ends describe the same stairwell */
const DUPLICATE_PAIR_DISTANCE = 5;

/** Campus-wide view of every loaded floor plan. Immutable once built. */
export interface Campus {
  floors: readonly FloorPlanData[];
  wallsByFloor: ReadonlyMap<FloorId, readonly CampusWall[]>;
  boundaryByFloor: ReadonlyMap<FloorId, readonly CampusPolygon[]>;
  entrances: readonly CampusEntrance[];
  /** One entry per building and floor, in load order */
  buildings: readonly CampusBuilding[];
  /** Walls and entrances of every building on a floor, merged */
  constraintsByFloor: ReadonlyMap<FloorId, FloorConstraintData>;
  floorNumbers: ReadonlyMap<FloorId, number>;
  stairPairs: readonly StairPair[];
}

export const EMPTY_CAMPUS: Campus = {
  floors: [],
  wallsByFloor: new Map(),
  boundaryByFloor: new Map(),
  entrances: [],
  buildings: [],
  constraintsByFloor: new Map(),
  floorNumbers: new Map(),
  stairPairs: [],
};

function pushTo<K, V>(map: Map<K, V[]>, key: K, ...values: V[]): void {
  const list = map.get(key);
  if (list) list.push(...values);
  else map.set(key, [...values]);
}

function constraintEntrance(entrance: Entrance, position: Point): ConstraintEntrance {
  return { id: entrance.id, position, name: entrance.name ?? null };
}

/**
 * Stair pairs of one floor plan. A bottom entrance on this floor pairs with
 * the nearest top entrance leading higher; a top entrance on this floor
 * pairs with the nearest bottom entrance leading lower. Nearest is measured
 * floor-locally.
 */
function stairPairsOf(floor: FloorPlanData, floorIdOf: (floorNumber: number) => FloorId | null): StairPair[] {
  const stairs = floor.entrances.filter((e) => e.stairs === "top" || e.stairs === "bottom");
  const nearest = (from: Entrance, candidates: Entrance[]): Entrance | null => {
    let best: Entrance | null = null;
    let bestDist = Infinity;
    for (const c of candidates) {
      const d = (from.x - c.x) ** 2 + (from.y - c.y) ** 2;
      if (d < bestDist) {
        bestDist = d;
        best = c;
      }
    }
    return best;
  };
  const here = floor.floorNumber;
  const pairs: StairPair[] = [];

  const bottomsHere = stairs.filter((e) => e.stairs === "bottom" && e.floor === here);
  const topsAbove = stairs.filter((e) => e.stairs === "top" && typeof e.floor === "number" && e.floor > here);
  for (const bottom of bottomsHere) {
    const top = nearest(bottom, topsAbove);
    if (!top || typeof top.floor !== "number") continue;
    const topFloorId = floorIdOf(top.floor);
    if (!topFloorId) continue;
    pairs.push({
      bottomPosition: toCampus(bottom, floor.placement),
      bottomFloorId: floor.floorId,
      bottomFloorNumber: here,
      topPosition: toCampus(top, floor.placement),
      topFloorId,
      topFloorNumber: top.floor,
    });
  }

  const topsHere = stairs.filter((e) => e.stairs === "top" && e.floor === here);
  const bottomsBelow = stairs.filter((e) => e.stairs === "bottom" && typeof e.floor === "number" && e.floor < here);
  for (const top of topsHere) {
    const bottom = nearest(top, bottomsBelow);
    if (!bottom || typeof bottom.floor !== "number") continue;
    const bottomFloorId = floorIdOf(bottom.floor);
    if (!bottomFloorId) continue;
    pairs.push({
      bottomPosition: toCampus(bottom, floor.placement),
      bottomFloorId,
      bottomFloorNumber: bottom.floor,
      topPosition: toCampus(top, floor.placement),
      topFloorId: floor.floorId,
      topFloorNumber: here,
    });
  }
  return pairs;
}

function isDuplicatePair(a: StairPair, b: StairPair): boolean {
  return (
    a.bottomFloorId === b.bottomFloorId &&
    a.topFloorId === b.topFloorId &&
    distance(a.bottomPosition, b.bottomPosition) < DUPLICATE_PAIR_DISTANCE &&
    distance(a.topPosition, b.topPosition) < DUPLICATE_PAIR_DISTANCE
  );
}

/**
 * Transforms parsed floor plans into the campus frame. A floor id names a
 * level across the whole campus, so walls, boundaries and constraints of
 * several buildings on the same level are merged under it.
 */
export function buildCampus(floors: readonly FloorPlanData[]): Campus {
  const wallsByFloor = new Map<FloorId, CampusWall[]>();
  const boundaryByFloor = new Map<FloorId, CampusPolygon[]>();
  const entrancesByFloor = new Map<FloorId, ConstraintEntrance[]>();
  const floorNumbers = new Map<FloorId, number>();
  const entrances: CampusEntrance[] = [];
  const buildings: CampusBuilding[] = [];

  for (const floor of floors) {
    const walls = floor.walls.map((w) => wallToCampus(w, floor.placement));
    const polygons = floor.boundaryPolygons.map((p) => polygonToCampus(p, floor.placement));
    const floorEntrances = floor.entrances.map((e) => ({
      entrance: e,
      position: toCampus(e, floor.placement),
    }));

    const existing = floorNumbers.get(floor.floorId);
    if (existing !== undefined && existing !== floor.floorNumber) {
      log.warn("Floor id used with two floor numbers", {
        floorId: floor.floorId,
        kept: existing,
        ignored: floor.floorNumber,
      });
    } else {
      floorNumbers.set(floor.floorId, floor.floorNumber);
    }

    pushTo(wallsByFloor, floor.floorId, ...walls);
    pushTo(boundaryByFloor, floor.floorId, ...polygons);
    pushTo(entrancesByFloor, floor.floorId, ...floorEntrances.map((e) => constraintEntrance(e.entrance, e.position)));

    for (const { entrance, position } of floorEntrances) {
      entrances.push({ original: entrance, position, buildingId: floor.buildingId, floorId: floor.floorId });
    }

    buildings.push({
      buildingId: floor.buildingId,
      floorId: floor.floorId,
      floorNumber: floor.floorNumber,
      polygons,
      constraintData: {
        floorId: floor.floorId,
        walls,
        entrances: floorEntrances.map((e) => constraintEntrance(e.entrance, e.position)),
      },
    });
  }

  const constraintsByFloor = new Map<FloorId, FloorConstraintData>();
  for (const [floorId, walls] of wallsByFloor) {
    constraintsByFloor.set(floorId, { floorId, walls, entrances: entrancesByFloor.get(floorId) ?? [] });
  }

  const stairPairs: StairPair[] = [];
  for (const floor of floors) {
    const floorIdOf = (n: number): FloorId | null =>
      floors.find((f) => f.buildingId === floor.buildingId && f.floorNumber === n)?.floorId ?? null;
    for (const pair of stairPairsOf(floor, floorIdOf)) {
      if (!stairPairs.some((p) => isDuplicatePair(p, pair))) stairPairs.push(pair);
    }
  }

  log.info("Campus assembled", {
    floors: floorNumbers.size,
    buildings: new Set(buildings.map((b) => b.buildingId)).size,
    entrances: entrances.length,
    stairPairs: stairPairs.length,
  });

  return {
    floors,
    wallsByFloor,
    boundaryByFloor,
    entrances,
    buildings,
    constraintsByFloor,
    floorNumbers,
    stairPairs,
  };
}

/**
 * Detector list for one level: each building contributes the entry for
 * `floorNumber`, or its lowest floor when it has no such level.
 */
export function buildingsOnLevel(campus: Campus, floorNumber: number): CampusBuilding[] {
  const byBuilding = new Map<BuildingId, CampusBuilding>();
  for (const building of campus.buildings) {
    const current = byBuilding.get(building.buildingId);
    if (!current) {
      byBuilding.set(building.buildingId, building);
      continue;
    }
    if (current.floorNumber === floorNumber) continue;
    if (building.floorNumber === floorNumber || building.floorNumber < current.floorNumber) {
      byBuilding.set(building.buildingId, building);
    }
  }
  return [...byBuilding.values()];
}
