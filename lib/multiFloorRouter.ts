import {
  Point,
  FloorId,
  BuildingId,
  CampusEntrance,
  FloorPathSegment,
  MultiFloorRoute,
  Room,
  RouteOutcome,
  StairPair,
} from "./types";
import { RoutingConfig, DEFAULT_ROUTING_CONFIG } from "./config";
import { Campus, EMPTY_CAMPUS } from "./campus";
import { FloorGrid } from "./routingGrid";
import { GridSearch } from "./astar";
import { distance, pathLength, pointInAnyPolygon } from "./geometry";
import { createLogger } from "./logger";

const log = createLogger("router");

export function emptyRoute(): MultiFloorRoute {
  return { segments: [], totalFloors: 0, isMultiFloor: false };
}

/** Thrown by the async search when its AbortSignal fires */
export class RouteCancelledError extends Error {
  constructor() {
    super("Route computation cancelled");
    this.name = "RouteCancelledError";
  }
}

/** Suspends between search chunks; the driver decides how to resume */
type Plan<T> = Generator<void, T, void>;

function totalLength(route: MultiFloorRoute): number {
  return route.segments.reduce((sum, s) => sum + pathLength(s.points), 0);
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Per-floor grids + A*, stitched across floors through stair pairs.
 *
 * Grids live in a registry keyed by floor id and are built lazily, at most
 * once per load generation. A floor without walls is registered as `null`
 * and never routed on.
 */
export class MultiFloorRouter {
  private readonly config: RoutingConfig;
  private campus: Campus = EMPTY_CAMPUS;
  private grids = new Map<FloorId, FloorGrid | null>();
  private generation = 0;
  private builds = 0;

  constructor(config: Partial<RoutingConfig> = {}) {
    this.config = { ...DEFAULT_ROUTING_CONFIG, ...config };
  }

  get loadGeneration(): number {
    return this.generation;
  }

  /** Grids built since construction */
  get gridBuildCount(): number {
    return this.builds;
  }

  /** Replaces all floor data and drops every cached grid */
  supplyFloorData(campus: Campus): void {
    this.campus = campus;
    this.grids = new Map();
    this.generation++;
    log.info("Floor data supplied", { generation: this.generation, floors: campus.floorNumbers.size });
  }

  /** Cached grid for a floor, built on first use; null when unroutable */
  gridFor(floorId: FloorId): FloorGrid | null {
    const cached = this.grids.get(floorId);
    if (cached !== undefined) return cached;

    const walls = this.campus.wallsByFloor.get(floorId) ?? [];
    if (walls.length === 0) {
      log.warn("No walls for floor, excluded from routing", { floorId });
      this.grids.set(floorId, null);
      return null;
    }

    const extraPoints = this.campus.entrances.filter((e) => e.floorId === floorId).map((e) => e.position);
    for (const pair of this.campus.stairPairs) {
      if (pair.bottomFloorId === floorId) extraPoints.push(pair.bottomPosition);
      if (pair.topFloorId === floorId) extraPoints.push(pair.topPosition);
    }
    const boundaries = this.campus.boundaryByFloor.get(floorId) ?? [];
    const grid = FloorGrid.build({ floorId, walls, extraPoints, boundaries }, this.config);
    this.builds++;
    log.debug("Built distance transform", {
      floorId,
      walls: walls.length,
      boundaries: boundaries.length,
      size: `${grid.width}x${grid.height}`,
    });
    this.grids.set(floorId, grid);
    return grid;
  }

  /**
   * Room number first (exact, building-scoped when the room names a
   * building), then case-insensitive name. First match in list order wins.
   */
  resolveDestination(room: Room): CampusEntrance | null {
    const inScope = (e: CampusEntrance) => !room.buildingId || e.buildingId === room.buildingId;

    if (room.number !== null && room.number !== undefined) {
      const number = String(room.number);
      const byNumber = this.campus.entrances.find(
        (e) => e.original.roomNo !== null && e.original.roomNo !== undefined && e.original.roomNo === number && inScope(e)
      );
      if (byNumber) return byNumber;
    }

    if (room.name) {
      const name = room.name.toLowerCase();
      const byName = this.campus.entrances.find(
        (e) => typeof e.original.name === "string" && e.original.name.toLowerCase() === name && inScope(e)
      );
      if (byName) return byName;
    }
    return null;
  }

  /** Path on a single floor; empty when no path exists */
  findFloorPath(floorId: FloorId, start: Point, goal: Point): Point[] {
    return this.runSync(this.floorPath(floorId, start, goal));
  }

  findRoute(start: Point, startFloorId: FloorId, goal: CampusEntrance): MultiFloorRoute {
    return this.runSync(this.planRoute(start, startFloorId, goal));
  }

  /**
   * Same result as {@link findRoute}, yielding to the event loop before
   * starting and every `iterationsPerChunk` expansions. Rejects with
   * {@link RouteCancelledError} once `signal` aborts.
   */
  findRouteAsync(
    start: Point,
    startFloorId: FloorId,
    goal: CampusEntrance,
    signal?: AbortSignal
  ): Promise<MultiFloorRoute> {
    return this.runAsync(this.planRoute(start, startFloorId, goal), signal);
  }

  routeToRoom(room: Room, start: Point, startFloorId: FloorId): RouteOutcome {
    const entrance = this.resolveDestination(room);
    if (!entrance) return this.noEntrance(room);
    return this.outcome(this.findRoute(start, startFloorId, entrance), entrance);
  }

  async routeToRoomAsync(
    room: Room,
    start: Point,
    startFloorId: FloorId,
    signal?: AbortSignal
  ): Promise<RouteOutcome> {
    const entrance = this.resolveDestination(room);
    if (!entrance) return this.noEntrance(room);
    const route = await this.findRouteAsync(start, startFloorId, entrance, signal);
    return this.outcome(route, entrance);
  }

  // ── Planning ──

  private noEntrance(room: Room): RouteOutcome {
    log.warn("No entrance matched", { name: room.name ?? null, number: room.number ?? null });
    return { status: "no_entrance" };
  }

  private outcome(route: MultiFloorRoute, entrance: CampusEntrance): RouteOutcome {
    return route.segments.length > 0
      ? { status: "found", route, entrance }
      : { status: "not_found", route, entrance };
  }

  private runSync<T>(plan: Plan<T>): T {
    for (;;) {
      const step = plan.next();
      if (step.done) return step.value;
    }
  }

  private async runAsync<T>(plan: Plan<T>, signal?: AbortSignal): Promise<T> {
    for (;;) {
      await nextTick();
      if (signal?.aborted) throw new RouteCancelledError();
      const step = plan.next();
      if (step.done) return step.value;
    }
  }

  private *floorPath(floorId: FloorId, start: Point, goal: Point): Plan<Point[]> {
    const grid = this.gridFor(floorId);
    if (!grid) return [];

    const startCell = grid.nearestPassable(grid.cellOf(start));
    const goalCell = grid.nearestPassable(grid.cellOf(goal));
    if (!startCell || !goalCell) {
      log.warn("No passable cell near start or goal", { floorId });
      return [];
    }

    const search = new GridSearch(grid, startCell, goalCell, this.config.maxIterations);
    while (search.advance(this.config.iterationsPerChunk) === "searching") {
      yield;
    }
    const cells = search.path();
    if (cells.length === 0) {
      log.info("No path on floor", { floorId, iterations: search.iterationCount });
      return [];
    }

    const points = cells.map((c) => grid.centreOf(c));
    if (points.length === 1) points.push({ ...points[0] });

    // The exact point replaces its cell centre when that cell is routable
    const ownStart = grid.cellOf(start);
    if (ownStart.x === startCell.x && ownStart.y === startCell.y) points[0] = { ...start };
    const ownGoal = grid.cellOf(goal);
    if (ownGoal.x === goalCell.x && ownGoal.y === goalCell.y) points[points.length - 1] = { ...goal };

    return this.smooth(grid, points);
  }

  /** Drops waypoints that have a clear line of sight past them */
  private smooth(grid: FloorGrid, points: Point[]): Point[] {
    if (points.length <= 2) return points;
    const result = [points[0]];
    let i = 0;
    while (i < points.length - 1) {
      let furthest = i + 1;
      for (let j = points.length - 1; j >= i + 2; j--) {
        if (grid.hasLineOfSight(points[i], points[j])) {
          furthest = j;
          break;
        }
      }
      result.push(points[furthest]);
      i = furthest;
    }
    return result;
  }

  private floorNumberOf(floorId: FloorId): number | undefined {
    return this.campus.floorNumbers.get(floorId);
  }

  /** Start floor, every known floor strictly between, goal floor */
  private floorSequence(startFloorId: FloorId, goalFloorId: FloorId, startNum: number, goalNum: number): FloorId[] {
    const lo = Math.min(startNum, goalNum);
    const hi = Math.max(startNum, goalNum);
    const seen = new Set<number>();
    const between = [...this.campus.floorNumbers.entries()]
      .filter(([, n]) => n > lo && n < hi)
      .sort((a, b) => a[1] - b[1])
      .filter(([, n]) => {
        if (seen.has(n)) return false;
        seen.add(n);
        return true;
      })
      .map(([id]) => id);
    if (goalNum < startNum) between.reverse();
    return [startFloorId, ...between, goalFloorId];
  }

  private pairsForHop(from: FloorId, to: FloorId, goingUp: boolean): StairPair[] {
    return this.campus.stairPairs.filter((p) =>
      goingUp ? p.bottomFloorId === from && p.topFloorId === to : p.topFloorId === from && p.bottomFloorId === to
    );
  }

  private buildingAt(position: Point, floorId: FloorId, fallback: BuildingId): BuildingId {
    const building = this.campus.buildings.find(
      (b) => b.floorId === floorId && pointInAnyPolygon(position, b.polygons)
    );
    return building?.buildingId ?? fallback;
  }

  private *planRoute(start: Point, startFloorId: FloorId, goal: CampusEntrance): Plan<MultiFloorRoute> {
    if (startFloorId === goal.floorId) {
      const points = yield* this.floorPath(startFloorId, start, goal.position);
      if (points.length === 0) return emptyRoute();
      const segment: FloorPathSegment = {
        floorId: startFloorId,
        floorNumber: this.floorNumberOf(startFloorId) ?? 0,
        buildingId: goal.buildingId,
        points,
        isTransition: false,
      };
      return { segments: [segment], totalFloors: 1, isMultiFloor: false };
    }

    const startNum = this.floorNumberOf(startFloorId);
    const goalNum = this.floorNumberOf(goal.floorId);
    if (startNum === undefined || goalNum === undefined) {
      log.warn("Unknown floor in route request", { startFloorId, goalFloorId: goal.floorId });
      return emptyRoute();
    }
    const goingUp = goalNum > startNum;
    const sequence = this.floorSequence(startFloorId, goal.floorId, startNum, goalNum);

    const candidates = this.pairsForHop(sequence[0], sequence[1], goingUp);
    if (candidates.length === 0) {
      log.warn("No stairwell leaves the start floor", { startFloorId, direction: goingUp ? "up" : "down" });
      return emptyRoute();
    }

    let best: MultiFloorRoute = emptyRoute();
    let bestLength = Infinity;
    for (const first of candidates) {
      const route = yield* this.candidateRoute(start, sequence, first, goal, goingUp);
      if (route.segments.length === 0) continue;
      const length = totalLength(route);
      if (length < bestLength) {
        best = route;
        bestLength = length;
      }
    }

    if (best.segments.length === 0) log.info("No multi-floor route", { from: startFloorId, to: goal.floorId });
    return best;
  }

  private *candidateRoute(
    start: Point,
    sequence: FloorId[],
    first: StairPair,
    goal: CampusEntrance,
    goingUp: boolean
  ): Plan<MultiFloorRoute> {
    const segments: FloorPathSegment[] = [];
    let position = start;
    let pair = first;
    const last = sequence.length - 1;

    for (let i = 0; i < sequence.length; i++) {
      const floorId = sequence[i];
      const floorNumber = this.floorNumberOf(floorId) ?? 0;

      if (i === last) {
        const points = yield* this.floorPath(floorId, position, goal.position);
        if (points.length === 0) return emptyRoute();
        segments.push({ floorId, floorNumber, buildingId: goal.buildingId, points, isTransition: false });
        break;
      }

      const hopStart = goingUp ? pair.bottomPosition : pair.topPosition;
      const hopEnd = goingUp ? pair.topPosition : pair.bottomPosition;
      const points = yield* this.floorPath(floorId, position, hopStart);
      if (points.length === 0) return emptyRoute();

      const buildingId = this.buildingAt(hopStart, floorId, goal.buildingId);
      const nextFloorId = sequence[i + 1];
      segments.push({ floorId, floorNumber, buildingId, points, isTransition: false });
      segments.push({
        floorId: nextFloorId,
        floorNumber: this.floorNumberOf(nextFloorId) ?? 0,
        buildingId,
        points: [{ ...hopStart }, { ...hopEnd }],
        isTransition: true,
      });
      position = hopEnd;

      if (i + 1 < last) {
        const onward = this.pairsForHop(nextFloorId, sequence[i + 2], goingUp);
        let nearest: StairPair | null = null;
        let nearestDist = Infinity;
        for (const p of onward) {
          const d = distance(position, goingUp ? p.bottomPosition : p.topPosition);
          if (d < nearestDist) {
            nearestDist = d;
            nearest = p;
          }
        }
        if (!nearest) {
          log.info("No onward stairwell", { floorId: nextFloorId });
          return emptyRoute();
        }
        pair = nearest;
      }
    }

    return { segments, totalFloors: sequence.length, isMultiFloor: true };
  }
}
