import { Point, FloorId, CampusWall, CampusPolygon } from "./types";
import { RoutingConfig } from "./config";
import { distanceToSegment, pointInAnyPolygon } from "./geometry";

export interface Cell {
  x: number;
  y: number;
}

/** A cell whose centre lies this close to a wall (in cells) is a wall cell */
export const WALL_CELL_THRESHOLD = 0.75;

const SQRT2 = Math.SQRT2;

export interface FloorGridInput {
  floorId: FloorId;
  walls: readonly CampusWall[];
  /** Points the grid must cover (entrances, stair ends) */
  extraPoints: readonly Point[];
  /** Cells outside every polygon are blocked; empty disables the check */
  boundaries: readonly CampusPolygon[];
}

/**
 * Routable cost surface for one floor.
 *
 * Walls are rasterized into wall cells, a two-pass chamfer transform gives
 * every cell its distance (in cells) to the nearest wall cell, and entering a
 * cell costs `step × (1 + wallAvoidance / distance)`.
 */
export class FloorGrid {
  readonly width: number;
  readonly height: number;
  readonly originX: number;
  readonly originY: number;
  readonly cellSize: number;
  private readonly distances: Float64Array;
  private readonly blocked: Uint8Array;

  private constructor(
    readonly floorId: FloorId,
    private readonly config: RoutingConfig,
    bounds: { minX: number; minY: number; maxX: number; maxY: number }
  ) {
    this.cellSize = config.cellSize;
    this.originX = Math.floor(bounds.minX / this.cellSize - 2) * this.cellSize;
    this.originY = Math.floor(bounds.minY / this.cellSize - 2) * this.cellSize;
    this.width = Math.floor((bounds.maxX - this.originX) / this.cellSize + 4);
    this.height = Math.floor((bounds.maxY - this.originY) / this.cellSize + 4);
    this.distances = new Float64Array(this.width * this.height).fill(Infinity);
    this.blocked = new Uint8Array(this.width * this.height);
  }

  static build(input: FloorGridInput, config: RoutingConfig): FloorGrid {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    const cover = (p: Point) => {
      minX = Math.min(minX, p.x);
      minY = Math.min(minY, p.y);
      maxX = Math.max(maxX, p.x);
      maxY = Math.max(maxY, p.y);
    };
    input.walls.forEach((w) => {
      cover(w.start);
      cover(w.end);
    });
    input.extraPoints.forEach(cover);
    if (!Number.isFinite(minX)) {
      minX = minY = maxX = maxY = 0;
    }

    const grid = new FloorGrid(input.floorId, config, { minX, minY, maxX, maxY });
    grid.rasterizeWalls(input.walls);
    grid.chamferTransform();
    if (input.boundaries.length > 0) grid.blockExterior(input.boundaries);
    return grid;
  }

  get cellCount(): number {
    return this.width * this.height;
  }

  index(x: number, y: number): number {
    return y * this.width + x;
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  /** Cell containing a campus point; may lie outside the grid */
  cellOf(p: Point): Cell {
    return {
      x: Math.floor((p.x - this.originX) / this.cellSize),
      y: Math.floor((p.y - this.originY) / this.cellSize),
    };
  }

  centreOf(cell: Cell): Point {
    return {
      x: (cell.x + 0.5) * this.cellSize + this.originX,
      y: (cell.y + 0.5) * this.cellSize + this.originY,
    };
  }

  isPassable(x: number, y: number): boolean {
    return this.inBounds(x, y) && this.blocked[this.index(x, y)] === 0;
  }

  /** Distance to the nearest wall cell, in cells (Infinity on wall-less floors) */
  distanceAt(x: number, y: number): number {
    return this.inBounds(x, y) ? this.distances[this.index(x, y)] : 0;
  }

  /** Cost of entering (x, y) with a move of length `step` cells */
  moveCost(x: number, y: number, step: number): number {
    const d = this.distanceAt(x, y);
    return step * (1 + this.config.wallAvoidance / d);
  }

  /**
   * The cell itself when passable, otherwise the first passable cell on
   * rings of growing radius around it (after clamping into the grid).
   */
  nearestPassable(cell: Cell): Cell | null {
    const cx = Math.min(this.width - 1, Math.max(0, cell.x));
    const cy = Math.min(this.height - 1, Math.max(0, cell.y));
    if (this.isPassable(cx, cy)) return { x: cx, y: cy };

    for (let r = 1; r <= this.config.snapSearchRadius; r++) {
      for (let dy = -r; dy <= r; dy++) {
        for (let dx = -r; dx <= r; dx++) {
          if (Math.abs(dx) !== r && Math.abs(dy) !== r) continue;
          if (this.isPassable(cx + dx, cy + dy)) return { x: cx + dx, y: cy + dy };
        }
      }
    }
    return null;
  }

  /**
   * Samples the segment every 0.4 cell; every sample must be passable and at
   * least `lineOfSightClearance` cells from a wall.
   */
  hasLineOfSight(from: Point, to: Point): boolean {
    const dx = to.x - from.x;
    const dy = to.y - from.y;
    const length = Math.sqrt(dx * dx + dy * dy);
    const samples = Math.max(1, Math.floor(length / (this.cellSize * 0.4)));
    for (let s = 0; s <= samples; s++) {
      const t = s / samples;
      const cell = this.cellOf({ x: from.x + dx * t, y: from.y + dy * t });
      if (!this.isPassable(cell.x, cell.y)) return false;
      if (this.distanceAt(cell.x, cell.y) < this.config.lineOfSightClearance) return false;
    }
    return true;
  }

  private rasterizeWalls(walls: readonly CampusWall[]): void {
    const size = this.cellSize;
    for (const wall of walls) {
      // Grid-unit coordinates, so cell (x, y) has its centre at (x + 0.5, y + 0.5)
      const a = { x: (wall.start.x - this.originX) / size, y: (wall.start.y - this.originY) / size };
      const b = { x: (wall.end.x - this.originX) / size, y: (wall.end.y - this.originY) / size };
      const x0 = Math.max(0, Math.floor(Math.min(a.x, b.x)) - 1);
      const x1 = Math.min(this.width - 1, Math.ceil(Math.max(a.x, b.x)) + 1);
      const y0 = Math.max(0, Math.floor(Math.min(a.y, b.y)) - 1);
      const y1 = Math.min(this.height - 1, Math.ceil(Math.max(a.y, b.y)) + 1);
      for (let y = y0; y <= y1; y++) {
        for (let x = x0; x <= x1; x++) {
          if (distanceToSegment({ x: x + 0.5, y: y + 0.5 }, a, b) <= WALL_CELL_THRESHOLD) {
            const i = this.index(x, y);
            this.distances[i] = 0;
            this.blocked[i] = 1;
          }
        }
      }
    }
  }

  /** Two passes with weights 1 (orthogonal) and √2 (diagonal) */
  private chamferTransform(): void {
    const d = this.distances;
    const w = this.width;
    const h = this.height;
    const relax = (i: number, x: number, y: number, cost: number) => {
      if (!this.inBounds(x, y)) return;
      const candidate = d[this.index(x, y)] + cost;
      if (candidate < d[i]) d[i] = candidate;
    };

    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const i = this.index(x, y);
        relax(i, x - 1, y, 1);
        relax(i, x, y - 1, 1);
        relax(i, x - 1, y - 1, SQRT2);
        relax(i, x + 1, y - 1, SQRT2);
      }
    }
    for (let y = h - 1; y >= 0; y--) {
      for (let x = w - 1; x >= 0; x--) {
        const i = this.index(x, y);
        relax(i, x + 1, y, 1);
        relax(i, x, y + 1, 1);
        relax(i, x + 1, y + 1, SQRT2);
        relax(i, x - 1, y + 1, SQRT2);
      }
    }
  }

  private blockExterior(boundaries: readonly CampusPolygon[]): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const i = this.index(x, y);
        if (this.blocked[i] === 1) continue;
        if (!pointInAnyPolygon(this.centreOf({ x, y }), boundaries)) this.blocked[i] = 1;
      }
    }
  }
}
