import { FloorGrid, Cell } from "./routingGrid";

interface OpenNode {
  index: number;
  f: number;
  h: number;
  seq: number;
}

/** f, then h, then insertion order */
function before(a: OpenNode, b: OpenNode): boolean {
  if (a.f !== b.f) return a.f < b.f;
  if (a.h !== b.h) return a.h < b.h;
  return a.seq < b.seq;
}

/** Binary min-heap of open nodes */
class OpenSet {
  private nodes: OpenNode[] = [];

  get size(): number {
    return this.nodes.length;
  }

  push(node: OpenNode): void {
    const nodes = this.nodes;
    nodes.push(node);
    let i = nodes.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(nodes[i], nodes[parent])) break;
      [nodes[i], nodes[parent]] = [nodes[parent], nodes[i]];
      i = parent;
    }
  }

  pop(): OpenNode | undefined {
    const nodes = this.nodes;
    const top = nodes[0];
    const last = nodes.pop();
    if (nodes.length > 0 && last) {
      nodes[0] = last;
      let i = 0;
      for (;;) {
        const l = 2 * i + 1;
        const r = l + 1;
        let smallest = i;
        if (l < nodes.length && before(nodes[l], nodes[smallest])) smallest = l;
        if (r < nodes.length && before(nodes[r], nodes[smallest])) smallest = r;
        if (smallest === i) break;
        [nodes[i], nodes[smallest]] = [nodes[smallest], nodes[i]];
        i = smallest;
      }
    }
    return top;
  }
}

// Fixed expansion order: N, E, S, W, then NE, SE, SW, NW
const NEIGHBOURS: ReadonlyArray<{ dx: number; dy: number; step: number }> = [
  { dx: 0, dy: -1, step: 1 },
  { dx: 1, dy: 0, step: 1 },
  { dx: 0, dy: 1, step: 1 },
  { dx: -1, dy: 0, step: 1 },
  { dx: 1, dy: -1, step: Math.SQRT2 },
  { dx: 1, dy: 1, step: Math.SQRT2 },
  { dx: -1, dy: 1, step: Math.SQRT2 },
  { dx: -1, dy: -1, step: Math.SQRT2 },
];

/** Octile distance in cells */
export function octile(a: Cell, b: Cell): number {
  const dx = Math.abs(a.x - b.x);
  const dy = Math.abs(a.y - b.y);
  return Math.max(dx, dy) + (Math.SQRT2 - 1) * Math.min(dx, dy);
}

export type SearchStatus = "searching" | "found" | "exhausted";

/**
 * A* over a {@link FloorGrid}, runnable in chunks so long searches can yield
 * between calls to {@link advance}. Diagonal moves need both adjacent
 * orthogonal cells passable.
 */
export class GridSearch {
  private readonly open = new OpenSet();
  private readonly g: Float64Array;
  private readonly cameFrom: Int32Array;
  private readonly closed: Uint8Array;
  private readonly goalIndex: number;
  private seq = 0;
  private iterations = 0;
  private status: SearchStatus = "searching";

  constructor(
    private readonly grid: FloorGrid,
    private readonly start: Cell,
    private readonly goal: Cell,
    private readonly maxIterations: number
  ) {
    this.g = new Float64Array(grid.cellCount).fill(Infinity);
    this.cameFrom = new Int32Array(grid.cellCount).fill(-1);
    this.closed = new Uint8Array(grid.cellCount);
    this.goalIndex = grid.index(goal.x, goal.y);

    const startIndex = grid.index(start.x, start.y);
    this.g[startIndex] = 0;
    const h = octile(start, goal);
    this.open.push({ index: startIndex, f: h, h, seq: this.seq++ });
  }

  get iterationCount(): number {
    return this.iterations;
  }

  get state(): SearchStatus {
    return this.status;
  }

  /** Expands up to `budget` nodes */
  advance(budget: number): SearchStatus {
    const grid = this.grid;
    let spent = 0;

    while (this.status === "searching" && spent < budget) {
      if (this.open.size === 0 || this.iterations >= this.maxIterations) {
        this.status = "exhausted";
        break;
      }
      const current = this.open.pop();
      if (!current) {
        this.status = "exhausted";
        break;
      }
      if (this.closed[current.index] === 1) continue;
      this.iterations++;
      spent++;

      if (current.index === this.goalIndex) {
        this.status = "found";
        break;
      }
      this.closed[current.index] = 1;

      const cx = current.index % grid.width;
      const cy = Math.floor(current.index / grid.width);
      const currentG = this.g[current.index];

      for (const { dx, dy, step } of NEIGHBOURS) {
        const nx = cx + dx;
        const ny = cy + dy;
        if (!grid.isPassable(nx, ny)) continue;
        if (dx !== 0 && dy !== 0 && (!grid.isPassable(cx + dx, cy) || !grid.isPassable(cx, cy + dy))) continue;

        const ni = grid.index(nx, ny);
        if (this.closed[ni] === 1) continue;
        const tentative = currentG + grid.moveCost(nx, ny, step);
        if (tentative < this.g[ni]) {
          this.g[ni] = tentative;
          this.cameFrom[ni] = current.index;
          const h = octile({ x: nx, y: ny }, this.goal);
          this.open.push({ index: ni, f: tentative + h, h, seq: this.seq++ });
        }
      }
    }
    return this.status;
  }

  /** Cells start → goal; empty unless the search found the goal */
  path(): Cell[] {
    if (this.status !== "found") return [];
    const cells: Cell[] = [];
    const startIndex = this.grid.index(this.start.x, this.start.y);
    let i = this.goalIndex;
    for (;;) {
      cells.push({ x: i % this.grid.width, y: Math.floor(i / this.grid.width) });
      if (i === startIndex) break;
      i = this.cameFrom[i];
      if (i < 0) return [];
    }
    return cells.reverse();
  }
}
