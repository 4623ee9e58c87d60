import { Point, PathPoint, StepEvent, FloorId, Heading } from "./types";
import { StrideConfig, DEFAULT_STRIDE_CONFIG, DEFAULT_UNITS_PER_CM } from "./config";
import { RingBuffer } from "./ringBuffer";
import { Channel } from "./channel";
import { advance, normalizeAngle } from "./geometry";
import { instantCadence, smoothCadence, strideLengthCm } from "./stride";

export type TrackerState =
  | { kind: "idle" }
  | {
      kind: "tracking";
      origin: Point;
      floorId: FloorId;
      position: Point;
      path: readonly PathPoint[];
      stepCount: number;
      averageCadence: number;
      lastStrideLengthCm: number;
    };

function pathPoint(position: Point, heading: Heading): PathPoint {
  return Object.freeze({
    position: Object.freeze({ x: position.x, y: position.y }),
    heading,
  });
}

/**
 * Pedestrian dead reckoning: integrates step events and heading into a path.
 * Heading arrives on its own channel ({@link updateHeading}) and never
 * touches the path by itself.
 */
export class DeadReckoningTracker {
  readonly steps = new Channel<StepEvent>();

  private config: StrideConfig;
  private cadences: RingBuffer<number>;
  private state: TrackerState = { kind: "idle" };
  private heading: Heading = 0;

  constructor(
    config: Partial<StrideConfig> = {},
    private readonly unitsPerCm: number = DEFAULT_UNITS_PER_CM
  ) {
    this.config = { ...DEFAULT_STRIDE_CONFIG, ...config };
    this.cadences = new RingBuffer<number>(this.config.cadenceAverageSize);
  }

  get snapshot(): TrackerState {
    return this.state;
  }

  get isTracking(): boolean {
    return this.state.kind === "tracking";
  }

  get currentHeading(): Heading {
    return this.heading;
  }

  updateStrideConfig(config: Partial<StrideConfig>): void {
    const next = { ...this.config, ...config };
    if (next.cadenceAverageSize !== this.config.cadenceAverageSize) {
      const kept = this.cadences.toArray();
      this.cadences = new RingBuffer<number>(next.cadenceAverageSize);
      kept.forEach((c) => this.cadences.push(c));
    }
    this.config = next;
  }

  updateHeading(heading: Heading): void {
    this.heading = normalizeAngle(heading);
  }

  /** Idle → Tracking. Resets step count and cadence history. */
  setOrigin(origin: Point, floorId: FloorId): void {
    this.cadences.clear();
    this.state = {
      kind: "tracking",
      origin: { ...origin },
      floorId,
      position: { ...origin },
      path: [pathPoint(origin, this.heading)],
      stepCount: 0,
      averageCadence: 0,
      lastStrideLengthCm: 0,
    };
  }

  /**
   * Advances the position by one step. Returns the event that was emitted,
   * or null while idle or before the user's height is known.
   */
  processStep(intervalMs: number, heading: Heading): StepEvent | null {
    const state = this.state;
    if (state.kind !== "tracking") return null;

    const cadence = instantCadence(intervalMs);
    this.cadences.push(cadence);
    const history = this.cadences.toArray();
    const averageCadence = history.reduce((a, b) => a + b, 0) / history.length;

    const strideCm = strideLengthCm(smoothCadence(cadence, averageCadence), this.config);
    if (strideCm <= 0) return null;

    const stepHeading = normalizeAngle(heading);
    const strideUnits = strideCm * this.unitsPerCm;
    const position = advance(state.position, stepHeading, strideUnits);

    this.state = {
      ...state,
      position,
      path: [...state.path, pathPoint(position, stepHeading)],
      stepCount: state.stepCount + 1,
      averageCadence,
      lastStrideLengthCm: strideCm,
    };

    const event: StepEvent = {
      strideLengthCm: strideCm,
      strideLengthUnits: strideUnits,
      cadence,
      position,
      heading: stepHeading,
      timestamp: Date.now(),
    };
    this.steps.emit(event);
    return event;
  }

  /**
   * Moves the tracked position after a confirmed floor change (stairwell).
   * The path keeps growing: the new position is appended.
   */
  relocate(position: Point, floorId: FloorId): void {
    const state = this.state;
    if (state.kind !== "tracking") return;
    this.state = {
      ...state,
      floorId,
      position: { ...position },
      path: [...state.path, pathPoint(position, this.heading)],
    };
  }

  /** Back to idle, discarding path and cadence history */
  clear(): void {
    this.cadences.clear();
    this.heading = 0;
    this.state = { kind: "idle" };
  }
}
