import { Point, PathPoint, RawStep, TurnEvent, FloorConstraintData, Heading } from "./types";
import { CorrectionConfig, DEFAULT_CORRECTION_CONFIG } from "./config";
import { FloorConstraintProvider } from "./floorConstraints";
import { RingBuffer } from "./ringBuffer";
import { detectTurn } from "./turnDetector";
import { snapToEntrance } from "./entranceSnapper";
import { constrainMovement } from "./wallConstraint";
import { advance, crossesAnyWall, normalizeAngle } from "./geometry";

export interface CorrectionResult {
  /** Points committed by this step (empty while the buffer fills) */
  newCommittedPoints: PathPoint[];
  /** Latest position, possibly still buffered */
  currentPosition: Point;
  headingCorrection: number;
  strideCalibrationFactor: number;
  turn: TurnEvent | null;
  snapped: boolean;
}

function pathPoint(position: Point, heading: Heading): PathPoint {
  return Object.freeze({ position: Object.freeze({ x: position.x, y: position.y }), heading });
}

/**
 * Drift correction pipeline:
 *
 *   raw step → [buffer] → turn detection → entrance snap (on turn)
 *            → wall constraint → commit oldest → rebase buffer
 *
 * The committed path lags by `bufferSize` steps; {@link visualPath} appends
 * the buffered steps so callers always see the latest estimate.
 */
export class DriftCorrector {
  private config: CorrectionConfig;
  private readonly constraints = new FloorConstraintProvider();

  private rawBuffer: RawStep[] = [];
  private committed: PathPoint[] = [];
  private recentCommitted: RingBuffer<RawStep>;
  private lastCommittedPosition: Point | null = null;
  private accumulatedHeadingCorrection = 0;
  private calibration = 1;

  constructor(config: Partial<CorrectionConfig> = {}) {
    this.config = { ...DEFAULT_CORRECTION_CONFIG, ...config };
    this.recentCommitted = new RingBuffer<RawStep>(this.config.bufferSize * 2);
  }

  get isActive(): boolean {
    return this.constraints.isLoaded();
  }

  get strideCalibrationFactor(): number {
    return this.calibration;
  }

  get committedPath(): readonly PathPoint[] {
    return this.committed;
  }

  /** Committed (corrected) points followed by the speculative buffered ones */
  get visualPath(): PathPoint[] {
    return [...this.committed, ...this.rawBuffer.map((s) => pathPoint(s.position, s.heading))];
  }

  get currentPosition(): Point | null {
    const last = this.rawBuffer[this.rawBuffer.length - 1];
    return last ? { ...last.position } : this.lastCommittedPosition;
  }

  /** Swaps walls/entrances for the current floor; null disables correction */
  setFloorConstraints(data: FloorConstraintData | null): void {
    this.constraints.load(data);
  }

  /** Hot-swaps tunables; buffer and committed path are kept */
  updateConfig(config: Partial<CorrectionConfig>): void {
    const next = { ...this.config, ...config };
    if (next.bufferSize !== this.config.bufferSize) {
      const kept = this.recentCommitted.toArray();
      this.recentCommitted = new RingBuffer<RawStep>(next.bufferSize * 2);
      kept.forEach((s) => this.recentCommitted.push(s));
    }
    this.config = next;
  }

  setOrigin(origin: Point, heading: Heading): void {
    this.reset();
    this.lastCommittedPosition = { ...origin };
    this.committed.push(pathPoint(origin, heading));
  }

  /**
   * Re-anchors after a floor change: the buffer is committed first, then the
   * new position is appended as a committed point.
   */
  relocate(position: Point, heading: Heading): PathPoint[] {
    const flushed = this.flush();
    const point = pathPoint(position, heading);
    this.committed.push(point);
    this.lastCommittedPosition = { ...position };
    this.recentCommitted.clear();
    return [...flushed, point];
  }

  reset(): void {
    this.rawBuffer = [];
    this.committed = [];
    this.recentCommitted.clear();
    this.lastCommittedPosition = null;
    this.accumulatedHeadingCorrection = 0;
    this.calibration = 1;
  }

  /**
   * Feeds one step. The raw position is `anchor + stride × heading`, with
   * the stride calibration and any accumulated heading correction applied.
   * Returns null before an origin is set.
   */
  processStep(heading: Heading, strideLengthUnits: number): CorrectionResult | null {
    const anchor = this.rawBuffer[this.rawBuffer.length - 1]?.position ?? this.lastCommittedPosition;
    if (!anchor) return null;

    const correctedHeading = normalizeAngle(heading + this.accumulatedHeadingCorrection);
    const stride = strideLengthUnits * this.calibration;
    const rawPosition = advance(anchor, correctedHeading, stride);
    this.rawBuffer.push({ position: rawPosition, heading: correctedHeading, strideLengthUnits: stride });

    if (this.rawBuffer.length < this.config.bufferSize) {
      return this.result([], rawPosition, null, false);
    }

    // 1. Turn detection
    const turn = detectTurn(this.rawBuffer, this.recentCommitted.toArray(), this.config.turnDetectionThreshold);

    // 2. Entrance snap on a turn
    let snapped = false;
    if (turn) {
      const turnStep = this.rawBuffer[turn.bufferIndex];
      const snap = snapToEntrance(
        turnStep.position,
        turn.preHeading,
        turnStep.strideLengthUnits,
        this.constraints,
        this.config
      );
      if (snap.snapped) {
        this.applySnap(turn.bufferIndex, snap.position, snap.delta);
        // Nudge, don't jump: 90 % keep / 10 % new
        this.calibration = this.calibration * 0.9 + snap.strideCalibrationFactor * 0.1;
        snapped = true;
      }
    }

    // 3. Wall constraint + commit of the oldest buffered step
    const committedPoint = this.commitOldest();
    // Re-derives every buffered position from the commit, so a snap applied to
    // a step still in the buffer is recomputed and may snap again on a later step
    this.rebaseBuffer(committedPoint.position);

    const current = this.rawBuffer[this.rawBuffer.length - 1]?.position ?? committedPoint.position;
    return this.result([committedPoint], { ...current }, turn, snapped);
  }

  /** Commits every buffered step (e.g. when tracking stops) */
  flush(): PathPoint[] {
    const flushed: PathPoint[] = [];
    while (this.rawBuffer.length > 0) {
      flushed.push(this.commitOldest());
    }
    return flushed;
  }

  private commitOldest(): PathPoint {
    const oldest = this.rawBuffer[0];
    const previous = this.lastCommittedPosition ?? oldest.position;
    const walls = this.constraints.wallsNear(oldest.position, this.config.wallSearchRadius);
    const constrained = constrainMovement(previous, oldest.position, walls, this.config);
    if (constrained.wasConstrained) {
      this.accumulatedHeadingCorrection += constrained.headingCorrection;
    }

    const point = pathPoint(constrained.position, oldest.heading);
    this.committed.push(point);
    this.lastCommittedPosition = { ...constrained.position };
    this.recentCommitted.push(oldest);
    this.rawBuffer.shift();
    return point;
  }

  /**
   * Moves the turn step onto the entrance and ramps the same correction
   * back over recently committed points (the origin never moves). A point
   * whose shift would cross a wall stays where it is.
   */
  private applySnap(turnIndex: number, snappedPosition: Point, delta: Point): void {
    this.rawBuffer[turnIndex] = { ...this.rawBuffer[turnIndex], position: { ...snappedPosition } };

    const smoothCount = Math.min(this.config.retroactiveSmoothSteps, this.committed.length - 1);
    if (smoothCount > 0) {
      const startIdx = this.committed.length - smoothCount;
      for (let i = startIdx; i < this.committed.length; i++) {
        const fraction = (i - startIdx + 1) / (smoothCount + 1);
        const original = this.committed[i];
        const shifted = {
          x: original.position.x + delta.x * fraction,
          y: original.position.y + delta.y * fraction,
        };
        const walls = this.constraints.wallsNear(original.position, this.config.wallSearchRadius);
        if (crossesAnyWall(original.position, shifted, walls)) continue;
        this.committed[i] = pathPoint(shifted, original.heading);
      }
      const last = this.committed[this.committed.length - 1];
      this.lastCommittedPosition = { ...last.position };
    }

    // Steps after the turn chain from the snapped position
    let anchor = snappedPosition;
    for (let i = turnIndex + 1; i < this.rawBuffer.length; i++) {
      const step = this.rawBuffer[i];
      const position = advance(anchor, step.heading, step.strideLengthUnits);
      this.rawBuffer[i] = { ...step, position };
      anchor = position;
    }
  }

  /** Recomputes every buffered position from the newly committed anchor */
  private rebaseBuffer(newAnchor: Point): void {
    let anchor = newAnchor;
    for (let i = 0; i < this.rawBuffer.length; i++) {
      const step = this.rawBuffer[i];
      const position = advance(anchor, step.heading, step.strideLengthUnits);
      this.rawBuffer[i] = { ...step, position };
      anchor = position;
    }
  }

  private result(
    newCommittedPoints: PathPoint[],
    currentPosition: Point,
    turn: TurnEvent | null,
    snapped: boolean
  ): CorrectionResult {
    return {
      newCommittedPoints,
      currentPosition,
      headingCorrection: this.accumulatedHeadingCorrection,
      strideCalibrationFactor: this.calibration,
      turn,
      snapped,
    };
  }
}
