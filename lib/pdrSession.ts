import { v4 as uuidv4 } from "uuid";
import {
  Point,
  PathPoint,
  FloorId,
  BuildingId,
  Heading,
  Room,
  StepEvent,
  StairTransitionEvent,
  FloorConstraintData,
} from "./types";
import {
  StrideConfig,
  CorrectionConfig,
  StairwellConfig,
  DEFAULT_UNITS_PER_CM,
} from "./config";
import { Campus, EMPTY_CAMPUS, buildingsOnLevel } from "./campus";
import { Channel } from "./channel";
import { DeadReckoningTracker } from "./deadReckoning";
import { DriftCorrector } from "./driftCorrector";
import { BuildingDetector } from "./buildingDetector";
import { StairwellTransitionDetector } from "./stairwellDetector";
import { MotionClassifier, MotionBridgeOptions, MotionLabelBridge } from "./motionLabels";
import { NavigationService, NavigationResult } from "./navigationService";
import { pointInAnyPolygon } from "./geometry";
import { createLogger } from "./logger";

const log = createLogger("pdr-session");

export interface PositionUpdate {
  position: Point;
  heading: Heading;
  floorId: FloorId;
  buildingId: BuildingId | null;
  /** Committed points followed by the ones still in the correction buffer */
  visualPath: PathPoint[];
}

export interface FloorChange {
  previousFloorId: FloorId | null;
  floorId: FloorId;
  buildingId: BuildingId | null;
  reason: "detector" | "stairs";
}

/** One step event from the sensor side */
export interface StepInput {
  intervalMs: number;
  headingRadians: number;
}

export interface PdrSessionOptions {
  sessionId?: string;
  unitsPerCm?: number;
  stride?: Partial<StrideConfig>;
  correction?: Partial<CorrectionConfig>;
  stairwell?: Partial<StairwellConfig>;
  classifier?: MotionClassifier;
  motion?: Partial<MotionBridgeOptions>;
  navigation?: NavigationService;
}

interface Location {
  floorId: FloorId;
  buildingId: BuildingId | null;
}

/**
 * One user's tracking session: tracker → drift corrector → building and
 * stairwell detectors, with the classifier bridge feeding stair labels.
 * Events are processed one at a time in arrival order.
 */
export class PdrSession {
  readonly id: string;
  readonly positions: Channel<PositionUpdate>;
  readonly steps: Channel<StepEvent>;
  readonly floorChanges: Channel<FloorChange>;
  readonly stairTransitions: Channel<StairTransitionEvent>;

  private readonly tracker: DeadReckoningTracker;
  private readonly corrector: DriftCorrector;
  private readonly buildings = new BuildingDetector();
  private readonly stairwell: StairwellTransitionDetector;
  private readonly motion: MotionLabelBridge | null;
  private readonly navigation: NavigationService | null;
  private campus: Campus = EMPTY_CAMPUS;
  private location: Location | null = null;

  constructor(options: PdrSessionOptions = {}) {
    this.id = options.sessionId ?? uuidv4();
    const onListenerError = (err: unknown) =>
      log.error("Session listener failed", { error: err instanceof Error ? err.message : String(err) });
    this.positions = new Channel<PositionUpdate>(onListenerError);
    this.floorChanges = new Channel<FloorChange>(onListenerError);
    this.stairTransitions = new Channel<StairTransitionEvent>(onListenerError);

    this.tracker = new DeadReckoningTracker(options.stride, options.unitsPerCm ?? DEFAULT_UNITS_PER_CM);
    this.steps = this.tracker.steps;
    this.corrector = new DriftCorrector(options.correction);
    this.stairwell = new StairwellTransitionDetector(options.stairwell);
    this.navigation = options.navigation ?? null;

    this.motion = options.classifier ? new MotionLabelBridge(options.classifier, options.motion) : null;
    this.motion?.labels.subscribe((l) => this.submitMotionLabel(l.label, l.confidence));
  }

  get isTracking(): boolean {
    return this.location !== null;
  }

  get currentFloorId(): FloorId | null {
    return this.location?.floorId ?? null;
  }

  get currentBuildingId(): BuildingId | null {
    return this.location?.buildingId ?? null;
  }

  get currentPosition(): Point | null {
    return this.corrector.currentPosition;
  }

  get visualPath(): PathPoint[] {
    return this.corrector.visualPath;
  }

  get strideCalibrationFactor(): number {
    return this.corrector.strideCalibrationFactor;
  }

  /** Swaps the campus; an active session keeps its position on the new data */
  loadCampus(campus: Campus): void {
    this.campus = campus;
    const location = this.location;
    if (!location) return;
    this.enterLevel(location.floorId, location.buildingId);
  }

  setHeight(heightCm: number | null): void {
    this.tracker.updateStrideConfig({ heightCm });
  }

  updateStrideConfig(config: Partial<StrideConfig>): void {
    this.tracker.updateStrideConfig(config);
  }

  updateCorrectionConfig(config: Partial<CorrectionConfig>): void {
    this.corrector.updateConfig(config);
  }

  setOrigin(position: Point, floorId: FloorId, buildingId: BuildingId | null = null): void {
    const heading = this.tracker.currentHeading;
    this.tracker.setOrigin(position, floorId);
    this.corrector.setOrigin(position, heading);
    this.stairwell.reset();
    this.location = { floorId, buildingId };
    this.enterLevel(floorId, buildingId);
    this.motion?.start();
    log.info("Tracking started", { sessionId: this.id, floorId, buildingId });
  }

  updateHeading(heading: Heading): void {
    this.tracker.updateHeading(heading);
  }

  /** Returns the position update that was emitted, or null when ignored */
  processStep(step: StepInput): PositionUpdate | null {
    const location = this.location;
    if (!location) return null;

    const event = this.tracker.processStep(step.intervalMs, step.headingRadians);
    if (!event) return null;

    const corrected = this.corrector.processStep(event.heading, event.strideLengthUnits);
    const position = corrected?.currentPosition ?? event.position;

    let current = location;
    const detection = this.buildings.detect(position);
    if (detection.changed) {
      const floorId = detection.floorId ?? location.floorId;
      this.corrector.setFloorConstraints(detection.newConstraintData ?? this.levelConstraints(floorId));
      current = { floorId, buildingId: detection.buildingId };
      this.location = current;
      if (floorId !== location.floorId || detection.buildingId !== location.buildingId) {
        this.floorChanges.emit({
          previousFloorId: location.floorId,
          floorId,
          buildingId: detection.buildingId,
          reason: "detector",
        });
      }
    }

    const floorNumber = this.campus.floorNumbers.get(current.floorId);
    if (floorNumber !== undefined) {
      const transition = this.stairwell.update(position, event.heading, this.campus.stairPairs, floorNumber);
      if (transition) return this.applyTransition(transition, event.heading, current.floorId);
    }

    return this.emitPosition(position, event.heading, current);
  }

  onAccelerometerSample(x: number, y: number, z: number): void {
    this.motion?.onSample(x, y, z);
  }

  submitMotionLabel(label: string, confidence: number): void {
    if (!this.location) return;
    this.stairwell.onMotionLabel(label, confidence);
  }

  /** Routes from the current position; a newer request cancels this one */
  async requestRoute(room: Room): Promise<NavigationResult> {
    const navigation = this.navigation;
    const location = this.location;
    const start = this.corrector.currentPosition;
    if (!navigation) throw new Error("Session has no navigation service");
    if (!location || !start) throw new Error("Tracking has not started");
    return navigation.requestRoute(this.id, { room, start, floorId: location.floorId });
  }

  /**
   * Ends tracking: commits the buffered steps, cancels any route request and
   * drops pending classifier results. Returns the final path.
   */
  stop(): PathPoint[] {
    const finalPath = this.location ? [...this.corrector.committedPath, ...this.corrector.flush()] : [];
    this.navigation?.cancel(this.id);
    this.motion?.stop();
    this.stairwell.reset();
    this.tracker.clear();
    this.corrector.reset();
    this.buildings.setInitial(null, null);
    if (this.location) log.info("Tracking stopped", { sessionId: this.id, points: finalPath.length });
    this.location = null;
    return finalPath;
  }

  private levelConstraints(floorId: FloorId): FloorConstraintData | null {
    return this.campus.constraintsByFloor.get(floorId) ?? null;
  }

  /** Loads detector buildings and corrector constraints for a level */
  private enterLevel(floorId: FloorId, buildingId: BuildingId | null): void {
    const floorNumber = this.campus.floorNumbers.get(floorId);
    const level = floorNumber === undefined ? [] : buildingsOnLevel(this.campus, floorNumber);
    this.buildings.loadBuildings(level);
    this.buildings.setInitial(buildingId, buildingId ? floorId : null);

    const building = level.find((b) => b.buildingId === buildingId && b.floorId === floorId);
    const constraints = building?.constraintData ?? this.levelConstraints(floorId);
    if (!constraints || constraints.walls.length === 0) {
      log.warn("No wall data for floor, correction disabled", { floorId });
    }
    this.corrector.setFloorConstraints(constraints);
  }

  private applyTransition(event: StairTransitionEvent, heading: Heading, previousFloorId: FloorId): PositionUpdate {
    const floorId = event.destinationFloorId;

    this.tracker.relocate(event.endPosition, floorId);
    this.corrector.relocate(event.endPosition, heading);

    const floorNumber = this.campus.floorNumbers.get(floorId);
    const arrival =
      floorNumber === undefined
        ? undefined
        : buildingsOnLevel(this.campus, floorNumber).find(
            (b) => b.floorId === floorId && pointInAnyPolygon(event.endPosition, b.polygons)
          );
    const buildingId = arrival?.buildingId ?? null;
    const location = { floorId, buildingId };
    this.location = location;
    this.enterLevel(floorId, buildingId);
    this.stairwell.reset();

    log.info("Floor changed by stairs", { from: previousFloorId, to: floorId, direction: event.direction });
    this.stairTransitions.emit(event);
    this.floorChanges.emit({ previousFloorId, floorId, buildingId, reason: "stairs" });
    return this.emitPosition(event.endPosition, heading, location);
  }

  private emitPosition(position: Point, heading: Heading, location: Location): PositionUpdate {
    const update: PositionUpdate = {
      position: { ...position },
      heading,
      floorId: location.floorId,
      buildingId: location.buildingId,
      visualPath: this.corrector.visualPath,
    };
    this.positions.emit(update);
    return update;
  }
}
