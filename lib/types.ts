/** Shared TypeScript types for campus positioning and routing */

/**
 * A 2-D point. Unless a type says otherwise, coordinates are campus-wide
 * (every building/floor transformed into one frame, 1 unit = 2 cm, +y down).
 */
export interface Point {
  x: number;
  y: number;
}

export type FloorId = string;
export type BuildingId = string;

// ── Floor plan input (already parsed by the data-loading collaborator) ──

/** Where a building sits on the campus canvas */
export interface BuildingPlacement {
  /** Floor-local units → campus units */
  scale: number;
  /** Clockwise rotation in degrees */
  rotationDegrees: number;
  /** Building origin in campus coordinates */
  offset: Point;
}

/** Wall segment in floor-local coordinates */
export interface Wall {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export type StairEnd = "top" | "bottom";

/** Room or stairwell entrance in floor-local coordinates */
export interface Entrance {
  id: number;
  x: number;
  y: number;
  name?: string | null;
  roomNo?: string | null;
  /**
   * "bottom": start of a stairwell going up to `floor`.
   * "top": arrival of a stairwell; go down from here.
   */
  stairs?: StairEnd | null;
  /** Floor number the stairwell connects to */
  floor?: number | null;
  available?: boolean;
}

export interface BoundaryPoint {
  id: number;
  x: number;
  y: number;
}

export interface BoundaryPolygon {
  points: BoundaryPoint[];
}

/** One floor of one building, as delivered by the loader */
export interface FloorPlanData {
  buildingId: BuildingId;
  floorId: FloorId;
  floorNumber: number;
  placement: BuildingPlacement;
  walls: Wall[];
  entrances: Entrance[];
  boundaryPolygons: BoundaryPolygon[];
}

// ── Campus-wide structures ──

export interface CampusWall {
  start: Point;
  end: Point;
}

/** Entrance used by the drift corrector */
export interface ConstraintEntrance {
  id: number;
  position: Point;
  name?: string | null;
}

/** Walls + entrances of a single floor, campus-wide, read-only */
export interface FloorConstraintData {
  floorId: FloorId;
  walls: readonly CampusWall[];
  entrances: readonly ConstraintEntrance[];
}

/** Campus-wide polygon; fewer than 3 points contains nothing */
export type CampusPolygon = readonly Point[];

export interface CampusBuilding {
  buildingId: BuildingId;
  floorId: FloorId;
  floorNumber: number;
  polygons: readonly CampusPolygon[];
  constraintData: FloorConstraintData;
}

export interface CampusEntrance {
  original: Entrance;
  position: Point;
  buildingId: BuildingId;
  floorId: FloorId;
}

/** One physical stairwell linking two adjacent floors */
export interface StairPair {
  topPosition: Point;
  topFloorId: FloorId;
  topFloorNumber: number;
  bottomPosition: Point;
  bottomFloorId: FloorId;
  bottomFloorNumber: number;
}

// ── Tracking ──

/** Heading in radians: 0 = north (−y), clockwise positive, (−π, π] */
export type Heading = number;

export interface PathPoint {
  readonly position: Readonly<Point>;
  readonly heading: Heading;
}

/** A step waiting in the correction buffer */
export interface RawStep {
  position: Point;
  heading: Heading;
  strideLengthUnits: number;
}

export interface StepEvent {
  strideLengthCm: number;
  strideLengthUnits: number;
  /** Steps per second */
  cadence: number;
  position: Point;
  heading: Heading;
  timestamp: number;
}

export interface TurnEvent {
  /** Index inside the raw buffer where the turn occurred */
  bufferIndex: number;
  preHeading: Heading;
  postHeading: Heading;
  headingDelta: number;
  approximatePosition: Point;
}

export type StairDirection = "up" | "down";

export interface StairTransitionEvent {
  stairPair: StairPair;
  direction: StairDirection;
  startPosition: Point;
  endPosition: Point;
  originFloorId: FloorId;
  destinationFloorId: FloorId;
  /** Steps taken between candidate latch and confirmation */
  preClimbedSteps: number;
  /** "sustained" when confirmed by classifier labels alone */
  trigger: "candidate" | "sustained";
}

/** Output of the external motion classifier */
export interface MotionLabel {
  label: string;
  confidence: number;
}

// ── Routing ──

export interface FloorPathSegment {
  floorId: FloorId;
  floorNumber: number;
  buildingId: BuildingId;
  points: Point[];
  /** True for the stairwell hop between two floors */
  isTransition: boolean;
}

export interface MultiFloorRoute {
  segments: FloorPathSegment[];
  totalFloors: number;
  isMultiFloor: boolean;
}

/** Destination room as known to search/UI */
export interface Room {
  name?: string | null;
  number?: string | number | null;
  buildingId?: BuildingId | null;
}

export type RouteOutcome =
  | { status: "found"; route: MultiFloorRoute; entrance: CampusEntrance }
  | { status: "not_found"; route: MultiFloorRoute; entrance: CampusEntrance }
  | { status: "no_entrance" };

/** A single step in turn-by-turn navigation */
export interface RouteStep {
  /** Localized instruction text */
  text: Record<string, string>;
  /** Distance for this segment in meters */
  distance: number;
  direction: "straight" | "left" | "right" | "stairs_up" | "stairs_down" | "start" | "arrive";
}
