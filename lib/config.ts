/**
 * Tunables for tracking, correction, stairwell detection and routing.
 * Distances are campus units (1 unit = 2 cm) unless the name says otherwise.
 */

export interface StrideConfig {
  /** User height; null until the user provides it (steps are then ignored) */
  heightCm: number | null;
  /** Sensitivity to cadence */
  k: number;
  /** Base stride constant */
  c: number;
  /** Number of recent cadences averaged */
  cadenceAverageSize: number;
}

export interface CorrectionConfig {
  /** Raw steps held before the oldest one is committed */
  bufferSize: number;
  /** Search radius for entrances when a turn is detected (1.5 m) */
  entranceSnapRadius: number;
  /** Max angle (rad) between pre-turn heading and direction to an entrance */
  entranceDirectionTolerance: number;
  /** Min heading change (rad) counted as a turn (~30°) */
  turnDetectionThreshold: number;
  /** Gap kept between the user and a wall after clamping */
  wallEpsilon: number;
  /** Fraction of the wall-slide heading change fed back into later steps */
  headingCorrectionFactor: number;
  /** Walls farther than this from the step are ignored (3 m) */
  wallSearchRadius: number;
  /** Slide-then-recheck iterations per step */
  maxWallIterations: number;
  /** Committed steps over which a snap correction is ramped */
  retroactiveSmoothSteps: number;
  /** Max stride scaling from a single snap (0.08 → [0.92, 1.08]) */
  maxStrideAdjustment: number;
  /** Upper bound on how far a snap may move any point */
  maxCorrectionPerStep: number;
}

export interface StairwellConfig {
  proximityRadius: number;
  /** Half-angle of the facing cone (rad) */
  fovHalfAngle: number;
  windowSize: number;
  requiredInWindow: number;
  minConfidence: number;
  candidateExpirySteps: number;
  headingBufferSize: number;
  sustainedLabelThreshold: number;
  sustainedProximityRadius: number;
}

export interface RoutingConfig {
  /** Grid cell edge; roughly half the narrowest doorway */
  cellSize: number;
  /** Weight of the 1/distance-to-wall penalty */
  wallAvoidance: number;
  /** Cells (distance-to-wall, in cells) below which smoothing won't cut through */
  lineOfSightClearance: number;
  /** Ring radius (cells) searched when start/goal lands on a blocked cell */
  snapSearchRadius: number;
  maxIterations: number;
  /** Expansions between cooperative yields in async searches */
  iterationsPerChunk: number;
}

export const DEFAULT_STRIDE_CONFIG: StrideConfig = {
  heightCm: null,
  k: 0.16,
  c: 0.25,
  cadenceAverageSize: 5,
};

export const DEFAULT_CORRECTION_CONFIG: CorrectionConfig = {
  bufferSize: 3,
  entranceSnapRadius: 75,
  entranceDirectionTolerance: 0.785,
  turnDetectionThreshold: 0.523,
  wallEpsilon: 1,
  headingCorrectionFactor: 0,
  wallSearchRadius: 150,
  maxWallIterations: 3,
  retroactiveSmoothSteps: 3,
  maxStrideAdjustment: 0.08,
  maxCorrectionPerStep: 40,
};

export const DEFAULT_STAIRWELL_CONFIG: StairwellConfig = {
  proximityRadius: 100,
  fovHalfAngle: 1.047,
  windowSize: 3,
  requiredInWindow: 1,
  minConfidence: 0.45,
  candidateExpirySteps: 8,
  headingBufferSize: 3,
  sustainedLabelThreshold: 3,
  sustainedProximityRadius: 200,
};

export const DEFAULT_ROUTING_CONFIG: RoutingConfig = {
  cellSize: 15,
  wallAvoidance: 2,
  lineOfSightClearance: 1.5,
  snapSearchRadius: 20,
  maxIterations: 80_000,
  iterationsPerChunk: 2_000,
};

/** Campus units per centimetre (1 unit = 2 cm) */
export const DEFAULT_UNITS_PER_CM = 0.5;

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export interface AppConfig {
  unitsPerCm: number;
  routing: RoutingConfig;
}

/** Reads overrides from the environment, falling back to defaults */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    unitsPerCm: numberFromEnv(env.PDR_UNITS_PER_CM, DEFAULT_UNITS_PER_CM),
    routing: {
      ...DEFAULT_ROUTING_CONFIG,
      cellSize: numberFromEnv(env.ROUTING_CELL_SIZE, DEFAULT_ROUTING_CONFIG.cellSize),
      wallAvoidance: numberFromEnv(env.ROUTING_WALL_AVOIDANCE, DEFAULT_ROUTING_CONFIG.wallAvoidance),
      maxIterations: Math.floor(
        numberFromEnv(env.ROUTING_MAX_ITERATIONS, DEFAULT_ROUTING_CONFIG.maxIterations)
      ),
    },
  };
}
