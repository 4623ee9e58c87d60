import { Point, Heading, StairPair, StairDirection, StairTransitionEvent } from "./types";
import { StairwellConfig, DEFAULT_STAIRWELL_CONFIG } from "./config";
import { RingBuffer } from "./ringBuffer";
import { distance, directionAngle, angleDifference } from "./geometry";
import { createLogger } from "./logger";

const log = createLogger("stairwell");

export const UPSTAIRS_LABEL = "upstairs";
export const DOWNSTAIRS_LABEL = "downstairs";

export type StairwellState =
  | { kind: "noCandidate" }
  | {
      kind: "candidateActive";
      pair: StairPair;
      direction: StairDirection;
      stepsRemaining: number;
      stepsSinceLatch: number;
    };

interface Streak {
  direction: StairDirection;
  count: number;
}

function labelDirection(label: string): StairDirection | null {
  if (label === UPSTAIRS_LABEL) return "up";
  if (label === DOWNSTAIRS_LABEL) return "down";
  return null;
}

/** Start of the climb for a direction: bottom going up, top going down */
function startOf(pair: StairPair, direction: StairDirection): { position: Point; floorNumber: number } {
  return direction === "up"
    ? { position: pair.bottomPosition, floorNumber: pair.bottomFloorNumber }
    : { position: pair.topPosition, floorNumber: pair.topFloorNumber };
}

function buildEvent(
  pair: StairPair,
  direction: StairDirection,
  preClimbedSteps: number,
  trigger: StairTransitionEvent["trigger"]
): StairTransitionEvent {
  const up = direction === "up";
  return {
    stairPair: pair,
    direction,
    startPosition: { ...(up ? pair.bottomPosition : pair.topPosition) },
    endPosition: { ...(up ? pair.topPosition : pair.bottomPosition) },
    originFloorId: up ? pair.bottomFloorId : pair.topFloorId,
    destinationFloorId: up ? pair.topFloorId : pair.bottomFloorId,
    preClimbedSteps,
    trigger,
  };
}

/**
 * Two-stage stairwell entry detection.
 *
 * Stage 1 latches a stair pair as candidate when the user is near its start
 * and was facing it a step or two ago (oldest heading in the ring). The latch
 * survives `candidateExpirySteps` updates without re-acquisition, which covers
 * the classifier's lag.
 *
 * Stage 2 confirms the candidate once the label window holds
 * `requiredInWindow` labels of the matching direction.
 *
 * As a fallback, `sustainedLabelThreshold` consecutive labels of one stair
 * direction confirm through the nearest pair by proximity alone.
 */
export class StairwellTransitionDetector {
  private readonly config: StairwellConfig;
  private readonly labels: RingBuffer<string>;
  private readonly headings: RingBuffer<Heading>;
  private state: StairwellState = { kind: "noCandidate" };
  private streak: Streak | null = null;

  constructor(config: Partial<StairwellConfig> = {}) {
    this.config = { ...DEFAULT_STAIRWELL_CONFIG, ...config };
    this.labels = new RingBuffer<string>(this.config.windowSize);
    this.headings = new RingBuffer<Heading>(this.config.headingBufferSize);
  }

  get snapshot(): StairwellState {
    return this.state;
  }

  get labelWindow(): string[] {
    return this.labels.toArray();
  }

  /** Low-confidence labels are dropped, not stored */
  onMotionLabel(label: string, confidence: number): void {
    if (confidence < this.config.minConfidence) return;
    this.labels.push(label);

    const direction = labelDirection(label);
    if (!direction) {
      this.streak = null;
    } else if (this.streak && this.streak.direction === direction) {
      this.streak = { direction, count: this.streak.count + 1 };
    } else {
      this.streak = { direction, count: 1 };
    }
  }

  /**
   * Called on every corrected position. Returns a transition event when one
   * is confirmed; the detector is then back in its initial state.
   */
  update(
    position: Point,
    heading: Heading,
    stairPairs: readonly StairPair[],
    currentFloorNumber: number
  ): StairTransitionEvent | null {
    this.headings.push(heading);
    const laggedHeading = this.headings.oldest() ?? heading;

    this.state = this.nextState(this.findFacingPair(position, laggedHeading, stairPairs, currentFloorNumber));

    const state = this.state;
    if (state.kind === "candidateActive") {
      const wanted = state.direction === "up" ? UPSTAIRS_LABEL : DOWNSTAIRS_LABEL;
      if (this.labels.countWhere((l) => l === wanted) >= this.config.requiredInWindow) {
        const event = buildEvent(state.pair, state.direction, state.stepsSinceLatch, "candidate");
        log.info("Stair transition confirmed", {
          direction: event.direction,
          from: event.originFloorId,
          to: event.destinationFloorId,
        });
        this.reset();
        return event;
      }
    }

    return this.checkSustained(position, stairPairs, currentFloorNumber);
  }

  /** Clears labels, headings, streak and candidate unconditionally */
  reset(): void {
    this.labels.clear();
    this.headings.clear();
    this.streak = null;
    this.state = { kind: "noCandidate" };
  }

  private nextState(match: { pair: StairPair; direction: StairDirection } | null): StairwellState {
    const current = this.state;
    if (match) {
      // A refresh keeps counting; only a fresh latch restarts the lag count
      const stepsSinceLatch = current.kind === "candidateActive" ? current.stepsSinceLatch + 1 : 1;
      return {
        kind: "candidateActive",
        pair: match.pair,
        direction: match.direction,
        stepsRemaining: this.config.candidateExpirySteps,
        stepsSinceLatch,
      };
    }
    if (current.kind === "noCandidate") return current;

    const stepsRemaining = current.stepsRemaining - 1;
    if (stepsRemaining <= 0) {
      log.debug("Stair candidate expired");
      return { kind: "noCandidate" };
    }
    return { ...current, stepsRemaining, stepsSinceLatch: current.stepsSinceLatch + 1 };
  }

  /** Up candidates first, then down */
  private findFacingPair(
    position: Point,
    heading: Heading,
    stairPairs: readonly StairPair[],
    currentFloorNumber: number
  ): { pair: StairPair; direction: StairDirection } | null {
    for (const direction of ["up", "down"] as const) {
      let best: StairPair | null = null;
      let bestDist = Infinity;
      for (const pair of stairPairs) {
        const start = startOf(pair, direction);
        if (start.floorNumber !== currentFloorNumber) continue;

        const d = distance(position, start.position);
        if (d > this.config.proximityRadius) continue;
        if (d > 1) {
          const bearing = directionAngle(position, start.position);
          if (Math.abs(angleDifference(heading, bearing)) > this.config.fovHalfAngle) continue;
        }
        if (d < bestDist) {
          bestDist = d;
          best = pair;
        }
      }
      if (best) return { pair: best, direction };
    }
    return null;
  }

  private checkSustained(
    position: Point,
    stairPairs: readonly StairPair[],
    currentFloorNumber: number
  ): StairTransitionEvent | null {
    const streak = this.streak;
    if (!streak || streak.count < this.config.sustainedLabelThreshold) return null;

    const pair = this.nearestByProximity(position, stairPairs, currentFloorNumber, streak.direction);
    if (!pair) return null;

    const event = buildEvent(pair, streak.direction, streak.count, "sustained");
    log.info("Stair transition from sustained labels", {
      direction: event.direction,
      labels: streak.count,
    });
    this.reset();
    return event;
  }

  /**
   * Pass 1: start entrance on the current floor within the sustained radius.
   * Pass 2: either end of any pair connecting the current floor that way.
   */
  private nearestByProximity(
    position: Point,
    stairPairs: readonly StairPair[],
    currentFloorNumber: number,
    direction: StairDirection
  ): StairPair | null {
    const radius = this.config.sustainedProximityRadius;
    let best: StairPair | null = null;
    let bestDist = Infinity;

    for (const pair of stairPairs) {
      const start = startOf(pair, direction);
      if (start.floorNumber !== currentFloorNumber) continue;
      const d = distance(position, start.position);
      if (d <= radius && d < bestDist) {
        bestDist = d;
        best = pair;
      }
    }
    if (best) return best;

    for (const pair of stairPairs) {
      const connects =
        direction === "up"
          ? pair.bottomFloorNumber === currentFloorNumber || pair.topFloorNumber > currentFloorNumber
          : pair.topFloorNumber === currentFloorNumber || pair.bottomFloorNumber < currentFloorNumber;
      if (!connects) continue;
      const d = Math.min(distance(position, pair.bottomPosition), distance(position, pair.topPosition));
      if (d <= radius && d < bestDist) {
        bestDist = d;
        best = pair;
      }
    }
    return best;
  }
}
