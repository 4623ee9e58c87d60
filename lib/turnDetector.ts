import { RawStep, TurnEvent } from "./types";
import { angleDifference } from "./geometry";

/** Committed steps used as leading context */
const CONTEXT_STEPS = 2;

/**
 * Detects turns across the step buffer (plus up to two committed steps).
 *
 * A turn is flagged when the sharpest single inter-step heading change, or
 * the cumulative change from the first to the last step, reaches
 * `threshold` radians.
 */
export function detectTurn(
  bufferSteps: readonly RawStep[],
  recentCommitted: readonly RawStep[],
  threshold: number
): TurnEvent | null {
  if (bufferSteps.length < 2) return null;

  const context = recentCommitted.slice(-CONTEXT_STEPS);
  const all = [...context, ...bufferSteps];

  let maxDelta = 0;
  let sharpIndex = -1;
  let preHeading = all[0].heading;
  let postHeading = all[0].heading;

  for (let i = 1; i < all.length; i++) {
    const delta = Math.abs(angleDifference(all[i - 1].heading, all[i].heading));
    if (delta > maxDelta) {
      maxDelta = delta;
      sharpIndex = i;
      preHeading = all[i - 1].heading;
      postHeading = all[i].heading;
    }
  }

  const totalChange = Math.abs(angleDifference(all[0].heading, all[all.length - 1].heading));
  const isTurn = maxDelta >= threshold || totalChange >= threshold;
  if (!isTurn || sharpIndex < 0) return null;

  const bufferIndex = Math.min(bufferSteps.length - 1, Math.max(0, sharpIndex - context.length));

  return {
    bufferIndex,
    preHeading,
    postHeading,
    headingDelta: angleDifference(preHeading, postHeading),
    approximatePosition: { ...bufferSteps[bufferIndex].position },
  };
}
