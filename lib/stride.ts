import { StrideConfig } from "./config";

export const MIN_STRIDE_CM = 40;
export const MAX_STRIDE_HEIGHT_RATIO = 0.85;
const SHORT_USER_HEIGHT_CM = 170;
const SHORT_USER_BOOST = 1.05;

/** Steps per second from the interval since the previous step */
export function instantCadence(intervalMs: number): number {
  return intervalMs > 0 ? 1000 / intervalMs : 0;
}

/** Weighted toward the rolling average so single odd intervals don't jump */
export function smoothCadence(instant: number, average: number): number {
  return instant * 0.35 + average * 0.65;
}

/**
 * Linear gait model: stride = height × (k × cadence + c).
 * Users under 170 cm get a 5 % boost; the result is clamped to
 * [40 cm, 0.85 × height]. Returns 0 when the height is unknown.
 */
export function strideLengthCm(smoothedCadence: number, config: StrideConfig): number {
  const heightCm = config.heightCm;
  if (heightCm === null || heightCm <= 0) return 0;

  let stride = (heightCm / 100) * (config.k * smoothedCadence + config.c);
  if (heightCm < SHORT_USER_HEIGHT_CM) {
    stride *= SHORT_USER_BOOST;
  }

  const maxStride = heightCm * MAX_STRIDE_HEIGHT_RATIO;
  return Math.min(maxStride, Math.max(MIN_STRIDE_CM, stride * 100));
}
