// Shared angle utilities for the Tilt Stabilizer.
//
// Every angle in this codebase is in radians and, once normalized, lies in
// the half-open interval (-π, π].

import type { TiltClassification } from "./types.js";

export const TWO_PI = 2 * Math.PI;
export const HALF_PI = Math.PI / 2;

// ─── normalizeAngle ─────────────────────────────────────────────────────────────

/** Bring any finite angle into (-π, π]. */
export function normalizeAngle(angle: number): number {
  if (angle > -Math.PI && angle <= Math.PI) {
    return angle;
  }
  const wrapped = angle % TWO_PI;
  if (wrapped > Math.PI) {
    return wrapped - TWO_PI;
  }
  if (wrapped <= -Math.PI) {
    return wrapped + TWO_PI;
  }
  return wrapped;
}

/** Signed shortest rotation taking `from` onto `to`, in (-π, π]. */
export function shortestAngleBetween(to: number, from: number): number {
  return normalizeAngle(to - from);
}

// ─── quantizeToRightAngle ───────────────────────────────────────────────────────

/**
 * Snap an angle to the nearest multiple of π/2 and normalize it.
 * Result is one of -π/2, 0, π/2, π.
 *
 * Exact halves (±45°, ±135°) round away from zero.
 */
export function quantizeToRightAngle(angle: number): number {
  const quarterTurns = angle / HALF_PI;
  const nearest = Math.sign(quarterTurns) * Math.round(Math.abs(quarterTurns));
  // 0, 1, 2, 3 quarter turns counter-clockwise
  const quadrant = ((nearest % 4) + 4) % 4;
  return quadrant === 3 ? -HALF_PI : quadrant * HALF_PI;
}

export function radiansToDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

// ─── classifyTilt ───────────────────────────────────────────────────────────────

/**
 * Coarse description of an angle relative to the baseline, used in debug logs:
 * within ±45° is near baseline, 45°–135° either way is a quarter turn, beyond
 * that the device is upside down.
 */
export function classifyTilt(angle: number): TiltClassification {
  const degrees = radiansToDegrees(angle);
  if (degrees > -45 && degrees < 45) return "near-baseline";
  if (degrees >= 45 && degrees <= 135) return "tilted-positive";
  if (degrees <= -45 && degrees >= -135) return "tilted-negative";
  return "upside-down";
}

/** Round a value to the specified number of decimal places. */
export function roundTo(value: number, precision: number = 4): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}
