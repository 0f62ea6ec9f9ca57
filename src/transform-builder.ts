/**
 * StabilizationTransformBuilder — rotation and cover scale for one frame.
 *
 * The rotation is the effective angle itself: zero deviation from the
 * baseline means zero applied rotation. The scale is the smallest uniform
 * enlargement for which the rotated frame, cropped back to its original size
 * around the centre, has no empty corners.
 */

import {
  BaselineOrientation,
  type FrameDimensions,
  type StabilizationTransform,
} from "./types.js";

export const IDENTITY_TRANSFORM: Readonly<StabilizationTransform> = Object.freeze({
  rotationRadians: 0,
  scale: 1,
});

/** The frame's intended upright rectangle: swapped for landscape recordings. */
export function referenceDimensions(
  dims: FrameDimensions,
  orientation: BaselineOrientation,
): FrameDimensions {
  return orientation === BaselineOrientation.PORTRAIT
    ? { width: dims.width, height: dims.height }
    : { width: dims.height, height: dims.width };
}

/** Axis-aligned bounding box of a w×h rectangle rotated by θ. */
export function rotatedBoundingBox(width: number, height: number, theta: number): FrameDimensions {
  const cosTheta = Math.abs(Math.cos(theta));
  const sinTheta = Math.abs(Math.sin(theta));
  return {
    width: width * cosTheta + height * sinTheta,
    height: width * sinTheta + height * cosTheta,
  };
}

/**
 * Scale needed to cover the reference rectangle after rotating by θ.
 * 1 at θ = 0; never below 1.
 */
export function coverScale(reference: FrameDimensions, theta: number): number {
  const rotated = rotatedBoundingBox(reference.width, reference.height, theta);
  const scale = Math.max(rotated.width / reference.width, rotated.height / reference.height);
  return Math.max(1, scale);
}

export function buildTransform(
  effectiveAngle: number,
  dims: FrameDimensions,
  orientation: BaselineOrientation,
): StabilizationTransform {
  if (!Number.isFinite(effectiveAngle)) {
    throw new Error(`Effective angle must be finite, got ${effectiveAngle}`);
  }
  assertValidDimensions(dims);

  const reference = referenceDimensions(dims, orientation);
  return {
    rotationRadians: effectiveAngle,
    scale: coverScale(reference, effectiveAngle),
  };
}

export function assertValidDimensions(dims: FrameDimensions): void {
  if (!Number.isInteger(dims.width) || dims.width <= 0) {
    throw new Error(`Frame width must be a positive integer, got ${dims.width}`);
  }
  if (!Number.isInteger(dims.height) || dims.height <= 0) {
    throw new Error(`Frame height must be a positive integer, got ${dims.height}`);
  }
}
