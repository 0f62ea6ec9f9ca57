/**
 * Baseline calibration — decides what "upright" means for one recording.
 *
 * The baseline is the tilt at record start snapped to a right angle. It is
 * captured once per recording and never recomputed while frames are in flight.
 */

import { BaselineOrientation, type DeviceOrientation } from "./types.js";
import { HALF_PI, normalizeAngle, quantizeToRightAngle } from "./utils.js";

/**
 * Quantized baseline for the given tilt.
 *
 * Landscape recordings held either way round calibrate to the same canonical
 * baseline: a quarter turn of -π/2 is flipped to +π/2. Frames from the mirrored
 * grip then carry an effective angle near π and get turned right side up.
 */
export function captureBaseline(currentAngle: number, orientation: BaselineOrientation): number {
  if (!Number.isFinite(currentAngle)) {
    throw new Error(`Cannot calibrate from a non-finite angle: ${currentAngle}`);
  }

  let baseline = quantizeToRightAngle(currentAngle);
  if (orientation === BaselineOrientation.LANDSCAPE && baseline === -HALF_PI) {
    baseline = normalizeAngle(baseline + Math.PI);
  }
  return baseline;
}

/** Landscape when the device reports either landscape grip, portrait otherwise (flat and unknown included). */
export function baselineOrientationFor(device: DeviceOrientation): BaselineOrientation {
  return device === "landscape-left" || device === "landscape-right"
    ? BaselineOrientation.LANDSCAPE
    : BaselineOrientation.PORTRAIT;
}

/**
 * Display rotation the encoder should tag the video track with, in degrees.
 * Sensor frames are landscape-native; portrait recordings are shown turned a quarter.
 */
export function encoderRotationDegrees(orientation: BaselineOrientation): number {
  return orientation === BaselineOrientation.PORTRAIT ? 90 : 0;
}
