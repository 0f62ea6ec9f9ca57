/**
 * OrientationEstimator — turns gravity samples into a smoothed tilt angle.
 *
 * Runs continuously, independent of any recording. The sensor callback is the
 * only writer; the frame path reads the published angle through an AngleCell.
 */

import type { GravitySample } from "./types.js";
import { AngleCell } from "./angle-cell.js";
import { HALF_PI, classifyTilt, normalizeAngle, radiansToDegrees, roundTo } from "./utils.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export const DEFAULT_SMOOTHING_FACTOR = 0.9;

/** Accepted samples between two debug log lines. */
const LOG_EVERY_N_SAMPLES = 30;

export interface OrientationEstimatorOptions {
  /** Weight on history, in [0, 1). 0 disables smoothing. */
  smoothingFactor?: number;
  logger?: Logger;
  /** Publish into an existing cell, e.g. one whose buffer a worker already holds. */
  cell?: AngleCell;
}

/**
 * Tilt of the device around its forward axis from one gravity reading:
 * `-(atan2(y, x) - π/2 + π)`, normalized.
 *
 * Returns null when x and y are both zero (gravity along the lens axis, phone
 * flat) or any component is not finite.
 */
export function tiltFromGravity(sample: GravitySample): number | null {
  const { x, y, z } = sample;
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    return null;
  }
  if (x === 0 && y === 0) {
    return null;
  }

  let angle = Math.atan2(y, x) - HALF_PI;
  angle += Math.PI; // sensor is mounted upside down relative to the screen
  angle = -angle;
  const tilt = normalizeAngle(angle);
  // upright portrait comes out of the negation as -0
  return tilt === 0 ? 0 : tilt;
}

export class OrientationEstimator {
  private readonly smoothingFactor: number;
  private readonly cell: AngleCell;
  private readonly logger: Logger;
  // Writer-side state, never read from the frame path
  private previousAngle: number | null = null;
  private accepted = 0;
  private ignored = 0;

  constructor(options: OrientationEstimatorOptions = {}) {
    const smoothingFactor = options.smoothingFactor ?? DEFAULT_SMOOTHING_FACTOR;
    if (!Number.isFinite(smoothingFactor) || smoothingFactor < 0 || smoothingFactor >= 1) {
      throw new Error(`smoothingFactor must be in [0, 1), got ${smoothingFactor}`);
    }
    this.smoothingFactor = smoothingFactor;
    this.cell = options.cell ?? new AngleCell(0);
    this.logger = options.logger ?? createConsoleLogger("OrientationEstimator");
  }

  /**
   * Fold one sample into the estimate. O(1), synchronous.
   *
   * The exponential filter blends along the shorter arc between the previous
   * estimate and the new reading, which is `α·previous + (1−α)·raw` whenever
   * the two do not straddle the ±π seam.
   */
  ingest(sample: GravitySample): void {
    const raw = tiltFromGravity(sample);
    if (raw === null) {
      this.ignored++;
      return;
    }

    let angle: number;
    if (this.previousAngle === null || this.smoothingFactor === 0) {
      angle = raw;
    } else {
      const delta = normalizeAngle(raw - this.previousAngle);
      angle = normalizeAngle(this.previousAngle + (1 - this.smoothingFactor) * delta);
    }

    this.previousAngle = angle;
    this.cell.store(angle);
    this.accepted++;

    if (this.accepted % LOG_EVERY_N_SAMPLES === 0) {
      this.logger.debug(
        `gravity=(${roundTo(sample.x)}, ${roundTo(sample.y)}) raw=${roundTo(raw)} ` +
          `smoothed=${roundTo(angle)} (${roundTo(radiansToDegrees(angle), 1)}°, ${classifyTilt(angle)})`,
      );
    }
  }

  /** Last published angle; 0 before the first usable sample. */
  currentAngle(): number {
    return this.cell.load();
  }

  /** Buffer backing the published angle, for readers on other threads. */
  get sharedBuffer(): SharedArrayBuffer {
    return this.cell.buffer;
  }

  get sampleCount(): number {
    return this.accepted;
  }

  get ignoredSampleCount(): number {
    return this.ignored;
  }
}
