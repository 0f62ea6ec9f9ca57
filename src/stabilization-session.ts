/**
 * StabilizationSession — stabilization context for one recording.
 *
 * IDLE → CALIBRATING → ACTIVE:  start()
 * ACTIVE → IDLE:                stop(), once in-flight frames have drained
 *
 * The baseline is written once, before the session becomes ACTIVE, and is
 * read-only until stop() has finished draining.
 */

import {
  SessionState,
  type BaselineOrientation,
  type FrameDimensions,
  type FrameErrorHandler,
  type FrameHeader,
  type FrameSink,
  type ImageBuffer,
  type StabilizationStatus,
  type StabilizationTransform,
  type StabilizedFrame,
} from "./types.js";
import { captureBaseline } from "./baseline-calibrator.js";
import { assertValidDimensions, buildTransform } from "./transform-builder.js";
import { FrameAllocationError, FrameWarper } from "./frame-warper.js";
import { FrameQueue, type QueuedFrame } from "./frame-queue.js";
import { classifyTilt, normalizeAngle, radiansToDegrees, roundTo } from "./utils.js";
import { createConsoleLogger, type Logger } from "./logger.js";

/** Anything that can report the current tilt angle; usually an OrientationEstimator. */
export interface AngleSource {
  currentAngle(): number;
}

export interface StabilizationSessionDeps {
  angleSource: AngleSource;
  warper?: FrameWarper;
  /** Receives frames warped by the drain task. */
  frameSink?: FrameSink;
  /** Told about queued frames the drain task could not warp. */
  onFrameError?: FrameErrorHandler;
  frameQueueMaxSize?: number;
  logger?: Logger;
}

const LOG_EVERY_N_FRAMES = 30;

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class StabilizationSession {
  private readonly angleSource: AngleSource;
  private readonly warper: FrameWarper;
  private readonly frameSink: FrameSink | undefined;
  private readonly onFrameError: FrameErrorHandler | undefined;
  private readonly logger: Logger;
  private readonly frameQueue: FrameQueue;

  private _state: SessionState = SessionState.IDLE;
  private baseline: number | null = null;
  private orientation: BaselineOrientation | null = null;
  private dims: FrameDimensions | null = null;
  private accepting = false;
  private drainPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;

  // Per-recording counters
  private framesReceived = 0;
  private framesProcessed = 0;
  private framesDroppedByAllocation = 0;
  private framesRejected = 0;
  private framesErrored = 0;
  private backpressureAtStart = 0;
  private warpMsTotal = 0;
  private framesDequeued = 0;
  private queueLatencyMsTotal = 0;

  constructor(deps: StabilizationSessionDeps) {
    this.angleSource = deps.angleSource;
    this.warper = deps.warper ?? new FrameWarper();
    this.frameSink = deps.frameSink;
    this.onFrameError = deps.onFrameError;
    this.logger = deps.logger ?? createConsoleLogger("StabilizationSession");
    this.frameQueue = new FrameQueue(deps.frameQueueMaxSize);
  }

  get state(): SessionState {
    return this._state;
  }

  /** Quantized baseline of the current recording, or null when IDLE. */
  get baselineAngle(): number | null {
    return this.baseline;
  }

  get baselineOrientation(): BaselineOrientation | null {
    return this.orientation;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Calibrate against the current tilt and begin stabilizing.
   *
   * Returns the captured baseline, or null when the session is not IDLE; a
   * rejected call leaves the running recording untouched.
   * @throws Error if `dims` is not a pair of positive integers
   */
  start(orientation: BaselineOrientation, dims: FrameDimensions): number | null {
    if (this._state !== SessionState.IDLE) {
      this.logger.warn(
        `start() rejected: session is "${this._state}"; stop it before starting again`,
      );
      return null;
    }
    assertValidDimensions(dims);

    this._state = SessionState.CALIBRATING;
    let baseline: number;
    try {
      baseline = captureBaseline(this.angleSource.currentAngle(), orientation);
    } catch (err) {
      this._state = SessionState.IDLE;
      throw err;
    }

    this.baseline = baseline;
    this.orientation = orientation;
    this.dims = { width: dims.width, height: dims.height };
    this.resetCounters();
    this.accepting = true;
    this._state = SessionState.ACTIVE;

    this.logger.info(
      `Recording started: ${orientation} ${dims.width}x${dims.height}, ` +
        `baseline ${roundTo(radiansToDegrees(baseline), 1)}°`,
    );
    return baseline;
  }

  /**
   * Stop stabilizing. New frames are refused at once; frames already queued
   * are warped and delivered before the baseline is discarded.
   */
  stop(): Promise<void> {
    if (this._state === SessionState.IDLE) {
      return Promise.resolve();
    }
    if (!this.stopPromise) {
      this.accepting = false;
      this.stopPromise = this.drainAndReset();
    }
    return this.stopPromise;
  }

  private async drainAndReset(): Promise<void> {
    try {
      // Always suspends, so stop() has stored stopPromise before the reset clears it
      await this.drainPromise;
    } finally {
      const status = this.getStatus();
      this.frameQueue.clear();
      this.baseline = null;
      this.orientation = null;
      this.dims = null;
      this._state = SessionState.IDLE;
      this.stopPromise = null;
      this.logger.info(
        `Recording stopped: ${status.framesProcessed}/${status.framesReceived} frames stabilized, ` +
          `${status.framesDroppedByAllocation + status.framesDroppedByBackpressure} dropped`,
      );
    }
  }

  // ─── Per-frame ──────────────────────────────────────────────────────────────

  /** Deviation of the current tilt from the baseline, or null when not ACTIVE. */
  effectiveAngle(): number | null {
    if (this._state !== SessionState.ACTIVE || this.baseline === null) {
      return null;
    }
    return normalizeAngle(this.angleSource.currentAngle() - this.baseline);
  }

  /** Transform for a frame captured now, or null when not ACTIVE. */
  transformForFrame(): StabilizationTransform | null {
    const effective = this.effectiveAngle();
    if (effective === null || this.dims === null || this.orientation === null) {
      return null;
    }
    return buildTransform(effective, this.dims, this.orientation);
  }

  /**
   * Stabilize one frame synchronously.
   *
   * Returns null when the session is not ACTIVE or when the output buffer
   * could not be allocated; either way only this frame is affected.
   * @throws Error if the frame does not match the recording's dimensions
   */
  processFrame(header: FrameHeader, image: ImageBuffer): StabilizedFrame | null {
    const dims = this.dims;
    const transform = this.transformForFrame();
    if (transform === null || dims === null) {
      this.framesRejected++;
      return null;
    }

    const startedAt = performance.now();
    let warped: ImageBuffer;
    try {
      warped = this.warper.warp(image, transform, dims);
    } catch (err) {
      if (err instanceof FrameAllocationError) {
        this.framesDroppedByAllocation++;
        this.logger.warn(`Dropped frame seq=${header.seq}: ${err.message}`);
        return null;
      }
      throw err;
    }
    this.warpMsTotal += performance.now() - startedAt;
    this.framesProcessed++;

    if (this.framesProcessed % LOG_EVERY_N_FRAMES === 0) {
      this.logger.debug(
        `frame seq=${header.seq} rotation=${roundTo(radiansToDegrees(transform.rotationRadians), 1)}° ` +
          `scale=${roundTo(transform.scale)} (${classifyTilt(transform.rotationRadians)})`,
      );
    }

    return { header, image: warped, transform };
  }

  /**
   * Hand a frame to the session's mailbox. A drain task warps queued frames
   * in order and passes each to the frame sink.
   *
   * Returns false when the session is not accepting frames.
   */
  enqueueFrame(header: FrameHeader, image: ImageBuffer): boolean {
    if (!this.accepting || this._state !== SessionState.ACTIVE) {
      this.framesRejected++;
      return false;
    }
    this.framesReceived++;
    const evicted = this.frameQueue.enqueue(header, image);
    if (evicted) {
      this.logger.debug(`Frame seq=${evicted.header.seq} dropped: mailbox full`);
    }
    if (!this.drainPromise) {
      this.drainPromise = this.drainQueue();
    }
    return true;
  }

  private async drainQueue(): Promise<void> {
    try {
      for (;;) {
        await yieldToEventLoop();
        const frame = this.frameQueue.dequeue();
        if (!frame) break;
        this.deliver(frame);
      }
    } finally {
      this.drainPromise = null;
    }
  }

  private deliver(frame: QueuedFrame): void {
    this.framesDequeued++;
    this.queueLatencyMsTotal += Date.now() - frame.enqueuedAt;

    let result: StabilizedFrame | null;
    try {
      result = this.processFrame(frame.header, frame.image);
    } catch (err) {
      this.framesErrored++;
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.warn(`Frame seq=${frame.header.seq} not stabilized: ${error.message}`);
      this.reportFrameError(frame.header, error);
      return;
    }
    if (!result || !this.frameSink) return;

    try {
      this.frameSink(result);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      this.logger.error(`Frame sink failed for seq=${frame.header.seq}: ${errMsg}`);
    }
  }

  private reportFrameError(header: FrameHeader, error: Error): void {
    if (!this.onFrameError) return;
    try {
      this.onFrameError(header, error);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      this.logger.error(`Frame error handler failed for seq=${header.seq}: ${errMsg}`);
    }
  }

  // ─── Status ─────────────────────────────────────────────────────────────────

  getStatus(): StabilizationStatus {
    return {
      state: this._state,
      orientation: this.orientation,
      baselineAngle: this.baseline,
      dims: this.dims ? { ...this.dims } : null,
      framesReceived: this.framesReceived,
      framesProcessed: this.framesProcessed,
      framesDroppedByAllocation: this.framesDroppedByAllocation,
      framesDroppedByBackpressure:
        this.frameQueue.framesDroppedByBackpressure - this.backpressureAtStart,
      framesRejected: this.framesRejected,
      framesErrored: this.framesErrored,
      averageWarpMs:
        this.framesProcessed > 0 ? roundTo(this.warpMsTotal / this.framesProcessed, 2) : 0,
      averageQueueLatencyMs:
        this.framesDequeued > 0 ? roundTo(this.queueLatencyMsTotal / this.framesDequeued, 2) : 0,
    };
  }

  private resetCounters(): void {
    this.framesReceived = 0;
    this.framesProcessed = 0;
    this.framesDroppedByAllocation = 0;
    this.framesRejected = 0;
    this.framesErrored = 0;
    this.backpressureAtStart = this.frameQueue.framesDroppedByBackpressure;
    this.warpMsTotal = 0;
    this.framesDequeued = 0;
    this.queueLatencyMsTotal = 0;
  }
}
