import { describe, it, expect, afterEach, vi } from "vitest";
import { StabilizationSession, type AngleSource } from "./stabilization-session.js";
import { FrameWarper, buildWarpMatrix } from "./frame-warper.js";
import { OrientationEstimator } from "./orientation-estimator.js";
import { applyToPoint } from "./affine-transform.js";
import { BaselineOrientation, SessionState } from "./types.js";
import type { FrameHeader, ImageBuffer, StabilizedFrame } from "./types.js";
import type { Logger } from "./logger.js";
import { HALF_PI } from "./utils.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function silentLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

/** Angle source whose reading the test sets directly. */
class FakeTilt implements AngleSource {
  angle = 0;
  currentAngle(): number {
    return this.angle;
  }
}

const DIMS = { width: 2, height: 2 };

function header(seq: number): FrameHeader {
  return { timestamp: seq * 33, seq, width: 2, height: 2 };
}

function image(pixels: number[] = [10, 20, 30, 40]): ImageBuffer {
  return { width: 2, height: 2, stride: 2, channels: 1, data: Buffer.from(pixels) };
}

function setup(options: { frameQueueMaxSize?: number; warper?: FrameWarper } = {}) {
  const tilt = new FakeTilt();
  const logger = silentLogger();
  const delivered: StabilizedFrame[] = [];
  const frameSink = vi.fn((frame: StabilizedFrame) => {
    delivered.push(frame);
  });
  const session = new StabilizationSession({
    angleSource: tilt,
    frameSink,
    logger,
    ...options,
  });
  return { tilt, logger, delivered, frameSink, session };
}

// ─── Lifecycle ──────────────────────────────────────────────────────────────────

describe("StabilizationSession lifecycle", () => {
  it("starts IDLE with no baseline", () => {
    const { session } = setup();
    expect(session.state).toBe(SessionState.IDLE);
    expect(session.baselineAngle).toBeNull();
    expect(session.effectiveAngle()).toBeNull();
    expect(session.transformForFrame()).toBeNull();
  });

  it("captures a quantized baseline and becomes ACTIVE", () => {
    const { session, tilt } = setup();
    tilt.angle = 1.4;

    expect(session.start(BaselineOrientation.PORTRAIT, DIMS)).toBe(HALF_PI);
    expect(session.state).toBe(SessionState.ACTIVE);
    expect(session.baselineAngle).toBe(HALF_PI);
    expect(session.baselineOrientation).toBe(BaselineOrientation.PORTRAIT);
  });

  it("rejects a second start and keeps the first baseline", () => {
    const { session, tilt, logger } = setup();
    tilt.angle = 0.1;
    session.start(BaselineOrientation.PORTRAIT, DIMS);

    tilt.angle = 1.4;
    expect(session.start(BaselineOrientation.LANDSCAPE, DIMS)).toBeNull();

    expect(session.baselineAngle).toBe(0);
    expect(session.baselineOrientation).toBe(BaselineOrientation.PORTRAIT);
    expect(logger.warn).toHaveBeenCalledWith(
      'start() rejected: session is "active"; stop it before starting again',
    );
  });

  it("refuses invalid dimensions without leaving IDLE", () => {
    const { session } = setup();
    expect(() => session.start(BaselineOrientation.PORTRAIT, { width: 0, height: 2 })).toThrow(
      "Frame width must be a positive integer, got 0",
    );
    expect(session.state).toBe(SessionState.IDLE);
  });

  it("returns to IDLE when calibration fails", () => {
    const { session, tilt } = setup();
    tilt.angle = Number.NaN;
    expect(() => session.start(BaselineOrientation.PORTRAIT, DIMS)).toThrow(
      "Cannot calibrate from a non-finite angle: NaN",
    );
    expect(session.state).toBe(SessionState.IDLE);
  });

  it("clears the baseline on stop and can start again", async () => {
    const { session, tilt } = setup();
    tilt.angle = 3.0;
    session.start(BaselineOrientation.PORTRAIT, DIMS);

    await session.stop();
    expect(session.state).toBe(SessionState.IDLE);
    expect(session.baselineAngle).toBeNull();
    expect(session.baselineOrientation).toBeNull();

    tilt.angle = -1.4;
    expect(session.start(BaselineOrientation.PORTRAIT, DIMS)).toBe(-HALF_PI);
    await session.stop();
    expect(session.state).toBe(SessionState.IDLE);
  });

  it("resolves stop() at once when IDLE", async () => {
    const { session } = setup();
    await expect(session.stop()).resolves.toBeUndefined();
  });

  it("shares one stop between concurrent callers", async () => {
    const { session } = setup();
    session.start(BaselineOrientation.PORTRAIT, DIMS);
    const first = session.stop();
    const second = session.stop();
    expect(second).toBe(first);
    await first;
    expect(session.state).toBe(SessionState.IDLE);
  });
});

// ─── Effective angle and transform ──────────────────────────────────────────────

describe("StabilizationSession transforms", () => {
  it("measures deviation from the baseline", () => {
    const { session, tilt } = setup();
    tilt.angle = 1.4;
    session.start(BaselineOrientation.PORTRAIT, DIMS);

    tilt.angle = HALF_PI + 0.2;
    expect(session.effectiveAngle()).toBeCloseTo(0.2, 12);
  });

  it("wraps deviation across the ±π seam", () => {
    const { session, tilt } = setup();
    tilt.angle = 3.0;
    session.start(BaselineOrientation.PORTRAIT, DIMS);

    tilt.angle = -3.0;
    expect(session.effectiveAngle()).toBeCloseTo(Math.PI - 3.0, 12);
  });

  it("turns a mirrored landscape grip a half turn", () => {
    const { session, tilt } = setup();
    tilt.angle = -1.4;
    expect(session.start(BaselineOrientation.LANDSCAPE, { width: 4, height: 2 })).toBe(HALF_PI);

    tilt.angle = -HALF_PI;
    expect(session.transformForFrame()?.rotationRadians).toBe(Math.PI);
  });

  it("levels the horizon of a device rolled clockwise", () => {
    const estimator = new OrientationEstimator({ smoothingFactor: 0, logger: silentLogger() });
    estimator.ingest({ x: 0, y: -1, z: 0, timestamp: 0 });
    const session = new StabilizationSession({ angleSource: estimator, logger: silentLogger() });
    const dims = { width: 100, height: 100 };
    session.start(BaselineOrientation.PORTRAIT, dims);

    const roll = 0.3;
    estimator.ingest({ x: Math.sin(roll), y: -Math.cos(roll), z: 0, timestamp: 16 });
    const transform = session.transformForFrame();
    expect(transform?.rotationRadians).toBeCloseTo(-roll, 12);
    if (!transform) return;

    // The scene's horizon shows up turned counter-clockwise by the roll
    const m = buildWarpMatrix(transform, dims);
    const from = applyToPoint(m, { x: 50, y: 50 });
    const to = applyToPoint(m, { x: 50 + 10 * Math.cos(roll), y: 50 - 10 * Math.sin(roll) });
    expect(to.y - from.y).toBeCloseTo(0, 9);
    expect(to.x - from.x).toBeGreaterThan(0);
  });

  it("uses the identity transform with no deviation", () => {
    const { session } = setup();
    session.start(BaselineOrientation.PORTRAIT, DIMS);
    expect(session.transformForFrame()).toEqual({ rotationRadians: 0, scale: 1 });
  });
});

// ─── processFrame ───────────────────────────────────────────────────────────────

describe("StabilizationSession.processFrame", () => {
  it("returns an unchanged copy when level with the baseline", () => {
    const { session } = setup();
    session.start(BaselineOrientation.PORTRAIT, DIMS);

    const result = session.processFrame(header(0), image());
    expect(result?.header.seq).toBe(0);
    expect(result?.transform).toEqual({ rotationRadians: 0, scale: 1 });
    expect([...(result?.image.data ?? [])]).toEqual([10, 20, 30, 40]);
    expect(session.getStatus().framesProcessed).toBe(1);
  });

  it("rejects frames while IDLE", () => {
    const { session } = setup();
    expect(session.processFrame(header(0), image())).toBeNull();
    expect(session.getStatus().framesRejected).toBe(1);
  });

  it("drops a frame whose output cannot be allocated and keeps going", () => {
    let failNext = true;
    const warper = new FrameWarper({
      allocate: (byteLength) => {
        if (failNext) {
          failNext = false;
          throw new RangeError("out of memory");
        }
        return Buffer.alloc(byteLength);
      },
    });
    const { session, logger } = setup({ warper });
    session.start(BaselineOrientation.PORTRAIT, DIMS);

    expect(session.processFrame(header(0), image())).toBeNull();
    expect(session.processFrame(header(1), image())).not.toBeNull();

    const status = session.getStatus();
    expect(status.framesDroppedByAllocation).toBe(1);
    expect(status.framesProcessed).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Dropped frame seq=0: Failed to allocate 4 bytes for warped frame",
    );
  });

  it("throws for a frame of the wrong size", () => {
    const { session } = setup();
    session.start(BaselineOrientation.PORTRAIT, { width: 3, height: 3 });
    expect(() => session.processFrame(header(0), image())).toThrow("Frame is 2x2, expected 3x3");
  });
});

// ─── enqueueFrame and draining ──────────────────────────────────────────────────

describe("StabilizationSession.enqueueFrame", () => {
  it("delivers queued frames in order before stop() resolves", async () => {
    const { session, delivered } = setup();
    session.start(BaselineOrientation.PORTRAIT, DIMS);

    expect(session.enqueueFrame(header(0), image())).toBe(true);
    expect(session.enqueueFrame(header(1), image())).toBe(true);
    expect(session.enqueueFrame(header(2), image())).toBe(true);

    await session.stop();

    expect(delivered.map((f) => f.header.seq)).toEqual([0, 1, 2]);
    expect(session.getStatus().framesProcessed).toBe(3);
  });

  it("refuses frames while IDLE and once stop() has been called", async () => {
    const { session, frameSink } = setup();
    expect(session.enqueueFrame(header(0), image())).toBe(false);

    session.start(BaselineOrientation.PORTRAIT, DIMS);
    const stopped = session.stop();
    expect(session.enqueueFrame(header(1), image())).toBe(false);
    await stopped;

    expect(frameSink).not.toHaveBeenCalled();
  });

  it("drops the oldest frames when the mailbox overflows", async () => {
    const { session, delivered, logger } = setup({ frameQueueMaxSize: 2 });
    session.start(BaselineOrientation.PORTRAIT, DIMS);

    for (let seq = 0; seq < 4; seq++) {
      session.enqueueFrame(header(seq), image());
    }
    await session.stop();

    expect(delivered.map((f) => f.header.seq)).toEqual([2, 3]);
    expect(logger.debug).toHaveBeenCalledWith("Frame seq=0 dropped: mailbox full");
    expect(logger.debug).toHaveBeenCalledWith("Frame seq=1 dropped: mailbox full");
    const status = session.getStatus();
    expect(status.framesReceived).toBe(4);
    expect(status.framesDroppedByBackpressure).toBe(2);
  });

  it("counts backpressure per recording", async () => {
    const { session } = setup({ frameQueueMaxSize: 1 });
    session.start(BaselineOrientation.PORTRAIT, DIMS);
    session.enqueueFrame(header(0), image());
    session.enqueueFrame(header(1), image());
    await session.stop();
    expect(session.getStatus().framesDroppedByBackpressure).toBe(1);

    session.start(BaselineOrientation.PORTRAIT, DIMS);
    expect(session.getStatus().framesDroppedByBackpressure).toBe(0);
    await session.stop();
  });

  it("logs a failing sink and keeps delivering", async () => {
    const tilt = new FakeTilt();
    const logger = silentLogger();
    const seen: number[] = [];
    const session = new StabilizationSession({
      angleSource: tilt,
      logger,
      frameSink: (frame) => {
        seen.push(frame.header.seq);
        if (frame.header.seq === 0) throw new Error("socket closed");
      },
    });
    session.start(BaselineOrientation.PORTRAIT, DIMS);
    session.enqueueFrame(header(0), image());
    session.enqueueFrame(header(1), image());
    await session.stop();

    expect(seen).toEqual([0, 1]);
    expect(logger.error).toHaveBeenCalledWith("Frame sink failed for seq=0: socket closed");
  });

  it("reports a frame that cannot be warped to the error handler", async () => {
    const onFrameError = vi.fn();
    const session = new StabilizationSession({
      angleSource: new FakeTilt(),
      logger: silentLogger(),
      onFrameError,
    });
    session.start(BaselineOrientation.PORTRAIT, { width: 3, height: 3 });
    session.enqueueFrame(header(4), image());
    await session.stop();

    expect(onFrameError).toHaveBeenCalledTimes(1);
    expect(onFrameError).toHaveBeenCalledWith(
      header(4),
      expect.objectContaining({ message: "Frame is 2x2, expected 3x3" }),
    );
  });

  it("logs a failing error handler and finishes the stop", async () => {
    const logger = silentLogger();
    const session = new StabilizationSession({
      angleSource: new FakeTilt(),
      logger,
      onFrameError: () => {
        throw new Error("socket closed");
      },
    });
    session.start(BaselineOrientation.PORTRAIT, { width: 3, height: 3 });
    session.enqueueFrame(header(0), image());
    await session.stop();

    expect(session.state).toBe(SessionState.IDLE);
    expect(logger.error).toHaveBeenCalledWith("Frame error handler failed for seq=0: socket closed");
  });

  it("counts a frame that cannot be warped as errored", async () => {
    const { session, logger, frameSink } = setup();
    session.start(BaselineOrientation.PORTRAIT, { width: 3, height: 3 });
    session.enqueueFrame(header(0), image());
    await session.stop();

    expect(frameSink).not.toHaveBeenCalled();
    expect(session.getStatus().framesErrored).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Frame seq=0 not stabilized: Frame is 2x2, expected 3x3",
    );
  });
});

// ─── getStatus ──────────────────────────────────────────────────────────────────

describe("StabilizationSession.getStatus", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports how long frames waited in the mailbox", async () => {
    const now = vi.spyOn(Date, "now").mockReturnValue(1000);
    const { session } = setup();
    session.start(BaselineOrientation.PORTRAIT, DIMS);
    session.enqueueFrame(header(0), image());
    session.enqueueFrame(header(1), image());

    now.mockReturnValue(1040);
    await session.stop();

    expect(session.getStatus().averageQueueLatencyMs).toBe(40);
  });

  it("reports the recording while ACTIVE", () => {
    const { session, tilt } = setup();
    tilt.angle = 1.4;
    session.start(BaselineOrientation.PORTRAIT, DIMS);

    expect(session.getStatus()).toEqual({
      state: SessionState.ACTIVE,
      orientation: BaselineOrientation.PORTRAIT,
      baselineAngle: HALF_PI,
      dims: { width: 2, height: 2 },
      framesReceived: 0,
      framesProcessed: 0,
      framesDroppedByAllocation: 0,
      framesDroppedByBackpressure: 0,
      framesRejected: 0,
      framesErrored: 0,
      averageWarpMs: 0,
      averageQueueLatencyMs: 0,
    });
  });
});
