// Tilt Stabilizer - Session Manager
// Owns one orientation estimator and one stabilization session per connected
// capture client and routes sensor samples, control calls and frames to them.

import { v4 as uuidv4 } from "uuid";
import type {
  BaselineOrientation,
  FrameDimensions,
  FrameErrorHandler,
  FrameHeader,
  FrameSink,
  GravitySample,
  ImageBuffer,
  StabilizationStatus,
  StabilizationTransform,
  StabilizerConfig,
} from "./types.js";
import { OrientationEstimator } from "./orientation-estimator.js";
import { StabilizationSession } from "./stabilization-session.js";
import { FrameWarper } from "./frame-warper.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { DEFAULT_STABILIZER_CONFIG } from "./config.js";

export interface CaptureSession {
  id: string;
  createdAt: Date;
  estimator: OrientationEstimator;
  stabilization: StabilizationSession;
}

export interface SessionManagerDeps {
  config?: StabilizerConfig;
  /** Builds the logger for each component; defaults to console loggers. */
  loggerFactory?: (component: string) => Logger;
}

export interface TransformSnapshot {
  tiltAngle: number;
  transform: StabilizationTransform | null;
}

export class SessionManager {
  private sessions: Map<string, CaptureSession> = new Map();
  private readonly config: StabilizerConfig;
  private readonly loggerFactory: (component: string) => Logger;
  private readonly logger: Logger;
  // Stateless, so shared by every session
  private readonly warper: FrameWarper;

  constructor(deps: SessionManagerDeps = {}) {
    this.config = deps.config ?? DEFAULT_STABILIZER_CONFIG;
    this.loggerFactory = deps.loggerFactory ?? createConsoleLogger;
    this.logger = this.loggerFactory("SessionManager");
    this.warper = new FrameWarper({
      interpolation: this.config.interpolation,
      fillValue: this.config.fillValue,
    });
    this.logger.info(
      `smoothing=${this.config.smoothingFactor} queue=${this.config.frameQueueMaxSize} ` +
        `interpolation=${this.config.interpolation}`,
    );
  }

  /**
   * Creates a session in the IDLE state. Warped frames go to `frameSink`;
   * queued frames that cannot be warped are reported to `onFrameError`.
   */
  createSession(frameSink?: FrameSink, onFrameError?: FrameErrorHandler): CaptureSession {
    const id = uuidv4();
    const estimator = new OrientationEstimator({
      smoothingFactor: this.config.smoothingFactor,
      logger: this.loggerFactory("OrientationEstimator"),
    });
    const stabilization = new StabilizationSession({
      angleSource: estimator,
      warper: this.warper,
      frameSink,
      onFrameError,
      frameQueueMaxSize: this.config.frameQueueMaxSize,
      logger: this.loggerFactory("StabilizationSession"),
    });

    const session: CaptureSession = { id, createdAt: new Date(), estimator, stabilization };
    this.sessions.set(id, session);
    return session;
  }

  /**
   * Retrieves a session by ID.
   * @throws Error if the session does not exist.
   */
  getSession(sessionId: string): CaptureSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  /** Feeds one gravity sample. Runs whether or not the session is recording. */
  ingestGravity(sessionId: string, sample: GravitySample): void {
    this.getSession(sessionId).estimator.ingest(sample);
  }

  /** Returns the captured baseline, or null if the session was already recording. */
  startRecording(
    sessionId: string,
    orientation: BaselineOrientation,
    dims: FrameDimensions,
  ): number | null {
    return this.getSession(sessionId).stabilization.start(orientation, dims);
  }

  stopRecording(sessionId: string): Promise<void> {
    return this.getSession(sessionId).stabilization.stop();
  }

  /** Queues a frame for warping. False when the session is not recording. */
  feedVideoFrame(sessionId: string, header: FrameHeader, image: ImageBuffer): boolean {
    return this.getSession(sessionId).stabilization.enqueueFrame(header, image);
  }

  getTransform(sessionId: string): TransformSnapshot {
    const session = this.getSession(sessionId);
    return {
      tiltAngle: session.estimator.currentAngle(),
      transform: session.stabilization.transformForFrame(),
    };
  }

  getStatus(sessionId: string): StabilizationStatus {
    return this.getSession(sessionId).stabilization.getStatus();
  }

  /** Stops the session's recording (draining queued frames) and forgets it. */
  async removeSession(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    this.sessions.delete(sessionId);
    await session.stabilization.stop();
  }
}
