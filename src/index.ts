// Tilt Stabilizer - Public API

export const APP_NAME = "Tilt Stabilizer";
export const APP_VERSION = "0.1.0";

export * from "./types.js";
export {
  normalizeAngle,
  quantizeToRightAngle,
  shortestAngleBetween,
  classifyTilt,
  radiansToDegrees,
  degreesToRadians,
} from "./utils.js";
export { AngleCell } from "./angle-cell.js";
export {
  OrientationEstimator,
  tiltFromGravity,
  DEFAULT_SMOOTHING_FACTOR,
} from "./orientation-estimator.js";
export type { OrientationEstimatorOptions } from "./orientation-estimator.js";
export {
  captureBaseline,
  baselineOrientationFor,
  encoderRotationDegrees,
} from "./baseline-calibrator.js";
export {
  buildTransform,
  coverScale,
  referenceDimensions,
  rotatedBoundingBox,
  IDENTITY_TRANSFORM,
} from "./transform-builder.js";
export { FrameWarper, FrameAllocationError, buildWarpMatrix } from "./frame-warper.js";
export type { FrameWarperOptions } from "./frame-warper.js";
export { FrameQueue } from "./frame-queue.js";
export { StabilizationSession } from "./stabilization-session.js";
export type { AngleSource, StabilizationSessionDeps } from "./stabilization-session.js";
export { SessionManager } from "./session-manager.js";
export type { CaptureSession, SessionManagerDeps } from "./session-manager.js";
export { encodeFrame, decodeFrame, isFrame } from "./frame-codec.js";
export { createAppServer } from "./server.js";
export type { AppServer, CreateServerOptions } from "./server.js";
export { loadConfig, DEFAULT_STABILIZER_CONFIG } from "./config.js";
export { createConsoleLogger, setLogLevel } from "./logger.js";
export type { Logger } from "./logger.js";
