// Tilt Stabilizer - Shared TypeScript interfaces and types

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  CALIBRATING = "calibrating",
  ACTIVE = "active",
}

// ─── Orientation ────────────────────────────────────────────────────────────────

/** Which frame axis is treated as the long axis for one recording. */
export enum BaselineOrientation {
  PORTRAIT = "portrait",
  LANDSCAPE = "landscape",
}

/** Coarse device orientation as reported by the capture client. */
export type DeviceOrientation =
  | "portrait"
  | "portrait-upside-down"
  | "landscape-left"
  | "landscape-right"
  | "face-up"
  | "face-down"
  | "unknown";

export const DEVICE_ORIENTATIONS: readonly DeviceOrientation[] = [
  "portrait",
  "portrait-upside-down",
  "landscape-left",
  "landscape-right",
  "face-up",
  "face-down",
  "unknown",
];

export interface GravitySample {
  x: number;
  y: number;
  z: number;
  timestamp: number; // seconds, sensor clock
}

export type TiltClassification =
  | "near-baseline"
  | "tilted-positive"
  | "tilted-negative"
  | "upside-down";

// ─── Frames ─────────────────────────────────────────────────────────────────────

export interface FrameDimensions {
  width: number;
  height: number;
}

/**
 * Raw pixel buffer. Layout beyond width/height is opaque: `channels` is bytes
 * per pixel and `stride` is bytes per row.
 */
export interface ImageBuffer {
  width: number;
  height: number;
  stride: number;
  channels: number;
  data: Buffer;
}

export interface FrameHeader {
  timestamp: number; // capture time in seconds; never altered by the stabilizer
  seq: number;
  width: number;
  height: number;
}

export interface StabilizationTransform {
  rotationRadians: number;
  scale: number;
}

export interface StabilizedFrame {
  header: FrameHeader;
  image: ImageBuffer;
  transform: StabilizationTransform;
}

/** Receives every warped frame, typically an encoder. */
export type FrameSink = (frame: StabilizedFrame) => void;

/** Told about a queued frame that could not be stabilized. */
export type FrameErrorHandler = (header: FrameHeader, error: Error) => void;

export type Interpolation = "bilinear" | "nearest";

// ─── Configuration ──────────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface StabilizerConfig {
  /** Weight on history for the exponential filter. 0 disables smoothing. Range: [0, 1). */
  smoothingFactor: number;
  /** Frames held between capture and warping before the oldest is dropped. */
  frameQueueMaxSize: number;
  interpolation: Interpolation;
  /** Byte written where a warped pixel has no source pixel. */
  fillValue: number;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  stabilizer: StabilizerConfig;
}

// ─── Status ─────────────────────────────────────────────────────────────────────

export interface StabilizationStatus {
  state: SessionState;
  orientation: BaselineOrientation | null;
  baselineAngle: number | null;
  dims: FrameDimensions | null;
  framesReceived: number;
  framesProcessed: number;
  framesDroppedByAllocation: number;
  framesDroppedByBackpressure: number;
  framesRejected: number;
  framesErrored: number;
  averageWarpMs: number;
  /** Mean time a frame waited in the mailbox before warping. */
  averageQueueLatencyMs: number;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Client → Server messages
export type ClientMessage =
  | { type: "gravity"; x: number; y: number; z: number; timestamp: number }
  | {
      type: "start_recording";
      width: number;
      height: number;
      orientation?: BaselineOrientation;
      deviceOrientation?: DeviceOrientation;
    }
  | { type: "stop_recording" }
  | { type: "get_transform" };

// Server → Client messages
export type ServerMessage =
  | { type: "state_change"; state: SessionState }
  | {
      type: "recording_started";
      baselineAngle: number;
      orientation: BaselineOrientation;
      encoderRotationDegrees: number;
    }
  | {
      type: "transform";
      rotationRadians: number;
      scale: number;
      tiltAngle: number;
    }
  | ({ type: "stabilization_status" } & StabilizationStatus)
  | { type: "error"; message: string; recoverable: boolean };
