// Tilt Stabilizer - Configuration
// Reads settings from environment variables (populated from .env by the entry point).

import type { AppConfig, Interpolation, LogLevel, StabilizerConfig } from "./types.js";
import { LOG_LEVELS } from "./logger.js";
import { DEFAULT_SMOOTHING_FACTOR } from "./orientation-estimator.js";

export const DEFAULT_PORT = 3000;

export const DEFAULT_STABILIZER_CONFIG: StabilizerConfig = {
  smoothingFactor: DEFAULT_SMOOTHING_FACTOR,
  frameQueueMaxSize: 8,
  interpolation: "bilinear",
  fillValue: 0,
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isInterpolation(value: string): value is Interpolation {
  return value === "bilinear" || value === "nearest";
}

/**
 * Builds the application config from environment variables.
 * @throws Error naming the first invalid variable
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = readNumber(env, "PORT", DEFAULT_PORT);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer in [0, 65535], got ${port}`);
  }

  const logLevel = (env.LOG_LEVEL ?? "info").toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${env.LOG_LEVEL}"`);
  }

  const smoothingFactor = readNumber(
    env,
    "STABILIZER_SMOOTHING",
    DEFAULT_STABILIZER_CONFIG.smoothingFactor,
  );
  if (smoothingFactor < 0 || smoothingFactor >= 1) {
    throw new Error(`STABILIZER_SMOOTHING must be in [0, 1), got ${smoothingFactor}`);
  }

  const frameQueueMaxSize = readNumber(
    env,
    "STABILIZER_QUEUE_SIZE",
    DEFAULT_STABILIZER_CONFIG.frameQueueMaxSize,
  );
  if (!Number.isInteger(frameQueueMaxSize) || frameQueueMaxSize < 1) {
    throw new Error(`STABILIZER_QUEUE_SIZE must be a positive integer, got ${frameQueueMaxSize}`);
  }

  const interpolation = (env.STABILIZER_INTERPOLATION ?? DEFAULT_STABILIZER_CONFIG.interpolation).toLowerCase();
  if (!isInterpolation(interpolation)) {
    throw new Error(
      `STABILIZER_INTERPOLATION must be "bilinear" or "nearest", got "${env.STABILIZER_INTERPOLATION}"`,
    );
  }

  const fillValue = readNumber(env, "STABILIZER_FILL", DEFAULT_STABILIZER_CONFIG.fillValue);
  if (!Number.isInteger(fillValue) || fillValue < 0 || fillValue > 255) {
    throw new Error(`STABILIZER_FILL must be an integer in [0, 255], got ${fillValue}`);
  }

  return {
    port,
    logLevel,
    stabilizer: { smoothingFactor, frameQueueMaxSize, interpolation, fillValue },
  };
}
