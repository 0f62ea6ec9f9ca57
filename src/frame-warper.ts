/**
 * FrameWarper — renders a stabilized copy of one frame.
 *
 * The composite transform is translate(−centre) → rotate → scale →
 * translate(+centre). Rendering walks the output pixels, maps each pixel
 * centre back into the source through the inverse transform and samples
 * there, so every output pixel is written exactly once.
 *
 * The warper holds no per-frame state; one instance can serve any number of
 * sessions.
 */

import type {
  FrameDimensions,
  ImageBuffer,
  Interpolation,
  StabilizationTransform,
} from "./types.js";
import {
  type AffineMatrix,
  chain,
  invert,
  rotation,
  scaling,
  translation,
} from "./affine-transform.js";

// ─── Errors ─────────────────────────────────────────────────────────────────────

/** The output buffer for one frame could not be allocated. The frame should be dropped. */
export class FrameAllocationError extends Error {
  readonly byteLength: number;

  constructor(byteLength: number, cause?: unknown) {
    super(`Failed to allocate ${byteLength} bytes for warped frame`, { cause });
    this.name = "FrameAllocationError";
    this.byteLength = byteLength;
  }
}

// ─── Options ────────────────────────────────────────────────────────────────────

export interface FrameWarperOptions {
  interpolation?: Interpolation;
  /** Byte written where the inverse-mapped point falls outside the source. */
  fillValue?: number;
  /** Output allocator. Defaults to Buffer.alloc. */
  allocate?: (byteLength: number) => Buffer;
}

/** Tolerance, in pixels, for points that land on the source edge through rounding. */
const EDGE_EPSILON = 1e-9;

/** Forward transform for a frame of the given size. */
export function buildWarpMatrix(
  transform: StabilizationTransform,
  dims: FrameDimensions,
): AffineMatrix {
  const cx = dims.width / 2;
  const cy = dims.height / 2;
  return chain(
    translation(-cx, -cy),
    rotation(transform.rotationRadians),
    scaling(transform.scale, transform.scale),
    translation(cx, cy),
  );
}

export class FrameWarper {
  private readonly interpolation: Interpolation;
  private readonly fillValue: number;
  private readonly allocate: (byteLength: number) => Buffer;

  constructor(options: FrameWarperOptions = {}) {
    const fillValue = options.fillValue ?? 0;
    if (!Number.isInteger(fillValue) || fillValue < 0 || fillValue > 255) {
      throw new Error(`fillValue must be an integer in [0, 255], got ${fillValue}`);
    }
    this.interpolation = options.interpolation ?? "bilinear";
    this.fillValue = fillValue;
    this.allocate = options.allocate ?? ((byteLength) => Buffer.alloc(byteLength));
  }

  /**
   * Warp `frame` into a new buffer of exactly `dims`, keeping the source
   * stride and channel count.
   *
   * @throws FrameAllocationError when the output buffer cannot be created
   * @throws Error when the frame does not match `dims` or the transform is degenerate
   */
  warp(frame: ImageBuffer, transform: StabilizationTransform, dims: FrameDimensions): ImageBuffer {
    assertFrameMatches(frame, dims);
    if (!Number.isFinite(transform.scale) || transform.scale <= 0) {
      throw new Error(`Transform scale must be a positive number, got ${transform.scale}`);
    }
    if (!Number.isFinite(transform.rotationRadians)) {
      throw new Error(`Transform rotation must be finite, got ${transform.rotationRadians}`);
    }

    const inverse = invert(buildWarpMatrix(transform, dims));
    if (!inverse) {
      throw new Error("Warp transform is not invertible");
    }

    const byteLength = frame.stride * frame.height;
    let data: Buffer;
    try {
      data = this.allocate(byteLength);
    } catch (err) {
      throw new FrameAllocationError(byteLength, err);
    }
    if (data.length < byteLength) {
      throw new FrameAllocationError(byteLength);
    }

    const output: ImageBuffer = {
      width: frame.width,
      height: frame.height,
      stride: frame.stride,
      channels: frame.channels,
      data,
    };

    if (this.interpolation === "nearest") {
      this.renderNearest(frame, output, inverse);
    } else {
      this.renderBilinear(frame, output, inverse);
    }
    return output;
  }

  // ─── Internal: Rendering ──────────────────────────────────────────────────────

  private renderNearest(src: ImageBuffer, dst: ImageBuffer, inv: AffineMatrix): void {
    const { width, height, stride, channels } = src;
    for (let y = 0; y < height; y++) {
      const qy = y + 0.5;
      for (let x = 0; x < width; x++) {
        const qx = x + 0.5;
        const px = inv.a * qx + inv.c * qy + inv.tx;
        const py = inv.b * qx + inv.d * qy + inv.ty;
        const outOffset = y * stride + x * channels;

        if (!insideSource(px, py, width, height)) {
          dst.data.fill(this.fillValue, outOffset, outOffset + channels);
          continue;
        }

        const sx = clamp(Math.floor(px), 0, width - 1);
        const sy = clamp(Math.floor(py), 0, height - 1);
        src.data.copy(dst.data, outOffset, sy * stride + sx * channels, sy * stride + sx * channels + channels);
      }
    }
  }

  private renderBilinear(src: ImageBuffer, dst: ImageBuffer, inv: AffineMatrix): void {
    const { width, height, stride, channels } = src;
    const pixels = src.data;
    for (let y = 0; y < height; y++) {
      const qy = y + 0.5;
      for (let x = 0; x < width; x++) {
        const qx = x + 0.5;
        const px = inv.a * qx + inv.c * qy + inv.tx;
        const py = inv.b * qx + inv.d * qy + inv.ty;
        const outOffset = y * stride + x * channels;

        if (!insideSource(px, py, width, height)) {
          dst.data.fill(this.fillValue, outOffset, outOffset + channels);
          continue;
        }

        // Sample grid is pixel centres
        const gx = px - 0.5;
        const gy = py - 0.5;
        const x0 = Math.floor(gx);
        const y0 = Math.floor(gy);
        const fx = gx - x0;
        const fy = gy - y0;

        const left = clamp(x0, 0, width - 1);
        const right = clamp(x0 + 1, 0, width - 1);
        const top = clamp(y0, 0, height - 1);
        const bottom = clamp(y0 + 1, 0, height - 1);

        const tl = top * stride + left * channels;
        const tr = top * stride + right * channels;
        const bl = bottom * stride + left * channels;
        const br = bottom * stride + right * channels;

        for (let ch = 0; ch < channels; ch++) {
          const upper = pixels[tl + ch] * (1 - fx) + pixels[tr + ch] * fx;
          const lower = pixels[bl + ch] * (1 - fx) + pixels[br + ch] * fx;
          dst.data[outOffset + ch] = Math.round(upper * (1 - fy) + lower * fy);
        }
      }
    }
  }
}

// ─── Validation ─────────────────────────────────────────────────────────────────

export function assertFrameMatches(frame: ImageBuffer, dims: FrameDimensions): void {
  if (frame.width !== dims.width || frame.height !== dims.height) {
    throw new Error(
      `Frame is ${frame.width}x${frame.height}, expected ${dims.width}x${dims.height}`,
    );
  }
  if (!Number.isInteger(frame.channels) || frame.channels < 1 || frame.channels > 4) {
    throw new Error(`Frame channels must be 1-4, got ${frame.channels}`);
  }
  if (!Number.isInteger(frame.stride) || frame.stride < frame.width * frame.channels) {
    throw new Error(
      `Frame stride ${frame.stride} is shorter than a row of ${frame.width * frame.channels} bytes`,
    );
  }
  if (frame.data.length < frame.stride * frame.height) {
    throw new Error(
      `Frame data holds ${frame.data.length} bytes, expected ${frame.stride * frame.height}`,
    );
  }
}

function insideSource(px: number, py: number, width: number, height: number): boolean {
  return (
    px >= -EDGE_EPSILON &&
    py >= -EDGE_EPSILON &&
    px <= width + EDGE_EPSILON &&
    py <= height + EDGE_EPSILON
  );
}

function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}
