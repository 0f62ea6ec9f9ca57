/**
 * Binary frame codec for ST-prefixed wire format.
 *
 * Wire format: [0x53 0x54 magic ("ST")][type byte 0x56 'V'][3-byte big-endian uint24 header JSON length][UTF-8 header JSON][pixel bytes]
 *
 * Header JSON: { timestamp, seq, width, height, stride, channels }
 * Pixel bytes: exactly stride × height bytes, row-major.
 *
 * The same format carries raw frames from the capture client and warped
 * frames back to it.
 */

import type { FrameHeader, ImageBuffer } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const ST_MAGIC_0 = 0x53; // 'S'
const ST_MAGIC_1 = 0x54; // 'T'
const TYPE_FRAME = 0x56; // 'V'

/** Minimum valid frame size: 2 (magic) + 1 (type) + 3 (header len) = 6 bytes */
const MIN_FRAME_SIZE = 6;

/** Maximum header JSON size in bytes */
const MAX_HEADER_JSON_BYTES = 4096;

/** Maximum resolution along either axis */
export const MAX_FRAME_EDGE = 4096;

export interface WireFrameHeader extends FrameHeader {
  stride: number;
  channels: number;
}

export interface DecodedFrame {
  header: FrameHeader;
  image: ImageBuffer;
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Encode a frame into the ST-prefixed wire format.
 * Produces: [0x53 0x54][0x56][uint24 header len][header JSON][pixel bytes]
 */
export function encodeFrame(header: FrameHeader, image: ImageBuffer): Buffer {
  const wireHeader: WireFrameHeader = {
    timestamp: header.timestamp,
    seq: header.seq,
    width: image.width,
    height: image.height,
    stride: image.stride,
    channels: image.channels,
  };
  const headerJson = Buffer.from(JSON.stringify(wireHeader), "utf-8");
  const pixelBytes = image.stride * image.height;
  const buf = Buffer.alloc(MIN_FRAME_SIZE + headerJson.length + pixelBytes);

  let offset = 0;
  buf[offset++] = ST_MAGIC_0;
  buf[offset++] = ST_MAGIC_1;
  buf[offset++] = TYPE_FRAME;

  // Write uint24 big-endian header length
  buf[offset++] = (headerJson.length >> 16) & 0xff;
  buf[offset++] = (headerJson.length >> 8) & 0xff;
  buf[offset++] = headerJson.length & 0xff;

  headerJson.copy(buf, offset);
  offset += headerJson.length;

  image.data.copy(buf, offset, 0, pixelBytes);

  return buf;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isPositiveInteger(value: unknown, max: number): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 && value <= max;
}

/**
 * Validate a wire header has all required fields with correct types.
 */
function isValidWireHeader(obj: unknown): obj is WireFrameHeader {
  if (typeof obj !== "object" || obj === null) return false;
  if (!("timestamp" in obj && "seq" in obj && "width" in obj && "height" in obj)) return false;
  if (!("stride" in obj && "channels" in obj)) return false;

  // timestamp: number >= 0
  const { timestamp, seq, width, height, stride, channels } = obj;
  if (typeof timestamp !== "number" || !isFinite(timestamp) || timestamp < 0) return false;

  // seq: non-negative integer
  if (typeof seq !== "number" || !Number.isInteger(seq) || seq < 0) return false;

  if (!isPositiveInteger(width, MAX_FRAME_EDGE)) return false;
  if (!isPositiveInteger(height, MAX_FRAME_EDGE)) return false;
  if (!isPositiveInteger(channels, 4)) return false;
  if (!isPositiveInteger(stride, MAX_FRAME_EDGE * 4) || stride < width * channels) return false;

  return true;
}

/**
 * Decode a frame from the ST-prefixed wire format.
 * Returns null on malformed input.
 */
export function decodeFrame(data: Buffer): DecodedFrame | null {
  if (!Buffer.isBuffer(data) || data.length < MIN_FRAME_SIZE) return null;

  if (data[0] !== ST_MAGIC_0 || data[1] !== ST_MAGIC_1) return null;
  if (data[2] !== TYPE_FRAME) return null;

  // Read uint24 big-endian header length
  const headerLen = (data[3] << 16) | (data[4] << 8) | data[5];
  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) return null;
  if (data.length < MIN_FRAME_SIZE + headerLen) return null;

  let parsed: unknown;
  try {
    const headerStr = data.toString("utf-8", MIN_FRAME_SIZE, MIN_FRAME_SIZE + headerLen);
    parsed = JSON.parse(headerStr);
  } catch {
    return null;
  }

  if (!isValidWireHeader(parsed)) return null;

  const pixels = data.subarray(MIN_FRAME_SIZE + headerLen);
  if (pixels.length !== parsed.stride * parsed.height) return null;

  return {
    header: {
      timestamp: parsed.timestamp,
      seq: parsed.seq,
      width: parsed.width,
      height: parsed.height,
    },
    image: {
      width: parsed.width,
      height: parsed.height,
      stride: parsed.stride,
      channels: parsed.channels,
      data: pixels,
    },
  };
}

// ─── Inspection ─────────────────────────────────────────────────────────────────

/** Check if a buffer starts with the ST frame prefix and type byte. */
export function isFrame(data: Buffer): boolean {
  if (!Buffer.isBuffer(data) || data.length < 3) return false;
  return data[0] === ST_MAGIC_0 && data[1] === ST_MAGIC_1 && data[2] === TYPE_FRAME;
}
