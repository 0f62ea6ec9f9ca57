// Parsing of JSON client messages received over the WebSocket.
// Returns null for anything that is not a well-formed ClientMessage.

import {
  BaselineOrientation,
  DEVICE_ORIENTATIONS,
  type ClientMessage,
  type DeviceOrientation,
} from "./types.js";

function field(obj: object, key: string): unknown {
  return key in obj ? Reflect.get(obj, key) : undefined;
}

function finiteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function positiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function baselineOrientation(value: unknown): BaselineOrientation | undefined {
  if (value === BaselineOrientation.PORTRAIT) return BaselineOrientation.PORTRAIT;
  if (value === BaselineOrientation.LANDSCAPE) return BaselineOrientation.LANDSCAPE;
  return undefined;
}

function deviceOrientation(value: unknown): DeviceOrientation | undefined {
  return DEVICE_ORIENTATIONS.find((candidate) => candidate === value);
}

export function parseClientMessage(text: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) return null;

  switch (field(parsed, "type")) {
    case "gravity": {
      const x = field(parsed, "x");
      const y = field(parsed, "y");
      const z = field(parsed, "z");
      const timestamp = field(parsed, "timestamp");
      if (!finiteNumber(x) || !finiteNumber(y) || !finiteNumber(z) || !finiteNumber(timestamp)) {
        return null;
      }
      return { type: "gravity", x, y, z, timestamp };
    }

    case "start_recording": {
      const width = field(parsed, "width");
      const height = field(parsed, "height");
      if (!positiveInteger(width) || !positiveInteger(height)) return null;

      const rawOrientation = field(parsed, "orientation");
      const rawDevice = field(parsed, "deviceOrientation");
      const orientation = baselineOrientation(rawOrientation);
      const device = deviceOrientation(rawDevice);
      if (rawOrientation !== undefined && orientation === undefined) return null;
      if (rawDevice !== undefined && device === undefined) return null;

      return {
        type: "start_recording",
        width,
        height,
        ...(orientation !== undefined ? { orientation } : {}),
        ...(device !== undefined ? { deviceOrientation: device } : {}),
      };
    }

    case "stop_recording":
      return { type: "stop_recording" };

    case "get_transform":
      return { type: "get_transform" };

    default:
      return null;
  }
}
