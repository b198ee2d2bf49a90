/*
  facetier — Landmarks supplied by an upstream detector

  Clients (for example a browser face-mesh run) send the face box, an optional
  dense mesh and the detection confidence alongside the image. This module
  validates that payload and replays it through the FaceDetector contract.

  Coordinates
  - "pixel": source-image pixels; rescaled by the decode scale.
  - "normalized": 0..1 of the decoded frame (z scaled by frame width).
*/

import type { FaceBox, FaceDetection, Frame, Point3D } from "../types";
import type { FaceDetector } from "./faceDetector";

export type CoordinateSpace = "pixel" | "normalized";

export interface LandmarkPayload {
  readonly coordinates: CoordinateSpace;
  readonly box: FaceBox;
  readonly mesh: ReadonlyArray<Point3D> | null;
  readonly confidence: number;
}

export class LandmarkPayloadError extends Error {
  readonly name = "LandmarkPayloadError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

function asRecord(v: unknown, what: string): Record<string, unknown> {
  if (!v || typeof v !== "object" || Array.isArray(v)) {
    throw new LandmarkPayloadError(`${what} must be an object`);
  }
  return v as Record<string, unknown>;
}

function asFinite(v: unknown, what: string): number {
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new LandmarkPayloadError(`${what} must be a finite number`);
  }
  return v;
}

function asPoint(v: unknown, i: number): Point3D {
  // [x, y, z?] tuples or {x, y, z?} objects
  if (Array.isArray(v)) {
    if (v.length < 2) throw new LandmarkPayloadError(`mesh[${i}] needs at least x and y`);
    return {
      x: asFinite(v[0], `mesh[${i}][0]`),
      y: asFinite(v[1], `mesh[${i}][1]`),
      z: v.length > 2 ? asFinite(v[2], `mesh[${i}][2]`) : 0
    };
  }
  const p = asRecord(v, `mesh[${i}]`);
  return {
    x: asFinite(p.x, `mesh[${i}].x`),
    y: asFinite(p.y, `mesh[${i}].y`),
    z: p.z === undefined ? 0 : asFinite(p.z, `mesh[${i}].z`)
  };
}

/**
 * Validate an untrusted payload. `null` (or a JSON `null`) means the upstream
 * detector found no face.
 */
export function parseLandmarkPayload(raw: unknown): LandmarkPayload | null {
  if (raw === null || raw === undefined) return null;

  const obj = asRecord(raw, "landmarks");

  const coordinates = obj.coordinates ?? "pixel";
  if (coordinates !== "pixel" && coordinates !== "normalized") {
    throw new LandmarkPayloadError("coordinates must be 'pixel' or 'normalized'");
  }

  const b = asRecord(obj.box, "box");
  const box: FaceBox = {
    x: asFinite(b.x, "box.x"),
    y: asFinite(b.y, "box.y"),
    w: asFinite(b.w, "box.w"),
    h: asFinite(b.h, "box.h")
  };

  const confidence = asFinite(obj.confidence, "confidence");
  if (confidence < 0 || confidence > 1) {
    throw new LandmarkPayloadError("confidence must be within [0,1]");
  }

  let mesh: Point3D[] | null = null;
  if (obj.mesh !== undefined && obj.mesh !== null) {
    if (!Array.isArray(obj.mesh)) throw new LandmarkPayloadError("mesh must be an array");
    mesh = obj.mesh.map((p: unknown, i: number) => asPoint(p, i));
  }

  return { coordinates, box, mesh, confidence };
}

/**
 * Map payload coordinates into decoded-frame pixels.
 */
export function toFrameDetection(payload: LandmarkPayload, frame: Frame): FaceDetection {
  const sx = payload.coordinates === "normalized" ? frame.width : frame.scale;
  const sy = payload.coordinates === "normalized" ? frame.height : frame.scale;

  return {
    box: {
      x: Math.trunc(payload.box.x * sx),
      y: Math.trunc(payload.box.y * sy),
      w: Math.trunc(payload.box.w * sx),
      h: Math.trunc(payload.box.h * sy)
    },
    mesh: payload.mesh ? payload.mesh.map((p) => ({ x: p.x * sx, y: p.y * sy, z: p.z * sx })) : null,
    confidence: payload.confidence
  };
}

export class SuppliedLandmarksDetector implements FaceDetector {
  readonly name = "supplied-landmarks";

  constructor(private readonly payload: LandmarkPayload | null) {}

  async initialize(): Promise<void> {
    // Nothing to load; landmarks arrive with the request.
  }

  detect(frame: Frame): FaceDetection | null {
    return this.payload ? toFrameDetection(this.payload, frame) : null;
  }

  async release(): Promise<void> {
    // No native handle to free.
  }
}
