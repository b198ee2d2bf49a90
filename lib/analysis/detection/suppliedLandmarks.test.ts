import { describe, it, expect } from "vitest";
import type { Frame } from "../types";
import {
  LandmarkPayloadError,
  SuppliedLandmarksDetector,
  parseLandmarkPayload,
  toFrameDetection
} from "./suppliedLandmarks";

function mkFrame(width: number, height: number, scale: number): Frame {
  return { width, height, scale, gray: new Uint8Array(width * height) };
}

describe("parseLandmarkPayload", () => {
  it("treats null and undefined as no face", () => {
    expect(parseLandmarkPayload(null)).toBeNull();
    expect(parseLandmarkPayload(undefined)).toBeNull();
  });

  it("accepts tuple and object mesh points and defaults to pixel coordinates", () => {
    const p = parseLandmarkPayload({
      box: { x: 1, y: 2, w: 3, h: 4 },
      confidence: 0.9,
      mesh: [[1, 2], [3, 4, 5], { x: 6, y: 7 }, { x: 8, y: 9, z: -1 }]
    });
    expect(p).toEqual({
      coordinates: "pixel",
      box: { x: 1, y: 2, w: 3, h: 4 },
      confidence: 0.9,
      mesh: [
        { x: 1, y: 2, z: 0 },
        { x: 3, y: 4, z: 5 },
        { x: 6, y: 7, z: 0 },
        { x: 8, y: 9, z: -1 }
      ]
    });
  });

  it("keeps a missing mesh as null", () => {
    const p = parseLandmarkPayload({ box: { x: 0, y: 0, w: 1, h: 1 }, confidence: 1 });
    expect(p?.mesh).toBeNull();
  });

  it.each([
    ["a non-object", "nope", /landmarks must be an object/],
    ["a missing box", { confidence: 0.5 }, /box must be an object/],
    ["a non-numeric box field", { box: { x: "1", y: 0, w: 1, h: 1 }, confidence: 0.5 }, /box\.x/],
    ["confidence above 1", { box: { x: 0, y: 0, w: 1, h: 1 }, confidence: 1.2 }, /confidence/],
    ["an unknown coordinate space", { coordinates: "cm", box: { x: 0, y: 0, w: 1, h: 1 }, confidence: 1 }, /coordinates/],
    ["a short mesh point", { box: { x: 0, y: 0, w: 1, h: 1 }, confidence: 1, mesh: [[1]] }, /mesh\[0\]/]
  ])("rejects %s", (_name, raw, message) => {
    expect(() => parseLandmarkPayload(raw)).toThrow(LandmarkPayloadError);
    expect(() => parseLandmarkPayload(raw)).toThrow(message);
  });
});

describe("toFrameDetection", () => {
  it("rescales pixel coordinates by the decode scale", () => {
    const d = toFrameDetection(
      { coordinates: "pixel", box: { x: 101, y: 50, w: 41, h: 60 }, mesh: [{ x: 10, y: 20, z: 4 }], confidence: 0.8 },
      mkFrame(100, 80, 0.5)
    );
    expect(d.box).toEqual({ x: 50, y: 25, w: 20, h: 30 });
    expect(d.mesh).toEqual([{ x: 5, y: 10, z: 2 }]);
    expect(d.confidence).toBe(0.8);
  });

  it("maps normalized coordinates onto the frame", () => {
    const d = toFrameDetection(
      { coordinates: "normalized", box: { x: 0.25, y: 0.5, w: 0.5, h: 0.25 }, mesh: null, confidence: 1 },
      mkFrame(200, 100, 1)
    );
    expect(d.box).toEqual({ x: 50, y: 50, w: 100, h: 25 });
    expect(d.mesh).toBeNull();
  });
});

describe("SuppliedLandmarksDetector", () => {
  it("reports no face for a null payload", async () => {
    const det = new SuppliedLandmarksDetector(null);
    await det.initialize();
    expect(det.detect(mkFrame(10, 10, 1))).toBeNull();
    await det.release();
  });
});
