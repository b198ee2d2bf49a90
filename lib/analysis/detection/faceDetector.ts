import type { FaceDetection, Frame } from "../types";

/**
 * Detection collaborator. One instance is one non-reentrant handle:
 * initialize once, call detect() serially, release on shutdown.
 */
export interface FaceDetector {
  readonly name: string;
  initialize(): Promise<void>;
  /** `null` means no face; never throws for image content */
  detect(frame: Frame): FaceDetection | null;
  release(): Promise<void>;
}

export class DetectorStateError extends Error {
  readonly name = "DetectorStateError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}
