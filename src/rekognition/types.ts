import type { ObjectRef } from "../sources/types";

/** Pixel coordinates in the decoded image grid. */
export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface DetectedFace {
  boundingBox: BoundingBox;
  /** Percent, 0-100. */
  confidence?: number;
}

export interface DetectionInput {
  bytes: Uint8Array;
  width: number;
  height: number;
  /** When set, the detector may read the object from storage instead of receiving the bytes. */
  source?: ObjectRef;
}

export interface FaceDetector {
  detectFaces(input: DetectionInput, signal?: AbortSignal): Promise<DetectedFace[]>;
}
