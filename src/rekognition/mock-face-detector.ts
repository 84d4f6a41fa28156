import type { DetectedFace, DetectionInput, FaceDetector } from "./types";

export interface MockFaceDetector extends FaceDetector {
  readonly calls: DetectionInput[];
}

/**
 * Detector that answers every request with the same faces, or with whatever
 * `respond` produces for the call.
 */
export function createMockFaceDetector(
  respond: DetectedFace[] | ((input: DetectionInput, signal?: AbortSignal) => Promise<DetectedFace[]>) = []
): MockFaceDetector {
  const calls: DetectionInput[] = [];

  return {
    calls,
    async detectFaces(input: DetectionInput, signal?: AbortSignal): Promise<DetectedFace[]> {
      calls.push(input);
      if (typeof respond === "function") {
        return respond(input, signal);
      }
      return respond.map((face) => ({ ...face, boundingBox: { ...face.boundingBox } }));
    },
  };
}
