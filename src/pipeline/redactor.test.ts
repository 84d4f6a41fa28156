import { describe, it, expect } from "vitest";
import { FaceRedactor } from "./redactor";
import { parseConfig } from "../config";
import { createMockFaceDetector } from "../rekognition/mock-face-detector";
import type { DetectedFace } from "../rekognition/types";
import {
  ConfigurationError,
  DecodeError,
  DetectionServiceError,
  EncodeError,
} from "../errors";
import {
  createCheckerboard,
  decodeRaw,
  encodeRaw,
  pixelAt,
  unchangedOutside,
} from "../test-helpers";

const config = parseConfig({ rekognition: { retryDelayMs: 1 } });

const FACE: DetectedFace = { boundingBox: { left: 10, top: 10, width: 30, height: 30 }, confidence: 95 };

async function checkerboardPng(): Promise<{ raw: Buffer; png: Buffer }> {
  const raw = createCheckerboard(100, 100);
  return { raw, png: await encodeRaw(raw, 100, 100, "png") };
}

function retryableFailure(): DetectionServiceError {
  return new DetectionServiceError("Rate exceeded", true);
}

describe("FaceRedactor", () => {
  it("should blur exactly the detected region", async () => {
    const { raw, png } = await checkerboardPng();
    const redactor = new FaceRedactor(createMockFaceDetector([FACE]), config);

    const result = await redactor.redact({ image: png });

    expect(result.facesRedacted).toBe(1);
    expect(result.facesDetected).toBe(1);
    expect(result.format).toBe("png");
    expect(result.contentType).toBe("image/png");
    const output = await decodeRaw(result.image);
    expect(output.width).toBe(100);
    expect(output.height).toBe(100);
    expect(unchangedOutside(raw, output.data, 100, 100, FACE.boundingBox)).toBe(true);
    const [red] = pixelAt(output.data, 100, 25, 25);
    expect(red).toBeGreaterThan(64);
    expect(red).toBeLessThan(192);
  });

  it("should return the input unchanged when no faces are found", async () => {
    const { png } = await checkerboardPng();
    const redactor = new FaceRedactor(createMockFaceDetector([]), config);

    const result = await redactor.redact({ image: png });

    expect(result.facesRedacted).toBe(0);
    expect(result.facesDetected).toBe(0);
    expect(result.image.equals(png)).toBe(true);
  });

  it("should ignore a box that clips to nothing", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector([
      { boundingBox: { left: 200, top: 200, width: 50, height: 50 }, confidence: 99 },
    ]);
    const redactor = new FaceRedactor(detector, config);

    const result = await redactor.redact({ image: png });

    expect(result.facesRedacted).toBe(0);
    expect(result.facesDetected).toBe(1);
    expect(result.image.equals(png)).toBe(true);
  });

  it("should skip detections below the confidence threshold", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector([{ ...FACE, confidence: 50 }]);
    const redactor = new FaceRedactor(detector, config);

    const result = await redactor.redact({ image: png });

    expect(result.facesRedacted).toBe(0);
  });

  it("should let a request lower the confidence threshold", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector([{ ...FACE, confidence: 50 }]);
    const redactor = new FaceRedactor(detector, config);

    const result = await redactor.redact({ image: png, options: { minConfidence: 40 } });

    expect(result.facesRedacted).toBe(1);
  });

  it("should keep detections that carry no confidence", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector([{ boundingBox: FACE.boundingBox }]);
    const redactor = new FaceRedactor(detector, config);

    const result = await redactor.redact({ image: png });

    expect(result.facesRedacted).toBe(1);
  });

  it("should count overlapping boxes separately", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector([
      FACE,
      { boundingBox: { left: 20, top: 20, width: 30, height: 30 }, confidence: 90 },
    ]);
    const redactor = new FaceRedactor(detector, config);

    const result = await redactor.redact({ image: png });

    expect(result.facesRedacted).toBe(2);
  });

  it("should re-encode to a requested format even without faces", async () => {
    const { png } = await checkerboardPng();
    const redactor = new FaceRedactor(createMockFaceDetector([]), config);

    const result = await redactor.redact({ image: png, options: { format: "jpeg" } });

    expect(result.format).toBe("jpeg");
    expect(result.contentType).toBe("image/jpeg");
    const output = await decodeRaw(result.image);
    expect(output.width).toBe(100);
    expect(output.height).toBe(100);
  });

  it("should pass the image size and source to the detector", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector([]);
    const redactor = new FaceRedactor(detector, config);

    await redactor.redact({ image: png, source: { bucket: "uploads", key: "a.png" } });

    expect(detector.calls).toHaveLength(1);
    expect(detector.calls[0].width).toBe(100);
    expect(detector.calls[0].height).toBe(100);
    expect(detector.calls[0].source).toEqual({ bucket: "uploads", key: "a.png" });
  });

  it("should fail with DecodeError before calling the detector for invalid bytes", async () => {
    const detector = createMockFaceDetector([FACE]);
    const redactor = new FaceRedactor(detector, config);

    await expect(redactor.redact({ image: Buffer.from("not an image at all") })).rejects.toBeInstanceOf(
      DecodeError
    );
    expect(detector.calls).toHaveLength(0);
  });

  it("should reject images larger than the inline limit", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector([]);
    const redactor = new FaceRedactor(detector, parseConfig({ imageProcessing: { maxInlineBytes: 10 } }));

    await expect(redactor.redact({ image: png })).rejects.toThrow(
      `Image of ${png.length} bytes exceeds the 10 byte limit`
    );
    expect(detector.calls).toHaveLength(0);
  });

  it("should fail with EncodeError for an unsupported target format", async () => {
    const { png } = await checkerboardPng();
    const redactor = new FaceRedactor(createMockFaceDetector([FACE]), config);

    await expect(redactor.redact({ image: png, options: { format: "tiff" } })).rejects.toBeInstanceOf(
      EncodeError
    );
  });

  it("should reject invalid options with ConfigurationError", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector([FACE]);
    const redactor = new FaceRedactor(detector, config);

    await expect(redactor.redact({ image: png, options: { blurStrength: -1 } })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(redactor.redact({ image: png, options: { maxRetries: 4 } })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(detector.calls).toHaveLength(0);
  });

  it("should time out a detector that never answers", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector(() => new Promise<DetectedFace[]>(() => {}));
    const redactor = new FaceRedactor(detector, config);

    const promise = redactor.redact({ image: png, options: { timeoutMs: 20 } });

    await expect(promise).rejects.toBeInstanceOf(DetectionServiceError);
    await expect(promise).rejects.toThrow("Face detection timed out after 20ms");
  });

  it("should abort the detector's signal on timeout", async () => {
    const { png } = await checkerboardPng();
    let received: AbortSignal | undefined;
    const detector = createMockFaceDetector((_input, signal) => {
      received = signal;
      return new Promise<DetectedFace[]>(() => {});
    });
    const redactor = new FaceRedactor(detector, config);

    await expect(redactor.redact({ image: png, options: { timeoutMs: 20 } })).rejects.toBeInstanceOf(
      DetectionServiceError
    );
    expect(received?.aborted).toBe(true);
  });

  it("should report cancellation by the caller", async () => {
    const { png } = await checkerboardPng();
    const controller = new AbortController();
    controller.abort();
    const redactor = new FaceRedactor(createMockFaceDetector(() => new Promise<DetectedFace[]>(() => {})), config);

    await expect(redactor.redact({ image: png, signal: controller.signal })).rejects.toThrow(
      "Face detection was cancelled"
    );
  });

  it("should not retry by default", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector(async () => {
      throw retryableFailure();
    });
    const redactor = new FaceRedactor(detector, config);

    await expect(redactor.redact({ image: png })).rejects.toThrow("Rate exceeded");
    expect(detector.calls).toHaveLength(1);
  });

  it("should retry retryable failures up to maxRetries", async () => {
    const { png } = await checkerboardPng();
    let attempts = 0;
    const detector = createMockFaceDetector(async () => {
      attempts++;
      if (attempts < 3) throw retryableFailure();
      return [FACE];
    });
    const redactor = new FaceRedactor(detector, config);

    const result = await redactor.redact({ image: png, options: { maxRetries: 2, backoff: "fixed" } });

    expect(result.facesRedacted).toBe(1);
    expect(detector.calls).toHaveLength(3);
  });

  it("should give up once retries are exhausted", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector(async () => {
      throw retryableFailure();
    });
    const redactor = new FaceRedactor(detector, config);

    await expect(redactor.redact({ image: png, options: { maxRetries: 1 } })).rejects.toBeInstanceOf(
      DetectionServiceError
    );
    expect(detector.calls).toHaveLength(2);
  });

  it("should not retry permanent failures", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector(async () => {
      throw new DetectionServiceError("Access denied", false);
    });
    const redactor = new FaceRedactor(detector, config);

    await expect(redactor.redact({ image: png, options: { maxRetries: 3 } })).rejects.toThrow("Access denied");
    expect(detector.calls).toHaveLength(1);
  });

  it("should wrap unexpected detector errors", async () => {
    const { png } = await checkerboardPng();
    const detector = createMockFaceDetector(async () => {
      throw new Error("socket hang up");
    });
    const redactor = new FaceRedactor(detector, config);

    await expect(redactor.redact({ image: png })).rejects.toThrow("Face detection failed: socket hang up");
  });

  it("should pixelate when asked to", async () => {
    const { raw, png } = await checkerboardPng();
    const redactor = new FaceRedactor(createMockFaceDetector([FACE]), config);

    const result = await redactor.redact({ image: png, options: { blurType: "pixelate" } });

    expect(result.facesRedacted).toBe(1);
    const output = await decodeRaw(result.image);
    expect(unchangedOutside(raw, output.data, 100, 100, FACE.boundingBox)).toBe(true);
    expect(output.data.equals(raw)).toBe(false);
  });
});
