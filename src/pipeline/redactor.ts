import type { DetectedFace, FaceDetector } from "../rekognition/types";
import type { ObjectRef } from "../sources/types";
import type { Config } from "../config";
import {
  contentTypeFor,
  decodeImage,
  encodeImage,
  resolveOutputFormat,
  type ImageBuffer,
  type OutputFormat,
} from "../image/codec";
import { clipBoxes } from "../image/boxes";
import { anonymizeRegion } from "../image/anonymize";
import { DecodeError, DetectionServiceError, toError } from "../errors";
import { DeadlineExceededError, withDeadline, withRetry } from "../utils/retry";
import { resolveOptions, type RedactionOverrides, type ResolvedOptions } from "./options";
import { createLogger } from "../logger";

const log = createLogger("redactor");

export interface RedactionRequest {
  image: Uint8Array;
  /** Where the bytes came from; lets the detector read the object itself. */
  source?: ObjectRef;
  options?: RedactionOverrides;
  signal?: AbortSignal;
}

export interface RedactionResult {
  image: Buffer;
  format: OutputFormat;
  contentType: string;
  width: number;
  height: number;
  facesDetected: number;
  facesRedacted: number;
}

export class FaceRedactor {
  private detector: FaceDetector;
  private config: Config;

  constructor(detector: FaceDetector, config: Config) {
    this.detector = detector;
    this.config = config;
  }

  /**
   * Decode, detect, clip, blur, encode. Any failure aborts the whole request;
   * no partial image is ever returned.
   */
  async redact(request: RedactionRequest): Promise<RedactionResult> {
    const options = resolveOptions(this.config, request.options);

    const limit = request.source
      ? this.config.imageProcessing.maxObjectBytes
      : this.config.imageProcessing.maxInlineBytes;
    if (request.image.length > limit) {
      throw new DecodeError(`Image of ${request.image.length} bytes exceeds the ${limit} byte limit`);
    }

    const image = await decodeImage(request.image);
    const format = resolveOutputFormat(options.format, image.format);

    log.debug(
      { source: request.source, width: image.width, height: image.height, channels: image.channels, format: image.format },
      "Image decoded"
    );

    const faces = await this.detect(image, request, options);
    const confident = faces.filter(
      (face) => face.confidence === undefined || face.confidence >= options.minConfidence
    );
    const boxes = clipBoxes(
      confident.map((face) => face.boundingBox),
      image.width,
      image.height
    );

    const result = {
      format,
      contentType: contentTypeFor(format),
      width: image.width,
      height: image.height,
      facesDetected: faces.length,
      facesRedacted: boxes.length,
    };

    if (boxes.length === 0 && format === image.format) {
      log.info({ ...result, source: request.source }, "No faces to redact, returning input unchanged");
      return { ...result, image: Buffer.from(request.image) };
    }

    // Overlapping boxes are blurred once per box.
    for (const box of boxes) {
      await anonymizeRegion(image, box, options);
    }

    const encoded = await encodeImage(image, format, options.quality);
    log.info({ ...result, source: request.source, size: encoded.length }, "Redaction completed");

    return { ...result, image: encoded };
  }

  private async detect(
    image: ImageBuffer,
    request: RedactionRequest,
    options: ResolvedOptions
  ): Promise<DetectedFace[]> {
    const input = {
      bytes: request.image,
      width: image.width,
      height: image.height,
      source: request.source,
    };

    try {
      return await withDeadline(
        (signal) =>
          withRetry(() => this.detector.detectFaces(input, signal), {
            maxRetries: options.maxRetries,
            backoff: options.backoff,
            baseDelayMs: options.retryDelayMs,
            signal,
            isRetryable: (error) => error instanceof DetectionServiceError && error.retryable,
            onRetry: (attempt, error, delayMs) =>
              log.warn(
                { attempt, maxRetries: options.maxRetries, delayMs, error: error.message },
                "Transient detection error, retrying"
              ),
          }),
        options.timeoutMs,
        request.signal
      );
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        throw new DetectionServiceError(`Face detection timed out after ${options.timeoutMs}ms`, false, error);
      }
      if (error instanceof DetectionServiceError) {
        throw error;
      }
      const cause = toError(error);
      if (request.signal?.aborted) {
        throw new DetectionServiceError("Face detection was cancelled", false, cause);
      }
      throw new DetectionServiceError(`Face detection failed: ${cause.message}`, false, cause);
    }
  }
}
