import {
  RekognitionClient,
  DetectFacesCommand,
  type DetectFacesCommandOutput,
  type Image,
} from "@aws-sdk/client-rekognition";
import { z } from "zod";
import type { BoundingBox, DetectedFace, DetectionInput, FaceDetector } from "./types";
import { DetectionServiceError, toError } from "../errors";
import { createLogger } from "../logger";
import type { Config } from "../config";

const log = createLogger("rekognition");

export interface RekognitionTransport {
  detectFaces(
    command: DetectFacesCommand,
    abortSignal?: AbortSignal
  ): Promise<Pick<DetectFacesCommandOutput, "FaceDetails">>;
}

/**
 * SDK retries are disabled; the redactor owns the retry policy so the
 * request-level deadline covers every attempt.
 */
export function createRekognitionTransport(region: string): RekognitionTransport {
  const client = new RekognitionClient({ region, maxAttempts: 1 });
  return {
    detectFaces: (command, abortSignal) => client.send(command, { abortSignal }),
  };
}

const RETRYABLE_ERRORS = new Set([
  "ThrottlingException",
  "ProvisionedThroughputExceededException",
  "InternalServerError",
  "ServiceUnavailableException",
  "TimeoutError",
]);

const ERROR_MESSAGES: Record<string, string> = {
  AccessDeniedException: "Caller does not have permission to call DetectFaces in Amazon Rekognition",
  InvalidS3ObjectException:
    "Unable to get object metadata from S3. Check object key, region and/or access permissions for the input bucket",
  ImageTooLargeException: "Image exceeds the size Amazon Rekognition accepts",
  InvalidImageFormatException: "Amazon Rekognition could not read the image format",
};

const faceDetailsSchema = z.array(
  z.object({
    BoundingBox: z.object({
      Width: z.number(),
      Height: z.number(),
      Left: z.number(),
      Top: z.number(),
    }),
    Confidence: z.number().optional(),
  })
);

export class FaceDetectionClient implements FaceDetector {
  private transport: RekognitionTransport;

  constructor(config: Config, transport?: RekognitionTransport) {
    this.transport = transport ?? createRekognitionTransport(config.aws.region);
  }

  async detectFaces(input: DetectionInput, signal?: AbortSignal): Promise<DetectedFace[]> {
    const image: Image = input.source
      ? { S3Object: { Bucket: input.source.bucket, Name: input.source.key } }
      : { Bytes: input.bytes };

    log.debug(
      { source: input.source, size: input.bytes.length, width: input.width, height: input.height },
      "Detecting faces"
    );

    let response: Pick<DetectFacesCommandOutput, "FaceDetails">;
    try {
      response = await this.transport.detectFaces(
        new DetectFacesCommand({ Image: image, Attributes: ["DEFAULT"] }),
        signal
      );
    } catch (error) {
      throw this.classifyError(error);
    }

    const parsed = faceDetailsSchema.safeParse(response.FaceDetails);
    if (!parsed.success) {
      throw new DetectionServiceError(
        `Malformed DetectFaces response: ${parsed.error.issues[0]?.message ?? "unknown issue"}`
      );
    }

    const faces = parsed.data.map((detail) => ({
      boundingBox: this.convertBoundingBox(detail.BoundingBox, input.width, input.height),
      confidence: detail.Confidence,
    }));

    log.debug(
      { faceCount: faces.length, faces: faces.map((f) => ({ ...f.boundingBox, confidence: f.confidence?.toFixed(2) })) },
      "Detection completed"
    );

    return faces;
  }

  private classifyError(error: unknown): DetectionServiceError {
    const cause = toError(error);
    const message = ERROR_MESSAGES[cause.name] ?? `DetectFaces failed: ${cause.message}`;
    const retryable = RETRYABLE_ERRORS.has(cause.name);
    log.error({ errorName: cause.name, error: cause.message, retryable }, "DetectFaces call failed");
    return new DetectionServiceError(message, retryable, cause);
  }

  /**
   * Rekognition reports ratios of the image size; edges can fall outside
   * [0, 1] for faces cut off by the frame.
   */
  private convertBoundingBox(
    box: { Width: number; Height: number; Left: number; Top: number },
    imageWidth: number,
    imageHeight: number
  ): BoundingBox {
    return {
      left: Math.trunc(box.Left * imageWidth),
      top: Math.trunc(box.Top * imageHeight),
      width: Math.trunc(box.Width * imageWidth),
      height: Math.trunc(box.Height * imageHeight),
    };
  }
}
