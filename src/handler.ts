import { z } from "zod";
import type pino from "pino";
import { loadConfig, type Config } from "./config";
import { FaceDetectionClient } from "./rekognition/client";
import { FaceRedactor } from "./pipeline/redactor";
import { parseOverrides } from "./pipeline/options";
import { S3ImageStore, createS3Transport } from "./sources/s3";
import type { ImageStore } from "./sources/types";
import type { OutputFormat } from "./image/codec";
import {
  ConfigurationError,
  DecodeError,
  RedactionError,
  toErrorBody,
  type ErrorBody,
  type ErrorKind,
} from "./errors";
import { createLogger } from "./logger";

const baseLog = createLogger("handler");

export interface HandlerDependencies {
  config: Config;
  redactor: FaceRedactor;
  store: ImageStore;
}

export interface LambdaContext {
  awsRequestId?: string;
}

export type InvocationResponse =
  | {
      ok: true;
      image: string;
      format: OutputFormat;
      faces_redacted: number;
      faces_detected: number;
    }
  | { ok: false; error: ErrorBody };

export interface SuccessfulRecord {
  bucket: string;
  key: string;
  faces_redacted: number;
}

export interface FailedRecord {
  bucket: string | null;
  key: string | null;
  error_kind: ErrorKind;
  error_message: string;
}

export interface BatchResponse {
  statusCode: number;
  body: string;
}

const invocationSchema = z.object({
  image: z.unknown(),
  format: z.unknown(),
  blur_strength: z.unknown(),
  blur_type: z.unknown(),
  max_retries: z.unknown(),
  backoff: z.unknown(),
  timeout_ms: z.unknown(),
  min_confidence: z.unknown(),
});

const s3EventSchema = z.object({
  Records: z.array(
    z.object({
      s3: z
        .object({
          bucket: z.object({ name: z.string().min(1) }).partial().optional(),
          object: z.object({ key: z.string(), size: z.number() }).partial().optional(),
        })
        .optional(),
    })
  ),
});

type S3Event = z.infer<typeof s3EventSchema>;

const DATA_URL_PREFIX = /^data:[^;,]*;base64,/;

let runtime: Readonly<HandlerDependencies> | undefined;

/**
 * Clients are built on first use and shared by every invocation of a warm
 * container. Nothing mutates them afterwards.
 */
function getRuntime(): Readonly<HandlerDependencies> {
  if (!runtime) {
    const config = loadConfig();
    runtime = Object.freeze({
      config,
      redactor: new FaceRedactor(new FaceDetectionClient(config), config),
      store: new S3ImageStore(createS3Transport(config.aws.region)),
    });
    baseLog.info({ region: config.aws.region, outputBucket: config.output.bucket }, "Runtime initialized");
  }
  return runtime;
}

function decodeKey(rawKey: string): string {
  try {
    return decodeURIComponent(rawKey.replace(/\+/g, " "));
  } catch {
    throw new DecodeError(`Object key "${rawKey}" is not validly URL-encoded`);
  }
}

async function handleInvocation(
  event: unknown,
  resolveDependencies: () => Readonly<HandlerDependencies>,
  log: pino.Logger
): Promise<InvocationResponse> {
  try {
    const parsed = invocationSchema.safeParse(event);
    if (!parsed.success) {
      throw new DecodeError("Invocation payload must be an object carrying a base64 \"image\"");
    }
    const payload = parsed.data;
    if (typeof payload.image !== "string" || payload.image.trim() === "") {
      throw new DecodeError("Invocation payload is missing a base64 \"image\" field");
    }

    const options = parseOverrides({
      format: payload.format,
      blurStrength: payload.blur_strength,
      blurType: payload.blur_type,
      maxRetries: payload.max_retries,
      backoff: payload.backoff,
      timeoutMs: payload.timeout_ms,
      minConfidence: payload.min_confidence,
    });

    const { redactor } = resolveDependencies();
    const image = Buffer.from(payload.image.replace(DATA_URL_PREFIX, ""), "base64");
    const result = await redactor.redact({ image, options });

    return {
      ok: true,
      image: result.image.toString("base64"),
      format: result.format,
      faces_redacted: result.facesRedacted,
      faces_detected: result.facesDetected,
    };
  } catch (error) {
    if (error instanceof RedactionError) {
      log.warn({ kind: error.kind, error: error.message }, "Invocation failed");
      return { ok: false, error: toErrorBody(error) };
    }
    throw error;
  }
}

async function handleS3Event(
  event: S3Event,
  resolveDependencies: () => Readonly<HandlerDependencies>,
  log: pino.Logger
): Promise<BatchResponse> {
  const successfulRecords: SuccessfulRecord[] = [];
  const failedRecords: FailedRecord[] = [];

  for (const record of event.Records) {
    const bucket = record.s3?.bucket?.name ?? null;
    const rawKey = record.s3?.object?.key ?? null;
    let key = rawKey;

    try {
      if (bucket === null || rawKey === null) {
        throw new DecodeError(
          "Invoked without S3 event data. Event needs to reference a S3 bucket and object key."
        );
      }
      key = decodeKey(rawKey);
      const { config, redactor, store } = resolveDependencies();

      const size = record.s3?.object?.size;
      if (size !== undefined && size > config.imageProcessing.maxObjectBytes) {
        throw new DecodeError(
          `Object of ${size} bytes exceeds the ${config.imageProcessing.maxObjectBytes} byte limit for Amazon Rekognition`
        );
      }

      const outputBucket = config.output.bucket;
      if (!outputBucket) {
        throw new ConfigurationError("No output bucket configured (set OUTPUT_BUCKET)");
      }
      if (outputBucket === bucket) {
        throw new ConfigurationError("Output bucket must differ from the input bucket");
      }

      const source = { bucket, key };
      const stored = await store.get(source);
      const result = await redactor.redact({ image: stored.bytes, source });
      await store.put({ bucket: outputBucket, key }, result.image, result.contentType);

      log.info({ bucket, key, outputBucket, facesRedacted: result.facesRedacted }, "Record processed");
      successfulRecords.push({ bucket, key, faces_redacted: result.facesRedacted });
    } catch (error) {
      if (!(error instanceof RedactionError)) {
        throw error;
      }
      log.warn({ bucket, key, kind: error.kind, error: error.message }, "Record failed");
      failedRecords.push({
        bucket,
        key,
        error_kind: error.kind,
        error_message: error.message,
      });
    }
  }

  return {
    statusCode: 200,
    body: JSON.stringify({
      failed_records: failedRecords,
      successful_records: successfulRecords,
    }),
  };
}

export function createHandler(
  resolveDependencies: () => Readonly<HandlerDependencies> = getRuntime
): (event: unknown, context?: LambdaContext) => Promise<InvocationResponse | BatchResponse> {
  return async (event, context) => {
    const log = baseLog.child({ requestId: context?.awsRequestId });
    const s3Event = s3EventSchema.safeParse(event);
    if (s3Event.success) {
      return handleS3Event(s3Event.data, resolveDependencies, log);
    }
    return handleInvocation(event, resolveDependencies, log);
  };
}

export const handler = createHandler();
