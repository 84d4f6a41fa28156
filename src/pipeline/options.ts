import { z } from "zod";
import {
  MAX_DETECTION_RETRIES,
  backoffSchema,
  blurTypeSchema,
  type BackoffStrategy,
  type Config,
} from "../config";
import { ConfigurationError } from "../errors";
import type { AnonymizeOptions } from "../image/anonymize";

export const redactionOverridesSchema = z.object({
  blurStrength: z.number().int().min(1).max(100).optional(),
  blurType: blurTypeSchema.optional(),
  maxRetries: z.number().int().min(0).max(MAX_DETECTION_RETRIES).optional(),
  backoff: backoffSchema.optional(),
  timeoutMs: z.number().int().positive().optional(),
  minConfidence: z.number().min(0).max(100).optional(),
  format: z.string().min(1).optional(),
});

export type RedactionOverrides = z.infer<typeof redactionOverridesSchema>;

export interface ResolvedOptions extends AnonymizeOptions {
  maxRetries: number;
  backoff: BackoffStrategy;
  retryDelayMs: number;
  timeoutMs: number;
  minConfidence: number;
  format?: string;
  quality: number;
}

export function parseOverrides(input: unknown): RedactionOverrides {
  const result = redactionOverridesSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid redaction options: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/** Per-request overrides take precedence over configured defaults. */
export function resolveOptions(config: Config, overrides?: RedactionOverrides): ResolvedOptions {
  const parsed = parseOverrides(overrides);
  return {
    blurType: parsed.blurType ?? config.redaction.blurType,
    blurStrength: parsed.blurStrength ?? config.redaction.blurStrength,
    pixelateBlocks: config.redaction.pixelateBlocks,
    maxRetries: parsed.maxRetries ?? config.rekognition.maxRetries,
    backoff: parsed.backoff ?? config.rekognition.backoff,
    retryDelayMs: config.rekognition.retryDelayMs,
    timeoutMs: parsed.timeoutMs ?? config.rekognition.timeoutMs,
    minConfidence: parsed.minConfidence ?? config.rekognition.minConfidence,
    format: parsed.format ?? config.imageProcessing.outputFormat,
    quality: config.imageProcessing.jpegQuality,
  };
}
