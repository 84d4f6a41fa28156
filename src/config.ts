import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { ConfigurationError, toError } from "./errors";

export const MAX_DETECTION_RETRIES = 3;

export const blurTypeSchema = z.enum(["gaussian", "pixelate"]);
export const backoffSchema = z.enum(["fixed", "exponential"]);

export type BlurType = z.infer<typeof blurTypeSchema>;
export type BackoffStrategy = z.infer<typeof backoffSchema>;

const configSchema = z.object({
  aws: z
    .object({
      region: z.string().default("us-east-1"),
    })
    .default({}),
  rekognition: z
    .object({
      minConfidence: z.number().min(0).max(100).default(80),
      timeoutMs: z.number().int().positive().default(10_000),
      maxRetries: z.number().int().min(0).max(MAX_DETECTION_RETRIES).default(0),
      backoff: backoffSchema.default("exponential"),
      retryDelayMs: z.number().int().min(0).max(5_000).default(200),
    })
    .default({}),
  redaction: z
    .object({
      blurType: blurTypeSchema.default("gaussian"),
      blurStrength: z.number().int().min(1).max(100).default(33),
      pixelateBlocks: z.number().int().min(1).max(100).default(10),
    })
    .default({}),
  imageProcessing: z
    .object({
      outputFormat: z.string().optional(),
      jpegQuality: z.number().int().min(1).max(100).default(90),
      maxInlineBytes: z.number().int().positive().default(5 * 1024 * 1024),
      maxObjectBytes: z.number().int().positive().default(15 * 1024 * 1024),
    })
    .default({}),
  output: z
    .object({
      bucket: z.string().min(1).optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

const CONFIG_FILENAME = "config.yaml";
const CONFIG_PATH_ENV = "FACE_REDACTOR_CONFIG";
const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "face-redactor");

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicitPath = env[CONFIG_PATH_ENV];
  if (explicitPath) {
    return resolve(explicitPath);
  }
  const localPath = join(process.cwd(), CONFIG_FILENAME);
  if (existsSync(localPath)) {
    return localPath;
  }
  return join(GLOBAL_CONFIG_DIR, CONFIG_FILENAME);
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} must be a number, got "${value}"`);
  }
  return parsed;
}

const recordSchema = z.record(z.string(), z.unknown());

function asRecord(value: unknown): Record<string, unknown> {
  const result = recordSchema.safeParse(value);
  return result.success ? { ...result.data } : {};
}

/**
 * Lambda deployments are configured through environment variables; they win
 * over anything read from the YAML file.
 */
export function applyEnvironment(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const aws = asRecord(raw.aws);
  const rekognition = asRecord(raw.rekognition);
  const redaction = asRecord(raw.redaction);
  const output = asRecord(raw.output);

  if (env.AWS_REGION) aws.region = env.AWS_REGION;
  if (env.OUTPUT_BUCKET) output.bucket = env.OUTPUT_BUCKET;
  if (env.BLUR_TYPE) redaction.blurType = env.BLUR_TYPE;
  if (env.BLUR_STRENGTH) redaction.blurStrength = parseNumber("BLUR_STRENGTH", env.BLUR_STRENGTH);
  if (env.MIN_CONFIDENCE) rekognition.minConfidence = parseNumber("MIN_CONFIDENCE", env.MIN_CONFIDENCE);
  if (env.DETECTION_TIMEOUT_MS) {
    rekognition.timeoutMs = parseNumber("DETECTION_TIMEOUT_MS", env.DETECTION_TIMEOUT_MS);
  }
  if (env.DETECTION_MAX_RETRIES) {
    rekognition.maxRetries = parseNumber("DETECTION_MAX_RETRIES", env.DETECTION_MAX_RETRIES);
  }

  return { ...raw, aws, rekognition, redaction, output };
}

export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (error) {
    const cause = toError(error);
    throw new ConfigurationError(`Unable to read config file ${configPath}: ${cause.message}`, [], cause);
  }

  // An empty file parses to null.
  if (parsed === null || parsed === undefined) {
    return {};
  }
  const result = recordSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Config file ${configPath} must contain a YAML mapping`);
  }
  return { ...result.data };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const configPath = getConfigPath(env);

  let raw: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    raw = readConfigFile(configPath);
  } else if (env[CONFIG_PATH_ENV]) {
    throw new ConfigurationError(`Config file ${configPath} named by ${CONFIG_PATH_ENV} does not exist`);
  }

  return parseConfig(applyEnvironment(raw, env));
}

export function getDefaultConfig(): string {
  return `# face-redactor configuration

aws:
  region: us-east-1

rekognition:
  minConfidence: 80         # Ignore detections below this confidence (0-100)
  timeoutMs: 10000          # Request-level deadline for face detection
  maxRetries: 0             # Retries for throttling/service errors (0-3)
  backoff: exponential      # "fixed" or "exponential"
  retryDelayMs: 200         # Base delay between retries

redaction:
  blurType: gaussian        # "gaussian" or "pixelate"
  blurStrength: 33          # Blur kernel size as % of the face's smaller side (1-100)
  pixelateBlocks: 10        # Cells per side when pixelating

imageProcessing:
  # outputFormat: jpeg      # Defaults to the input format (jpeg, png, webp)
  jpegQuality: 90           # Quality for JPEG/WebP output (1-100)
  maxInlineBytes: 5242880   # Largest image sent to Rekognition as bytes
  maxObjectBytes: 15728640  # Largest image Rekognition reads from S3

output:
  # bucket: my-redacted-images   # Destination for S3-triggered invocations
`;
}
