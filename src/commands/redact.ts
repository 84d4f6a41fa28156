import ora from "ora";
import { existsSync, readFileSync, writeFileSync } from "fs";
import { basename, dirname, extname, join, resolve } from "path";
import { loadConfig } from "../config";
import { FaceDetectionClient } from "../rekognition/client";
import { FaceRedactor } from "../pipeline/redactor";
import { parseOverrides } from "../pipeline/options";
import type { OutputFormat } from "../image/codec";
import { RedactionError } from "../errors";

export interface RedactOptions {
  output?: string;
  format?: string;
  blurType?: string;
  strength?: number;
  minConfidence?: number;
  retries?: number;
  timeout?: number;
}

const EXTENSIONS: Record<OutputFormat, string> = {
  jpeg: ".jpg",
  png: ".png",
  webp: ".webp",
};

/** photo.jpg -> photo.redacted.jpg, next to the input. */
export function defaultOutputPath(inputPath: string, format: OutputFormat): string {
  const name = basename(inputPath, extname(inputPath));
  return join(dirname(inputPath), `${name}.redacted${EXTENSIONS[format]}`);
}

export async function redactCommand(input: string, options: RedactOptions = {}): Promise<void> {
  const spinner = ora();
  const inputPath = resolve(input);

  if (!existsSync(inputPath)) {
    spinner.fail(`File not found: ${inputPath}`);
    process.exit(1);
  }

  try {
    const config = loadConfig();
    const overrides = parseOverrides({
      format: options.format,
      blurType: options.blurType,
      blurStrength: options.strength,
      minConfidence: options.minConfidence,
      maxRetries: options.retries,
      timeoutMs: options.timeout,
    });
    const redactor = new FaceRedactor(new FaceDetectionClient(config), config);

    spinner.start(`Redacting faces in ${basename(inputPath)}...`);
    const result = await redactor.redact({ image: readFileSync(inputPath), options: overrides });

    const outputPath = options.output ? resolve(options.output) : defaultOutputPath(inputPath, result.format);
    writeFileSync(outputPath, result.image);

    spinner.succeed(
      `Redacted ${result.facesRedacted} of ${result.facesDetected} detected face(s): ${outputPath}`
    );
  } catch (error) {
    if (!(error instanceof RedactionError)) throw error;
    spinner.fail(`${error.kind}: ${error.message}`);
    process.exit(1);
  }
}
