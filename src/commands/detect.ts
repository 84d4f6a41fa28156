import ora from "ora";
import { existsSync, readFileSync } from "fs";
import { basename, resolve } from "path";
import { loadConfig } from "../config";
import { FaceDetectionClient } from "../rekognition/client";
import type { DetectedFace } from "../rekognition/types";
import { decodeImage } from "../image/codec";
import { clipBox } from "../image/boxes";
import { RedactionError } from "../errors";
import { DeadlineExceededError, withDeadline } from "../utils/retry";
import { printFaceTable, type FaceRow } from "../utils/table";

export interface DetectOptions {
  minConfidence?: number;
  json?: boolean;
}

/**
 * Marks each detection with what the redactor would do with it.
 */
export function describeDetections(
  faces: DetectedFace[],
  width: number,
  height: number,
  minConfidence: number
): FaceRow[] {
  return faces.map((face, i) => {
    const clipped = clipBox(face.boundingBox, width, height);
    let status: FaceRow["status"] = "redact";
    if (face.confidence !== undefined && face.confidence < minConfidence) {
      status = "low-confidence";
    } else if (!clipped) {
      status = "outside";
    }
    return {
      index: i + 1,
      box: clipped ?? face.boundingBox,
      confidence: face.confidence,
      status,
    };
  });
}

export async function detectCommand(input: string, options: DetectOptions = {}): Promise<void> {
  const spinner = ora();
  const inputPath = resolve(input);

  if (!existsSync(inputPath)) {
    spinner.fail(`File not found: ${inputPath}`);
    process.exit(1);
  }

  try {
    const config = loadConfig();
    const bytes = readFileSync(inputPath);
    const image = await decodeImage(bytes);
    const client = new FaceDetectionClient(config);

    if (!options.json) spinner.start(`Detecting faces in ${basename(inputPath)}...`);
    const faces = await withDeadline(
      (signal) => client.detectFaces({ bytes, width: image.width, height: image.height }, signal),
      config.rekognition.timeoutMs
    );
    const rows = describeDetections(
      faces,
      image.width,
      image.height,
      options.minConfidence ?? config.rekognition.minConfidence
    );

    if (options.json) {
      console.log(JSON.stringify({ width: image.width, height: image.height, faces: rows }, null, 2));
      return;
    }

    spinner.succeed(`${faces.length} face(s) detected in ${image.width}x${image.height} ${image.format}`);
    if (rows.length > 0) {
      printFaceTable(rows);
    }
  } catch (error) {
    if (error instanceof DeadlineExceededError) {
      spinner.fail(`Face detection timed out after ${error.timeoutMs}ms`);
      process.exit(1);
    }
    if (!(error instanceof RedactionError)) throw error;
    spinner.fail(`${error.kind}: ${error.message}`);
    process.exit(1);
  }
}
