import sharp from "sharp";
import { DecodeError, EncodeError, toError } from "../errors";

/** Formats Amazon Rekognition accepts. */
export const INPUT_FORMATS = ["jpeg", "png"] as const;
export const OUTPUT_FORMATS = ["jpeg", "png", "webp"] as const;

export type InputFormat = (typeof INPUT_FORMATS)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type Channels = 1 | 2 | 3 | 4;

/**
 * Decoded raster held as interleaved 8-bit samples, row-major. `orientation`
 * is the EXIF tag of the input; pixels are kept in stored order because that
 * is the grid Rekognition reports boxes against.
 */
export interface ImageBuffer {
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
  format: InputFormat;
  orientation?: number;
}

const CONTENT_TYPES: Record<OutputFormat, string> = {
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
};

function isInputFormat(format: string | undefined): format is InputFormat {
  return INPUT_FORMATS.some((f) => f === format);
}

export async function decodeImage(bytes: Uint8Array): Promise<ImageBuffer> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(bytes).metadata();
  } catch (error) {
    const cause = toError(error);
    throw new DecodeError(`Input is not a readable image: ${cause.message}`, cause);
  }

  const format = metadata.format;
  if (!isInputFormat(format)) {
    throw new DecodeError(`Unsupported image format "${format ?? "unknown"}", expected JPEG or PNG`);
  }

  try {
    const { data, info } = await sharp(bytes).raw().toBuffer({ resolveWithObject: true });
    return {
      data,
      width: info.width,
      height: info.height,
      channels: info.channels,
      format,
      orientation: metadata.orientation,
    };
  } catch (error) {
    const cause = toError(error);
    throw new DecodeError(`Failed to decode ${format} image: ${cause.message}`, cause);
  }
}

/**
 * Picks the output format: the requested one when given (`jpg` is accepted
 * for `jpeg`), otherwise the input's.
 */
export function resolveOutputFormat(requested: string | undefined, input: InputFormat): OutputFormat {
  const normalized = (requested ?? input).trim().toLowerCase();
  const format = OUTPUT_FORMATS.find((f) => f === (normalized === "jpg" ? "jpeg" : normalized));
  if (!format) {
    throw new EncodeError(
      `Unsupported output format "${requested ?? input}", expected one of: ${OUTPUT_FORMATS.join(", ")}`
    );
  }
  return format;
}

export function contentTypeFor(format: OutputFormat): string {
  return CONTENT_TYPES[format];
}

export async function encodeImage(image: ImageBuffer, format: OutputFormat, quality: number): Promise<Buffer> {
  const { width, height, channels } = image;
  let pipeline = sharp(image.data, { raw: { width, height, channels } });

  if (image.orientation !== undefined) {
    pipeline = pipeline.withMetadata({ orientation: image.orientation });
  }

  switch (format) {
    case "jpeg":
      pipeline = pipeline.jpeg({ quality });
      break;
    case "png":
      pipeline = pipeline.png();
      break;
    case "webp":
      pipeline = pipeline.webp({ quality });
      break;
  }

  try {
    return await pipeline.toBuffer();
  } catch (error) {
    const cause = toError(error);
    throw new EncodeError(`Failed to encode ${format} image: ${cause.message}`, cause);
  }
}
