import sharp from "sharp";
import type { BoundingBox } from "../rekognition/types";
import type { BlurType } from "../config";
import type { ImageBuffer } from "./codec";
import { EncodeError } from "../errors";

export interface AnonymizeOptions {
  blurType: BlurType;
  /** Kernel size as a percentage of the box's smaller side. */
  blurStrength: number;
  pixelateBlocks: number;
}

const MIN_SIGMA = 0.3;
const MAX_SIGMA = 1000;

/**
 * Kernel size scales with the face so small and large faces are obscured
 * alike. Always odd and at least 3.
 */
export function gaussianKernelSize(box: BoundingBox, blurStrength: number): number {
  let size = Math.floor((Math.min(box.width, box.height) * blurStrength) / 100);
  if (size % 2 === 0) {
    size -= 1;
  }
  return Math.max(3, size);
}

/** Sigma a Gaussian of the given kernel size would use when none is specified. */
export function sigmaForKernel(kernelSize: number): number {
  const sigma = 0.3 * ((kernelSize - 1) * 0.5 - 1) + 0.8;
  return Math.min(MAX_SIGMA, Math.max(MIN_SIGMA, sigma));
}

export function extractRegion(image: ImageBuffer, box: BoundingBox): Buffer {
  const rowBytes = box.width * image.channels;
  const region = Buffer.alloc(rowBytes * box.height);
  for (let y = 0; y < box.height; y++) {
    const start = ((box.top + y) * image.width + box.left) * image.channels;
    image.data.copy(region, y * rowBytes, start, start + rowBytes);
  }
  return region;
}

export function writeRegion(image: ImageBuffer, box: BoundingBox, region: Buffer): void {
  const rowBytes = box.width * image.channels;
  if (region.length !== rowBytes * box.height) {
    throw new EncodeError(
      `Region of ${region.length} bytes does not fit a ${box.width}x${box.height}x${image.channels} box`
    );
  }
  for (let y = 0; y < box.height; y++) {
    const start = ((box.top + y) * image.width + box.left) * image.channels;
    region.copy(image.data, start, y * rowBytes, (y + 1) * rowBytes);
  }
}

/**
 * Splits the region into a grid of at most `blocks` cells per side and fills
 * each cell with the mean colour of its pixels.
 */
export function pixelate(region: Buffer, box: BoundingBox, channels: ImageBuffer["channels"], blocks: number): Buffer {
  const columns = Math.max(1, Math.min(blocks, box.width));
  const rows = Math.max(1, Math.min(blocks, box.height));
  const output = Buffer.alloc(region.length);
  const sums = new Array<number>(channels);

  for (let row = 0; row < rows; row++) {
    const top = Math.floor((row * box.height) / rows);
    const bottom = Math.floor(((row + 1) * box.height) / rows);
    for (let column = 0; column < columns; column++) {
      const left = Math.floor((column * box.width) / columns);
      const right = Math.floor(((column + 1) * box.width) / columns);
      const count = (bottom - top) * (right - left);

      sums.fill(0);
      for (let y = top; y < bottom; y++) {
        for (let x = left; x < right; x++) {
          const offset = (y * box.width + x) * channels;
          for (let c = 0; c < channels; c++) {
            sums[c] += region[offset + c];
          }
        }
      }

      for (let y = top; y < bottom; y++) {
        for (let x = left; x < right; x++) {
          const offset = (y * box.width + x) * channels;
          for (let c = 0; c < channels; c++) {
            output[offset + c] = Math.round(sums[c] / count);
          }
        }
      }
    }
  }
  return output;
}

/**
 * Obscures one region of `image` in place. The box must already be clipped
 * to the image.
 */
export async function anonymizeRegion(image: ImageBuffer, box: BoundingBox, options: AnonymizeOptions): Promise<void> {
  const region = extractRegion(image, box);
  const { channels } = image;

  let processed: Buffer;
  if (options.blurType === "pixelate") {
    processed = pixelate(region, box, channels, options.pixelateBlocks);
  } else {
    const sigma = sigmaForKernel(gaussianKernelSize(box, options.blurStrength));
    processed = await sharp(region, { raw: { width: box.width, height: box.height, channels } })
      .blur(sigma)
      .raw()
      .toBuffer();
  }

  writeRegion(image, box, processed);
}
