import sharp from "sharp";
import type { ImageStore, ObjectRef, StoredImage } from "./sources/types";
import { StorageError } from "./errors";

export const WHITE = 255;
export const BLACK = 0;

/** One-pixel black and white checkerboard, 3 channels. */
export function createCheckerboard(width: number, height: number): Buffer {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data.fill((x + y) % 2 === 0 ? WHITE : BLACK, (y * width + x) * 3, (y * width + x + 1) * 3);
    }
  }
  return data;
}

/** Red rises with x, green with y, blue is 0. */
export function createGradient(width: number, height: number): Buffer {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const offset = (y * width + x) * 3;
      data[offset] = (x * 2) % 256;
      data[offset + 1] = (y * 2) % 256;
    }
  }
  return data;
}

export async function encodeRaw(
  data: Buffer,
  width: number,
  height: number,
  format: "png" | "jpeg" | "webp" = "png"
): Promise<Buffer> {
  return sharp(data, { raw: { width, height, channels: 3 } }).toFormat(format).toBuffer();
}

export async function decodeRaw(bytes: Uint8Array): Promise<{ data: Buffer; width: number; height: number; channels: number }> {
  const { data, info } = await sharp(bytes).raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: info.channels };
}

export function pixelAt(data: Buffer, width: number, x: number, y: number, channels = 3): number[] {
  const offset = (y * width + x) * channels;
  return Array.from(data.subarray(offset, offset + channels));
}

/** Every byte of `after` outside the box equals the same byte of `before`. */
export function unchangedOutside(
  before: Buffer,
  after: Buffer,
  width: number,
  height: number,
  box: { left: number; top: number; width: number; height: number },
  channels = 3
): boolean {
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const inside = x >= box.left && x < box.left + box.width && y >= box.top && y < box.top + box.height;
      if (inside) continue;
      const offset = (y * width + x) * channels;
      for (let c = 0; c < channels; c++) {
        if (before[offset + c] !== after[offset + c]) return false;
      }
    }
  }
  return true;
}

export function regionVariance(
  data: Buffer,
  width: number,
  box: { left: number; top: number; width: number; height: number },
  channels = 3
): number {
  const values: number[] = [];
  for (let y = box.top; y < box.top + box.height; y++) {
    for (let x = box.left; x < box.left + box.width; x++) {
      values.push(data[(y * width + x) * channels]);
    }
  }
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
}

export interface MemoryObject extends StoredImage {
  contentType?: string;
}

export interface MemoryImageStore extends ImageStore {
  readonly objects: Map<string, MemoryObject>;
}

export function createMemoryImageStore(initial: Record<string, Uint8Array> = {}): MemoryImageStore {
  const objects = new Map<string, MemoryObject>();
  for (const [path, bytes] of Object.entries(initial)) {
    objects.set(path, { bytes });
  }
  const pathOf = (ref: ObjectRef): string => `${ref.bucket}/${ref.key}`;

  return {
    objects,
    async get(ref: ObjectRef): Promise<StoredImage> {
      const stored = objects.get(pathOf(ref));
      if (!stored) {
        throw new StorageError(`No object at ${pathOf(ref)}`);
      }
      return { bytes: stored.bytes };
    },
    async put(ref: ObjectRef, bytes: Uint8Array, contentType: string): Promise<void> {
      objects.set(pathOf(ref), { bytes, contentType });
    },
  };
}
