import type { BoundingBox } from "../rekognition/types";

/**
 * Clamps a box to [0, width) x [0, height). Returns null when nothing of the
 * box is left inside the image.
 */
export function clipBox(box: BoundingBox, width: number, height: number): BoundingBox | null {
  const { left, top } = box;
  if (![left, top, box.width, box.height].every(Number.isFinite)) {
    return null;
  }

  const x1 = Math.max(0, Math.floor(left));
  const y1 = Math.max(0, Math.floor(top));
  const x2 = Math.min(width, Math.ceil(left + box.width));
  const y2 = Math.min(height, Math.ceil(top + box.height));

  if (x2 <= x1 || y2 <= y1) {
    return null;
  }

  return { left: x1, top: y1, width: x2 - x1, height: y2 - y1 };
}

export function clipBoxes(boxes: BoundingBox[], width: number, height: number): BoundingBox[] {
  const clipped: BoundingBox[] = [];
  for (const box of boxes) {
    const result = clipBox(box, width, height);
    if (result) {
      clipped.push(result);
    }
  }
  return clipped;
}
