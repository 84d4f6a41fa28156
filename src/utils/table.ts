import type { BoundingBox } from "../rekognition/types";

export interface FaceRow {
  index: number;
  box: BoundingBox;
  confidence?: number;
  status: "redact" | "low-confidence" | "outside";
}

function formatBox(box: BoundingBox): string {
  return `${box.left},${box.top} ${box.width}x${box.height}`;
}

export function formatFaceRow(row: FaceRow): string {
  const confStr = (row.confidence === undefined ? "-" : `${row.confidence.toFixed(1)}%`).padEnd(11);
  return ` ${String(row.index).padStart(2)}  ${formatBox(row.box).padEnd(22)} ${confStr} ${row.status}`;
}

/**
 * Print a formatted table of detected faces
 */
export function printFaceTable(rows: FaceRow[]): void {
  console.log(` #   ${"Box (x,y wxh)".padEnd(22)} Confidence  Status`);
  console.log("─".repeat(52));
  for (const row of rows) {
    console.log(formatFaceRow(row));
  }
}
