// Conversions between reported face boxes and integral pixel rectangles.

import type { PixelRect, Rect } from "./types.js";

/**
 * Round a fractional box outward to whole pixels and clip it to the image.
 * Returns null when nothing of the box lies inside the image.
 */
export function toPixelRect(
  box: Rect,
  imageWidth: number,
  imageHeight: number,
): PixelRect | null {
  if (
    !Number.isFinite(box.x) ||
    !Number.isFinite(box.y) ||
    !Number.isFinite(box.width) ||
    !Number.isFinite(box.height)
  ) {
    return null;
  }

  const left = Math.max(0, Math.floor(box.x));
  const top = Math.max(0, Math.floor(box.y));
  const right = Math.min(imageWidth, Math.ceil(box.x + box.width));
  const bottom = Math.min(imageHeight, Math.ceil(box.y + box.height));

  if (right <= left || bottom <= top) return null;
  return { left, top, width: right - left, height: bottom - top };
}
