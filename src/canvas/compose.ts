import Jimp from 'jimp';
import { ValidationError } from '../errors.js';
import { blendInto, type Rgba } from './color.js';

export type ColorMode = 'rgb' | 'rgba';

/**
 * Mutable pixel buffer owned by a single render.
 */
export interface Canvas {
  readonly image: Jimp;
  readonly mode: ColorMode;
}

/** Half-open pixel box: [x, x + width) × [y, y + height) */
export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function createCanvas(
  width: number,
  height: number,
  background: Rgba,
  mode: ColorMode
): Canvas {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ValidationError(`Invalid canvas size ${width}x${height}`);
  }
  const fill = mode === 'rgb' ? { ...background, a: 255 } : background;
  const image = new Jimp(width, height, Jimp.rgbaToInt(fill.r, fill.g, fill.b, fill.a));
  return { image, mode };
}

export function canvasSize(canvas: Canvas): { width: number; height: number } {
  return { width: canvas.image.bitmap.width, height: canvas.image.bitmap.height };
}

function clip(canvas: Canvas, box: Box): Box | null {
  const { width, height } = canvasSize(canvas);
  const x0 = Math.max(0, box.x);
  const y0 = Math.max(0, box.y);
  const x1 = Math.min(width, box.x + box.width);
  const y1 = Math.min(height, box.y + box.height);
  if (x1 <= x0 || y1 <= y0) {
    return null;
  }
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}

/**
 * Fill an axis-aligned rectangle. Calls are order-sensitive: a later
 * rectangle paints over an earlier one where they overlap.
 */
export function fillRect(canvas: Canvas, box: Box, color: Rgba): void {
  const area = clip(canvas, box);
  if (!area) {
    return;
  }
  const data = canvas.image.bitmap.data;
  canvas.image.scan(area.x, area.y, area.width, area.height, (_x, _y, idx) => {
    blendInto(data, idx, color);
  });
}

/**
 * Overlay one color across the whole canvas with alpha falling linearly
 * from `attenuation * 255` on the first row to zero at the bottom.
 */
export function drawVerticalGradient(canvas: Canvas, color: Rgba, attenuation: number): void {
  const { width, height } = canvasSize(canvas);
  for (let y = 0; y < height; y++) {
    const alpha = Math.floor(255 * (1 - y / height));
    fillRect(canvas, { x: 0, y, width, height: 1 }, { ...color, a: Math.floor(alpha * attenuation) });
  }
}

/**
 * Single-channel mask (stored as grey RGB) holding a filled rounded
 * rectangle the full size of the mask. Pixels are tested at their centres.
 */
export function createRoundedMask(width: number, height: number, radius: number): Jimp {
  const mask = new Jimp(width, height, 0x000000ff);
  const r = Math.max(0, Math.min(radius, width / 2, height / 2));

  mask.scan(0, 0, width, height, (x, y, idx) => {
    const px = x + 0.5;
    const py = y + 0.5;
    const cx = px < r ? r : px > width - r ? width - r : px;
    const cy = py < r ? r : py > height - r ? height - r : py;
    const dx = px - cx;
    const dy = py - cy;
    if (dx * dx + dy * dy <= r * r) {
      mask.bitmap.data[idx] = 255;
      mask.bitmap.data[idx + 1] = 255;
      mask.bitmap.data[idx + 2] = 255;
    }
  });

  return mask;
}

/**
 * Fail when a `width` × `height` block at (x, y) would be clipped.
 */
export function assertFits(canvas: Canvas, width: number, height: number, x: number, y: number): void {
  const size = canvasSize(canvas);
  if (x < 0 || y < 0 || x + width > size.width || y + height > size.height) {
    throw new ValidationError(
      `A ${width}x${height} block at (${x}, ${y}) does not fit in the ${size.width}x${size.height} canvas`
    );
  }
}

/**
 * Composite `source` with its top-left corner at (x, y). When a mask is
 * given its grey level becomes the source alpha.
 */
export function paste(canvas: Canvas, source: Jimp, x: number, y: number, mask?: Jimp): void {
  const layer = mask ? source.clone().mask(mask, 0, 0) : source;
  const area = clip(canvas, { x, y, width: layer.bitmap.width, height: layer.bitmap.height });
  if (!area) {
    return;
  }

  const src = layer.bitmap.data;
  const dst = canvas.image.bitmap.data;
  const srcWidth = layer.bitmap.width;

  canvas.image.scan(area.x, area.y, area.width, area.height, (cx, cy, idx) => {
    const s = ((cy - y) * srcWidth + (cx - x)) * 4;
    blendInto(dst, idx, { r: src[s], g: src[s + 1], b: src[s + 2], a: src[s + 3] });
  });
}

/**
 * Unsharp pass: v + (factor - 1) * (v - smooth), where smooth is a 3x3
 * average with the centre weighted 5. Alpha is left untouched and edge
 * pixels read their nearest in-bounds neighbour.
 */
export function sharpen(canvas: Canvas, factor: number): void {
  const { width, height } = canvasSize(canvas);
  const data = canvas.image.bitmap.data;
  const source = Buffer.from(data);
  const amount = factor - 1;

  const at = (x: number, y: number, channel: number): number => {
    const cx = Math.min(width - 1, Math.max(0, x));
    const cy = Math.min(height - 1, Math.max(0, y));
    return source[(cy * width + cx) * 4 + channel];
  };

  canvas.image.scan(0, 0, width, height, (x, y, idx) => {
    for (let c = 0; c < 3; c++) {
      let sum = 0;
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
          sum += at(x + dx, y + dy, c);
        }
      }
      const v = source[idx + c];
      const smooth = (sum + 4 * v) / 13;
      data[idx + c] = Math.min(255, Math.max(0, Math.round(v + amount * (v - smooth))));
    }
  });
}
