import Jimp from 'jimp';
import { paste, canvasSize, type Canvas } from '../canvas/compose.js';
import type { Rgba } from '../canvas/color.js';
import type { BitmapFont } from './fonts.js';

export interface Point {
  x: number;
  y: number;
}

/**
 * The text as the font prints it: a non-whitespace character the font
 * has no glyph for comes out as '?'.
 */
export function printableText(font: BitmapFont, text: string): string {
  return text
    .split('')
    .map(char => (font.chars[char] || /\s/.test(char) ? char : '?'))
    .join('');
}

export function measureText(font: BitmapFont, text: string): number {
  return Jimp.measureText(font, printableText(font, text));
}

/**
 * Left edge that centres `text` horizontally on a canvas of the given width.
 */
export function centeredX(canvasWidth: number, font: BitmapFont, text: string): number {
  return Math.floor((canvasWidth - measureText(font, text)) / 2);
}

/**
 * Draw a single line of text with its top-left corner at `position`.
 *
 * Bitmap fonts carry their own colour, so glyphs are printed onto a clear
 * layer, recoloured from their coverage and blended onto the canvas.
 */
export function renderText(
  canvas: Canvas,
  text: string,
  position: Point,
  font: BitmapFont,
  color: Rgba
): Canvas {
  if (!text) {
    return canvas;
  }

  const { width, height } = canvasSize(canvas);
  const layer = new Jimp(width, height, 0x00000000);
  layer.print(font, position.x, position.y, printableText(font, text));

  const data = layer.bitmap.data;
  layer.scan(0, 0, width, height, (_x, _y, idx) => {
    const coverage = data[idx + 3];
    if (coverage === 0) {
      return;
    }
    data[idx] = color.r;
    data[idx + 1] = color.g;
    data[idx + 2] = color.b;
    data[idx + 3] = Math.round((coverage * color.a) / 255);
  });

  paste(canvas, layer, 0, 0);
  return canvas;
}
