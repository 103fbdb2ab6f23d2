import fs from 'fs';
import path from 'path';
import Jimp from 'jimp';
import type { Canvas } from '../canvas/compose.js';
import { IOError } from '../errors.js';

export interface RenderedOutput {
  canvas: Canvas;
  path: string;
}

export async function encodePng(canvas: Canvas): Promise<Buffer> {
  const image = canvas.mode === 'rgb' ? canvas.image.clone().opaque() : canvas.image;
  return image.getBufferAsync(Jimp.MIME_PNG);
}

/**
 * Write the canvas as a PNG, creating the parent directory if needed.
 * Returns the path written.
 */
export async function writePng(output: RenderedOutput): Promise<string> {
  const png = await encodePng(output.canvas);
  const dir = path.dirname(output.path);

  try {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    await fs.promises.writeFile(output.path, png);
  } catch (error) {
    throw new IOError(output.path, 'Could not write output', { cause: error });
  }

  return output.path;
}
