import fs from 'fs';
import os from 'os';
import path from 'path';
import type Jimp from 'jimp';

export function pixel(image: Jimp, x: number, y: number): number[] {
  const idx = (y * image.bitmap.width + x) * 4;
  return Array.from(image.bitmap.data.subarray(idx, idx + 4));
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'qr-poster-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
