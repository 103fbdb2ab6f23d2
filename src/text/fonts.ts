import path from 'path';
import Jimp from 'jimp';
import { config } from '../config.js';
import { FontLoadError } from '../errors.js';

export type BitmapFont = Parameters<typeof Jimp.measureText>[0];

export interface FontSpec {
  /** BMFont (.fnt) file, relative to the font directory unless absolute */
  file: string;
  /** Requested pixel size; picks the built-in fallback */
  size: number;
}

// Built-in white Open Sans faces shipped with jimp
const BUILTIN_FONTS: ReadonlyArray<{ size: number; path: string }> = [
  { size: 8, path: Jimp.FONT_SANS_8_WHITE },
  { size: 16, path: Jimp.FONT_SANS_16_WHITE },
  { size: 32, path: Jimp.FONT_SANS_32_WHITE },
  { size: 64, path: Jimp.FONT_SANS_64_WHITE },
  { size: 128, path: Jimp.FONT_SANS_128_WHITE },
];

/**
 * Built-in face whose size is nearest to the request; ties go to the smaller face.
 */
export function builtinFontPath(size: number): string {
  let best = BUILTIN_FONTS[0];
  for (const font of BUILTIN_FONTS) {
    if (Math.abs(font.size - size) < Math.abs(best.size - size)) {
      best = font;
    }
  }
  return best.path;
}

export function resolveFontPath(spec: FontSpec, fontDir: string = config.fontDir): string {
  return path.isAbsolute(spec.file) ? spec.file : path.resolve(fontDir, spec.file);
}

async function readFont(file: string): Promise<BitmapFont> {
  try {
    return await Jimp.loadFont(file);
  } catch (error) {
    throw new FontLoadError(file, { cause: error });
  }
}

export type FontLoader = (spec: FontSpec) => Promise<BitmapFont>;

/**
 * Font loader for a single render. Each asset is read once, so a missing
 * file is reported once however many slots use it.
 */
export function createFontLoader(fontDir?: string): FontLoader {
  const assets = new Map<string, Promise<BitmapFont | null>>();
  const fallbacks = new Map<string, Promise<BitmapFont>>();

  const readAsset = async (file: string): Promise<BitmapFont | null> => {
    try {
      return await readFont(file);
    } catch (error) {
      if (!(error instanceof FontLoadError)) {
        throw error;
      }
      console.warn(`⚠️  Warning: ${error.message}. Using default font.`);
      return null;
    }
  };

  return async spec => {
    const file = resolveFontPath(spec, fontDir);
    let asset = assets.get(file);
    if (!asset) {
      asset = readAsset(file);
      assets.set(file, asset);
    }
    const font = await asset;
    if (font) {
      return font;
    }

    const builtin = builtinFontPath(spec.size);
    let fallback = fallbacks.get(builtin);
    if (!fallback) {
      fallback = Jimp.loadFont(builtin);
      fallbacks.set(builtin, fallback);
    }
    return fallback;
  };
}

/**
 * Load the requested font, falling back to a built-in face when the asset
 * is missing or unreadable. Only a failing fallback is fatal.
 */
export function loadFont(spec: FontSpec, fontDir?: string): Promise<BitmapFont> {
  return createFontLoader(fontDir)(spec);
}
