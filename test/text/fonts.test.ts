import path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import Jimp from 'jimp';
import { builtinFontPath, createFontLoader, loadFont, resolveFontPath } from '../../src/text/fonts.js';
import { centeredX, measureText, printableText, renderText } from '../../src/text/render.js';
import { createCanvas } from '../../src/canvas/compose.js';
import { rgb } from '../../src/canvas/color.js';
import { pixel } from '../helpers.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('builtinFontPath', () => {
  it('picks the nearest built-in size', () => {
    expect(builtinFontPath(120)).toBe(Jimp.FONT_SANS_128_WHITE);
    expect(builtinFontPath(45)).toBe(Jimp.FONT_SANS_32_WHITE);
    expect(builtinFontPath(10)).toBe(Jimp.FONT_SANS_8_WHITE);
    expect(builtinFontPath(500)).toBe(Jimp.FONT_SANS_128_WHITE);
  });

  it('prefers the smaller face on a tie', () => {
    expect(builtinFontPath(48)).toBe(Jimp.FONT_SANS_32_WHITE);
  });
});

describe('resolveFontPath', () => {
  it('resolves relative files against the font directory', () => {
    expect(resolveFontPath({ file: 'CaviarDreams.fnt', size: 40 }, '/srv/fonts'))
      .toBe(path.resolve('/srv/fonts', 'CaviarDreams.fnt'));
  });

  it('keeps absolute files as they are', () => {
    expect(resolveFontPath({ file: '/opt/a.fnt', size: 40 }, '/srv/fonts')).toBe('/opt/a.fnt');
  });
});

describe('loadFont', () => {
  it('falls back to a built-in face with a warning when the asset is missing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const font = await loadFont({ file: 'missing.fnt', size: 32 }, '/nonexistent-fonts');
    const builtin = await Jimp.loadFont(Jimp.FONT_SANS_32_WHITE);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      `⚠️  Warning: Font ${path.resolve('/nonexistent-fonts', 'missing.fnt')} could not be loaded. Using default font.`
    );
    expect(font.common.lineHeight).toBe(builtin.common.lineHeight);
    expect(measureText(font, 'Hello')).toBe(measureText(builtin, 'Hello'));
  });

  it('loads an existing BMFont without warning', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const font = await loadFont({ file: Jimp.FONT_SANS_16_WHITE, size: 16 });

    expect(warn).not.toHaveBeenCalled();
    expect(font.common.lineHeight).toBeGreaterThan(0);
  });
});

describe('createFontLoader', () => {
  it('reads a missing file once and still picks the fallback per size', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const load = createFontLoader('/nonexistent-fonts');

    const large = await load({ file: 'missing.fnt', size: 120 });
    const small = await load({ file: 'missing.fnt', size: 32 });
    const again = await load({ file: 'missing.fnt', size: 120 });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(again).toBe(large);
    expect(large.common.lineHeight).toBe((await Jimp.loadFont(Jimp.FONT_SANS_128_WHITE)).common.lineHeight);
    expect(small.common.lineHeight).toBe((await Jimp.loadFont(Jimp.FONT_SANS_32_WHITE)).common.lineHeight);
  });
});

describe('printableText', () => {
  it('replaces characters without a glyph by a question mark', async () => {
    const font = await Jimp.loadFont(Jimp.FONT_SANS_32_WHITE);
    expect(printableText(font, 'Hi \u2713!')).toBe('Hi ?!');
  });

  it('measures missing characters as the question mark that is printed', async () => {
    const font = await Jimp.loadFont(Jimp.FONT_SANS_32_WHITE);
    expect(measureText(font, 'A\u2713\u2713')).toBe(Jimp.measureText(font, 'A??'));
    expect(measureText(font, 'A\u2713')).toBeGreaterThan(Jimp.measureText(font, 'A'));
  });
});

describe('renderText', () => {
  it('draws nothing for empty text', async () => {
    const font = await Jimp.loadFont(Jimp.FONT_SANS_16_WHITE);
    const canvas = createCanvas(50, 30, rgb(0, 0, 0), 'rgb');
    const before = Buffer.from(canvas.image.bitmap.data);

    renderText(canvas, '', { x: 0, y: 0 }, font, rgb(255, 0, 0));
    expect(canvas.image.bitmap.data.equals(before)).toBe(true);
  });

  it('tints glyphs with the requested colour', async () => {
    const font = await Jimp.loadFont(Jimp.FONT_SANS_64_WHITE);
    const canvas = createCanvas(300, 100, rgb(0, 0, 0), 'rgb');
    renderText(canvas, 'HH', { x: 10, y: 10 }, font, rgb(0, 230, 255));

    const colours = new Set<string>();
    let maxRed = 0;
    for (let y = 0; y < 100; y++) {
      for (let x = 0; x < 300; x++) {
        const [r, g, b] = pixel(canvas.image, x, y);
        maxRed = Math.max(maxRed, r);
        colours.add(`${r},${g},${b}`);
      }
    }
    expect(maxRed).toBe(0);
    expect(colours.has('0,230,255')).toBe(true);
  });

  it('centres on the measured width', async () => {
    const font = await Jimp.loadFont(Jimp.FONT_SANS_32_WHITE);
    const width = measureText(font, 'Hi');
    expect(centeredX(400, font, 'Hi')).toBe(Math.floor((400 - width) / 2));
  });
});
